import fs from 'node:fs/promises';
import path from 'node:path';
import { generateId } from '../shared/utils.js';
import { PersistenceError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ArchiveRecord } from './records.js';

/**
 * Durable store of full article records under date-partitioned keys
 * (`YYYY/MM/DD/<name>.json`).
 */
export interface ContentArchive {
  /** Write a record. Returns false when the key already exists; records are write-once. */
  put(key: string, record: ArchiveRecord): Promise<boolean>;
  /** True when any key starts with `prefix`. */
  exists(prefix: string): Promise<boolean>;
  get(key: string): Promise<ArchiveRecord | null>;
  /** Remove every day partition strictly before `day` (`YYYY/MM/DD`). Returns records removed. */
  deleteBefore(day: string): Promise<number>;
  healthCheck(): Promise<boolean>;
}

const KEY_PATTERN = /^\d{4}\/\d{2}\/\d{2}\/[a-z0-9\-]+\.json$/;

/**
 * Filesystem archive rooted at a directory. Writes go to a temp file first and are
 * renamed into place, so readers never see a partial record.
 */
export class FsArchive implements ContentArchive {
  constructor(private readonly rootDir: string) {}

  private resolve(key: string): string {
    const target = path.resolve(this.rootDir, key);
    const relative = path.relative(path.resolve(this.rootDir), target);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new PersistenceError(`Archive key escapes archive root: ${key}`, 'archive', { key });
    }
    return target;
  }

  async put(key: string, record: ArchiveRecord): Promise<boolean> {
    if (!KEY_PATTERN.test(key)) {
      throw new PersistenceError(`Malformed archive key: ${key}`, 'archive', { key });
    }
    const target = this.resolve(key);
    await fs.mkdir(path.dirname(target), { recursive: true });

    if (await pathExists(target)) {
      logger.debug({ key }, 'Archive record already present');
      return false;
    }

    const tmp = `${target}.${generateId(8)}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(record, null, 2), 'utf-8');
    try {
      await fs.rename(tmp, target);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
    return true;
  }

  async exists(prefix: string): Promise<boolean> {
    const target = this.resolve(prefix);
    const dir = prefix.endsWith('/') ? target : path.dirname(target);
    const namePrefix = prefix.endsWith('/') ? '' : path.basename(target);

    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
    return names.some((name) => name.startsWith(namePrefix) && !name.endsWith('.tmp'));
  }

  async get(key: string): Promise<ArchiveRecord | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.resolve(key), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    return JSON.parse(raw) as ArchiveRecord;
  }

  async deleteBefore(day: string): Promise<number> {
    let removed = 0;
    for (const year of await listDirs(this.rootDir)) {
      const yearDir = path.join(this.rootDir, year);
      for (const month of await listDirs(yearDir)) {
        const monthDir = path.join(yearDir, month);
        for (const dayName of await listDirs(monthDir)) {
          if (`${year}/${month}/${dayName}` >= day) continue;
          const dayDir = path.join(monthDir, dayName);
          const files = await fs.readdir(dayDir);
          removed += files.filter((f) => f.endsWith('.json')).length;
          await fs.rm(dayDir, { recursive: true, force: true });
        }
        await removeIfEmpty(monthDir);
      }
      await removeIfEmpty(yearDir);
    }
    logger.info({ before: day, removed }, 'Archive days removed');
    return removed;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await fs.mkdir(this.rootDir, { recursive: true });
      await fs.access(this.rootDir, fs.constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function listDirs(dir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory() && /^\d+$/.test(e.name))
      .map((e) => e.name)
      .sort();
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}

async function removeIfEmpty(dir: string): Promise<void> {
  const remaining = await fs.readdir(dir);
  if (remaining.length === 0) await fs.rmdir(dir);
}
