#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getHarvestDir, getPackageRoot, resolvePath } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { withDatabase } from '../db/db.js';
import { listFailures } from '../db/failures.js';
import { loadSourceRegistry } from '../source/registry.js';
import { buildRuntime, type Runtime } from '../pipeline/runtime.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('newsharvest')
  .description('News ingestion pipeline: discover, extract, archive and index articles')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create config, source registry and database')
  .action(async () => {
    const harvestDir = getHarvestDir();
    const configPath = path.join(harvestDir, 'config.yaml');

    // 1. Create config
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log('✓ ~/.newsharvest/config.yaml created');
    } else {
      log('✓ ~/.newsharvest/config.yaml already exists');
    }

    const config = await loadConfig();

    // 2. Copy the example source registry
    const sourcesPath = resolvePath(config.sources_file);
    if (!fs.existsSync(sourcesPath)) {
      fs.mkdirSync(path.dirname(sourcesPath), { recursive: true });
      fs.copyFileSync(path.join(getPackageRoot(), 'sources.example.yaml'), sourcesPath);
      log(`✓ ${config.sources_file} created from sources.example.yaml`);
    } else {
      log(`✓ ${config.sources_file} already exists`);
    }

    // 3. Init database
    await withDatabase(config.db.path, (_db, { applied }) => {
      if (applied.length > 0) {
        log(`✓ ${config.db.path} ready (${applied.length} migrations applied)`);
      } else {
        log(`✓ ${config.db.path} already up to date`);
      }
    });
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, source registry, database and collaborators')
  .action(async () => {
    let config: Config;
    try {
      config = await loadConfig();
    } catch (err) {
      log(`✗ Config: error (${errorMessage(err)})`);
      process.exitCode = 1;
      return;
    }

    const results: string[] = ['Config: ok'];
    try {
      const registry = loadSourceRegistry(resolvePath(config.sources_file));
      results.push(`Sources: ${registry.active.length}/${registry.all.length} active`);
    } catch (err) {
      results.push(`Sources: error (${errorMessage(err)})`);
      log(`✗ ${results.join(' | ')}`);
      process.exitCode = 1;
      return;
    }

    await withRuntime(config, async (runtime) => {
      results.push('DB: ok');
      for (const component of await runtime.health.check()) {
        results.push(`${component.name}: ${component.status}${component.detail ? ` (${component.detail})` : ''}`);
      }
    });

    log(`✓ ${results.join(' | ')}`);
  });

// === sources ===
program
  .command('sources')
  .description('List the configured sources')
  .action(async () => {
    const config = await loadConfig();
    const registry = loadSourceRegistry(resolvePath(config.sources_file));

    if (registry.all.length === 0) {
      log('No sources configured.');
      return;
    }
    for (const s of registry.all) {
      const state = s.enabled ? 'on ' : 'off';
      log(`${state} ${s.name.padEnd(24)} ${s.kind.padEnd(8)} ${String(s.recency_hours).padStart(4)}h  ${s.endpoint}`);
    }
  });

// === crawl ===
program
  .command('crawl')
  .description('Run one ingestion cycle now')
  .option('-s, --source <names...>', 'Only crawl these sources')
  .action(async (opts: { source?: string[] }) => {
    const config = await loadConfig();
    await withRuntime(config, async (runtime) => {
      const stats = await runtime.orchestrator.runCycle({ sources: opts.source });
      for (const s of stats.sources) {
        const error = s.error ? `  error: ${s.error}` : '';
        log(
          `${s.source.padEnd(24)} discovered ${s.discovered}  processed ${s.processed}  failed ${s.failed}  skipped ${s.skipped}${error}`,
        );
      }
      log(
        `✓ Cycle ${stats.status}: ${stats.discovered} discovered, ${stats.processed} processed, ${stats.failed} failed, ${stats.skipped} skipped`,
      );
      if (stats.status !== 'completed') process.exitCode = 1;
    });
  });

// === start ===
program
  .command('start')
  .description('Start the status server and run cycles on schedule')
  .option('-p, --port <port>', 'Port number')
  .option('--no-run-on-start', 'Wait for the first scheduled tick')
  .action(async (opts: { port?: string; runOnStart: boolean }) => {
    const config = await loadConfig();
    const runtime = buildRuntime(config);
    startServer(runtime, {
      port: opts.port ? parseInt(opts.port, 10) : undefined,
      runOnStart: opts.runOnStart,
    });
  });

// === cleanup ===
program
  .command('cleanup')
  .description('Delete index entries published before the retention window')
  .option('--hours <n>', 'Retention window in hours')
  .option('--archive', 'Also delete archive days before the cutoff')
  .action(async (opts: { hours?: string; archive?: boolean }) => {
    const config = await loadConfig();
    const hours = opts.hours ? Number(opts.hours) : config.retention.hours;
    if (!Number.isFinite(hours) || hours <= 0) {
      log(`Invalid --hours value: ${opts.hours}`);
      process.exitCode = 1;
      return;
    }

    await withRuntime(config, async (runtime) => {
      const result = await runtime.sweeper.sweep(hours, {
        includeArchive: opts.archive ?? config.retention.include_archive,
      });
      if (result.status === 'completed') {
        log(
          `✓ Removed ${result.deletedCount} index entries older than ${hours}h` +
            (result.archiveDeleted ? `, ${result.archiveDeleted} archive records` : '') +
            ` (${result.durationSeconds.toFixed(1)}s)`,
        );
      } else {
        log(`✗ Retention sweep ${result.status}: ${result.error ?? 'unknown error'}`);
        process.exitCode = 1;
      }
    });
  });

// === clear-index ===
program
  .command('clear-index')
  .description('Delete every entry in the vector index (destructive)')
  .option('--yes', 'Confirm deletion')
  .action(async (opts: { yes?: boolean }) => {
    if (!opts.yes) {
      log('This deletes every entry in the vector index. Re-run with --yes to confirm.');
      process.exitCode = 1;
      return;
    }
    const config = await loadConfig();
    await withRuntime(config, async (runtime) => {
      const deleted = await runtime.sweeper.clearIndex();
      log(`✓ Vector index cleared (${deleted} entries)`);
    });
  });

// === index-init ===
program
  .command('index-init')
  .description('Create the vector index collection and payload indexes if missing')
  .action(async () => {
    const config = await loadConfig();
    await withRuntime(config, async (runtime) => {
      if (!runtime.indexFactory) {
        log('Vector index is not configured (vector_index.url and embedding.api_key).');
        process.exitCode = 1;
        return;
      }
      const index = runtime.indexFactory();
      try {
        await index.ensureCollection();
        const stats = await index.stats();
        log(`✓ Collection ${config.vector_index.collection} ready (${stats.points} points, ${stats.status})`);
      } finally {
        await index.close();
      }
    });
  });

// === failures ===
const failuresCmd = program.command('failures').description('Inspect and re-drive failed writes');

failuresCmd
  .command('list')
  .description('List persistence failures')
  .option('-a, --all', 'Include resolved failures')
  .action(async (opts: { all?: boolean }) => {
    const config = await loadConfig();
    await withDatabase(config.db.path, (db) => {
      const failures = listFailures(db, { includeResolved: opts.all });
      if (failures.length === 0) {
        log('No persistence failures.');
        return;
      }
      for (const f of failures) {
        const state = f.resolved_at ? 'resolved' : 'pending ';
        log(`#${String(f.id).padEnd(5)} ${state} ${f.sink.padEnd(7)} ${f.source.padEnd(20)} ${f.title.slice(0, 60)}`);
        log(`       ${f.url}  (${f.error.slice(0, 100)})`);
      }
    });
  });

failuresCmd
  .command('redrive [ids...]')
  .description('Retry failed writes (all pending when no ids are given)')
  .action(async (ids: string[]) => {
    const parsed = ids.map((id) => parseInt(id, 10));
    if (parsed.some((id) => Number.isNaN(id))) {
      log(`Invalid failure id in: ${ids.join(', ')}`);
      process.exitCode = 1;
      return;
    }

    const config = await loadConfig();
    await withRuntime(config, async (runtime) => {
      const outcomes = await runtime.persistence.redrive(parsed.length > 0 ? parsed : undefined);
      for (const o of outcomes) {
        log(`#${o.id} ${o.sink} ${o.resolved ? '✓ resolved' : `✗ ${o.error ?? 'failed'}`}  ${o.url}`);
      }
      log(`✓ ${outcomes.filter((o) => o.resolved).length}/${outcomes.length} failures resolved`);
    });
  });

// === Helper to run a command against the wired pipeline ===
async function withRuntime(config: Config, fn: (runtime: Runtime) => Promise<void>): Promise<void> {
  const runtime = buildRuntime(config);
  try {
    await fn(runtime);
  } finally {
    await runtime.close();
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync(process.argv).catch((err: unknown) => {
  log(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
