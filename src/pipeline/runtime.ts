import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import { MemoryGuard } from '../shared/memory.js';
import { retryPolicy } from '../shared/retry.js';
import { resolvePath } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import { loadSourceRegistry, type SourceRegistry } from '../source/registry.js';
import { Discovery } from '../source/discover.js';
import { DuplicateFilter } from '../source/dedup.js';
import { ContentExtractor, extractorOptions, type ContentCleaner } from '../extract/extractor.js';
import { JsdomRenderer, RenderPool } from '../extract/renderer.js';
import { LlmClient } from '../llm/client.js';
import { LlmContentCleaner } from '../llm/cleaner.js';
import { OpenAiEmbedder } from '../llm/embedder.js';
import { FsArchive, type ContentArchive } from '../store/archive.js';
import { QdrantIndex, type VectorIndexFactory } from '../store/vectorIndex.js';
import { PersistenceCoordinator } from '../store/persist.js';
import { RetentionSweeper } from '../retention/sweeper.js';
import { openDatabase } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { SqliteRunLog } from '../db/runs.js';
import { SqliteFailureLedger } from '../db/failures.js';
import { HealthRegistry } from './health.js';
import { CycleOrchestrator } from './orchestrator.js';

export interface Runtime {
  config: Config;
  db: Database.Database;
  registry: SourceRegistry;
  health: HealthRegistry;
  dedup: DuplicateFilter;
  renderer: RenderPool | null;
  archive: ContentArchive | null;
  indexFactory: VectorIndexFactory | null;
  persistence: PersistenceCoordinator;
  sweeper: RetentionSweeper;
  orchestrator: CycleOrchestrator;
  startedAt: Date;
  close(): Promise<void>;
}

export interface RuntimeOverrides {
  registry?: SourceRegistry;
  db?: Database.Database;
  indexFactory?: VectorIndexFactory | null;
}

/**
 * Wire the pipeline from configuration. Collaborators with missing configuration are
 * left out and marked in the health registry; only the absence of every persistence
 * sink is fatal.
 */
export function buildRuntime(config: Config, overrides: RuntimeOverrides = {}): Runtime {
  const health = new HealthRegistry();

  const ownsDb = overrides.db === undefined;
  const db = overrides.db ?? openDatabase(config.db.path);
  runMigrations(db);
  const runLog = new SqliteRunLog(db);
  const ledger = new SqliteFailureLedger(db);

  const registry = overrides.registry ?? loadSourceRegistry(resolvePath(config.sources_file));

  // Render pool
  let renderer: RenderPool | null = null;
  if (config.render.enabled) {
    renderer = new RenderPool(
      config.render.max_concurrent,
      () =>
        new JsdomRenderer({
          timeoutMs: config.http.timeout_ms,
          userAgent: config.http.user_agent,
          settleMs: config.render.settle_ms,
          runScripts: config.render.run_scripts,
        }),
    );
    health.mark('renderer', 'healthy');
  } else {
    health.mark('renderer', 'disabled');
  }

  // Optional LLM cleaner
  let cleaner: ContentCleaner | null = null;
  if (!config.llm.clean_content) {
    health.mark('llm', 'disabled');
  } else if (!config.llm.api_key) {
    health.mark('llm', 'unhealthy', 'llm.clean_content is on but llm.api_key is missing');
  } else {
    cleaner = new LlmContentCleaner(new LlmClient(config.llm), { translateTo: config.llm.translate_to });
    health.mark('llm', 'healthy');
  }

  // Index sink: needs both an endpoint and an embedder
  let indexFactory: VectorIndexFactory | null = null;
  const embedder = config.embedding.api_key
    ? new OpenAiEmbedder(config.embedding, config.vector_index.dimensions)
    : null;
  if (overrides.indexFactory !== undefined) {
    indexFactory = overrides.indexFactory;
  } else if (config.vector_index.url) {
    indexFactory = () => new QdrantIndex(config.vector_index);
  }

  if (!indexFactory) {
    health.mark('index', 'disabled', 'vector_index.url not set');
  } else if (!embedder) {
    health.mark('index', 'unhealthy', 'embedding.api_key is missing');
  } else {
    const factory = indexFactory;
    health.register('index', async () => {
      const index = factory();
      try {
        return await index.healthCheck();
      } finally {
        await index.close();
      }
    });
  }
  const usableIndex = embedder ? indexFactory : null;

  // Archive sink
  let archive: ContentArchive | null = null;
  if (config.archive.enabled) {
    const fsArchive = new FsArchive(resolvePath(config.archive.dir));
    archive = fsArchive;
    health.register('archive', () => fsArchive.healthCheck());
  } else {
    health.mark('archive', 'disabled');
  }

  if (!usableIndex && !archive) {
    throw new ConfigError('No persistence sink available: configure vector_index and embedding, or enable archive');
  }

  const persistence = new PersistenceCoordinator({
    archive,
    indexFactory: usableIndex,
    embedder,
    ledger,
    timeZone: config.timezone,
    indexRetry: retryPolicy({
      maxAttempts: config.vector_index.retry.max_attempts,
      baseDelayMs: config.vector_index.retry.base_delay_ms,
    }),
    archiveRetry: retryPolicy({
      maxAttempts: config.archive.retry.max_attempts,
      baseDelayMs: config.archive.retry.base_delay_ms,
    }),
  });

  const sweeper = new RetentionSweeper({
    indexFactory: usableIndex,
    archive,
    timeZone: config.timezone,
    onResult: (result) => runLog.recordRetention(result),
  });

  const dedup = new DuplicateFilter({
    capacity: config.dedup.capacity,
    matchTitles: config.dedup.match_titles,
    minTitleChars: config.dedup.min_title_chars,
    titleTtlHours: config.dedup.title_ttl_hours,
  });

  const orchestrator = new CycleOrchestrator({
    registry,
    discovery: new Discovery({ timeoutMs: config.http.timeout_ms, userAgent: config.http.user_agent }),
    extractor: new ContentExtractor(extractorOptions(config, renderer, cleaner)),
    persistence,
    dedup,
    sourceConcurrency: config.pipeline.source_concurrency,
    memory: new MemoryGuard({ highWaterMb: config.memory.high_water_mb, cooldownMs: config.memory.cooldown_ms }),
    sweeper: usableIndex ? sweeper : null,
    retention: {
      hours: config.retention.hours,
      intervalHours: config.schedule.retention_interval_hours,
      includeArchive: config.retention.include_archive,
    },
    stats: runLog,
  });

  logger.info(
    { sources: registry.active.length, health: health.all().map((h) => `${h.name}:${h.status}`) },
    'Runtime ready',
  );

  return {
    config,
    db,
    registry,
    health,
    dedup,
    renderer,
    archive,
    indexFactory: usableIndex,
    persistence,
    sweeper,
    orchestrator,
    startedAt: new Date(),
    close: async () => {
      await renderer?.close();
      if (ownsDb) db.close();
    },
  };
}
