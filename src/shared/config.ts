import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getHarvestDir, isRecord } from './utils.js';
import { isValidTimeZone } from './time.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const STRATEGY_NAMES = ['rendered', 'static', 'paragraphs', 'summary'] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];

const RetrySettingsSchema = (maxAttempts: number, baseDelayMs: number) =>
  z
    .object({
      max_attempts: z.number().int().min(1).default(maxAttempts),
      base_delay_ms: z.number().int().min(0).default(baseDelayMs),
    })
    .default({});

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  sources_file: z.string().default('~/.newsharvest/sources.yaml'),

  timezone: z
    .string()
    .default('America/Los_Angeles')
    .refine(isValidTimeZone, { message: 'Unknown IANA timezone' }),

  schedule: z
    .object({
      cycle_cron: z.string().default('0 * * * *'),
      retention_interval_hours: z.number().positive().default(24),
    })
    .default({}),

  pipeline: z
    .object({
      source_concurrency: z.number().int().min(1).default(2),
    })
    .default({}),

  http: z
    .object({
      timeout_ms: z.number().int().positive().default(30000),
      user_agent: z
        .string()
        .default(
          'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
        ),
    })
    .default({}),

  extract: z
    .object({
      min_chars: z.number().int().min(1).default(200),
      stage_timeout_ms: z.number().int().positive().default(30000),
      fallback_order: z.array(z.enum(STRATEGY_NAMES)).min(1).default([...STRATEGY_NAMES]),
      min_line_chars: z.number().int().min(0).default(10),
      summary_title_prefix: z.boolean().default(true),
    })
    .default({}),

  render: z
    .object({
      enabled: z.boolean().default(true),
      max_concurrent: z.number().int().min(1).default(2),
      settle_ms: z.number().int().min(0).default(1500),
      run_scripts: z.boolean().default(false),
    })
    .default({}),

  dedup: z
    .object({
      capacity: z.number().int().min(1).default(10000),
      match_titles: z.boolean().default(true),
      min_title_chars: z.number().int().min(1).default(16),
      title_ttl_hours: z.number().positive().default(24),
    })
    .default({}),

  memory: z
    .object({
      high_water_mb: z.number().positive().default(800),
      cooldown_ms: z.number().int().min(0).default(10000),
    })
    .default({}),

  llm: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('gpt-4.1-mini'),
      max_tokens: z.number().default(4000),
      temperature: z.number().default(0),
      timeout_ms: z.number().default(60000),
      max_concurrent: z.number().default(2),
      clean_content: z.boolean().default(false),
      translate_to: z.string().default(''),
    })
    .default({}),

  embedding: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('text-embedding-3-small'),
      timeout_ms: z.number().default(30000),
      max_input_chars: z.number().int().positive().default(8000),
    })
    .default({}),

  vector_index: z
    .object({
      url: z.string().default(''),
      api_key: z.string().default(''),
      collection: z.string().default('news_articles'),
      dimensions: z.number().int().positive().default(1536),
      timeout_ms: z.number().int().positive().default(30000),
      retry: RetrySettingsSchema(3, 2000),
    })
    .default({}),

  archive: z
    .object({
      enabled: z.boolean().default(true),
      dir: z.string().default('~/.newsharvest/archive'),
      retry: RetrySettingsSchema(2, 1000),
    })
    .default({}),

  retention: z
    .object({
      hours: z.number().positive().default(24),
      include_archive: z.boolean().default(false),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.newsharvest/newsharvest.db'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RetrySettings = Config['archive']['retry'];

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  const value: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
  raw[key] = value;
  return value;
}

/**
 * Apply NEWSHARVEST_* environment overrides for credentials and endpoints.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const overrides: Array<[string, string, string | undefined]> = [
    ['llm', 'api_key', env['NEWSHARVEST_LLM_API_KEY']],
    ['llm', 'base_url', env['NEWSHARVEST_LLM_BASE_URL']],
    ['llm', 'model', env['NEWSHARVEST_LLM_MODEL']],
    ['embedding', 'api_key', env['NEWSHARVEST_EMBEDDING_API_KEY'] ?? env['NEWSHARVEST_LLM_API_KEY']],
    ['embedding', 'base_url', env['NEWSHARVEST_EMBEDDING_BASE_URL']],
    ['vector_index', 'url', env['NEWSHARVEST_QDRANT_URL']],
    ['vector_index', 'api_key', env['NEWSHARVEST_QDRANT_API_KEY']],
  ];

  for (const [sectionName, key, value] of overrides) {
    if (value) section(rawConfig, sectionName)[key] = value;
  }
  return rawConfig;
}

export function parseConfig(rawConfig: Record<string, unknown>): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

function toRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

export async function loadConfig(): Promise<Config> {
  if (cachedConfig) return cachedConfig;

  const explorer = cosmiconfig('newsharvest', {
    searchPlaces: [
      'newsharvest.config.yaml',
      'newsharvest.config.yml',
      '.newsharvestrc.yaml',
      '.newsharvestrc.yml',
    ],
  });

  const envConfigPath = process.env['NEWSHARVEST_CONFIG'];
  const defaultConfigPath = path.join(getHarvestDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    rawConfig = toRecord((await explorer.load(resolved))?.config);
  } else if (fs.existsSync(defaultConfigPath)) {
    rawConfig = toRecord((await explorer.load(defaultConfigPath))?.config);
  } else {
    logger.debug('No config file found, using defaults');
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}
