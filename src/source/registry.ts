import { z } from 'zod';
import fs from 'node:fs';
import { parse as yamlParse } from 'yaml';
import { STRATEGY_NAMES } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

const ListingSelectorsSchema = z.object({
  item: z.string().min(1),
  link: z.string().default('a[href]'),
  title: z.string().optional(),
  category: z.string().optional(),
  date: z.string().optional(),
  date_attr: z.string().optional(),
  article_date: z.string().optional(),
});

export const SourceDefinitionSchema = z
  .object({
    name: z.string().min(1),
    kind: z.enum(['feed', 'listing']),
    endpoint: z.string().url(),
    enabled: z.boolean().default(true),
    recency_hours: z.number().positive().default(24),
    max_items: z.number().int().positive().default(50),
    content_selectors: z.array(z.string()).default([]),
    min_word_count: z.number().int().min(0).default(0),
    fallback_order: z.array(z.enum(STRATEGY_NAMES)).min(1).optional(),
    archive_check_before_write: z.boolean().default(false),
    /** Overrides `render.run_scripts` for this source. */
    run_scripts: z.boolean().optional(),
    listing: ListingSelectorsSchema.optional(),
  })
  .superRefine((source, ctx) => {
    if (source.kind === 'listing' && !source.listing) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'listing sources require listing selectors',
        path: ['listing'],
      });
    }
  });

export type SourceDefinition = z.infer<typeof SourceDefinitionSchema>;
export type ListingSelectors = z.infer<typeof ListingSelectorsSchema>;

const RegistrySchema = z.object({
  sources: z.array(SourceDefinitionSchema),
});

export interface SourceRegistry {
  all: readonly SourceDefinition[];
  active: readonly SourceDefinition[];
  get(name: string): SourceDefinition | undefined;
}

export function buildRegistry(sources: SourceDefinition[]): SourceRegistry {
  const seen = new Set<string>();
  for (const source of sources) {
    if (seen.has(source.name)) {
      throw new ConfigError(`Duplicate source name: ${source.name}`, { name: source.name });
    }
    seen.add(source.name);
  }

  const all = Object.freeze(sources.map((s) => Object.freeze({ ...s })));
  const active = Object.freeze(all.filter((s) => s.enabled));
  const byName = new Map(all.map((s) => [s.name, s]));
  return { all, active, get: (name) => byName.get(name) };
}

export function parseSourceRegistry(yamlContent: string): SourceRegistry {
  const raw = yamlParse(yamlContent) as unknown;
  const result = RegistrySchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError('Invalid source registry', {
      errors: result.error.flatten().fieldErrors,
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return buildRegistry(result.data.sources);
}

export function loadSourceRegistry(filePath: string): SourceRegistry {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Source registry not found: ${filePath}`);
  }
  const registry = parseSourceRegistry(fs.readFileSync(filePath, 'utf-8'));
  logger.info(
    { file: filePath, total: registry.all.length, active: registry.active.length },
    'Source registry loaded',
  );
  return registry;
}
