import { vi } from 'vitest';
import { SourceDefinitionSchema, type SourceDefinition } from '../../source/registry.js';
import type { CandidateItem } from '../../source/adapter.js';
import type { ExtractedArticle } from '../../extract/extractor.js';

type Routes = Record<string, string | { status: number; body?: string } | Error>;

/**
 * Replace global fetch with a URL → response table. Unknown URLs answer 404.
 */
export function mockFetch(routes: Routes) {
  const fn = vi.fn(async (input: string | URL | Request) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const route = routes[url];
    if (route === undefined) return new Response('not found', { status: 404 });
    if (route instanceof Error) throw route;
    if (typeof route === 'string') return new Response(route, { status: 200 });
    return new Response(route.body ?? '', { status: route.status });
  });
  globalThis.fetch = fn;
  return fn;
}

export function makeSource(overrides: Record<string, unknown> = {}): SourceDefinition {
  return SourceDefinitionSchema.parse({
    name: 'test-feed',
    kind: 'feed',
    endpoint: 'https://example.com/feed.xml',
    ...overrides,
  });
}

export function makeItem(overrides: Partial<CandidateItem> = {}): CandidateItem {
  return {
    url: 'https://example.com/news/rates-steady',
    title: 'Central bank keeps rates steady',
    publishedAt: new Date('2024-06-01T10:00:00Z'),
    sourceName: 'test-feed',
    ...overrides,
  };
}

export function makeArticle(overrides: Partial<ExtractedArticle> = {}): ExtractedArticle {
  const content = overrides.content ?? 'The central bank left its policy rate unchanged on Saturday.';
  return {
    ...makeItem(),
    content,
    contentLength: content.length,
    wordCount: content.split(/\s+/).length,
    extractionMethod: 'static',
    belowMinimum: false,
    lang: 'en',
    cleanedBy: 'regex',
    ...overrides,
  };
}

/** Sentences joined into a paragraph long enough to pass extraction minimums. */
export function longParagraph(topic: string, sentences = 6): string {
  return Array.from(
    { length: sentences },
    (_, i) => `${topic} sentence number ${i + 1} carries enough words to count as article text.`,
  ).join(' ');
}
