import Parser from 'rss-parser';
import type { SourceHandler, CandidateItem, DiscoveryContext } from './adapter.js';
import type { SourceDefinition } from './registry.js';
import { fetchText } from './http.js';
import { parseInstant } from '../shared/time.js';
import { SourceFetchError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

type FeedEntry = {
  contentEncoded?: string;
  creator?: string;
  summary?: string;
};

const parser = new Parser<Record<string, unknown>, FeedEntry>({
  customFields: {
    item: [
      ['content:encoded', 'contentEncoded'],
      ['dc:creator', 'creator'],
    ],
  },
});

const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';

// Some feeds deliver categories as xml2js objects ({ _: 'Name', $: {...} }) despite the typings.
function firstCategory(categories: unknown): string | undefined {
  if (!Array.isArray(categories)) return undefined;
  const list: unknown[] = categories;
  for (const c of list) {
    if (typeof c === 'string' && c.trim()) return c.trim();
    if (c !== null && typeof c === 'object' && '_' in c) {
      const text = c._;
      if (typeof text === 'string' && text.trim()) return text.trim();
    }
  }
  return undefined;
}

export class FeedHandler implements SourceHandler {
  readonly kind = 'feed';

  constructor(
    private readonly timeoutMs: number,
    private readonly userAgent: string,
  ) {}

  async *discover(source: SourceDefinition, ctx: DiscoveryContext): AsyncGenerator<CandidateItem> {
    let feed: Parser.Output<FeedEntry>;
    try {
      const doc = await fetchText(source.endpoint, {
        timeoutMs: this.timeoutMs,
        userAgent: this.userAgent,
        accept: FEED_ACCEPT,
      });
      feed = await parser.parseString(doc.body);
    } catch (err) {
      throw new SourceFetchError(`Feed unavailable for ${source.name}: ${errorMessage(err)}`, {
        source: source.name,
        url: source.endpoint,
      });
    }

    const entries = feed.items ?? [];
    ctx.report.entries = entries.length;

    for (const entry of entries) {
      if (ctx.report.yielded >= source.max_items) break;

      const title = entry.title?.trim();
      const link = entry.link?.trim();
      const publishedAt = parseInstant(entry.isoDate ?? entry.pubDate);

      if (!title || !link || !publishedAt) {
        ctx.report.malformed++;
        logger.debug({ source: source.name, title, link }, 'Skipping malformed feed entry');
        continue;
      }

      let url: string;
      try {
        url = new URL(link, source.endpoint).toString();
      } catch {
        ctx.report.malformed++;
        continue;
      }

      if (publishedAt.getTime() < ctx.cutoff.getTime()) {
        ctx.report.stale++;
        continue;
      }

      const summary = entry.contentSnippet ?? entry.summary ?? entry.contentEncoded ?? entry.content;
      ctx.report.yielded++;
      yield {
        url,
        title,
        publishedAt,
        sourceName: source.name,
        author: entry.creator?.trim() || undefined,
        category: firstCategory(entry.categories),
        summary: summary?.trim() || undefined,
      };
    }
  }
}
