import * as cheerio from 'cheerio';
import type { SourceHandler, CandidateItem, DiscoveryContext } from './adapter.js';
import type { SourceDefinition, ListingSelectors } from './registry.js';
import { fetchText } from './http.js';
import { parseInstant } from '../shared/time.js';
import { isRecord } from '../shared/utils.js';
import { SourceFetchError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

interface ListingRow {
  url: string;
  title: string;
  category?: string;
  rawDate?: string;
}

const ARTICLE_DATE_SELECTORS: Array<[string, string | null]> = [
  ['meta[property="article:published_time"]', 'content'],
  ['meta[name="article:published_time"]', 'content'],
  ['meta[itemprop="datePublished"]', 'content'],
  ['meta[name="pubdate"]', 'content'],
  ['meta[name="date"]', 'content'],
  ['time[datetime]', 'datetime'],
  ['[itemprop="datePublished"]', 'datetime'],
];

function textOf(value: string | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Parse listing rows from HTML. Relative links are resolved against `baseUrl`; rows
 * without a usable link or title are dropped, repeated URLs keep their first row.
 */
export function parseListing(html: string, baseUrl: string, selectors: ListingSelectors): ListingRow[] {
  const $ = cheerio.load(html);
  const rows: ListingRow[] = [];
  const seen = new Set<string>();

  $(selectors.item).each((_, el) => {
    const row = $(el);
    const link = row.is('a[href]') ? row : row.find(selectors.link).first();
    const href = link.attr('href');
    if (!href) return;

    let url: string;
    try {
      url = new URL(href, baseUrl).toString();
    } catch {
      return;
    }
    if (seen.has(url)) return;

    const title = textOf(selectors.title ? row.find(selectors.title).first().text() : link.text());
    if (!title) return;

    const category = selectors.category ? textOf(row.find(selectors.category).first().text()) : '';
    let rawDate: string | undefined;
    if (selectors.date) {
      const dateEl = row.find(selectors.date).first();
      rawDate = textOf(selectors.date_attr ? dateEl.attr(selectors.date_attr) : dateEl.attr('datetime') ?? dateEl.text());
    }

    seen.add(url);
    rows.push({ url, title, category: category || undefined, rawDate: rawDate || undefined });
  });

  return rows;
}

function fromJsonLd($: cheerio.CheerioAPI): string | undefined {
  let found: string | undefined;
  $('script[type="application/ld+json"]').each((_, el) => {
    if (found) return;
    let data: unknown;
    try {
      data = JSON.parse($(el).text());
    } catch {
      // malformed JSON-LD blocks are common; the meta selectors still apply
      return;
    }
    const nodes: unknown[] = Array.isArray(data) ? data : [data];
    for (const node of nodes) {
      if (!isRecord(node)) continue;
      const graph = node['@graph'];
      const candidates: unknown[] = Array.isArray(graph) ? [node, ...graph] : [node];
      for (const candidate of candidates) {
        if (isRecord(candidate) && typeof candidate['datePublished'] === 'string') {
          found = candidate['datePublished'];
          return;
        }
      }
    }
  });
  return found;
}

/**
 * Find the publish instant on an article page.
 */
export function extractPublishedAt(html: string, customSelector?: string): Date | null {
  const $ = cheerio.load(html);

  if (customSelector) {
    const el = $(customSelector).first();
    const fromCustom = parseInstant(el.attr('datetime') ?? el.attr('content') ?? el.text());
    if (fromCustom) return fromCustom;
  }

  for (const [selector, attr] of ARTICLE_DATE_SELECTORS) {
    const el = $(selector).first();
    if (el.length === 0) continue;
    const parsed = parseInstant(attr ? el.attr(attr) : el.text());
    if (parsed) return parsed;
  }

  return parseInstant(fromJsonLd($));
}

export class ListingHandler implements SourceHandler {
  readonly kind = 'listing';

  constructor(
    private readonly timeoutMs: number,
    private readonly userAgent: string,
  ) {}

  async *discover(source: SourceDefinition, ctx: DiscoveryContext): AsyncGenerator<CandidateItem> {
    const selectors = source.listing;
    if (!selectors) {
      throw new SourceFetchError(`Listing source ${source.name} has no selectors`, { source: source.name });
    }

    let rows: ListingRow[];
    try {
      const doc = await fetchText(source.endpoint, { timeoutMs: this.timeoutMs, userAgent: this.userAgent });
      rows = parseListing(doc.body, doc.url, selectors);
    } catch (err) {
      throw new SourceFetchError(`Listing unavailable for ${source.name}: ${errorMessage(err)}`, {
        source: source.name,
        url: source.endpoint,
      });
    }

    ctx.report.entries = rows.length;

    for (const row of rows) {
      if (ctx.report.yielded >= source.max_items) break;

      let publishedAt = parseInstant(row.rawDate);
      if (!publishedAt) {
        // Listing pages rarely carry a normalized timestamp; ask the article itself.
        try {
          const page = await fetchText(row.url, { timeoutMs: this.timeoutMs, userAgent: this.userAgent });
          publishedAt = extractPublishedAt(page.body, selectors.article_date);
        } catch (err) {
          ctx.report.itemErrors++;
          logger.warn({ source: source.name, url: row.url, error: errorMessage(err) }, 'Article date lookup failed');
          continue;
        }
      }

      if (!publishedAt) {
        ctx.report.malformed++;
        logger.debug({ source: source.name, url: row.url }, 'No publish date found, skipping');
        continue;
      }

      if (publishedAt.getTime() < ctx.cutoff.getTime()) {
        ctx.report.stale++;
        continue;
      }

      ctx.report.yielded++;
      yield {
        url: row.url,
        title: row.title,
        publishedAt,
        sourceName: source.name,
        category: row.category,
      };
    }
  }
}
