import * as cheerio from 'cheerio';
import { JSDOM } from 'jsdom';
import { Readability } from '@mozilla/readability';
import type { CandidateItem } from '../source/adapter.js';
import type { SourceDefinition } from '../source/registry.js';
import type { StrategyName } from '../shared/config.js';
import { HarvestError } from '../shared/errors.js';
import { blockText, cleanText, NOISE_SELECTORS } from './clean.js';
import type { ItemPage } from './page.js';
import type { PageRenderer } from './renderer.js';

export interface StrategyInput {
  item: CandidateItem;
  source: SourceDefinition;
  page: ItemPage;
  signal: AbortSignal;
}

/**
 * One way of turning an item into raw article text. Returns '' when the page has
 * nothing usable; throws on fetch or render failure. Cleaning and thresholds are
 * applied by the extractor.
 */
export interface ExtractionStrategy {
  readonly name: StrategyName;
  run(input: StrategyInput): Promise<string>;
}

/** Generic content containers tried after the source's own selectors. */
export const GENERIC_SELECTORS = ['article', '[class*=content]', '[class*=post]', '[class*=entry]', 'main'];

/**
 * Text of the match with the most text across `selectors`, or '' when nothing matches.
 */
export function largestMatch($: cheerio.CheerioAPI, selectors: readonly string[]): string {
  let best = '';
  for (const selector of selectors) {
    try {
      $(selector).each((_, el) => {
        const text = blockText($.html(el)).trim();
        if (text.length > best.length) best = text;
      });
    } catch (err) {
      throw new HarvestError(`Invalid content selector: ${selector}`, 'INVALID_SELECTOR', {
        selector,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
  return best;
}

export interface MatchThreshold {
  minChars: number;
  minLineChars: number;
}

/** A selector match stands in for the page only when its cleaned text reaches the minimum. */
export function qualifies(text: string, threshold: MatchThreshold): boolean {
  return text.length > 0 && cleanText(text, { minLineChars: threshold.minLineChars }).length >= threshold.minChars;
}

export class RenderedStrategy implements ExtractionStrategy {
  readonly name = 'rendered' as const;

  constructor(
    private readonly renderer: PageRenderer | null,
    private readonly threshold: MatchThreshold,
  ) {}

  async run({ item, source, signal }: StrategyInput): Promise<string> {
    if (!this.renderer) throw new HarvestError('Renderer unavailable', 'RENDERER_UNAVAILABLE');

    const html = await this.renderer.render(item.url, signal, source.run_scripts);
    const $ = cheerio.load(html);
    $(NOISE_SELECTORS).remove();

    const selected = largestMatch($, source.content_selectors);
    if (qualifies(selected, this.threshold)) return selected;

    const dom = new JSDOM(html, { url: item.url });
    try {
      const article = new Readability(dom.window.document).parse();
      return article?.content ? blockText(article.content) : '';
    } finally {
      dom.window.close();
    }
  }
}

export class StaticStrategy implements ExtractionStrategy {
  readonly name = 'static' as const;

  constructor(private readonly threshold: MatchThreshold) {}

  async run({ source, page }: StrategyInput): Promise<string> {
    const $ = cheerio.load(await page.html());
    $(NOISE_SELECTORS).remove();

    for (const selectors of [source.content_selectors, GENERIC_SELECTORS]) {
      const selected = largestMatch($, selectors);
      if (qualifies(selected, this.threshold)) return selected;
    }

    return blockText($.html($('body')));
  }
}

export class ParagraphStrategy implements ExtractionStrategy {
  readonly name = 'paragraphs' as const;

  async run({ page }: StrategyInput): Promise<string> {
    const $ = cheerio.load(await page.html());
    $(NOISE_SELECTORS).remove();

    const paragraphs: string[] = [];
    $('p').each((_, el) => {
      const text = $(el).text().replace(/\s+/g, ' ').trim();
      if (text) paragraphs.push(text);
    });
    return paragraphs.join('\n');
  }
}

export class SummaryStrategy implements ExtractionStrategy {
  readonly name = 'summary' as const;

  constructor(private readonly titlePrefix: boolean) {}

  async run({ item, page }: StrategyInput): Promise<string> {
    const summary = item.summary?.trim() ?? '';
    if (!summary) return '';
    if (!this.titlePrefix) return summary;

    const title = page.title() ?? item.title;
    return `${title}\n\n${summary}`;
  }
}
