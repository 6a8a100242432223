import type { CandidateItem } from '../source/adapter.js';
import type { SourceDefinition } from '../source/registry.js';
import { fetchText } from '../source/http.js';
import type { Config, StrategyName } from '../shared/config.js';
import { ExtractionExhaustedError, errorMessage, type StrategyAttempt } from '../shared/errors.js';
import { withTimeout } from '../shared/timeout.js';
import { logger } from '../shared/logger.js';
import { cleanText, countWords, detectLanguage } from './clean.js';
import { ItemPage, type PageLoader } from './page.js';
import type { PageRenderer } from './renderer.js';
import {
  ParagraphStrategy,
  RenderedStrategy,
  StaticStrategy,
  SummaryStrategy,
  type ExtractionStrategy,
} from './strategies.js';

export interface ExtractedArticle extends CandidateItem {
  content: string;
  contentLength: number;
  wordCount: number;
  extractionMethod: StrategyName;
  /** Only the summary fallback may produce text under the minimums. */
  belowMinimum: boolean;
  lang: string | null;
  translatedTitle?: string;
  translatedContent?: string;
  cleanedBy: 'regex' | 'llm';
}

export interface CleanerInput {
  url: string;
  title: string;
  content: string;
  lang: string | null;
}

export interface CleanerOutput {
  content: string;
  author?: string;
  category?: string;
  translatedTitle?: string;
  translatedContent?: string;
}

/**
 * Optional rewrite step run on the winning text. Failures fall back to the regex
 * cleaned text.
 */
export interface ContentCleaner {
  clean(input: CleanerInput): Promise<CleanerOutput>;
}

export interface ExtractorOptions {
  minChars: number;
  minLineChars: number;
  stageTimeoutMs: number;
  fallbackOrder: readonly StrategyName[];
  summaryTitlePrefix: boolean;
  renderer: PageRenderer | null;
  loadPage: PageLoader;
  cleaner?: ContentCleaner | null;
}

export function extractorOptions(
  config: Config,
  renderer: PageRenderer | null,
  cleaner: ContentCleaner | null = null,
): ExtractorOptions {
  return {
    minChars: config.extract.min_chars,
    minLineChars: config.extract.min_line_chars,
    stageTimeoutMs: config.extract.stage_timeout_ms,
    fallbackOrder: config.extract.fallback_order,
    summaryTitlePrefix: config.extract.summary_title_prefix,
    renderer,
    cleaner,
    loadPage: (url) =>
      fetchText(url, { timeoutMs: config.http.timeout_ms, userAgent: config.http.user_agent }),
  };
}

/**
 * Ordered fallback chain. The first strategy whose cleaned text meets the source's
 * minimums wins and later strategies are never invoked.
 */
export class ContentExtractor {
  private readonly strategies: Map<StrategyName, ExtractionStrategy>;

  constructor(private readonly opts: ExtractorOptions) {
    const threshold = { minChars: opts.minChars, minLineChars: opts.minLineChars };
    const all: ExtractionStrategy[] = [
      new RenderedStrategy(opts.renderer, threshold),
      new StaticStrategy(threshold),
      new ParagraphStrategy(),
      new SummaryStrategy(opts.summaryTitlePrefix),
    ];
    this.strategies = new Map(all.map((s) => [s.name, s]));
  }

  async extract(item: CandidateItem, source: SourceDefinition): Promise<ExtractedArticle> {
    const order = source.fallback_order ?? this.opts.fallbackOrder;
    const page = new ItemPage(item.url, this.opts.loadPage);
    const attempts: StrategyAttempt[] = [];

    for (const name of order) {
      const strategy = this.strategies.get(name);
      if (!strategy) continue;

      let text: string;
      try {
        const raw = await withTimeout(this.opts.stageTimeoutMs, `${name} extraction`, (signal) =>
          strategy.run({ item, source, page, signal }),
        );
        text = cleanText(raw, { minLineChars: this.opts.minLineChars });
      } catch (err) {
        attempts.push({ strategy: name, reason: errorMessage(err), chars: 0 });
        logger.debug({ url: item.url, strategy: name, error: errorMessage(err) }, 'Extraction strategy failed');
        continue;
      }

      const meetsMinimum = this.meetsMinimum(text, source);

      if (meetsMinimum || (name === 'summary' && text.length > 0)) {
        logger.debug({ url: item.url, strategy: name, chars: text.length }, 'Extraction succeeded');
        return this.finish(item, source, text, name, !meetsMinimum);
      }

      attempts.push({
        strategy: name,
        reason: text.length === 0 ? 'no text' : `below minimum (${text.length} chars, ${countWords(text)} words)`,
        chars: text.length,
      });
    }

    throw new ExtractionExhaustedError(`All extraction strategies failed for ${item.url}`, attempts, {
      url: item.url,
      source: source.name,
    });
  }

  private meetsMinimum(text: string, source: SourceDefinition): boolean {
    return text.length >= this.opts.minChars && countWords(text) >= source.min_word_count;
  }

  private async finish(
    item: CandidateItem,
    source: SourceDefinition,
    text: string,
    method: StrategyName,
    belowMinimum: boolean,
  ): Promise<ExtractedArticle> {
    const article: ExtractedArticle = {
      ...item,
      content: text,
      contentLength: text.length,
      wordCount: countWords(text),
      extractionMethod: method,
      belowMinimum,
      lang: detectLanguage(text),
      cleanedBy: 'regex',
    };

    const cleaner = this.opts.cleaner;
    if (!cleaner) return article;

    try {
      const out = await cleaner.clean({ url: item.url, title: item.title, content: text, lang: article.lang });
      const content = out.content.trim();
      if (!content) return article;
      if (!belowMinimum && !this.meetsMinimum(content, source)) {
        logger.warn(
          { url: item.url, chars: content.length, minChars: this.opts.minChars },
          'Cleaned content below minimum, keeping regex-cleaned text',
        );
        return article;
      }
      return {
        ...article,
        content,
        contentLength: content.length,
        wordCount: countWords(content),
        author: article.author ?? out.author,
        category: article.category ?? out.category,
        translatedTitle: out.translatedTitle,
        translatedContent: out.translatedContent,
        cleanedBy: 'llm',
      };
    } catch (err) {
      logger.warn({ url: item.url, error: errorMessage(err) }, 'Content cleaner failed, keeping regex-cleaned text');
      return article;
    }
  }
}
