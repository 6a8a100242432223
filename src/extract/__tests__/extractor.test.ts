import { describe, it, expect, vi } from 'vitest';
import { ContentExtractor, type ExtractorOptions, type ContentCleaner } from '../extractor.js';
import type { PageRenderer } from '../renderer.js';
import { ExtractionExhaustedError } from '../../shared/errors.js';
import { makeItem, makeSource, longParagraph } from '../../__tests__/helpers/fixtures.js';

const P1 = longParagraph('Rates');
const P2 = longParagraph('Growth');
const ARTICLE_HTML = `<html><head><title>Rates steady | Example News</title></head><body>
<nav>Home Markets Economy</nav>
<article><p>${P1}</p><p>${P2}</p></article>
<footer>Copyright notice for the site</footer>
</body></html>`;
const THIN_HTML = '<html><head><title>Rates steady | Example News</title></head><body><p>Too short.</p></body></html>';

function renderer(render: PageRenderer['render']): PageRenderer {
  return { render: vi.fn(render), close: async () => undefined };
}

function extractor(overrides: Partial<ExtractorOptions> = {}) {
  const loadPage = vi.fn(async (url: string) => ({ url, status: 200, body: ARTICLE_HTML }));
  const opts: ExtractorOptions = {
    minChars: 200,
    minLineChars: 10,
    stageTimeoutMs: 1000,
    fallbackOrder: ['rendered', 'static', 'paragraphs', 'summary'],
    summaryTitlePrefix: true,
    renderer: null,
    loadPage,
    ...overrides,
  };
  return { extractor: new ContentExtractor(opts), loadPage: opts.loadPage };
}

async function exhaustion(promise: Promise<unknown>): Promise<ExtractionExhaustedError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ExtractionExhaustedError) return err;
    throw err;
  }
  throw new Error('expected extraction to fail');
}

describe('ContentExtractor', () => {
  it('stops at the first strategy that meets the minimums', async () => {
    const render = renderer(async () => ARTICLE_HTML);
    const { extractor: ex, loadPage } = extractor({ renderer: render });

    const article = await ex.extract(makeItem(), makeSource({ content_selectors: ['article'] }));

    expect(article.extractionMethod).toBe('rendered');
    expect(article.content).toBe(`${P1}\n${P2}`);
    expect(article.contentLength).toBe(article.content.length);
    expect(article.belowMinimum).toBe(false);
    expect(article.cleanedBy).toBe('regex');
    expect(loadPage).not.toHaveBeenCalled();
  });

  it('passes the source script setting to the renderer', async () => {
    const render = renderer(async () => ARTICLE_HTML);
    const { extractor: ex } = extractor({ renderer: render });

    await ex.extract(makeItem(), makeSource({ content_selectors: ['article'], run_scripts: true }));

    expect(render.render).toHaveBeenCalledWith('https://example.com/news/rates-steady', expect.any(AbortSignal), true);
  });

  it('falls back to readability on the rendered page when no selector matches', async () => {
    const { extractor: ex } = extractor({ renderer: renderer(async () => ARTICLE_HTML) });

    const article = await ex.extract(makeItem(), makeSource());

    expect(article.extractionMethod).toBe('rendered');
    expect(article.content).toContain('Rates sentence number 1 carries enough words');
  });

  it('moves on when rendering exceeds the stage timeout', async () => {
    const { extractor: ex } = extractor({
      stageTimeoutMs: 30,
      renderer: renderer(() => new Promise<string>(() => undefined)),
    });

    const article = await ex.extract(makeItem(), makeSource());

    expect(article.extractionMethod).toBe('static');
    expect(article.content).toBe(`${P1}\n${P2}`);
  });

  it('uses the static strategy when no renderer is configured', async () => {
    const { extractor: ex, loadPage } = extractor();

    const article = await ex.extract(makeItem(), makeSource());

    expect(article.extractionMethod).toBe('static');
    expect(article.lang).toBe('en');
    expect(loadPage).toHaveBeenCalledTimes(1);
  });

  it('falls back to full-page text when generic selectors only match a byline', async () => {
    const body = `<html><body><div class="content-meta">By Jane Roe, Markets desk</div><div><p>${P1}</p></div></body></html>`;
    const { extractor: ex } = extractor({ loadPage: async (url) => ({ url, status: 200, body }) });

    const article = await ex.extract(makeItem(), makeSource({ fallback_order: ['static', 'paragraphs', 'summary'] }));

    expect(article.extractionMethod).toBe('static');
    expect(article.content).toBe(`By Jane Roe, Markets desk\n${P1}`);
    expect(article.belowMinimum).toBe(false);
  });

  it('honours a per-source fallback order', async () => {
    const { extractor: ex } = extractor();

    const article = await ex.extract(makeItem(), makeSource({ fallback_order: ['paragraphs'] }));

    expect(article.extractionMethod).toBe('paragraphs');
    expect(article.content).toBe(`${P1}\n${P2}`);
  });

  it('returns the summary below the minimums as a last resort', async () => {
    const { extractor: ex } = extractor({
      loadPage: async (url) => ({ url, status: 200, body: THIN_HTML }),
    });

    const article = await ex.extract(
      makeItem({ summary: 'Policy makers held the benchmark rate unchanged.' }),
      makeSource(),
    );

    expect(article.extractionMethod).toBe('summary');
    expect(article.belowMinimum).toBe(true);
    expect(article.content).toBe('Rates steady | Example News\nPolicy makers held the benchmark rate unchanged.');
  });

  it('fetches the page once even when every page strategy fails', async () => {
    const loadPage = vi.fn(async () => {
      throw new Error('connection refused');
    });
    const { extractor: ex } = extractor({ loadPage });

    const article = await ex.extract(
      makeItem({ summary: 'Policy makers held the benchmark rate unchanged.' }),
      makeSource(),
    );

    expect(loadPage).toHaveBeenCalledTimes(1);
    expect(article.content).toBe('Central bank keeps rates steady\nPolicy makers held the benchmark rate unchanged.');
  });

  it('omits the title prefix when disabled', async () => {
    const { extractor: ex } = extractor({
      summaryTitlePrefix: false,
      loadPage: async (url) => ({ url, status: 200, body: THIN_HTML }),
    });

    const article = await ex.extract(makeItem({ summary: 'Policy makers held the benchmark rate.' }), makeSource());

    expect(article.content).toBe('Policy makers held the benchmark rate.');
  });

  it('records every attempt when all strategies fail', async () => {
    const { extractor: ex } = extractor({
      loadPage: async (url) => ({ url, status: 200, body: THIN_HTML }),
    });

    const err = await exhaustion(ex.extract(makeItem(), makeSource()));

    expect(err.code).toBe('EXTRACTION_EXHAUSTED');
    expect(err.attempts).toEqual([
      { strategy: 'rendered', reason: 'Renderer unavailable', chars: 0 },
      { strategy: 'static', reason: 'below minimum (10 chars, 2 words)', chars: 10 },
      { strategy: 'paragraphs', reason: 'below minimum (10 chars, 2 words)', chars: 10 },
      { strategy: 'summary', reason: 'no text', chars: 0 },
    ]);
  });

  it('applies the source word minimum', async () => {
    const { extractor: ex } = extractor();

    const err = await exhaustion(ex.extract(makeItem(), makeSource({ min_word_count: 5000 })));

    expect(err.attempts.map((a) => a.strategy)).toEqual(['rendered', 'static', 'paragraphs', 'summary']);
  });

  it('applies the content cleaner to the winning text', async () => {
    const cleaned = longParagraph('Cleaned');
    const cleaner: ContentCleaner = {
      clean: vi.fn(async () => ({
        content: cleaned,
        author: 'Desk Writer',
        category: 'Economy',
        translatedTitle: 'Titre traduit',
      })),
    };
    const { extractor: ex } = extractor({ cleaner });

    const article = await ex.extract(makeItem({ category: 'Markets' }), makeSource());

    expect(cleaner.clean).toHaveBeenCalledWith(
      expect.objectContaining({
        url: 'https://example.com/news/rates-steady',
        title: 'Central bank keeps rates steady',
        content: `${P1}\n${P2}`,
      }),
    );
    expect(article).toMatchObject({
      content: cleaned,
      contentLength: cleaned.length,
      wordCount: 72,
      belowMinimum: false,
      author: 'Desk Writer',
      category: 'Markets',
      translatedTitle: 'Titre traduit',
      cleanedBy: 'llm',
    });
  });

  it('keeps the regex-cleaned text when the cleaner output misses the minimums', async () => {
    const cleaner: ContentCleaner = { clean: async () => ({ content: 'Markets moved.' }) };
    const { extractor: ex } = extractor({ cleaner });

    const article = await ex.extract(makeItem(), makeSource());

    expect(article).toMatchObject({
      content: `${P1}\n${P2}`,
      extractionMethod: 'static',
      belowMinimum: false,
      cleanedBy: 'regex',
    });
  });

  it('lets the cleaner shorten a flagged summary', async () => {
    const cleaner: ContentCleaner = { clean: async () => ({ content: 'Rates held.' }) };
    const { extractor: ex } = extractor({
      cleaner,
      loadPage: async (url) => ({ url, status: 200, body: THIN_HTML }),
    });

    const article = await ex.extract(makeItem({ summary: 'Policy makers held the benchmark rate.' }), makeSource());

    expect(article).toMatchObject({ content: 'Rates held.', belowMinimum: true, cleanedBy: 'llm' });
  });

  it('keeps the regex-cleaned text when the cleaner fails', async () => {
    const cleaner: ContentCleaner = {
      clean: async () => {
        throw new Error('model unavailable');
      },
    };
    const { extractor: ex } = extractor({ cleaner });

    const article = await ex.extract(makeItem(), makeSource());

    expect(article.cleanedBy).toBe('regex');
    expect(article.content).toBe(`${P1}\n${P2}`);
  });
});
