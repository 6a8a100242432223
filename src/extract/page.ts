import * as cheerio from 'cheerio';
import type { FetchedDocument } from '../source/http.js';

export type PageLoader = (url: string) => Promise<FetchedDocument>;

/**
 * The static HTML of one item's page, fetched at most once and shared by every
 * strategy that reads it. A failed fetch is remembered too.
 */
export class ItemPage {
  private pending: Promise<FetchedDocument> | null = null;
  private loaded: FetchedDocument | null = null;

  constructor(
    readonly url: string,
    private readonly load: PageLoader,
  ) {}

  async html(): Promise<string> {
    if (!this.pending) {
      this.pending = this.load(this.url).then((doc) => {
        this.loaded = doc;
        return doc;
      });
    }
    const doc = await this.pending;
    return doc.body;
  }

  /** `<title>` of the page if it has already been fetched; never triggers a fetch. */
  title(): string | undefined {
    if (!this.loaded) return undefined;
    const title = cheerio.load(this.loaded.body)('title').first().text().trim();
    return title || undefined;
  }
}
