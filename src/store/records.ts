import type { ExtractedArticle } from '../extract/extractor.js';
import { normalizeUrl } from '../source/dedup.js';
import { sha1, hashToUuid, slugify } from '../shared/utils.js';
import { datePath } from '../shared/time.js';

/** Characters of article text stored in the index payload. */
export const PAYLOAD_TEXT_CHARS = 1000;

export interface ArchiveRecord {
  articleId: string;
  url: string;
  title: string;
  sourceName: string;
  author?: string;
  category?: string;
  summary?: string;
  publishedAt: string;
  crawledAt: string;
  content: string;
  contentLength: number;
  wordCount: number;
  extractionMethod: ExtractedArticle['extractionMethod'];
  belowMinimum: boolean;
  lang: string | null;
  translatedTitle?: string;
  translatedContent?: string;
  cleanedBy: ExtractedArticle['cleanedBy'];
}

export interface IndexPayload {
  [key: string]: unknown;
  title: string;
  url: string;
  source: string;
  author: string | null;
  category: string | null;
  published_at: string;
  /** Epoch milliseconds, the field retention filters on. */
  published_ts: number;
  article_id: string;
  archive_key: string;
  extraction_method: string;
  lang: string | null;
  text: string;
  text_length: number;
}

/** Stable id of an article, derived from its normalized URL. */
export function articleId(url: string): string {
  return sha1(normalizeUrl(url)).slice(0, 20);
}

/**
 * Deterministic index id: the same article always maps to the same point, so a retried
 * or repeated write replaces instead of duplicating.
 */
export function indexId(article: ExtractedArticle): string {
  const material = [
    article.content.slice(0, PAYLOAD_TEXT_CHARS),
    article.url,
    article.title,
    article.publishedAt.toISOString(),
    article.sourceName,
  ].join('\u0000');
  return hashToUuid(sha1(material));
}

/** Archive directory for the article's publish day in the canonical zone. */
export function archiveDay(publishedAt: Date, timeZone: string): string {
  return datePath(publishedAt, timeZone);
}

/** `YYYY/MM/DD/<slug>-<id10>.json` */
export function archiveKey(article: ExtractedArticle, timeZone: string): string {
  const slug = slugify(article.title) || 'article';
  return `${archiveDay(article.publishedAt, timeZone)}/${slug}-${articleId(article.url).slice(0, 10)}.json`;
}

export function toArchiveRecord(article: ExtractedArticle, crawledAt: Date): ArchiveRecord {
  return {
    articleId: articleId(article.url),
    url: article.url,
    title: article.title,
    sourceName: article.sourceName,
    author: article.author,
    category: article.category,
    summary: article.summary,
    publishedAt: article.publishedAt.toISOString(),
    crawledAt: crawledAt.toISOString(),
    content: article.content,
    contentLength: article.contentLength,
    wordCount: article.wordCount,
    extractionMethod: article.extractionMethod,
    belowMinimum: article.belowMinimum,
    lang: article.lang,
    translatedTitle: article.translatedTitle,
    translatedContent: article.translatedContent,
    cleanedBy: article.cleanedBy,
  };
}

/** Inverse of toArchiveRecord, used when re-driving failed writes. */
export function fromArchiveRecord(record: ArchiveRecord): ExtractedArticle {
  return {
    url: record.url,
    title: record.title,
    sourceName: record.sourceName,
    author: record.author,
    category: record.category,
    summary: record.summary,
    publishedAt: new Date(record.publishedAt),
    content: record.content,
    contentLength: record.contentLength,
    wordCount: record.wordCount,
    extractionMethod: record.extractionMethod,
    belowMinimum: record.belowMinimum,
    lang: record.lang,
    translatedTitle: record.translatedTitle,
    translatedContent: record.translatedContent,
    cleanedBy: record.cleanedBy,
  };
}

export function toIndexPayload(article: ExtractedArticle, key: string): IndexPayload {
  const text = article.translatedContent ?? article.content;
  return {
    title: article.translatedTitle ?? article.title,
    url: article.url,
    source: article.sourceName,
    author: article.author ?? null,
    category: article.category ?? null,
    published_at: article.publishedAt.toISOString(),
    published_ts: article.publishedAt.getTime(),
    article_id: articleId(article.url),
    archive_key: key,
    extraction_method: article.extractionMethod,
    lang: article.lang,
    text: text.slice(0, PAYLOAD_TEXT_CHARS),
    text_length: text.length,
  };
}
