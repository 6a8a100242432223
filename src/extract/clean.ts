import * as cheerio from 'cheerio';
import { franc } from 'franc-min';

/** Elements whose content is never article text. */
export const NOISE_SELECTORS = 'script, style, noscript, template, iframe, svg, nav, header, footer, aside, form, button';

const BLOCK_SELECTORS = 'p, div, section, article, li, h1, h2, h3, h4, h5, h6, blockquote, pre, tr, br, figcaption, dd, dt';

const BOILERPLATE_PATTERNS: RegExp[] = [
  /subscribe to (?:our|the) [\w\s]*?newsletter[^.\n]*\.?/gi,
  /sign up for (?:our|the) [\w\s]*?newsletter[^.\n]*\.?/gi,
  /follow us on [\w\s,]*?(?:twitter|x|facebook|linkedin|instagram|telegram|social media)[^.\n]*\.?/gi,
  /share (?:this|on) (?:article|story|twitter|facebook|linkedin)[^.\n]*/gi,
  /click here to [^.\n]*\.?/gi,
  /all rights reserved\.?/gi,
  /cookie (?:policy|settings|preferences)[^.\n]*/gi,
  /we use cookies[^.\n]*\.?/gi,
  /advertisement/gi,
  /skip to (?:main )?content/gi,
  /read more:?/gi,
  /related articles?:?/gi,
];

export interface CleanOptions {
  /** Lines shorter than this after trimming are treated as navigation noise. */
  minLineChars: number;
}

/**
 * Strip HTML tags and decode common entities.
 */
export function stripHtml(html: string): string {
  let text = html.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
  text = text.replace(/<br\s*\/?>/gi, '\n').replace(/<\/(p|div|li|h[1-6]|tr|blockquote)>/gi, '\n');
  text = text.replace(/<[^>]+>/g, ' ');
  return decodeEntities(text);
}

export function decodeEntities(text: string): string {
  return text
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
    .replace(/&amp;/g, '&');
}

/**
 * Text of an HTML fragment with block elements separated by newlines and noise
 * elements removed.
 */
export function blockText(html: string): string {
  const $ = cheerio.load(html);
  $(NOISE_SELECTORS).remove();
  $(BLOCK_SELECTORS).each((_, el) => {
    $(el).after('\n');
  });
  return $.root().text();
}

/**
 * Shared cleaning step for all HTML-derived text: markdown images and links, raw URLs,
 * boilerplate phrases, whitespace, and short navigation lines.
 */
export function cleanText(input: string, opts: CleanOptions): string {
  let text = input.includes('<') && /<\/?[a-z][^>]*>/i.test(input) ? stripHtml(input) : decodeEntities(input);

  text = text
    .replace(/!\[[^\]]*\]\([^)]*\)/g, '')
    .replace(/\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/\bhttps?:\/\/\S+/gi, '')
    .replace(/\bwww\.\S+/gi, '');

  for (const pattern of BOILERPLATE_PATTERNS) {
    text = text.replace(pattern, '');
  }

  const lines = text
    .split(/\r?\n/)
    .map((line) => line.replace(/[ \t\f\v\u00a0]+/g, ' ').trim())
    .filter((line) => line.length >= opts.minLineChars);

  return lines.join('\n');
}

// CJK unified ideographs plus Hiragana/Katakana
const CJK_REGEX = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]/;
const CJK_GLOBAL = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]/g;

/**
 * Count words. Uses whitespace split for Latin, character count for CJK.
 */
export function countWords(text: string): number {
  if (!text) return 0;

  if (CJK_REGEX.test(text)) {
    const cjkChars = text.match(CJK_GLOBAL) ?? [];
    const latinWords = text
      .replace(CJK_GLOBAL, ' ')
      .split(/\s+/)
      .filter((w) => w.length > 0);
    return cjkChars.length + latinWords.length;
  }

  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

const ISO3_TO_1: Record<string, string> = {
  eng: 'en',
  cmn: 'zh',
  zho: 'zh',
  jpn: 'ja',
  kor: 'ko',
  fra: 'fr',
  deu: 'de',
  spa: 'es',
  por: 'pt',
  rus: 'ru',
  ara: 'ar',
  ita: 'it',
  nld: 'nl',
};

/**
 * Detect language from text. Maps ISO 639-3 to short codes.
 */
export function detectLanguage(text: string): string | null {
  if (!text || text.length < 20) return null;

  const iso3 = franc(text);
  if (iso3 === 'und') return null;

  return ISO3_TO_1[iso3] ?? iso3;
}
