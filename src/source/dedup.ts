/**
 * Normalize a URL for dedup comparison:
 * - Strip trailing slashes
 * - Remove www. prefix
 * - Remove common tracking params (utm_*, ref, fbclid, etc.)
 * - Sort remaining query params
 * - Lowercase scheme + host, drop the fragment
 */
export function normalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return raw.trim();
  }

  url.protocol = url.protocol.toLowerCase();
  url.hostname = url.hostname.toLowerCase();

  if (url.hostname.startsWith('www.')) {
    url.hostname = url.hostname.slice(4);
  }

  const trackingPrefixes = ['utm_', 'ref', 'fbclid', 'gclid', 'mc_', 'mkt_', 'cmpid', 'ito'];
  const keysToRemove: string[] = [];
  for (const key of url.searchParams.keys()) {
    if (trackingPrefixes.some((p) => key.toLowerCase().startsWith(p))) {
      keysToRemove.push(key);
    }
  }
  for (const key of keysToRemove) {
    url.searchParams.delete(key);
  }

  url.searchParams.sort();

  let pathname = url.pathname;
  while (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }
  if (pathname === '/') {
    pathname = '';
  }

  const search = url.searchParams.toString();
  return `${url.protocol}//${url.hostname}${url.port ? ':' + url.port : ''}${pathname}${search ? '?' + search : ''}`;
}

/**
 * Title key for secondary matching: NFKC, case-folded, punctuation and symbols removed,
 * whitespace collapsed.
 */
export function normalizeTitle(raw: string): string {
  return raw
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[\p{P}\p{S}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export interface DuplicateFilterOptions {
  capacity: number;
  matchTitles: boolean;
  minTitleChars: number;
  /** Title entries older than this stop matching. Unset means they match until evicted. */
  titleTtlHours?: number;
  now?: () => number;
}

/**
 * Bounded LRU of admitted articles. Keys are `url:<normalized url>` and, when title
 * matching is on, `title:<normalized title>`; the value is the admission time.
 *
 * Title entries expire after `titleTtlHours` so a recurring headline on a new URL is
 * admitted again the next day.
 *
 * `isDuplicate` is a pure read. Entries only move on `admit`, so eviction order is
 * least-recently admitted. Forgetting an old entry means at most one re-ingest, which
 * the idempotent index write absorbs.
 */
export class DuplicateFilter {
  private readonly entries = new Map<string, number>();
  private readonly inFlight = new Set<string>();
  private readonly now: () => number;

  constructor(private readonly opts: DuplicateFilterOptions) {
    if (opts.capacity < 1) throw new RangeError('DuplicateFilter capacity must be at least 1');
    this.now = opts.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  private keysFor(url: string, title?: string): string[] {
    const keys = [`url:${normalizeUrl(url)}`];
    if (this.opts.matchTitles && title) {
      const normalized = normalizeTitle(title);
      if (normalized.length >= this.opts.minTitleChars) keys.push(`title:${normalized}`);
    }
    return keys;
  }

  isDuplicate(url: string, title?: string): boolean {
    return this.keysFor(url, title).some((key) => {
      const at = this.entries.get(key);
      if (at === undefined) return false;
      return !key.startsWith('title:') || !this.titleExpired(at);
    });
  }

  private titleExpired(admittedAt: number): boolean {
    const ttl = this.opts.titleTtlHours;
    return ttl !== undefined && this.now() - admittedAt >= ttl * 3_600_000;
  }

  admittedAt(url: string): number | undefined {
    return this.entries.get(`url:${normalizeUrl(url)}`);
  }

  /**
   * Claim a URL for processing so a concurrent source carrying the same article skips
   * it. Returns false when the article is already admitted or claimed.
   */
  reserve(url: string, title?: string): boolean {
    const key = `url:${normalizeUrl(url)}`;
    if (this.inFlight.has(key) || this.isDuplicate(url, title)) return false;
    this.inFlight.add(key);
    return true;
  }

  release(url: string): void {
    this.inFlight.delete(`url:${normalizeUrl(url)}`);
  }

  admit(url: string, title?: string): void {
    const at = this.now();
    for (const key of this.keysFor(url, title)) {
      this.entries.delete(key);
      this.entries.set(key, at);
    }
    this.release(url);

    while (this.entries.size > this.opts.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
