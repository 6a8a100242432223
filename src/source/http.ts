import { FetchError } from '../shared/errors.js';

export interface FetchTextOptions {
  timeoutMs: number;
  userAgent: string;
  accept?: string;
  signal?: AbortSignal;
}

export interface FetchedDocument {
  url: string;
  status: number;
  body: string;
}

const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

/**
 * GET a text document with a timeout. Non-2xx responses and timeouts raise FetchError.
 */
export async function fetchText(url: string, opts: FetchTextOptions): Promise<FetchedDocument> {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new FetchError(`Request timed out after ${opts.timeoutMs}ms: ${url}`, null, { url }));
    }, opts.timeoutMs);
  });

  try {
    const response = await Promise.race([
      fetch(url, {
        headers: {
          'User-Agent': opts.userAgent,
          Accept: opts.accept ?? HTML_ACCEPT,
          'Accept-Language': 'en-US,en;q=0.9',
        },
        signal: controller.signal,
        redirect: 'follow',
      }),
      timeout,
    ]);

    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status} from ${url}`, response.status, { url });
    }

    const body = await Promise.race([response.text(), timeout]);
    return { url: response.url || url, status: response.status, body };
  } catch (err) {
    if (err instanceof FetchError) throw err;
    throw new FetchError(
      `Request failed for ${url}: ${err instanceof Error ? err.message : String(err)}`,
      null,
      { url },
    );
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener('abort', onAbort);
  }
}
