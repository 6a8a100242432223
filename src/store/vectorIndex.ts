import type { Config } from '../shared/config.js';
import { VectorIndexError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { IndexPayload } from './records.js';

export interface IndexPoint {
  id: string;
  vector: number[];
  payload: IndexPayload;
}

export interface IndexFilter {
  /** Entries whose publish instant is strictly earlier. */
  publishedBefore?: Date;
  source?: string;
}

export interface IndexStats {
  points: number;
  status: string;
}

export interface DeleteOutcome {
  /** Number of deleted entries when the backend reports it. */
  deleted: number | null;
}

/**
 * Similarity-search store. One instance may hold a connection; callers close it
 * when done.
 */
export interface VectorIndex {
  upsert(points: IndexPoint[]): Promise<void>;
  deleteWhere(filter: IndexFilter): Promise<DeleteOutcome>;
  count(filter?: IndexFilter): Promise<number>;
  stats(): Promise<IndexStats>;
  healthCheck(): Promise<boolean>;
  ensureCollection(): Promise<void>;
  close(): Promise<void>;
}

export type VectorIndexFactory = () => VectorIndex;

interface QdrantResponse<T> {
  result?: T;
  status?: string | { error?: string };
}

interface QdrantCollectionInfo {
  status?: string;
  points_count?: number | null;
}

type QdrantCondition =
  | { key: string; range: { lt: number } }
  | { key: string; match: { value: string } };

/**
 * Translate an IndexFilter to Qdrant's filter shape. An empty filter matches every point.
 */
export function toQdrantFilter(filter: IndexFilter = {}): { must: QdrantCondition[] } {
  const must: QdrantCondition[] = [];
  if (filter.publishedBefore) {
    must.push({ key: 'published_ts', range: { lt: filter.publishedBefore.getTime() } });
  }
  if (filter.source) {
    must.push({ key: 'source', match: { value: filter.source } });
  }
  return { must };
}

/**
 * Qdrant over its REST API. Instances are cheap; `close` aborts anything in flight.
 */
export class QdrantIndex implements VectorIndex {
  private readonly baseUrl: string;
  private readonly controller = new AbortController();

  constructor(private readonly config: Config['vector_index']) {
    this.baseUrl = config.url.replace(/\/+$/, '');
  }

  private get collectionPath(): string {
    return `/collections/${encodeURIComponent(this.config.collection)}`;
  }

  private async send(method: string, path: string, body?: unknown): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.api_key) headers['api-key'] = this.config.api_key;

    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new VectorIndexError(`Index request timed out after ${this.config.timeout_ms}ms`, { url }));
      }, this.config.timeout_ms);
    });

    let response: Response;
    try {
      response = await Promise.race([
        fetch(url, {
          method,
          headers,
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: this.controller.signal,
        }),
        timeoutPromise,
      ]);
    } catch (err) {
      if (err instanceof VectorIndexError) throw err;
      throw new VectorIndexError(`Index request failed: ${err instanceof Error ? err.message : String(err)}`, {
        url,
        method,
      });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new VectorIndexError(`Index API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: text.slice(0, 500),
        url,
      });
    }
    return response;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const response = await this.send(method, path, body);
    try {
      return (await response.json()) as T;
    } catch {
      throw new VectorIndexError('Index response is not valid JSON', { url: response.url || path });
    }
  }

  async upsert(points: IndexPoint[]): Promise<void> {
    if (points.length === 0) return;
    await this.request<QdrantResponse<unknown>>('PUT', `${this.collectionPath}/points?wait=true`, { points });
    logger.debug({ count: points.length, collection: this.config.collection }, 'Index points upserted');
  }

  async deleteWhere(filter: IndexFilter): Promise<DeleteOutcome> {
    await this.request<QdrantResponse<unknown>>('POST', `${this.collectionPath}/points/delete?wait=true`, {
      filter: toQdrantFilter(filter),
    });
    // Qdrant acknowledges the operation without a count
    return { deleted: null };
  }

  async count(filter?: IndexFilter): Promise<number> {
    const data = await this.request<QdrantResponse<{ count?: number }>>('POST', `${this.collectionPath}/points/count`, {
      filter: toQdrantFilter(filter),
      exact: true,
    });
    return data.result?.count ?? 0;
  }

  async stats(): Promise<IndexStats> {
    const data = await this.request<QdrantResponse<QdrantCollectionInfo>>('GET', this.collectionPath);
    return {
      points: data.result?.points_count ?? 0,
      status: data.result?.status ?? 'unknown',
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      // plain-text body
      await this.send('GET', '/healthz');
      return true;
    } catch (err) {
      logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Index health check failed');
      return false;
    }
  }

  /**
   * Create the collection and its payload indexes when missing.
   */
  async ensureCollection(): Promise<void> {
    const existing = await this.request<QdrantResponse<{ exists?: boolean }>>('GET', `${this.collectionPath}/exists`);
    if (existing.result?.exists) return;

    await this.request('PUT', this.collectionPath, {
      vectors: { size: this.config.dimensions, distance: 'Cosine' },
    });
    for (const [field, schema] of [
      ['published_ts', 'integer'],
      ['source', 'keyword'],
    ] as const) {
      await this.request('PUT', `${this.collectionPath}/index?wait=true`, { field_name: field, field_schema: schema });
    }
    logger.info({ collection: this.config.collection, dimensions: this.config.dimensions }, 'Index collection created');
  }

  async close(): Promise<void> {
    this.controller.abort();
  }
}
