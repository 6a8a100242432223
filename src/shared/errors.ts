export class HarvestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'HarvestError';
  }
}

export class ConfigError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class FetchError extends HarvestError {
  constructor(
    message: string,
    public readonly status: number | null,
    details?: Record<string, unknown>,
  ) {
    super(message, 'FETCH_ERROR', { status, ...details });
    this.name = 'FetchError';
  }
}

export class TimeoutError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMEOUT', details);
    this.name = 'TimeoutError';
  }
}

export class SourceFetchError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_FETCH_ERROR', details);
    this.name = 'SourceFetchError';
  }
}

export interface StrategyAttempt {
  strategy: string;
  reason: string;
  chars: number;
}

export class ExtractionExhaustedError extends HarvestError {
  constructor(
    message: string,
    public readonly attempts: StrategyAttempt[],
    details?: Record<string, unknown>,
  ) {
    super(message, 'EXTRACTION_EXHAUSTED', { attempts, ...details });
    this.name = 'ExtractionExhaustedError';
  }
}

export type SinkName = 'archive' | 'index';

export class PersistenceError extends HarvestError {
  constructor(
    message: string,
    public readonly sink: SinkName,
    details?: Record<string, unknown>,
  ) {
    super(message, 'PERSISTENCE_ERROR', { sink, ...details });
    this.name = 'PersistenceError';
  }
}

export class RetentionError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RETENTION_ERROR', details);
    this.name = 'RetentionError';
  }
}

export class LlmError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LlmError';
  }
}

export class VectorIndexError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INDEX_ERROR', details);
    this.name = 'VectorIndexError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
