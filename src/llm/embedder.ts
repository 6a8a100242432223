import { logger } from '../shared/logger.js';
import { LlmError } from '../shared/errors.js';
import type { Config } from '../shared/config.js';
import { endpoint, postJson } from './client.js';

/**
 * Turns article text into the vector stored alongside it in the index.
 */
export interface Embedder {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

interface EmbeddingResponse {
  data?: Array<{ embedding?: number[] }>;
  usage?: { total_tokens?: number };
}

/**
 * OpenAI-compatible `/embeddings` client.
 */
export class OpenAiEmbedder implements Embedder {
  readonly dimensions: number;

  constructor(
    private readonly config: Config['embedding'],
    dimensions: number,
  ) {
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    const input = text.slice(0, this.config.max_input_chars);
    const url = endpoint(this.config.base_url, '/embeddings');

    const data = await postJson<EmbeddingResponse>(
      url,
      this.config.api_key,
      { model: this.config.model, input, dimensions: this.dimensions },
      this.config.timeout_ms,
    );

    const vector = data.data?.[0]?.embedding;
    if (!vector || vector.length === 0) {
      throw new LlmError('Embedding response contained no vector', { model: this.config.model });
    }
    if (vector.length !== this.dimensions) {
      throw new LlmError(`Embedding has ${vector.length} dimensions, index expects ${this.dimensions}`, {
        model: this.config.model,
      });
    }

    logger.debug({ model: this.config.model, tokens: data.usage?.total_tokens ?? 0 }, 'Embedding computed');
    return vector;
  }
}
