import { logger } from '../shared/logger.js';
import { LlmError } from '../shared/errors.js';
import type { Config } from '../shared/config.js';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
  token_count: number;
}

// OpenAI-compatible chat completions API response shape (partial)
interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
  model?: string;
  usage?: { total_tokens?: number };
}

/** The part of the client the parsers and cleaner depend on. */
export type ChatClient = Pick<LlmClient, 'chat'>;

export const DEFAULT_LLM_BASE_URL = 'https://api.openai.com/v1';

/**
 * POST JSON to an OpenAI-compatible endpoint with a timeout. Shared by chat and
 * embeddings calls.
 */
export async function postJson<T>(
  url: string,
  apiKey: string,
  payload: unknown,
  timeoutMs: number,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new LlmError(`Request timed out after ${timeoutMs}ms`, { url })), timeoutMs);
  });

  let response: Response;
  try {
    response = await Promise.race([
      fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify(payload),
      }),
      timeoutPromise,
    ]);
  } catch (err) {
    if (err instanceof LlmError) throw err;
    throw new LlmError(`Request failed: ${err instanceof Error ? err.message : String(err)}`, { url });
  } finally {
    clearTimeout(timer);
  }

  if (!response.ok) {
    const text = await response.text().catch(() => '');
    throw new LlmError(`API error: ${response.status} ${response.statusText}`, {
      status: response.status,
      body: text.slice(0, 500),
      url,
    });
  }

  try {
    return (await response.json()) as T;
  } catch {
    throw new LlmError('Response is not valid JSON', { url });
  }
}

export function endpoint(baseUrl: string, path: string): string {
  return `${(baseUrl || DEFAULT_LLM_BASE_URL).replace(/\/+$/, '')}${path}`;
}

export class LlmClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly maxConcurrent: number;
  private activeRequests = 0;

  constructor(config: Config['llm']) {
    this.baseUrl = config.base_url;
    this.apiKey = config.api_key;
    this.model = config.model;
    this.maxTokens = config.max_tokens;
    this.temperature = config.temperature;
    this.timeoutMs = config.timeout_ms;
    this.maxConcurrent = config.max_concurrent;
  }

  async chat(messages: LlmMessage[]): Promise<LlmResponse> {
    // Enforce concurrency limit
    while (this.activeRequests >= this.maxConcurrent) {
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    this.activeRequests++;
    try {
      return await this.doRequest(messages);
    } finally {
      this.activeRequests--;
    }
  }

  private async doRequest(messages: LlmMessage[]): Promise<LlmResponse> {
    const url = endpoint(this.baseUrl, '/chat/completions');

    const data = await postJson<ChatCompletionResponse>(
      url,
      this.apiKey,
      {
        model: this.model,
        messages,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
      },
      this.timeoutMs,
    );

    const content = data.choices?.[0]?.message?.content;
    if (!content) {
      throw new LlmError('LLM returned empty content', { response: JSON.stringify(data).slice(0, 200) });
    }

    const tokenCount = data.usage?.total_tokens ?? 0;
    logger.debug({ model: data.model, tokens: tokenCount }, 'LLM call completed');

    return {
      content,
      model: data.model ?? this.model,
      token_count: tokenCount,
    };
  }
}
