import type { CleanerInput, CleanerOutput, ContentCleaner } from '../extract/extractor.js';
import { logger } from '../shared/logger.js';
import type { ChatClient } from './client.js';
import { CleanOutputSchema, parseWithRetry } from './parse.js';
import { buildCleanArticleMessages } from './prompts.js';

export interface LlmCleanerOptions {
  /** Language code to translate into; '' disables translation. */
  translateTo: string;
  maxContentChars?: number;
}

/**
 * Rewrites extracted text through the chat model and pulls author/category out of
 * it. Translation is requested only when the detected language differs from the
 * target.
 */
export class LlmContentCleaner implements ContentCleaner {
  constructor(
    private readonly client: ChatClient,
    private readonly opts: LlmCleanerOptions,
  ) {}

  needsTranslation(lang: string | null): boolean {
    if (!this.opts.translateTo) return false;
    return lang !== this.opts.translateTo.toLowerCase();
  }

  async clean(input: CleanerInput): Promise<CleanerOutput> {
    const messages = buildCleanArticleMessages({
      url: input.url,
      title: input.title,
      content: input.content,
      translate_to: this.needsTranslation(input.lang) ? this.opts.translateTo : '',
      max_content_chars: this.opts.maxContentChars ?? 12000,
    });

    const response = await this.client.chat(messages);
    const systemMessage = messages[0]?.content ?? '';
    const out = await parseWithRetry(CleanOutputSchema, response.content, this.client, systemMessage);

    logger.debug({ url: input.url, chars: out.content.length }, 'Article cleaned by LLM');

    return {
      content: out.content,
      author: out.author,
      category: out.category,
      translatedTitle: out.translated_title,
      translatedContent: out.translated_content,
    };
  }
}
