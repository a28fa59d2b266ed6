/**
 * @fileoverview LLM adapter built on the OpenAI SDK.
 *
 * A batch is sent as JSON items with numeric ids and the model answers with the
 * same ids. In `batch` mode every text becomes its own request of an OpenAI Batch
 * API job, which is polled until it completes.
 */

import OpenAI from 'openai';
import { HttpsProxyAgent } from 'https-proxy-agent';
import type { LlmMode, Translator } from '../types/index.js';
import type { Locale } from '../core/locale.js';
import { FormatError, ProviderError, TranslationError } from '../core/errors.js';
import {
  createBatchFile,
  createBatchJob,
  customId,
  parseBatchContent,
  waitForBatchContent,
} from './batch-job.js';
import type { ChatMessage } from './batch-job.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a translation assistant for Fluent (.ftl) localization files. ' +
  'Translate the text of every item from {source_language} to {target_language}. ' +
  'Keep placeholders such as {0} or {1}, HTML or XML tags and line breaks exactly as they are. ' +
  'Reply with a JSON object {"translations": [{"id": <id>, "text": <translation>}]} ' +
  'containing one entry per input item, in the same order and with the same ids. ' +
  'Send only the JSON, without introductions.';

export interface LlmTranslatorOptions {
  apiKey: string;
  /** Chat model (default: 'gpt-4o-mini') */
  model?: string;
  /** System prompt with `{source_language}` and `{target_language}` placeholders */
  systemPrompt?: string;
  /** Default source language for {@link LlmTranslator.translate} (default: 'ru') */
  source?: Locale;
  /** Default target language for {@link LlmTranslator.translate} (default: 'en') */
  target?: Locale;
  /** Batch API polling interval in ms (default: 10000) */
  checkInterval?: number;
  /** HTTPS proxy URL */
  proxy?: string;
  /** Chat completions or the Batch API (default: 'chat') */
  mode?: LlmMode;
  /** Called with every status seen while polling a batch job */
  onBatchStatus?: (status: string) => void;
}

interface TranslationItem {
  id: number;
  text: string;
}

function isTranslationItem(value: unknown): value is TranslationItem {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number' &&
    'text' in value &&
    typeof value.text === 'string'
  );
}

/**
 * Parse a model answer of the form `{"translations": [{"id": 1, "text": "..."}]}`.
 *
 * @param content - Assistant message content
 * @param expected - Number of items that were sent (ids 1..expected)
 * @returns Texts ordered by id
 * @throws FormatError if the content is not JSON, has the wrong shape, the wrong
 * number of items or ids outside of the request
 *
 * @example
 * ```typescript
 * parseTranslations('{"translations":[{"id":1,"text":"Hello"}]}', 1); // ['Hello']
 * ```
 */
export function parseTranslations(content: string | null, expected: number): string[] {
  if (!content) {
    throw new FormatError('Model returned an empty response');
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new FormatError(`Model response is not valid JSON: ${content.slice(0, 100)}`, { cause: error });
  }

  const items =
    typeof data === 'object' && data !== null && 'translations' in data ? data.translations : undefined;
  if (!Array.isArray(items) || !items.every(isTranslationItem)) {
    throw new FormatError('Model response does not contain a "translations" list of {id, text} items');
  }

  if (items.length !== expected) {
    throw new FormatError(`Expected ${expected} translations, received ${items.length}`);
  }

  const byId = new Map(items.map((item) => [item.id, item.text]));
  const texts: string[] = [];
  for (let id = 1; id <= expected; id++) {
    const text = byId.get(id);
    if (text === undefined) {
      throw new FormatError(`Translation for item ${id} is missing`);
    }
    texts.push(text);
  }
  return texts;
}

export class LlmTranslator implements Translator {
  readonly name = 'llm';
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly systemPrompt: string;
  private readonly source: Locale;
  private readonly target: Locale;
  private readonly checkInterval: number;
  private readonly mode: LlmMode;
  private readonly onBatchStatus?: (status: string) => void;

  constructor(options: LlmTranslatorOptions) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.source = options.source ?? 'ru';
    this.target = options.target ?? 'en';
    this.checkInterval = options.checkInterval ?? 10000;
    this.mode = options.mode ?? 'chat';
    this.onBatchStatus = options.onBatchStatus;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      httpAgent: options.proxy ? new HttpsProxyAgent(options.proxy) : undefined,
    });
  }

  /**
   * Build the conversation for a group of texts. Item ids start at 1.
   */
  buildMessages(texts: string[], source: Locale, target: Locale): ChatMessage[] {
    const systemPrompt = this.systemPrompt
      .replaceAll('{source_language}', source)
      .replaceAll('{target_language}', target);
    const items = texts.map((text, index) => ({ id: index + 1, text }));

    return [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: JSON.stringify({ items }) },
    ];
  }

  private async complete(messages: ChatMessage[]): Promise<string | null> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      response_format: { type: 'json_object' },
      messages,
    });
    return completion.choices[0]?.message.content ?? null;
  }

  private async translateViaBatchJob(texts: string[], source: Locale, target: Locale): Promise<string[]> {
    const conversations = texts.map((text) => this.buildMessages([text], source, target));
    const jobId = await createBatchJob(this.client, this.model, createBatchFile(conversations, this.model));
    const content = await waitForBatchContent(this.client, jobId, this.checkInterval, this.onBatchStatus);
    const answers = parseBatchContent(content);

    return texts.map((_, index) => {
      const answer = answers.get(customId(index));
      if (answer === undefined) {
        throw new FormatError(`Batch job ${jobId} has no answer for ${customId(index)}`);
      }
      const [text] = parseTranslations(answer, 1);
      return text;
    });
  }

  /**
   * Translate a batch. The result has one text per input text, in input order.
   *
   * @throws FormatError if the model answer does not match the request
   * @throws ProviderError if the API call fails
   */
  async translateBatch(texts: string[], source: Locale, target: Locale): Promise<string[]> {
    if (texts.length === 0) {
      return [];
    }

    try {
      if (this.mode === 'batch') {
        return await this.translateViaBatchJob(texts, source, target);
      }
      const content = await this.complete(this.buildMessages(texts, source, target));
      return parseTranslations(content, texts.length);
    } catch (error) {
      if (error instanceof TranslationError) {
        throw error;
      }
      if (error instanceof OpenAI.APIError) {
        throw new ProviderError(`OpenAI API error: ${error.message}`, error.status, { cause: error });
      }
      throw new ProviderError(
        `OpenAI request failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error }
      );
    }
  }

  /**
   * Translate a single text.
   *
   * @example
   * ```typescript
   * const translator = new LlmTranslator({ apiKey: process.env.OPENAI_API_KEY ?? '' });
   * await translator.translate('Привет'); // "Hello"
   * ```
   */
  async translate(text: string, source: Locale = this.source, target: Locale = this.target): Promise<string> {
    const [translated] = await this.translateBatch([text], source, target);
    return translated;
  }
}
