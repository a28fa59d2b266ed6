/**
 * @fileoverview Google Translate adapter (free `translate_a/single` endpoint).
 * A batch is joined with a separator and sent as a single request.
 */

import type { Translator } from '../types/index.js';
import { FormatError, ProviderError } from '../core/errors.js';

export const GOOGLE_TRANSLATE_URL = 'https://translate.googleapis.com/translate_a/single';

/** Joins batch texts into one request; unlikely to appear in real strings */
export const BATCH_SEPARATOR = '\n[◙]\n';
const SEPARATOR_PATTERN = /\s*\[◙\]\s*/;

/** Longest `q` parameter the endpoint accepts */
export const MAX_REQUEST_CHARS = 5000;

export interface GoogleTranslatorOptions {
  /** Default source language for {@link GoogleTranslator.translate} (default: 'auto') */
  source?: string;
  /** Default target language for {@link GoogleTranslator.translate} (default: 'en') */
  target?: string;
  /** Request timeout in ms (default: 10000) */
  timeout?: number;
}

type GoogleResponse = [Array<[string | null, ...unknown[]]> | null, ...unknown[]];

function isGoogleResponse(data: unknown): data is GoogleResponse {
  return Array.isArray(data) && (data[0] === null || Array.isArray(data[0]));
}

export class GoogleTranslator implements Translator {
  readonly name = 'google';
  private readonly source: string;
  private readonly target: string;
  private readonly timeout: number;

  constructor(options: GoogleTranslatorOptions = {}) {
    this.source = options.source ?? 'auto';
    this.target = options.target ?? 'en';
    this.timeout = options.timeout ?? 10000;
  }

  /**
   * Send one text to the endpoint.
   *
   * @throws ProviderError on network failure, timeout, a non-2xx status or a
   * response without a translation
   */
  private async request(text: string, from: string, to: string): Promise<string> {
    if (text.length > MAX_REQUEST_CHARS) {
      throw new ProviderError(`Text exceeds ${MAX_REQUEST_CHARS} characters`);
    }

    const params = new URLSearchParams({ client: 'gtx', dt: 't', sl: from, tl: to, q: text.trim() });
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await fetch(`${GOOGLE_TRANSLATE_URL}?${params}`, {
        signal: controller.signal,
        headers: {
          'User-Agent': 'Mozilla/5.0 (compatible; fluent-autotranslate/0.1)',
        },
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Request failed: ${reason}`, undefined, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new ProviderError(`HTTP ${response.status}: ${response.statusText}`, response.status);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new ProviderError('Response is not valid JSON', response.status, { cause: error });
    }

    if (!isGoogleResponse(data) || !data[0]) {
      throw new ProviderError('Translation not found in response', response.status);
    }

    let result = '';
    for (const chunk of data[0]) {
      if (chunk && typeof chunk[0] === 'string') {
        result += chunk[0];
      }
    }
    if (!result) {
      throw new ProviderError('Translation not found in response', response.status);
    }
    return result;
  }

  /**
   * Translate a single text.
   *
   * @example
   * ```typescript
   * const translator = new GoogleTranslator({ source: 'ru' });
   * await translator.translate('Привет'); // "Hello"
   * ```
   */
  async translate(text: string, source: string = this.source, target: string = this.target): Promise<string> {
    if (text.trim() === '') {
      return text;
    }
    return this.request(text, source, target);
  }

  /**
   * Translate a batch with one request. Empty and whitespace-only texts are
   * returned unchanged and not sent. Batches longer than {@link MAX_REQUEST_CHARS}
   * fall back to one request per text.
   *
   * @throws FormatError if the response does not split back into one part per text
   */
  async translateBatch(texts: string[], source: string, target: string): Promise<string[]> {
    const results = [...texts];
    const pending = texts.flatMap((text, index) => (text.trim() === '' ? [] : [index]));

    if (pending.length === 0) {
      return results;
    }

    const joined = pending.map((index) => texts[index].trim()).join(BATCH_SEPARATOR);

    let parts: string[];
    if (joined.length <= MAX_REQUEST_CHARS) {
      const translated = await this.request(joined, source, target);
      parts = translated.split(SEPARATOR_PATTERN);
      if (parts.length !== pending.length) {
        throw new FormatError(
          `Expected ${pending.length} translations in response, received ${parts.length}`
        );
      }
    } else {
      // One request at a time, so the batch still holds a single slot of the run's gate
      parts = [];
      for (const index of pending) {
        parts.push(await this.request(texts[index], source, target));
      }
    }

    pending.forEach((textIndex, partIndex) => {
      results[textIndex] = parts[partIndex].trim();
    });
    return results;
  }
}
