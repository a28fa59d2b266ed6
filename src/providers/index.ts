import type { TranslateOpts, Translator } from '../types/index.js';
import { GoogleTranslator } from './google.js';
import { LlmTranslator } from './llm.js';

export { GoogleTranslator, GOOGLE_TRANSLATE_URL, BATCH_SEPARATOR, MAX_REQUEST_CHARS } from './google.js';
export type { GoogleTranslatorOptions } from './google.js';
export { LlmTranslator, parseTranslations, DEFAULT_MODEL, DEFAULT_SYSTEM_PROMPT } from './llm.js';
export type { LlmTranslatorOptions } from './llm.js';

/** Run-time callbacks that are not part of the serializable options */
export interface TranslatorHooks {
  /** Called with every status seen while polling an LLM batch job */
  onBatchStatus?: (status: string) => void;
}

/**
 * Build the adapter that matches the options' provider.
 *
 * @example
 * ```typescript
 * const translator = createTranslator({ provider: 'google', localesDir: 'locales' });
 * await translator.translateBatch(['Привет'], 'ru', 'en'); // ['Hello']
 * ```
 */
export function createTranslator(opts: TranslateOpts, hooks: TranslatorHooks = {}): Translator {
  switch (opts.provider) {
    case 'google':
      return new GoogleTranslator({ source: opts.originLocale });
    case 'llm':
      return new LlmTranslator({
        apiKey: opts.apiKey,
        model: opts.model,
        systemPrompt: opts.systemPrompt,
        source: opts.source,
        target: opts.target,
        checkInterval: opts.checkInterval !== undefined ? opts.checkInterval * 1000 : undefined,
        proxy: opts.proxy,
        mode: opts.mode,
        onBatchStatus: hooks.onBatchStatus,
      });
  }
}
