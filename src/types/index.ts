import type { Locale } from '../core/locale.js';

/**
 * Options shared by every provider. Constructed once per run and read-only while it lasts.
 */
export interface BaseTranslateOpts {
  /** Directory holding one sub-directory per locale */
  localesDir: string;
  /** Locale the resources are written in (default: RUSSIAN) */
  originLocale?: Locale;
  /** Locales to translate into (default: every supported locale) */
  targetLocales?: Locale[];
  /** Only translate files with these names */
  includeFiles?: string[];
  /** Skip files with these names */
  excludeFiles?: string[];
  /** Only translate messages with these ids; the rest are copied as-is */
  includeMessages?: string[];
  /** Copy messages with these ids without translating them */
  excludeMessages?: string[];
  /** Segments per provider call (default: 5) */
  translateBatchSize?: number;
  /** Provider calls in flight at once across the run (default: 4) */
  translateLimit?: number;
  /** Seconds to wait between attempts of a failed batch (default: 5) */
  translateRetryWaitTime?: number;
  /** Extra attempts after the first failure of a batch (default: 3) */
  translateRetryCount?: number;
}

export interface GoogleTranslateOpts extends BaseTranslateOpts {
  provider: 'google';
}

/** How the LLM adapter talks to the API */
export type LlmMode = 'chat' | 'batch';

export interface LlmTranslateOpts extends BaseTranslateOpts {
  provider: 'llm';
  /** OpenAI API key, usually `process.env.OPENAI_API_KEY` */
  apiKey: string;
  /** Chat model (default: 'gpt-4o-mini') */
  model?: string;
  /** System prompt with `{source_language}` and `{target_language}` placeholders */
  systemPrompt?: string;
  /** Fallback source language for single-text calls (default: 'ru') */
  source?: Locale;
  /** Fallback target language for single-text calls (default: 'en') */
  target?: Locale;
  /** Seconds between Batch API status checks (default: 10) */
  checkInterval?: number;
  /** HTTPS proxy URL for API requests */
  proxy?: string;
  /** Synchronous chat completions or the asynchronous Batch API (default: 'chat') */
  mode?: LlmMode;
}

export type TranslateOpts = GoogleTranslateOpts | LlmTranslateOpts;

/** Options after defaults are applied and values validated */
export interface ResolvedTranslateOpts {
  localesDir: string;
  originLocale: Locale;
  originLocaleDir: string;
  targetLocales: Locale[];
  includeFiles: string[];
  excludeFiles: string[];
  includeMessages: string[];
  excludeMessages: string[];
  translateBatchSize: number;
  translateLimit: number;
  translateRetryWaitTime: number;
  translateRetryCount: number;
}

/**
 * A translation provider. `translateBatch` returns one string per input text,
 * in input order.
 */
export interface Translator {
  /** Human-readable provider name */
  readonly name: string;
  translateBatch(texts: string[], source: Locale, target: Locale): Promise<string[]>;
  /** Release sockets or clients held by the provider */
  dispose?(): Promise<void> | void;
}

export interface TranslateProgress {
  /** Segments translated so far in this run */
  done: number;
  /** Segments the run has to translate */
  total: number;
}

export interface TranslateRunOptions {
  /** Provider to use instead of the one built from the options */
  translator?: Translator;
  /** Silent mode - no console output */
  silent?: boolean;
  /** Called after every successful batch */
  onProgress?: (progress: TranslateProgress) => void;
}

export interface FileTranslationResult {
  /** Origin file, relative to the origin locale directory */
  file: string;
  locale: Locale;
  /** Absolute path of the output file */
  target: string;
  status: 'translated' | 'failed';
  /** Segments sent to the provider */
  segments: number;
  error?: Error;
}

export interface TranslateResult {
  files: FileTranslationResult[];
  translated: number;
  failed: number;
}
