/**
 * @fileoverview fluent-autotranslate - machine translation for Fluent (.ftl) resources.
 *
 * This package provides tools for:
 * - Translating every origin locale file into each target locale
 * - Google Translate and OpenAI (chat or Batch API) providers
 * - Batching, a concurrency limit and retries shared across a run
 * - Validating translated files against the origin
 *
 * @example
 * ```typescript
 * import { Locale, translateBatch } from 'fluent-autotranslate';
 *
 * const result = await translateBatch({
 *   provider: 'google',
 *   localesDir: 'locales',
 *   originLocale: Locale.RUSSIAN,
 *   targetLocales: [Locale.ENGLISH, Locale.GERMAN],
 * });
 * console.log(`${result.translated} written, ${result.failed} failed`);
 * ```
 *
 * @packageDocumentation
 */

// Commands
export { translate, translateBatch } from './commands/translate.js';
export { validate } from './commands/validate.js';
export type { ValidateResult, ValidateOptions, ValidationIssue, IssueType } from './commands/validate.js';

// Types
export type {
  BaseTranslateOpts,
  GoogleTranslateOpts,
  LlmTranslateOpts,
  LlmMode,
  TranslateOpts,
  ResolvedTranslateOpts,
  Translator,
  TranslateProgress,
  TranslateRunOptions,
  FileTranslationResult,
  TranslateResult,
} from './types/index.js';

// Locales
export { Locale, ALL_LOCALES, isLocale, parseLocale } from './core/locale.js';

// Errors
export {
  TranslationError,
  ParseError,
  ProviderError,
  FormatError,
  RetryExhaustedError,
  ConfigError,
  isRetryableError,
} from './core/errors.js';

// Core utilities - Fluent resources
export {
  parseFtl,
  serializeFtl,
  getMessages,
  messageIds,
  collectSegments,
  applyTranslations,
  verifyTranslation,
} from './core/ftl.js';
export type {
  Segment,
  Placeable,
  InlinePlaceable,
  SelectPlaceable,
  Variant,
  FtlEntry,
  MessageEntry,
  ResourceFile,
} from './core/ftl.js';

// Core utilities - Batches and retries
export { createBatches, withRetry, translateInBatches } from './core/translator.js';
export type { RetryConfig, TranslateInBatchesOptions } from './core/translator.js';

// Core utilities - Options and config
export { DEFAULT_TRANSLATE_OPTS, resolveOpts, validateOpts, findFtlFiles } from './core/options.js';
export {
  loadConfig,
  mergeWithCliOptions,
  createConfigTemplate,
  validateConfig,
  toTranslateOpts,
  DEFAULT_CONFIG,
  API_KEY_ENV,
} from './core/config.js';
export type { ToolConfig, ProviderName } from './core/config.js';

// Providers
export * from './providers/index.js';
