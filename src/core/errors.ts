/**
 * @fileoverview Error types raised while parsing, translating and writing resources.
 */

/** Base class for every error this package raises */
export class TranslationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TranslationError';
  }
}

/** A resource file line or message that is not valid Fluent */
export class ParseError extends TranslationError {
  constructor(
    message: string,
    public readonly file?: string,
    public readonly line?: number
  ) {
    const location = file ? `${file}${line !== undefined ? `:${line}` : ''}: ` : '';
    super(`${location}${message}`);
    this.name = 'ParseError';
  }
}

/** Network, HTTP or provider-reported failure */
export class ProviderError extends TranslationError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }
}

/** Provider response that does not match the request (count, shape, placeables) */
export class FormatError extends TranslationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FormatError';
  }
}

/** Every attempt for a batch failed; `cause` holds the last failure */
export class RetryExhaustedError extends TranslationError {
  constructor(
    public readonly attempts: number,
    lastError: unknown
  ) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Translation failed after ${attempts} attempt(s): ${reason}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

/** Invalid options or missing locale directories */
export class ConfigError extends TranslationError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Errors that a fresh attempt may not repeat */
export function isRetryableError(error: unknown): boolean {
  return error instanceof ProviderError || error instanceof FormatError;
}
