/**
 * @fileoverview Supported locales. Each value is both the locale directory name
 * under `localesDir` and the language code sent to translation providers.
 */

import { ConfigError } from './errors.js';

export const Locale = {
  ENGLISH: 'en',
  RUSSIAN: 'ru',

  ARABIC: 'ar',
  CHINESE: 'zh-CN',
  SPANISH: 'es',
  FRENCH: 'fr',
  GERMAN: 'de',
  HINDI: 'hi',
  JAPANESE: 'ja',
  PORTUGUESE: 'pt',
  TURKISH: 'tr',
  UKRAINIAN: 'uk',

  FILIPINO: 'tl',
  INDONESIAN: 'id',
} as const;

export type Locale = (typeof Locale)[keyof typeof Locale];

/** Every supported locale, in declaration order */
export const ALL_LOCALES: readonly Locale[] = Object.values(Locale);

export function isLocale(value: string): value is Locale {
  return ALL_LOCALES.some((locale) => locale === value);
}

/**
 * Convert a user-supplied language code into a {@link Locale}.
 *
 * @throws ConfigError if the code is not supported
 */
export function parseLocale(value: string): Locale {
  const trimmed = value.trim();
  if (!isLocale(trimmed)) {
    throw new ConfigError(
      `Unsupported locale "${value}". Expected one of: ${ALL_LOCALES.join(', ')}`
    );
  }
  return trimmed;
}
