/**
 * @fileoverview Option defaults, validation and origin file discovery.
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import type { BaseTranslateOpts, ResolvedTranslateOpts } from '../types/index.js';
import { ConfigError } from './errors.js';
import { ALL_LOCALES, Locale, isLocale } from './locale.js';

/** Default values for the shared options */
export const DEFAULT_TRANSLATE_OPTS = {
  originLocale: Locale.RUSSIAN,
  translateBatchSize: 5,
  translateLimit: 4,
  translateRetryWaitTime: 5,
  translateRetryCount: 3,
} as const;

/**
 * Validate option values and return any errors found.
 *
 * @returns Array of validation error messages (empty if valid)
 */
export function validateOpts(opts: BaseTranslateOpts): string[] {
  const errors: string[] = [];

  if (!opts.localesDir) {
    errors.push('localesDir is required');
  }

  for (const locale of [opts.originLocale, ...(opts.targetLocales ?? [])]) {
    if (locale !== undefined && !isLocale(locale)) {
      errors.push(`Unsupported locale: "${locale}". Expected one of: ${ALL_LOCALES.join(', ')}`);
    }
  }

  const positive: Array<[string, number | undefined]> = [
    ['translateBatchSize', opts.translateBatchSize],
    ['translateLimit', opts.translateLimit],
  ];
  for (const [name, value] of positive) {
    if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
      errors.push(`Invalid ${name}: ${value}. Must be an integer of at least 1`);
    }
  }

  if (
    opts.translateRetryCount !== undefined &&
    (!Number.isInteger(opts.translateRetryCount) || opts.translateRetryCount < 0)
  ) {
    errors.push(`Invalid translateRetryCount: ${opts.translateRetryCount}. Must be an integer of at least 0`);
  }

  if (
    opts.translateRetryWaitTime !== undefined &&
    (!Number.isFinite(opts.translateRetryWaitTime) || opts.translateRetryWaitTime < 0)
  ) {
    errors.push(`Invalid translateRetryWaitTime: ${opts.translateRetryWaitTime}. Must be 0 or more seconds`);
  }

  return errors;
}

/**
 * Apply defaults, drop the origin locale and duplicates from the targets, and check
 * that the locale directories exist.
 *
 * @throws ConfigError if an option is invalid or a directory is missing
 *
 * @example
 * ```typescript
 * const resolved = resolveOpts({ localesDir: 'locales', targetLocales: ['ru', 'en', 'en'] });
 * resolved.targetLocales; // ['en']
 * ```
 */
export function resolveOpts(opts: BaseTranslateOpts): ResolvedTranslateOpts {
  const errors = validateOpts(opts);
  if (errors.length > 0) {
    throw new ConfigError(errors.join('; '));
  }

  const localesDir = path.resolve(opts.localesDir);
  const originLocale = opts.originLocale ?? DEFAULT_TRANSLATE_OPTS.originLocale;
  const originLocaleDir = path.join(localesDir, originLocale);

  if (!fs.existsSync(localesDir) || !fs.statSync(localesDir).isDirectory()) {
    throw new ConfigError(`Locales directory not found: ${localesDir}`);
  }
  if (!fs.existsSync(originLocaleDir) || !fs.statSync(originLocaleDir).isDirectory()) {
    throw new ConfigError(`Origin locale directory not found: ${originLocaleDir}`);
  }

  const targetLocales = [...new Set(opts.targetLocales ?? ALL_LOCALES)].filter(
    (locale) => locale !== originLocale
  );

  return {
    localesDir,
    originLocale,
    originLocaleDir,
    targetLocales,
    includeFiles: opts.includeFiles ?? [],
    excludeFiles: opts.excludeFiles ?? [],
    includeMessages: opts.includeMessages ?? [],
    excludeMessages: opts.excludeMessages ?? [],
    translateBatchSize: opts.translateBatchSize ?? DEFAULT_TRANSLATE_OPTS.translateBatchSize,
    translateLimit: opts.translateLimit ?? DEFAULT_TRANSLATE_OPTS.translateLimit,
    translateRetryWaitTime: opts.translateRetryWaitTime ?? DEFAULT_TRANSLATE_OPTS.translateRetryWaitTime,
    translateRetryCount: opts.translateRetryCount ?? DEFAULT_TRANSLATE_OPTS.translateRetryCount,
  };
}

/** Whether a file passes the include/exclude file name filters */
function isApplicableFile(opts: ResolvedTranslateOpts, file: string): boolean {
  const name = path.basename(file);
  if (opts.includeFiles.length > 0 && !opts.includeFiles.includes(name)) {
    return false;
  }
  return !opts.excludeFiles.includes(name);
}

/** Whether a message passes the include/exclude message id filters */
export function isTranslatableMessage(opts: ResolvedTranslateOpts, messageId: string): boolean {
  if (opts.includeMessages.length > 0 && !opts.includeMessages.includes(messageId)) {
    return false;
  }
  return !opts.excludeMessages.includes(messageId);
}

/**
 * Find every `.ftl` file under the origin locale directory.
 *
 * @returns Paths relative to the origin locale directory, sorted, using `/`
 */
export async function findFtlFiles(opts: ResolvedTranslateOpts): Promise<string[]> {
  const files = await fg('**/*.ftl', {
    cwd: opts.originLocaleDir,
    onlyFiles: true,
  });
  return files.filter((file) => isApplicableFile(opts, file)).sort();
}

/**
 * Resolve a user-given origin file (relative to the origin locale directory, or a
 * path inside it) to its relative path.
 *
 * @throws ConfigError if the file is outside the origin locale directory or missing
 */
export function toOriginRelativePath(opts: ResolvedTranslateOpts, file: string): string {
  const absolute = path.resolve(opts.originLocaleDir, file);
  const relative = path.relative(opts.originLocaleDir, absolute);

  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new ConfigError(`${file} is not inside ${opts.originLocaleDir}`);
  }
  if (!fs.existsSync(absolute)) {
    throw new ConfigError(`Origin file not found: ${absolute}`);
  }
  return relative.split(path.sep).join('/');
}

/** Output path of an origin file for a target locale */
export function targetFilePath(opts: ResolvedTranslateOpts, relativeFile: string, locale: Locale): string {
  return path.join(opts.localesDir, locale, relativeFile);
}
