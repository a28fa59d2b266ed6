/**
 * @fileoverview Validate command - check translated Fluent files against the origin.
 * Detects unparsable files, missing and extra messages, changed placeables and empty values.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { BaseTranslateOpts } from '../types/index.js';
import type { Segment } from '../core/ftl.js';
import { collectSegments, isBlankSegment, parseFtl } from '../core/ftl.js';
import { ParseError } from '../core/errors.js';
import { findFtlFiles, resolveOpts, targetFilePath } from '../core/options.js';
import { colors, output } from '../core/output.js';

export type IssueType =
  | 'parse_error'
  | 'missing_file'
  | 'missing_key'
  | 'extra_key'
  | 'placeable_mismatch'
  | 'empty_value';

export interface ValidationIssue {
  type: IssueType;
  /** Locale the issue was found in */
  locale: string;
  /** File, relative to the locale directory */
  file: string;
  /** Segment key (`id` or `id.attr`), if applicable */
  key?: string;
  message: string;
  severity: 'error' | 'warning';
}

export interface ValidateResult {
  /** Whether validation passed */
  valid: boolean;
  errorCount: number;
  warningCount: number;
  issues: ValidationIssue[];
}

export interface ValidateOptions {
  /** Treat warnings as errors */
  strict?: boolean;
  silent?: boolean;
}

const SEVERITY: Record<IssueType, ValidationIssue['severity']> = {
  parse_error: 'error',
  missing_file: 'error',
  missing_key: 'error',
  extra_key: 'warning',
  placeable_mismatch: 'error',
  empty_value: 'warning',
};

function issue(type: IssueType, locale: string, file: string, message: string, key?: string): ValidationIssue {
  return { type, locale, file, key, message, severity: SEVERITY[type] };
}

/**
 * Placeables with insignificant whitespace removed, sorted. A select expression is
 * reduced to its selector and variant keys; its variants are segments of their own.
 */
function placeableSignature(segment: Segment): string[] {
  return segment.placeables
    .map((placeable) =>
      placeable.type === 'inline'
        ? placeable.source
        : `${placeable.selector}->${placeable.variants.map((v) => `${v.isDefault ? '*' : ''}[${v.key}]`).join('')}`
    )
    .map((signature) => signature.replace(/\s+/g, ''))
    .sort();
}

function readSegments(
  filePath: string,
  locale: string,
  file: string,
  issues: ValidationIssue[]
): Map<string, Segment> | null {
  try {
    const resource = parseFtl(fs.readFileSync(filePath, 'utf8'), file);
    return new Map(collectSegments(resource).map((segment) => [segment.key, segment]));
  } catch (error) {
    if (error instanceof ParseError) {
      issues.push(issue('parse_error', locale, file, error.message));
      return null;
    }
    throw error;
  }
}

function compareSegments(
  origin: Map<string, Segment>,
  target: Map<string, Segment>,
  locale: string,
  file: string,
  issues: ValidationIssue[]
): void {
  for (const [key, source] of origin) {
    const translated = target.get(key);
    if (!translated) {
      issues.push(issue('missing_key', locale, file, `Message missing from ${locale}`, key));
      continue;
    }

    if (isBlankSegment(translated) && !isBlankSegment(source)) {
      issues.push(issue('empty_value', locale, file, 'Translation is empty', key));
      continue;
    }

    const expected = placeableSignature(source);
    const actual = placeableSignature(translated);
    if (expected.join('\n') !== actual.join('\n')) {
      issues.push(
        issue(
          'placeable_mismatch',
          locale,
          file,
          `Placeable mismatch: source has ${source.placeables.length}, target has ${translated.placeables.length}`,
          key
        )
      );
    }
  }

  for (const key of target.keys()) {
    if (!origin.has(key)) {
      issues.push(issue('extra_key', locale, file, `Message exists in ${locale} but not in origin`, key));
    }
  }
}

function printIssues(issues: ValidationIssue[]): void {
  const byLocale = new Map<string, ValidationIssue[]>();
  for (const found of issues) {
    const list = byLocale.get(found.locale) ?? [];
    list.push(found);
    byLocale.set(found.locale, list);
  }

  for (const [locale, localeIssues] of byLocale) {
    output.section(colors.lang(locale.toUpperCase()));

    const ordered = [
      ...localeIssues.filter((found) => found.severity === 'error'),
      ...localeIssues.filter((found) => found.severity === 'warning'),
    ];
    for (const found of ordered.slice(0, 20)) {
      output.issue(found.severity, found.type, found.file, found.message, found.key);
    }
    if (ordered.length > 20) {
      output.dim(`  ... and ${ordered.length - 20} more issues`);
    }
  }
}

/**
 * Validate translated resources against the origin locale.
 * Checks for:
 * - Origin or target files that are not valid Fluent
 * - Target files that do not exist
 * - Messages and attributes missing from, or only present in, a target
 * - Placeables that differ from the origin
 * - Empty translations
 *
 * @throws ConfigError on invalid options or missing directories
 *
 * @example
 * ```typescript
 * const result = await validate({ localesDir: 'locales', targetLocales: [Locale.ENGLISH] }, { strict: true });
 * if (!result.valid) {
 *   console.error(`Found ${result.errorCount} errors`);
 *   process.exit(1);
 * }
 * ```
 */
export async function validate(opts: BaseTranslateOpts, options: ValidateOptions = {}): Promise<ValidateResult> {
  const resolved = resolveOpts(opts);
  const files = await findFtlFiles(resolved);
  const issues: ValidationIssue[] = [];

  if (!options.silent) {
    output.header('Validate Translations');
    output.keyValue('Origin', resolved.originLocale);
    output.keyValue('Locales', resolved.targetLocales.join(', ') || colors.dim('none'));
    output.keyValue('Files', files.length);
  }

  for (const file of files) {
    const origin = readSegments(path.join(resolved.originLocaleDir, file), resolved.originLocale, file, issues);
    if (!origin) continue;

    for (const locale of resolved.targetLocales) {
      const targetPath = targetFilePath(resolved, file, locale);
      if (!fs.existsSync(targetPath)) {
        issues.push(issue('missing_file', locale, file, `Translation file not found: ${targetPath}`));
        continue;
      }

      const target = readSegments(targetPath, locale, file, issues);
      if (target) {
        compareSegments(origin, target, locale, file, issues);
      }
    }
  }

  const errorCount = issues.filter((found) => found.severity === 'error').length;
  const warningCount = issues.filter((found) => found.severity === 'warning').length;
  const effectiveErrors = options.strict ? errorCount + warningCount : errorCount;

  if (!options.silent) {
    printIssues(issues);
    output.newline();
    output.separator();

    if (effectiveErrors > 0) {
      output.error(`Validation failed: ${errorCount} error(s), ${warningCount} warning(s)`);
    } else if (warningCount > 0) {
      output.warn(`Validation passed with ${warningCount} warning(s)`);
    } else {
      output.success('Validation passed - no issues found');
    }
  }

  return {
    valid: effectiveErrors === 0,
    errorCount,
    warningCount,
    issues,
  };
}
