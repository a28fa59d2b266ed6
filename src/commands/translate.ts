import fs from 'node:fs';
import path from 'node:path';
import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';
import type {
  FileTranslationResult,
  ResolvedTranslateOpts,
  TranslateOpts,
  TranslateResult,
  TranslateRunOptions,
  Translator,
} from '../types/index.js';
import type { Locale } from '../core/locale.js';
import type { ResourceFile, Segment } from '../core/ftl.js';
import { applyTranslations, collectSegments, isBlankSegment, parseFtl, serializeFtl, verifyTranslation } from '../core/ftl.js';
import {
  findFtlFiles,
  isTranslatableMessage,
  resolveOpts,
  targetFilePath,
  toOriginRelativePath,
} from '../core/options.js';
import { translateInBatches } from '../core/translator.js';
import { createTranslator } from '../providers/index.js';
import { colors, output, pairLabel } from '../core/output.js';

interface OriginFile {
  /** Path relative to the origin locale directory */
  file: string;
  resource: ResourceFile;
}

interface RunContext {
  opts: ResolvedTranslateOpts;
  translator: Translator;
  limit: LimitFunction;
  silent: boolean;
  onBatchDone: (size: number) => void;
}

/**
 * Read and parse origin files. Runs before any provider call so that a malformed
 * file stops the run with nothing written.
 */
function loadOriginFiles(opts: ResolvedTranslateOpts, files: string[]): OriginFile[] {
  return files.map((file) => {
    const source = fs.readFileSync(path.join(opts.originLocaleDir, file), 'utf8');
    return { file, resource: parseFtl(source, file) };
  });
}

function translatableSegments(opts: ResolvedTranslateOpts, resource: ResourceFile): Segment[] {
  return collectSegments(resource).filter(
    (segment) => !isBlankSegment(segment) && isTranslatableMessage(opts, segment.messageId)
  );
}

/**
 * Translate one origin file into one locale and write it. Nothing is written
 * unless every batch succeeds.
 */
async function translateFile(ctx: RunContext, origin: OriginFile, locale: Locale): Promise<FileTranslationResult> {
  const { opts } = ctx;
  const target = targetFilePath(opts, origin.file, locale);
  const segments = translatableSegments(opts, origin.resource);
  const label = pairLabel(opts.originLocale, locale, origin.file);

  try {
    const translated = await translateInBatches({
      texts: segments.map((segment) => segment.text),
      source: opts.originLocale,
      target: locale,
      translator: ctx.translator,
      limit: ctx.limit,
      batchSize: opts.translateBatchSize,
      retry: {
        retryCount: opts.translateRetryCount,
        retryWaitTime: opts.translateRetryWaitTime * 1000,
        onRetry: (error, attempt) => {
          if (!ctx.silent) {
            const reason = error instanceof Error ? error.message : String(error);
            output.warn(
              `${label}: ${reason}. Retry ${attempt}/${opts.translateRetryCount} in ${opts.translateRetryWaitTime}s`
            );
          }
        },
      },
      validate: (batch, results) => {
        results.forEach((text, i) => verifyTranslation(batch[i], text));
      },
      onBatchDone: ctx.onBatchDone,
    });

    const translations = new Map(segments.map((segment, i) => [segment, translated[i].trim()]));
    const content = serializeFtl(applyTranslations(origin.resource, translations));

    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, 'utf8');

    if (!ctx.silent) {
      output.success(`${label} ${colors.dim(`(${segments.length} strings)`)}`);
    }
    return { file: origin.file, locale, target, status: 'translated', segments: segments.length };
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e));
    if (!ctx.silent) {
      output.error(`${label}: ${error.message}`);
    }
    return { file: origin.file, locale, target, status: 'failed', segments: segments.length, error };
  }
}

async function run(opts: TranslateOpts, resolved: ResolvedTranslateOpts, files: string[], runOptions: TranslateRunOptions): Promise<TranslateResult> {
  const silent = runOptions.silent ?? false;

  if (!silent) {
    output.header('Translate Fluent Resources');
    output.keyValue('Provider', runOptions.translator?.name ?? opts.provider);
    output.keyValue('Origin', resolved.originLocale);
    output.keyValue('Targets', resolved.targetLocales.join(', ') || colors.dim('none'));
    output.keyValue('Files', files.length);
    output.newline();
  }

  const origins = loadOriginFiles(resolved, files);

  const total =
    origins.reduce((sum, origin) => sum + translatableSegments(resolved, origin.resource).length, 0) *
    resolved.targetLocales.length;
  let done = 0;

  const translator =
    runOptions.translator ??
    createTranslator(opts, {
      onBatchStatus: silent ? undefined : (status) => output.dim(`Batch job status: ${status}`),
    });
  const ctx: RunContext = {
    opts: resolved,
    translator,
    limit: pLimit(resolved.translateLimit),
    silent,
    onBatchDone: (size) => {
      done += size;
      runOptions.onProgress?.({ done, total });
    },
  };

  let fileResults: FileTranslationResult[];
  try {
    fileResults = await Promise.all(
      resolved.targetLocales.flatMap((locale) => origins.map((origin) => translateFile(ctx, origin, locale)))
    );
  } finally {
    if (!runOptions.translator) {
      await translator.dispose?.();
    }
  }

  const result: TranslateResult = {
    files: fileResults,
    translated: fileResults.filter((file) => file.status === 'translated').length,
    failed: fileResults.filter((file) => file.status === 'failed').length,
  };

  if (!silent) {
    output.newline();
    output.separator();
    if (result.failed > 0) {
      output.error(`Translation finished with ${result.failed} failed file(s), ${result.translated} written`);
    } else {
      output.success(`Translation complete! ${result.translated} file(s) written`);
    }
  }

  return result;
}

/**
 * Translate one origin file into every target locale.
 *
 * @param opts - Provider and run options
 * @param file - Origin file, relative to `{localesDir}/{originLocale}` or a path inside it
 * @param runOptions - Injected translator, progress callback, silent mode
 * @returns One result per target locale; failed locales carry their error
 * @throws ConfigError on invalid options or missing directories
 * @throws ParseError if the origin file is not valid Fluent
 *
 * @example
 * ```typescript
 * const result = await translate(
 *   { provider: 'google', localesDir: 'locales', originLocale: Locale.RUSSIAN, targetLocales: [Locale.ENGLISH] },
 *   'main.ftl'
 * );
 * console.log(result.files[0].target); // .../locales/en/main.ftl
 * ```
 */
export async function translate(
  opts: TranslateOpts,
  file: string,
  runOptions: TranslateRunOptions = {}
): Promise<TranslateResult> {
  const resolved = resolveOpts(opts);
  return run(opts, resolved, [toOriginRelativePath(resolved, file)], runOptions);
}

/**
 * Translate every `.ftl` file under `{localesDir}/{originLocale}` into every target
 * locale. Files and locales are processed concurrently; at most `translateLimit`
 * provider calls are in flight for the whole run.
 *
 * @example
 * ```typescript
 * const result = await translateBatch({
 *   provider: 'llm',
 *   apiKey: process.env.OPENAI_API_KEY ?? '',
 *   localesDir: 'locales',
 *   targetLocales: [Locale.ENGLISH, Locale.GERMAN],
 * });
 * if (result.failed > 0) process.exitCode = 1;
 * ```
 */
export async function translateBatch(
  opts: TranslateOpts,
  runOptions: TranslateRunOptions = {}
): Promise<TranslateResult> {
  const resolved = resolveOpts(opts);
  const files = await findFtlFiles(resolved);
  return run(opts, resolved, files, runOptions);
}
