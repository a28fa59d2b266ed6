/**
 * @fileoverview Batch translation runtime: splits texts into batches, sends them
 * through a shared concurrency gate, retries failed batches with a fixed delay and
 * merges the results back in input order.
 */

import type { LimitFunction } from 'p-limit';
import type { Translator } from '../types/index.js';
import type { Locale } from './locale.js';
import { FormatError, RetryExhaustedError, isRetryableError } from './errors.js';

/** Configuration for retry behavior */
export interface RetryConfig {
  /** Attempts after the first failure */
  retryCount: number;
  /** Fixed delay in ms between attempts */
  retryWaitTime: number;
  /** Called before waiting for the next attempt */
  onRetry?: (error: unknown, attempt: number) => void;
  /** Stops further attempts once aborted */
  signal?: AbortSignal;
}

/** Options for {@link translateInBatches} */
export interface TranslateInBatchesOptions {
  /** Texts to translate */
  texts: string[];
  source: Locale;
  target: Locale;
  translator: Translator;
  /** Gate shared by every provider call of the run */
  limit: LimitFunction;
  /** Number of texts per provider call */
  batchSize: number;
  retry: RetryConfig;
  /** Extra check on a batch result; throw a retryable error to reject it */
  validate?: (batch: string[], translated: string[]) => void;
  /** Called with the size of every batch that succeeds */
  onBatchDone?: (size: number) => void;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Split items into consecutive batches of at most `size` items.
 *
 * @example
 * ```typescript
 * createBatches(['a', 'b', 'c'], 2); // [['a', 'b'], ['c']]
 * ```
 */
export function createBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Translation aborted');
}

/**
 * Run a task until it succeeds, retrying provider and format errors.
 * Any other error is rethrown at once.
 *
 * @returns The first successful result
 * @throws RetryExhaustedError once `retryCount + 1` attempts have failed
 *
 * @example
 * ```typescript
 * const text = await withRetry(() => translator.translateBatch(['Привет'], 'ru', 'en'), {
 *   retryCount: 3,
 *   retryWaitTime: 5000,
 * });
 * ```
 */
export async function withRetry<T>(task: (attempt: number) => Promise<T>, config: RetryConfig): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= config.retryCount; attempt++) {
    if (config.signal?.aborted) {
      throw abortReason(config.signal);
    }

    try {
      return await task(attempt);
    } catch (error) {
      if (!isRetryableError(error)) {
        throw error;
      }
      lastError = error;

      if (attempt < config.retryCount) {
        config.onRetry?.(error, attempt + 1);
        await sleep(config.retryWaitTime);
      }
    }
  }

  throw new RetryExhaustedError(config.retryCount + 1, lastError);
}

/**
 * Translate texts in batches. Every provider call waits for a slot of `limit`;
 * the retry delay is spent outside of it. Results keep input order whatever order
 * the batches finish in. When one batch gives up, the remaining batches stop before
 * their next attempt and the returned promise rejects with that batch's error.
 *
 * @returns Translated texts in input order
 */
export async function translateInBatches({
  texts,
  source,
  target,
  translator,
  limit,
  batchSize,
  retry,
  validate,
  onBatchDone,
}: TranslateInBatchesOptions): Promise<string[]> {
  const batches = createBatches(texts, batchSize);
  const results: string[][] = new Array(batches.length);
  const controller = new AbortController();

  const runBatch = async (batch: string[], index: number): Promise<void> => {
    try {
      results[index] = await withRetry(
        () =>
          limit(async () => {
            if (controller.signal.aborted) {
              throw abortReason(controller.signal);
            }
            const translated = await translator.translateBatch(batch, source, target);
            if (translated.length !== batch.length) {
              throw new FormatError(
                `Expected ${batch.length} translations, received ${translated.length}`
              );
            }
            validate?.(batch, translated);
            return translated;
          }),
        { ...retry, signal: controller.signal }
      );
      onBatchDone?.(batch.length);
    } catch (error) {
      if (!controller.signal.aborted) {
        controller.abort(error);
      }
      throw error;
    }
  };

  await Promise.all(batches.map((batch, index) => runBatch(batch, index)));
  return results.flat();
}
