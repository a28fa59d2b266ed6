/**
 * @fileoverview Console output: colored status lines, run headers, validation issues
 * and the CLI progress bar.
 */

import pc from 'picocolors';
import cliProgress from 'cli-progress';

type Paint = (text: string) => string;

const symbols = {
  success: pc.green('✓'),
  error: pc.red('✗'),
  warning: pc.yellow('⚠'),
} as const;

export const colors = {
  dim: pc.dim,
  path: pc.dim,
  lang: pc.magenta,
};

function line(symbol: string, paint: Paint, message: string, write: (text: string) => void = console.log): void {
  write(`${symbol} ${paint(message)}`);
}

export const output = {
  success: (message: string): void => line(symbols.success, pc.green, message),
  error: (message: string): void => line(symbols.error, pc.red, message, console.error),
  warn: (message: string): void => line(symbols.warning, pc.yellow, message, console.warn),
  dim: (message: string): void => console.log(pc.dim(message)),
  newline: (): void => console.log(''),

  /** Bold title underlined to its width */
  header(title: string): void {
    console.log(`\n${pc.bold(title)}`);
    console.log(pc.dim('─'.repeat(Math.max(40, title.length + 4))));
  },

  section(title: string): void {
    console.log(`\n${pc.bold(pc.blue(title))}`);
  },

  keyValue(key: string, value: string | number): void {
    console.log(`${pc.dim(`${key}:`)} ${value}`);
  },

  separator(length = 50): void {
    console.log(pc.dim('─'.repeat(length)));
  },

  /** Two-line entry of a validation report */
  issue(severity: 'error' | 'warning', type: string, file: string, detail: string, key?: string): void {
    const label = severity === 'error' ? pc.red('error') : pc.yellow('warn');
    console.log(`  ${label} ${type} ${pc.dim(file)}`);
    console.log(`    ${key ? `${pc.cyan(key)}: ` : ''}${detail}`);
  },
};

/** `[ru -> en] path/to/file.ftl` */
export function pairLabel(origin: string, locale: string, file: string): string {
  return `[${origin} -> ${pc.magenta(locale)}] ${file}`;
}

export interface ProgressBar {
  start: () => void;
  update: (value: number) => void;
  stop: () => void;
}

/**
 * Progress bar over the strings of a translation run.
 *
 * @example
 * ```typescript
 * const bar = createProgressBar(120);
 * bar.start();
 * await translateBatch(opts, { onProgress: ({ done }) => bar.update(done) });
 * bar.stop();
 * ```
 */
export function createProgressBar(total: number): ProgressBar {
  const bar = new cliProgress.SingleBar(
    {
      format: `${pc.blue('{bar}')} ${pc.bold('{percentage}%')} | ${pc.dim('{value}/{total} strings')} | {duration_formatted}`,
      hideCursor: true,
      stopOnComplete: true,
      barsize: 30,
    },
    cliProgress.Presets.shades_classic
  );

  return {
    start: () => bar.start(total, 0),
    update: (value) => bar.update(value),
    stop: () => bar.stop(),
  };
}

/** `850ms`, `4.2s` or `3m 5s` */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60_000)}m ${Math.round((ms % 60_000) / 1000)}s`;
}
