#!/usr/bin/env node
import { Command } from 'commander';
import { translate, translateBatch } from './commands/translate.js';
import { validate } from './commands/validate.js';
import type { ToolConfig } from './core/config.js';
import { createConfigTemplate, loadConfig, mergeWithCliOptions, toTranslateOpts } from './core/config.js';
import type { ProgressBar } from './core/output.js';
import { colors, createProgressBar, formatDuration, output } from './core/output.js';
import type { TranslateProgress } from './types/index.js';

interface SharedCliOptions {
  localesDir?: string;
  origin?: string;
  targets?: string;
}

interface TranslateCliOptions extends SharedCliOptions {
  provider?: string;
  file?: string;
  batchSize?: string;
  concurrency?: string;
  retryCount?: string;
  retryWait?: string;
  model?: string;
  mode?: string;
  proxy?: string;
  checkInterval?: string;
  includeFiles?: string;
  excludeFiles?: string;
  includeMessages?: string;
  excludeMessages?: string;
}

interface ValidateCliOptions extends SharedCliOptions {
  strict?: boolean;
}

function list(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function num(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function sharedOverrides(options: SharedCliOptions): Partial<ToolConfig> {
  return {
    localesDir: options.localesDir,
    originLocale: options.origin,
    targetLocales: list(options.targets),
  };
}

function reportError(e: unknown): never {
  output.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
}

const program = new Command();

program
  .name('fluent-autotranslate')
  .description(colors.dim('Machine-translate Fluent (.ftl) resources into every target locale'))
  .version('0.1.0');

// Init command
program
  .command('init')
  .description('Create a configuration file (.fluent-autotranslaterc.json)')
  .action(() => {
    try {
      const configPath = createConfigTemplate();
      output.success(`Created configuration file: ${colors.path(configPath)}`);
      console.log('');
      output.dim('You can now customize the settings in this file.');
    } catch (e) {
      reportError(e);
    }
  });

// Translate command
program
  .command('translate')
  .description('Translate origin locale files into the target locales')
  .option('-l, --locales-dir <path>', 'Path to locales directory')
  .option('-o, --origin <locale>', 'Origin locale')
  .option('-t, --targets <locales>', 'Target locales (comma-separated)')
  .option('-p, --provider <name>', 'Provider: google or llm')
  .option('-f, --file <path>', 'Translate only this origin file')
  .option('-b, --batch-size <n>', 'Strings per provider request')
  .option('-c, --concurrency <n>', 'Provider requests in flight')
  .option('--retry-count <n>', 'Retries after the first failed attempt')
  .option('--retry-wait <seconds>', 'Seconds between attempts')
  .option('--model <name>', 'LLM model')
  .option('--mode <mode>', 'LLM mode: chat or batch')
  .option('--proxy <url>', 'HTTPS proxy for the LLM provider')
  .option('--check-interval <seconds>', 'Seconds between Batch API status checks')
  .option('--include-files <names>', 'Only these file names (comma-separated)')
  .option('--exclude-files <names>', 'Skip these file names (comma-separated)')
  .option('--include-messages <ids>', 'Only these message ids (comma-separated)')
  .option('--exclude-messages <ids>', 'Skip these message ids (comma-separated)')
  .action(async (options: TranslateCliOptions) => {
    const progress: { bar?: ProgressBar } = {};
    try {
      const overrides: Record<string, unknown> = {
        ...sharedOverrides(options),
        provider: options.provider,
        translateBatchSize: num(options.batchSize),
        translateLimit: num(options.concurrency),
        translateRetryCount: num(options.retryCount),
        translateRetryWaitTime: num(options.retryWait),
        model: options.model,
        mode: options.mode,
        proxy: options.proxy,
        checkInterval: num(options.checkInterval),
        includeFiles: list(options.includeFiles),
        excludeFiles: list(options.excludeFiles),
        includeMessages: list(options.includeMessages),
        excludeMessages: list(options.excludeMessages),
      };
      if (options.provider !== undefined && options.provider !== 'google' && options.provider !== 'llm') {
        throw new Error(`Unknown provider: "${options.provider}". Expected google or llm`);
      }
      if (options.mode !== undefined && options.mode !== 'chat' && options.mode !== 'batch') {
        throw new Error(`Unknown mode: "${options.mode}". Expected chat or batch`);
      }

      const config = mergeWithCliOptions(loadConfig(), overrides);
      const opts = toTranslateOpts(config);
      const startTime = Date.now();

      const onProgress = ({ done, total }: TranslateProgress): void => {
        if (!process.stdout.isTTY) return;
        if (!progress.bar) {
          progress.bar = createProgressBar(total);
          progress.bar.start();
        }
        progress.bar.update(done);
      };

      const result = options.file
        ? await translate(opts, options.file, { onProgress })
        : await translateBatch(opts, { onProgress });
      progress.bar?.stop();

      output.dim(`Finished in ${formatDuration(Date.now() - startTime)}`);
      if (result.failed > 0) {
        process.exit(1);
      }
    } catch (e) {
      progress.bar?.stop();
      reportError(e);
    }
  });

// Validate command
program
  .command('validate')
  .description('Check translated files against the origin locale')
  .option('-l, --locales-dir <path>', 'Path to locales directory')
  .option('-o, --origin <locale>', 'Origin locale')
  .option('-t, --targets <locales>', 'Target locales (comma-separated)')
  .option('--strict', 'Treat warnings as errors')
  .action(async (options: ValidateCliOptions) => {
    try {
      const config = mergeWithCliOptions(loadConfig(), sharedOverrides(options));
      const opts = toTranslateOpts({ ...config, provider: 'google' });
      const result = await validate(opts, { strict: options.strict });

      if (!result.valid) {
        process.exit(1);
      }
    } catch (e) {
      reportError(e);
    }
  });

program.parseAsync().catch(reportError);
