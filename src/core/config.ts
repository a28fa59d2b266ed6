/**
 * @fileoverview Configuration file loader for fluent-autotranslate.
 * Supports .fluent-autotranslaterc.json and the package.json "fluent-autotranslate" field.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { LlmMode, TranslateOpts } from '../types/index.js';
import { ConfigError } from './errors.js';
import { ALL_LOCALES, Locale, isLocale } from './locale.js';
import { DEFAULT_TRANSLATE_OPTS, validateOpts } from './options.js';
import { DEFAULT_MODEL } from '../providers/llm.js';

export type ProviderName = TranslateOpts['provider'];

/**
 * Configuration options for fluent-autotranslate. Locales are kept as plain strings
 * until {@link validateConfig} has checked them.
 */
export interface ToolConfig {
  /** Path to locales directory, relative to the project root (default: 'locales') */
  localesDir: string;
  /** Origin locale (default: 'ru') */
  originLocale: string;
  /** Target locales (default: every supported locale; the origin is skipped) */
  targetLocales: string[];
  /** Translation provider (default: 'google') */
  provider: ProviderName;
  translateBatchSize: number;
  translateLimit: number;
  /** Seconds between attempts */
  translateRetryWaitTime: number;
  translateRetryCount: number;
  includeFiles: string[];
  excludeFiles: string[];
  includeMessages: string[];
  excludeMessages: string[];
  /** LLM model (default: 'gpt-4o-mini') */
  model: string;
  /** LLM system prompt override */
  systemPrompt?: string;
  /** LLM mode (default: 'chat') */
  mode: LlmMode;
  /** Seconds between Batch API status checks (default: 10) */
  checkInterval: number;
  /** HTTPS proxy for the LLM provider */
  proxy?: string;
}

/** Configuration file names to search for (in order of priority) */
const CONFIG_FILES = [
  '.fluent-autotranslaterc.json',
  '.fluent-autotranslaterc',
  'fluent-autotranslate.config.json',
];

/** package.json field holding the configuration */
const PACKAGE_FIELD = 'fluent-autotranslate';

/** Environment variable holding the OpenAI API key */
export const API_KEY_ENV = 'OPENAI_API_KEY';

/** Default configuration values */
export const DEFAULT_CONFIG: ToolConfig = {
  localesDir: 'locales',
  originLocale: DEFAULT_TRANSLATE_OPTS.originLocale,
  targetLocales: [...ALL_LOCALES],
  provider: 'google',
  translateBatchSize: DEFAULT_TRANSLATE_OPTS.translateBatchSize,
  translateLimit: DEFAULT_TRANSLATE_OPTS.translateLimit,
  translateRetryWaitTime: DEFAULT_TRANSLATE_OPTS.translateRetryWaitTime,
  translateRetryCount: DEFAULT_TRANSLATE_OPTS.translateRetryCount,
  includeFiles: [],
  excludeFiles: [],
  includeMessages: [],
  excludeMessages: [],
  model: DEFAULT_MODEL,
  mode: 'chat',
  checkInterval: 10,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Keep the known fields of a parsed configuration object that have the right type.
 * Fields of the wrong type are reported by {@link validateConfig} once merged.
 */
function pickConfig(raw: Record<string, unknown>): Partial<ToolConfig> {
  const config: Partial<ToolConfig> = {};

  for (const key of ['localesDir', 'originLocale', 'model', 'systemPrompt', 'proxy'] as const) {
    const value = raw[key];
    if (typeof value === 'string') config[key] = value;
  }
  for (const key of ['translateBatchSize', 'translateLimit', 'translateRetryWaitTime', 'translateRetryCount', 'checkInterval'] as const) {
    const value = raw[key];
    if (typeof value === 'number') config[key] = value;
  }
  for (const key of ['targetLocales', 'includeFiles', 'excludeFiles', 'includeMessages', 'excludeMessages'] as const) {
    const value = raw[key];
    if (isStringList(value)) config[key] = value;
  }
  const { provider, mode } = raw;
  if (provider === 'google' || provider === 'llm') {
    config.provider = provider;
  }
  if (mode === 'chat' || mode === 'batch') {
    config.mode = mode;
  }

  return config;
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf8'));
}

/**
 * Find and load configuration file from the project root.
 * Searches for config files in order of priority, then falls back to package.json.
 *
 * @param root - Root directory to search from (default: process.cwd())
 * @returns Loaded configuration merged with defaults
 * @throws ConfigError if a config file is not valid JSON
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * console.log(config.localesDir); // 'locales' or custom value
 * ```
 */
export function loadConfig(root: string = process.cwd()): ToolConfig {
  let userConfig: Partial<ToolConfig> = {};
  let found = false;

  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(root, configFile);
    if (!fs.existsSync(configPath)) continue;

    let raw: unknown;
    try {
      raw = readJson(configPath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Could not parse ${configFile}: ${reason}`);
    }
    if (!isRecord(raw)) {
      throw new ConfigError(`${configFile} must contain a JSON object`);
    }
    userConfig = pickConfig(raw);
    found = true;
    break;
  }

  if (!found) {
    const packagePath = path.join(root, 'package.json');
    if (fs.existsSync(packagePath)) {
      let packageJson: unknown;
      try {
        packageJson = readJson(packagePath);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Could not parse package.json: ${reason}`);
      }
      if (isRecord(packageJson)) {
        const field = packageJson[PACKAGE_FIELD];
        if (isRecord(field)) userConfig = pickConfig(field);
      }
    }
  }

  return { ...DEFAULT_CONFIG, ...userConfig };
}

/**
 * Apply CLI overrides to a loaded configuration.
 * Defined CLI values take precedence over config file values; unknown keys and
 * values of the wrong type are ignored.
 *
 * @example
 * ```typescript
 * const finalConfig = mergeWithCliOptions(loadConfig(), { localesDir: 'app/locales' });
 * ```
 */
export function mergeWithCliOptions(config: ToolConfig, cliOptions: Record<string, unknown>): ToolConfig {
  const defined = Object.fromEntries(
    Object.entries(cliOptions).filter(([, value]) => value !== undefined)
  );
  return { ...config, ...pickConfig(defined) };
}

/**
 * Create a configuration file template in the project root.
 *
 * @returns Path to created config file
 */
export function createConfigTemplate(
  root: string = process.cwd(),
  filename: string = CONFIG_FILES[0]
): string {
  const configPath = path.join(root, filename);

  const template: Partial<ToolConfig> = {
    localesDir: DEFAULT_CONFIG.localesDir,
    originLocale: Locale.RUSSIAN,
    targetLocales: [Locale.ENGLISH, Locale.GERMAN],
    provider: 'google',
    translateBatchSize: DEFAULT_CONFIG.translateBatchSize,
    translateLimit: DEFAULT_CONFIG.translateLimit,
    translateRetryWaitTime: DEFAULT_CONFIG.translateRetryWaitTime,
    translateRetryCount: DEFAULT_CONFIG.translateRetryCount,
    model: DEFAULT_CONFIG.model,
  };

  fs.writeFileSync(configPath, JSON.stringify(template, null, 2) + '\n', 'utf8');
  return configPath;
}

/**
 * Validate configuration and return any errors found.
 *
 * @returns Array of validation error messages (empty if valid)
 */
export function validateConfig(config: ToolConfig): string[] {
  const errors: string[] = [];

  for (const locale of [config.originLocale, ...config.targetLocales]) {
    if (!isLocale(locale)) {
      errors.push(`Unsupported locale: "${locale}". Expected one of: ${ALL_LOCALES.join(', ')}`);
    }
  }

  errors.push(...validateOpts({ ...config, originLocale: undefined, targetLocales: undefined }));

  if (!Number.isFinite(config.checkInterval) || config.checkInterval <= 0) {
    errors.push(`Invalid checkInterval: ${config.checkInterval}. Must be more than 0 seconds`);
  }

  return errors;
}

/**
 * Turn a validated configuration into run options.
 *
 * @param root - Directory `localesDir` is relative to
 * @param env - Environment the API key is read from
 * @throws ConfigError if the configuration is invalid or the LLM provider has no API key
 */
export function toTranslateOpts(
  config: ToolConfig,
  root: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): TranslateOpts {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(errors.join('; '));
  }

  const locales = [config.originLocale, ...config.targetLocales].filter(isLocale);
  const [originLocale, ...targetLocales] = locales;

  const base = {
    localesDir: path.resolve(root, config.localesDir),
    originLocale,
    targetLocales,
    includeFiles: config.includeFiles,
    excludeFiles: config.excludeFiles,
    includeMessages: config.includeMessages,
    excludeMessages: config.excludeMessages,
    translateBatchSize: config.translateBatchSize,
    translateLimit: config.translateLimit,
    translateRetryWaitTime: config.translateRetryWaitTime,
    translateRetryCount: config.translateRetryCount,
  };

  if (config.provider === 'google') {
    return { provider: 'google', ...base };
  }

  const apiKey = env[API_KEY_ENV];
  if (!apiKey) {
    throw new ConfigError(`The llm provider needs an API key in ${API_KEY_ENV}`);
  }

  return {
    provider: 'llm',
    ...base,
    apiKey,
    model: config.model,
    systemPrompt: config.systemPrompt,
    source: originLocale,
    target: targetLocales[0],
    checkInterval: config.checkInterval,
    proxy: config.proxy,
    mode: config.mode,
  };
}
