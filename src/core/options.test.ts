import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  findFtlFiles,
  isTranslatableMessage,
  resolveOpts,
  targetFilePath,
  toOriginRelativePath,
} from './options.js';
import { ConfigError } from './errors.js';

let tmpDir: string;
let localesDir: string;

function writeFile(relative: string, content = 'key = Значение\n'): void {
  const file = path.join(localesDir, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, 'utf8');
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fluent-autotranslate-options-'));
  localesDir = path.join(tmpDir, 'locales');
  writeFile('ru/main.ftl');
  writeFile('ru/nested/extra.ftl');
  writeFile('ru/skip.ftl');
  writeFile('ru/readme.txt', 'not a resource');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('resolveOpts', () => {
  it('applies defaults and cleans up the targets', () => {
    const resolved = resolveOpts({ localesDir, targetLocales: ['ru', 'en', 'en', 'de'] });

    expect(resolved).toEqual({
      localesDir,
      originLocale: 'ru',
      originLocaleDir: path.join(localesDir, 'ru'),
      targetLocales: ['en', 'de'],
      includeFiles: [],
      excludeFiles: [],
      includeMessages: [],
      excludeMessages: [],
      translateBatchSize: 5,
      translateLimit: 4,
      translateRetryWaitTime: 5,
      translateRetryCount: 3,
    });
  });

  it('defaults to every locale but the origin', () => {
    const resolved = resolveOpts({ localesDir });
    expect(resolved.targetLocales).toHaveLength(13);
    expect(resolved.targetLocales).not.toContain('ru');
  });

  it('rejects invalid numbers', () => {
    expect(() => resolveOpts({ localesDir, translateBatchSize: 0, translateRetryCount: -1 })).toThrow(
      new ConfigError(
        'Invalid translateBatchSize: 0. Must be an integer of at least 1; ' +
          'Invalid translateRetryCount: -1. Must be an integer of at least 0'
      )
    );
  });

  it('rejects missing directories', () => {
    const missing = path.join(tmpDir, 'missing');
    expect(() => resolveOpts({ localesDir: missing })).toThrow(`Locales directory not found: ${missing}`);
    expect(() => resolveOpts({ localesDir, originLocale: 'de' })).toThrow(
      `Origin locale directory not found: ${path.join(localesDir, 'de')}`
    );
  });
});

describe('findFtlFiles', () => {
  it('finds resources below the origin directory, sorted', async () => {
    expect(await findFtlFiles(resolveOpts({ localesDir }))).toEqual([
      'main.ftl',
      'nested/extra.ftl',
      'skip.ftl',
    ]);
  });

  it('applies the file name filters', async () => {
    expect(await findFtlFiles(resolveOpts({ localesDir, excludeFiles: ['skip.ftl'] }))).toEqual([
      'main.ftl',
      'nested/extra.ftl',
    ]);
    expect(await findFtlFiles(resolveOpts({ localesDir, includeFiles: ['extra.ftl'] }))).toEqual([
      'nested/extra.ftl',
    ]);
  });
});

describe('toOriginRelativePath', () => {
  it('accepts relative and absolute paths inside the origin directory', () => {
    const resolved = resolveOpts({ localesDir });
    expect(toOriginRelativePath(resolved, 'nested/extra.ftl')).toBe('nested/extra.ftl');
    expect(toOriginRelativePath(resolved, path.join(localesDir, 'ru', 'main.ftl'))).toBe('main.ftl');
  });

  it('rejects files outside of it or missing', () => {
    const resolved = resolveOpts({ localesDir });
    expect(() => toOriginRelativePath(resolved, '../en/main.ftl')).toThrow(ConfigError);
    expect(() => toOriginRelativePath(resolved, 'absent.ftl')).toThrow(
      `Origin file not found: ${path.join(localesDir, 'ru', 'absent.ftl')}`
    );
  });
});

describe('message filters and target paths', () => {
  it('keeps included messages that are not excluded', () => {
    const resolved = resolveOpts({ localesDir, includeMessages: ['a', 'b'], excludeMessages: ['b'] });
    expect(isTranslatableMessage(resolved, 'a')).toBe(true);
    expect(isTranslatableMessage(resolved, 'b')).toBe(false);
    expect(isTranslatableMessage(resolved, 'c')).toBe(false);
  });

  it('mirrors the origin path under the target locale', () => {
    const resolved = resolveOpts({ localesDir });
    expect(targetFilePath(resolved, 'nested/extra.ftl', 'en')).toBe(
      path.join(localesDir, 'en', 'nested', 'extra.ftl')
    );
  });
});
