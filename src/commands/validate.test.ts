import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { validate } from './validate.js';

const ORIGIN = 'hello = Привет, { $name }!\n    .title = Заголовок\nbye = Пока\n';

let tmpDir: string;
let localesDir: string;

function writeLocale(locale: string, relative: string, content: string): void {
  const file = path.join(localesDir, locale, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, 'utf8');
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fluent-autotranslate-validate-'));
  localesDir = path.join(tmpDir, 'locales');
  writeLocale('ru', 'main.ftl', ORIGIN);
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('validate', () => {
  it('passes a complete translation', async () => {
    writeLocale('en', 'main.ftl', 'hello = Hello, {$name}!\n    .title = Title\nbye = Bye\n');

    const result = await validate({ localesDir, targetLocales: ['en'] }, { silent: true });

    expect(result).toEqual({ valid: true, errorCount: 0, warningCount: 0, issues: [] });
  });

  it('reports every kind of mismatch', async () => {
    writeLocale('en', 'main.ftl', 'hello = Hello!\nbye = { "" }\nextra = Extra\n');

    const result = await validate({ localesDir, targetLocales: ['en', 'de'] }, { silent: true });

    expect(result.issues.map((issue) => [issue.type, issue.locale, issue.key])).toEqual([
      ['placeable_mismatch', 'en', 'hello'],
      ['missing_key', 'en', 'hello.title'],
      ['empty_value', 'en', 'bye'],
      ['extra_key', 'en', 'extra'],
      ['missing_file', 'de', undefined],
    ]);
    expect(result.errorCount).toBe(3);
    expect(result.warningCount).toBe(2);
    expect(result.valid).toBe(false);
  });

  it('counts warnings as errors in strict mode', async () => {
    writeLocale('en', 'main.ftl', 'hello = Hello, { $name }!\n    .title = Title\nbye = Bye\nextra = Extra\n');

    const relaxed = await validate({ localesDir, targetLocales: ['en'] }, { silent: true });
    const strict = await validate({ localesDir, targetLocales: ['en'] }, { silent: true, strict: true });

    expect(relaxed.valid).toBe(true);
    expect(relaxed.warningCount).toBe(1);
    expect(strict.valid).toBe(false);
  });

  it('reports target files that do not parse', async () => {
    writeLocale('en', 'main.ftl', 'broken line\n');

    const result = await validate({ localesDir, targetLocales: ['en'] }, { silent: true });

    expect(result.issues).toEqual([
      {
        type: 'parse_error',
        locale: 'en',
        file: 'main.ftl',
        key: undefined,
        message: 'main.ftl:1: Cannot interpret line "broken line"',
        severity: 'error',
      },
    ]);
  });

  it('checks select variants one by one', async () => {
    writeLocale(
      'ru',
      'plural.ftl',
      'emails = { $count ->\n    [one] Одно письмо\n   *[other] { $count } писем\n}\n'
    );
    writeLocale('en', 'main.ftl', 'hello = Hello, { $name }!\n    .title = Title\nbye = Bye\n');
    writeLocale('en', 'plural.ftl', 'emails = { $count ->\n   *[other] { $count } emails\n}\n');

    const result = await validate({ localesDir, targetLocales: ['en'] }, { silent: true });

    expect(result.issues.map((issue) => [issue.type, issue.file, issue.key])).toEqual([
      ['placeable_mismatch', 'plural.ftl', 'emails'],
      ['missing_key', 'plural.ftl', 'emails[one]'],
    ]);
  });
});
