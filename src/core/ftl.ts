/**
 * @fileoverview Fluent (.ftl) resource reader and writer.
 *
 * Resources are split into entries line by line (blank lines, comments, terms and
 * messages) and every entry keeps its exact source, so an untouched resource
 * serializes back byte for byte. Messages are additionally parsed with
 * `@fluent/syntax` to turn their value and attributes into translatable segments,
 * where each placeable is replaced by an index token (`{0}`, `{1}`, ...). Every
 * variant of a select expression is a segment of its own.
 */

import { FluentParser, Identifier, Junk, Message, SelectExpression, Term, TextElement } from '@fluent/syntax';
import type { Pattern, SyntaxNode } from '@fluent/syntax';
import { FormatError, ParseError } from './errors.js';

/**
 * One translatable pattern: a message value, one of its attributes, or a variant
 * of a select expression inside either.
 *
 * @example
 * ```typescript
 * // welcome = Hello, { $name }!
 * {
 *   key: 'welcome',
 *   messageId: 'welcome',
 *   attribute: null,
 *   text: 'Hello, {0}!',
 *   placeables: [{ type: 'inline', source: '{ $name }' }],
 * }
 * ```
 */
export interface Segment {
  /** `messageId` or `messageId.attribute`, then `[variant]` for every enclosing select */
  key: string;
  messageId: string;
  attribute: string | null;
  /** Pattern text with placeables replaced by index tokens */
  text: string;
  /** Placeables by token index */
  placeables: Placeable[];
}

/** Placeable written back from its exact source */
export interface InlinePlaceable {
  type: 'inline';
  source: string;
}

export interface Variant {
  /** Variant key as written between the brackets */
  key: string;
  isDefault: boolean;
  segment: Segment;
}

/** Select expression: the selector is kept, every variant pattern is translated */
export interface SelectPlaceable {
  type: 'select';
  /** Source of the selector, e.g. `$count` */
  selector: string;
  variants: Variant[];
}

export type Placeable = InlinePlaceable | SelectPlaceable;

export interface BlankEntry {
  type: 'blank';
  raw: string;
}

export interface CommentEntry {
  type: 'comment';
  raw: string;
}

export interface TermEntry {
  type: 'term';
  id: string;
  raw: string;
}

export interface MessageEntry {
  type: 'message';
  id: string;
  raw: string;
  /** 1-based line the message starts on */
  line: number;
  value: Segment | null;
  attributes: Segment[];
}

export type FtlEntry = BlankEntry | CommentEntry | TermEntry | MessageEntry;

export interface ResourceFile {
  entries: FtlEntry[];
}

const MESSAGE_START = /^([a-zA-Z][a-zA-Z0-9_-]*) *=/;
const TERM_START = /^-([a-zA-Z][a-zA-Z0-9_-]*) *=/;
const COMMENT_LINE = /^#{1,3}(?: |$)/;
const BLANK_LINE = /^[ \t]*$/;
// Indented text, or a closing brace, attribute or variant at column 0
const CONTINUATION_LINE = /^(?: +\S|[}.[*])/;
const TOKEN = /\{\s*(\d+)\s*\}/g;

const CONTINUATION_INDENT = '    ';
const ATTRIBUTE_INDENT = '        ';
// Relative to the line holding the select expression
const VARIANT_INDENT = '    ';
const DEFAULT_VARIANT_INDENT = '   *';
const VARIANT_PATTERN_INDENT = '        ';

const parser = new FluentParser({ withSpans: true });

interface PendingEntry {
  type: 'message' | 'term';
  id: string;
  line: number;
  lines: string[];
}

/** Split source into lines, keeping each line's terminator */
function splitLines(source: string): string[] {
  return source.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function stripLineEnding(line: string): string {
  return line.replace(/\r?\n$/, '');
}

interface PatternSource {
  messageId: string;
  attribute: string | null;
  raw: string;
  file: string | undefined;
  line: number;
}

function sourceOf(from: PatternSource, node: SyntaxNode): string {
  if (!node.span) {
    throw new ParseError(`Placeable in "${from.messageId}" has no source position`, from.file, from.line);
  }
  return from.raw.slice(node.span.start, node.span.end);
}

function toSelect(from: PatternSource, key: string, select: SelectExpression): SelectPlaceable {
  return {
    type: 'select',
    selector: sourceOf(from, select.selector),
    variants: select.variants.map((variant) => {
      const name = variant.key instanceof Identifier ? variant.key.name : variant.key.value;
      return {
        key: name,
        isDefault: variant.default,
        segment: toSegment(from, `${key}[${name}]`, variant.value),
      };
    }),
  };
}

function toSegment(from: PatternSource, key: string, pattern: Pattern): Segment {
  let text = '';
  const placeables: Placeable[] = [];

  for (const element of pattern.elements) {
    if (element instanceof TextElement) {
      text += element.value;
      continue;
    }
    text += `{${placeables.length}}`;
    placeables.push(
      element.expression instanceof SelectExpression
        ? toSelect(from, key, element.expression)
        : { type: 'inline', source: sourceOf(from, element) }
    );
  }

  return { key, messageId: from.messageId, attribute: from.attribute, text, placeables };
}

function buildEntry(pending: PendingEntry, file: string | undefined): TermEntry | MessageEntry {
  const raw = pending.lines.join('');
  const node = parser.parseEntry(raw);

  if (node instanceof Junk) {
    const reason = node.annotations[0]?.message ?? 'Invalid entry';
    throw new ParseError(reason, file, pending.line);
  }

  if (pending.type === 'term') {
    if (!(node instanceof Term)) {
      throw new ParseError(`Expected term "-${pending.id}"`, file, pending.line);
    }
    return { type: 'term', id: pending.id, raw };
  }

  if (!(node instanceof Message)) {
    throw new ParseError(`Expected message "${pending.id}"`, file, pending.line);
  }

  const from = (attribute: string | null): PatternSource => ({
    messageId: pending.id,
    attribute,
    raw,
    file,
    line: pending.line,
  });

  return {
    type: 'message',
    id: pending.id,
    raw,
    line: pending.line,
    value: node.value ? toSegment(from(null), pending.id, node.value) : null,
    attributes: node.attributes.map((attribute) =>
      toSegment(from(attribute.id.name), `${pending.id}.${attribute.id.name}`, attribute.value)
    ),
  };
}

/**
 * Parse the text of a Fluent resource.
 *
 * @param source - File contents
 * @param file - File name used in error messages
 * @throws ParseError if a line is neither blank, a comment, a message, a term nor
 * a continuation of one, or if a message is not valid Fluent
 *
 * @example
 * ```typescript
 * const resource = parseFtl('# Greetings\nhello = Привет, { $name }!\n');
 * collectSegments(resource)[0].text; // 'Привет, {0}!'
 * ```
 */
export function parseFtl(source: string, file?: string): ResourceFile {
  const entries: FtlEntry[] = [];
  let pending: PendingEntry | null = null;
  // Blank lines seen inside a message; they stay with it if an indented line follows
  let blanks: string[] = [];

  const flush = (): void => {
    if (pending) {
      entries.push(buildEntry(pending, file));
      pending = null;
    }
    for (const raw of blanks) {
      entries.push({ type: 'blank', raw });
    }
    blanks = [];
  };

  splitLines(source).forEach((line, index) => {
    const body = stripLineEnding(line);
    const lineNumber = index + 1;

    if (BLANK_LINE.test(body)) {
      if (pending) {
        blanks.push(line);
      } else {
        entries.push({ type: 'blank', raw: line });
      }
      return;
    }

    if (CONTINUATION_LINE.test(body)) {
      if (!pending) {
        throw new ParseError('Continuation line outside of a message', file, lineNumber);
      }
      pending.lines.push(...blanks, line);
      blanks = [];
      return;
    }

    flush();

    if (COMMENT_LINE.test(body)) {
      entries.push({ type: 'comment', raw: line });
      return;
    }

    const message = MESSAGE_START.exec(body);
    if (message) {
      pending = { type: 'message', id: message[1], line: lineNumber, lines: [line] };
      return;
    }

    const term = TERM_START.exec(body);
    if (term) {
      pending = { type: 'term', id: term[1], line: lineNumber, lines: [line] };
      return;
    }

    throw new ParseError(`Cannot interpret line "${body.slice(0, 60)}"`, file, lineNumber);
  });

  flush();
  return { entries };
}

/**
 * Serialize a resource back to text. For a resource returned by {@link parseFtl}
 * this is the original source.
 */
export function serializeFtl(resource: ResourceFile): string {
  return resource.entries.map((entry) => entry.raw).join('');
}

export function getMessages(resource: ResourceFile): MessageEntry[] {
  return resource.entries.filter((entry): entry is MessageEntry => entry.type === 'message');
}

export function messageIds(resource: ResourceFile): string[] {
  return getMessages(resource).map((message) => message.id);
}

/** The segment followed by the segments of its select variants, depth first */
function withVariants(segment: Segment): Segment[] {
  return [
    segment,
    ...segment.placeables.flatMap((placeable) =>
      placeable.type === 'select' ? placeable.variants.flatMap((variant) => withVariants(variant.segment)) : []
    ),
  ];
}

function messageSegments(message: MessageEntry): Segment[] {
  const patterns = message.value ? [message.value, ...message.attributes] : message.attributes;
  return patterns.flatMap(withVariants);
}

/** Every segment of the resource, in file order */
export function collectSegments(resource: ResourceFile): Segment[] {
  return getMessages(resource).flatMap(messageSegments);
}

/** Whether the segment has no text outside its placeables */
export function isBlankSegment(segment: Segment): boolean {
  return segment.text.replace(TOKEN, '').trim() === '';
}

function tokenIndexes(text: string): number[] {
  return [...text.matchAll(TOKEN)].map((match) => Number(match[1])).sort((a, b) => a - b);
}

/**
 * Check a translated segment text against its source text.
 *
 * @throws FormatError if the translation is empty or its index tokens differ from
 * the source's
 */
export function verifyTranslation(source: string, translated: string): void {
  if (translated.trim() === '' && source.trim() !== '') {
    throw new FormatError(`Empty translation for "${source}"`);
  }

  const expected = tokenIndexes(source);
  const actual = tokenIndexes(translated);
  if (expected.join(',') !== actual.join(',')) {
    throw new FormatError(
      `Placeables changed in translation: expected [${expected.join(', ')}], ` +
        `received [${actual.join(', ')}] in "${translated}"`
    );
  }
}

function escapeText(text: string): string {
  return text.replace(/[{}]/g, (brace) => `{"${brace}"}`);
}

/**
 * A select expression in canonical layout. `indent` is the indentation of the line
 * the expression starts on; the closing brace goes back to it.
 */
function renderSelect(select: SelectPlaceable, indent: string, lineBreak: string): string {
  const variants = select.variants.map((variant) => {
    const marker = variant.isDefault ? DEFAULT_VARIANT_INDENT : VARIANT_INDENT;
    const pattern = renderPattern(variant.segment, `${indent}${VARIANT_PATTERN_INDENT}`, lineBreak);
    return `${lineBreak}${indent}${marker}[${variant.key}]${pattern}`;
  });
  return `{ ${select.selector} ->${variants.join('')}${lineBreak}${indent}}`;
}

function renderLine(
  line: string,
  placeables: Placeable[],
  indent: string,
  lineBreak: string,
  continuation: boolean
): string {
  // With a capture group, odd parts are token indexes
  const parts = line.split(/\{\s*(\d+)\s*\}/);
  const rendered = parts
    .map((part, i) => {
      if (i % 2 === 0) {
        return escapeText(part);
      }
      const placeable = placeables.at(Number(part));
      if (!placeable) {
        return escapeText(`{${part}}`);
      }
      return placeable.type === 'inline' ? placeable.source : renderSelect(placeable, indent, lineBreak);
    })
    .join('');

  // `[`, `*` and `.` open variants and attributes as the first character of a continuation line
  return continuation ? rendered.replace(/^( *)([[*.])/, '$1{"$2"}') : rendered;
}

/** Inline (` text`) for a single line without select expressions, an indented block otherwise */
function renderPattern(segment: Segment, indent: string, lineBreak: string): string {
  const lines = segment.text
    .trim()
    .split(/\r?\n/)
    .map((line) => line.trimEnd());
  const hasSelect = segment.placeables.some((placeable) => placeable.type === 'select');

  if (lines.length === 1 && !hasSelect) {
    return lines[0] === '' ? '' : ` ${renderLine(lines[0], segment.placeables, indent, lineBreak, false)}`;
  }

  return lines
    .map((line) =>
      line === ''
        ? lineBreak
        : `${lineBreak}${indent}${renderLine(line, segment.placeables, indent, lineBreak, true)}`
    )
    .join('');
}

function renderMessage(message: MessageEntry): string {
  const lineBreak = message.raw.includes('\r\n') ? '\r\n' : '\n';
  const ending = /\r?\n$/.exec(message.raw)?.[0] ?? '';

  let rendered = `${message.id} =`;
  if (message.value) {
    rendered += renderPattern(message.value, CONTINUATION_INDENT, lineBreak);
  }
  for (const attribute of message.attributes) {
    rendered += `${lineBreak}${CONTINUATION_INDENT}.${attribute.attribute} =`;
    rendered += renderPattern(attribute, ATTRIBUTE_INDENT, lineBreak);
  }
  return rendered + ending;
}

/**
 * Return a copy of the resource with translated segment texts. Only messages with at
 * least one translated segment are re-rendered; every other entry keeps its source.
 *
 * @param translations - Translated text (with index tokens) by segment, as returned
 * by {@link collectSegments} for this resource
 *
 * @example
 * ```typescript
 * const resource = parseFtl('hello = Привет, { $name }!\n');
 * const [hello] = collectSegments(resource);
 * const translated = applyTranslations(resource, new Map([[hello, 'Hello, {0}!']]));
 * serializeFtl(translated); // 'hello = Hello, { $name }!\n'
 * ```
 */
export function applyTranslations(
  resource: ResourceFile,
  translations: ReadonlyMap<Segment, string>
): ResourceFile {
  const translate = (segment: Segment): Segment => ({
    ...segment,
    text: translations.get(segment) ?? segment.text,
    placeables: segment.placeables.map((placeable) =>
      placeable.type === 'select'
        ? {
            ...placeable,
            variants: placeable.variants.map((variant) => ({ ...variant, segment: translate(variant.segment) })),
          }
        : placeable
    ),
  });

  return {
    entries: resource.entries.map((entry) => {
      if (entry.type !== 'message' || !messageSegments(entry).some((segment) => translations.has(segment))) {
        return entry;
      }

      const message: MessageEntry = {
        ...entry,
        value: entry.value ? translate(entry.value) : null,
        attributes: entry.attributes.map(translate),
      };
      return { ...message, raw: renderMessage(message) };
    }),
  };
}
