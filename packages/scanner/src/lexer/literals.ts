import type { Position } from '../reader/position.js';
import { EOF, type RuneReader } from '../reader/rune-reader.js';
import { isIdentChar } from './chars.js';

/**
 * Outcome of scanning a quoted or delimited literal
 */
export type LiteralResult =
  | { status: 'ok'; value: string }
  | { status: 'unterminated'; value: string }
  | { status: 'bad-escape'; value: string; pos: Position }
  | { status: 'bad-delimiter'; value: string };

/** Escapes accepted inside quoted strings and quoted identifiers */
const STRING_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['n', '\n'],
  ['\\', '\\'],
  ["'", "'"],
  ['"', '"'],
]);

/**
 * Scan a quoted string whose opening quote has just been read.
 * A newline or the end of input before the closing quote leaves it unterminated.
 */
export function scanQuoted(reader: RuneReader, quote: string): LiteralResult {
  let value = '';

  for (;;) {
    const { ch } = reader.read();
    if (ch === quote) {
      return { status: 'ok', value };
    }
    if (ch === EOF || ch === '\n') {
      return { status: 'unterminated', value };
    }
    if (ch !== '\\') {
      value += ch;
      continue;
    }

    const escaped = reader.read();
    if (escaped.ch === EOF) {
      return { status: 'unterminated', value };
    }
    const replacement = STRING_ESCAPES.get(escaped.ch);
    if (replacement === undefined) {
      return { status: 'bad-escape', value, pos: escaped.pos };
    }
    value += replacement;
  }
}

export interface DelimitedOptions {
  start: string;
  end: string;
  /** Escaped character to replacement */
  escapes: ReadonlyMap<string, string>;
  /** Keep unknown escapes (backslash included) instead of failing */
  passThrough: boolean;
}

/**
 * Scan text between start and end delimiters, starting with the opening
 * delimiter itself. A different first character is consumed and reported
 * as a bad delimiter.
 */
export function scanDelimited(reader: RuneReader, options: DelimitedOptions): LiteralResult {
  const open = reader.read();
  if (open.ch !== options.start) {
    return { status: 'bad-delimiter', value: open.ch === EOF ? '' : open.ch };
  }

  let value = '';
  for (;;) {
    const { ch } = reader.read();
    if (ch === options.end) {
      return { status: 'ok', value };
    }
    if (ch === EOF || ch === '\n') {
      return { status: 'unterminated', value };
    }
    if (ch !== '\\') {
      value += ch;
      continue;
    }

    const escaped = reader.read();
    if (escaped.ch === EOF || escaped.ch === '\n') {
      return { status: 'unterminated', value };
    }
    const replacement = options.escapes.get(escaped.ch);
    if (replacement !== undefined) {
      value += replacement;
    } else if (options.passThrough) {
      value += ch + escaped.ch;
    } else {
      return { status: 'bad-escape', value, pos: escaped.pos };
    }
  }
}

/**
 * Read a run of identifier characters
 */
export function scanBareIdent(reader: RuneReader): string {
  let value = '';
  for (;;) {
    const { ch } = reader.read();
    if (!isIdentChar(ch)) {
      reader.unread();
      return value;
    }
    value += ch;
  }
}
