/**
 * Token output formats
 */

import {
  isErrorToken,
  tokenCategory,
  tokenName,
  type Token,
  type Vocabulary,
} from '@tokenscan/scanner';
import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type OutputFormat = 'pretty' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['pretty', 'json'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface FormatOptions {
  format: OutputFormat;
  color?: boolean;
}

/**
 * Display label of a kind: the constant name of a built-in kind, or the
 * upper-cased keyword of a host kind
 */
export function kindLabel(kind: number, vocabulary: Vocabulary): string {
  return tokenName(kind) || vocabulary.tokenString(kind).toUpperCase() || String(kind);
}

function tokenText(token: Token, vocabulary: Vocabulary): string {
  return token.literal !== '' ? JSON.stringify(token.literal) : vocabulary.tokenString(token.type);
}

/**
 * One line per token: 1-based line:column, kind label and text
 */
export function formatPretty(token: Token, vocabulary: Vocabulary, color = true): string {
  const c: ChalkInstance = color ? chalk : new Chalk({ level: 0 });
  const location = `${token.pos.line + 1}:${token.pos.char + 1}`.padEnd(8);
  const label = kindLabel(token.type, vocabulary).padEnd(10);
  const text = tokenText(token, vocabulary);

  if (isErrorToken(token.type)) {
    return `${c.gray(location)}${c.red(label)} ${c.red(text)}`;
  }
  if (tokenCategory(token.type) === 'keyword') {
    return `${c.gray(location)}${c.cyan(label)} ${text}`;
  }
  return `${c.gray(location)}${label} ${text}`;
}

/**
 * One JSON object per token, with the 0-based position the scanner reports
 */
export function formatJson(token: Token, vocabulary: Vocabulary): string {
  return JSON.stringify({
    type: kindLabel(token.type, vocabulary),
    kind: token.type,
    line: token.pos.line,
    char: token.pos.char,
    literal: token.literal,
  });
}

export function formatToken(token: Token, vocabulary: Vocabulary, options: FormatOptions): string {
  return options.format === 'json'
    ? formatJson(token, vocabulary)
    : formatPretty(token, vocabulary, options.color ?? true);
}

export function formatSummary(tokens: number, errors: number, color = true): string {
  const c: ChalkInstance = color ? chalk : new Chalk({ level: 0 });
  const summary = `${tokens} token${tokens !== 1 ? 's' : ''}, ${errors} error${errors !== 1 ? 's' : ''}`;
  return errors > 0 ? c.red(summary) : c.gray(summary);
}
