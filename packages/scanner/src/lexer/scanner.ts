import { createNoopLogger, type Logger } from '@tokenscan/logger';
import type { Position } from '../reader/position.js';
import { EOF, RuneReader, type Rune, type RuneSource } from '../reader/rune-reader.js';
import { isDigit, isIdentChar, isIdentFirstChar, isWhitespace } from './chars.js';
import { scanBareIdent, scanDelimited, scanQuoted, type LiteralResult } from './literals.js';
import { makeToken, type Token } from './token.js';
import { isErrorToken, TokenType, type BuiltinTokenType } from './token-types.js';
import { defaultVocabulary, type Vocabulary } from './vocabulary.js';

/**
 * How scanRegex() treats an escape other than `\/`
 * - strict (default): stop with a BADESCAPE token
 * - passthrough: keep the backslash and the character
 */
export type RegexEscapeMode = 'passthrough' | 'strict';

export interface ScannerOptions {
  /** Keyword table; the shared default vocabulary when omitted */
  vocabulary?: Vocabulary;
  regexEscapes?: RegexEscapeMode;
  logger?: Logger;
}

interface OperatorEntry {
  single?: BuiltinTokenType;
  /** Second character to two-character token */
  pairs?: ReadonlyMap<string, BuiltinTokenType>;
}

/**
 * Punctuation and operators, keyed by first character. Two-character forms
 * need one character of lookahead; `.`, `+` and `-` are handled by number scanning.
 */
const OPERATORS: ReadonlyMap<string, OperatorEntry> = new Map<string, OperatorEntry>([
  ['=', { single: TokenType.EQ, pairs: new Map([['~', TokenType.EQREGEX]]) }],
  ['!', { pairs: new Map([['=', TokenType.NEQ], ['~', TokenType.NEQREGEX]]) }],
  ['>', { single: TokenType.GT, pairs: new Map([['=', TokenType.GTE], ['>', TokenType.RSHIFT]]) }],
  [
    '<',
    {
      single: TokenType.LT,
      pairs: new Map([['=', TokenType.LTE], ['>', TokenType.NEQ], ['<', TokenType.LSHIFT]]),
    },
  ],
  ['*', { single: TokenType.MUL }],
  ['/', { single: TokenType.DIV }],
  ['(', { single: TokenType.LPAREN }],
  [')', { single: TokenType.RPAREN }],
  ['[', { single: TokenType.LBRACKET }],
  [']', { single: TokenType.RBRACKET }],
  ['{', { single: TokenType.LCURLY }],
  ['}', { single: TokenType.RCURLY }],
  [',', { single: TokenType.COMMA }],
  [';', { single: TokenType.SEMICOLON }],
  [':', { single: TokenType.COLON }],
  ['^', { single: TokenType.XOR }],
  ['|', { single: TokenType.PIPE }],
  ['&', { single: TokenType.AMPERSAND }],
  ['%', { single: TokenType.PERCENT }],
  ['$', { single: TokenType.DOLLAR }],
  ['#', { single: TokenType.HASH }],
  ['@', { single: TokenType.ATSIGN }],
]);

/** Duration units made of one character; `m` and `ms` are checked separately */
const DURATION_UNITS: ReadonlySet<string> = new Set(['u', 'µ', 's', 'h', 'd', 'w']);

const REGEX_ESCAPES: ReadonlyMap<string, string> = new Map([['/', '/']]);

/**
 * Lexical scanner for DSL source text
 *
 * Produces one token per call. Malformed input comes back as ILLEGAL,
 * BADSTRING, BADESCAPE or BADREGEX tokens and scanning can continue
 * after any of them.
 */
export class Scanner {
  private readonly reader: RuneReader;
  private readonly vocabulary: Vocabulary;
  private readonly regexEscapes: RegexEscapeMode;
  private readonly logger: Logger;

  constructor(source: RuneSource, options: ScannerOptions = {}) {
    this.logger = options.logger ?? createNoopLogger();
    this.reader = new RuneReader(source, { logger: this.logger });
    this.vocabulary = options.vocabulary ?? defaultVocabulary;
    this.regexEscapes = options.regexEscapes ?? 'strict';
  }

  /**
   * Scan the next token. Returns EOF once the input is exhausted.
   */
  scan(): Token {
    return this.report(this.scanToken());
  }

  /**
   * Scan a regex literal delimited by `/`
   *
   * `/` is division in scan(), so the caller decides from context when a
   * regex is expected. Whitespace before the opening `/` is skipped.
   */
  scanRegex(): Token {
    this.skipWhitespace();
    const { pos } = this.reader.peek();

    const result = scanDelimited(this.reader, {
      start: '/',
      end: '/',
      escapes: REGEX_ESCAPES,
      passThrough: this.regexEscapes === 'passthrough',
    });

    switch (result.status) {
      case 'ok':
        return this.report(makeToken(TokenType.REGEX, pos, result.value));
      case 'bad-escape':
        return this.report(makeToken(TokenType.BADESCAPE, result.pos, result.value));
      default:
        return this.report(makeToken(TokenType.BADREGEX, pos, result.value));
    }
  }

  /**
   * The next character, without consuming it
   */
  peek(): string {
    return this.reader.peek().ch;
  }

  private scanToken(): Token {
    const rune = this.reader.read();
    const { ch, pos } = rune;

    if (isWhitespace(ch)) {
      return this.scanWhitespace(rune);
    }
    if (isIdentFirstChar(ch) || ch === '"') {
      this.reader.unread();
      return this.scanIdent(pos);
    }
    if (isDigit(ch) || ch === '.' || ch === '+' || ch === '-') {
      return this.scanNumber();
    }
    if (ch === "'") {
      return this.scanString();
    }
    if (ch === EOF) {
      return makeToken(TokenType.EOF, pos);
    }
    return this.scanOperator(rune);
  }

  private report(token: Token): Token {
    if (isErrorToken(token.type)) {
      this.logger.debug('scanner_error_token', {
        type: this.vocabulary.tokenString(token.type),
        line: token.pos.line,
        char: token.pos.char,
        literal: token.literal,
      });
    }
    return token;
  }

  private skipWhitespace(): void {
    while (isWhitespace(this.reader.read().ch)) {
      // consume
    }
    this.reader.unread();
  }

  /**
   * Consume the current rune and all contiguous whitespace
   */
  private scanWhitespace(first: Rune): Token {
    let value = first.ch;
    for (;;) {
      const { ch } = this.reader.read();
      if (!isWhitespace(ch)) {
        this.reader.unread();
        break;
      }
      value += ch;
    }
    return makeToken(TokenType.WS, first.pos, value);
  }

  /**
   * Scan a bare identifier, keyword or quoted identifier
   *
   * A double quote after a bare prefix ends the prefix: the quoted text
   * alone becomes the identifier.
   */
  private scanIdent(pos: Position): Token {
    let value = '';

    for (;;) {
      const { ch } = this.reader.read();
      if (ch === '"') {
        const quoted = this.scanString();
        if (quoted.type !== TokenType.STRING) {
          return quoted;
        }
        return makeToken(TokenType.IDENT, pos, quoted.literal);
      }
      if (!isIdentChar(ch)) {
        this.reader.unread();
        break;
      }
      this.reader.unread();
      value += scanBareIdent(this.reader);
    }

    const kind = this.vocabulary.lookup(value);
    if (kind !== TokenType.IDENT) {
      return makeToken(kind, pos);
    }
    return makeToken(TokenType.IDENT, pos, value);
  }

  /**
   * Scan a quoted string whose opening quote is the current rune
   */
  private scanString(): Token {
    const { ch: quote, pos } = this.reader.current();
    const result: LiteralResult = scanQuoted(this.reader, quote);

    switch (result.status) {
      case 'ok':
        return makeToken(TokenType.STRING, pos, result.value);
      case 'bad-escape':
        return makeToken(TokenType.BADESCAPE, result.pos, result.value);
      default:
        return makeToken(TokenType.BADSTRING, pos, result.value);
    }
  }

  /**
   * Scan anything that looks like the start of a number: a digit, `.`, `+` or `-`.
   * May return a non-number token when the start was a false positive,
   * e.g. a minus sign followed by a letter is MINUS.
   */
  private scanNumber(): Token {
    const { ch, pos } = this.reader.current();
    let value = '';

    if (ch === '+' || ch === '-') {
      const next = this.reader.read();
      const afterNext = this.reader.read();
      this.reader.unread();
      this.reader.unread();

      if (isDigit(next.ch) || (next.ch === '.' && isDigit(afterNext.ch))) {
        value += ch;
      } else {
        return makeToken(ch === '+' ? TokenType.PLUS : TokenType.MINUS, pos);
      }
    } else if (ch === '.') {
      if (!isDigit(this.reader.peek().ch)) {
        return makeToken(TokenType.ILLEGAL, pos, '.');
      }
      // Re-read the full stop as part of the fraction below
      this.reader.unread();
    } else {
      this.reader.unread();
    }

    value += this.scanDigits();

    const dot = this.reader.read();
    if (dot.ch === '.') {
      const digit = this.reader.read();
      if (isDigit(digit.ch)) {
        value += dot.ch + digit.ch + this.scanDigits();
      } else {
        this.reader.unread();
        this.reader.unread();
      }
    } else {
      this.reader.unread();
    }

    // Only integral numbers take a duration unit
    if (!value.includes('.')) {
      const unit = this.reader.read();
      if (DURATION_UNITS.has(unit.ch)) {
        return makeToken(TokenType.DURATION, pos, value + unit.ch);
      }
      if (unit.ch === 'm') {
        value += unit.ch;
        if (this.reader.read().ch === 's') {
          value += 's';
        } else {
          this.reader.unread();
        }
        return makeToken(TokenType.DURATION, pos, value);
      }
      this.reader.unread();
    }

    return makeToken(TokenType.NUMBER, pos, value);
  }

  private scanDigits(): string {
    let value = '';
    for (;;) {
      const { ch } = this.reader.read();
      if (!isDigit(ch)) {
        this.reader.unread();
        return value;
      }
      value += ch;
    }
  }

  private scanOperator(first: Rune): Token {
    const entry = OPERATORS.get(first.ch);
    if (!entry) {
      return makeToken(TokenType.ILLEGAL, first.pos, first.ch);
    }

    if (entry.pairs) {
      const next = this.reader.read();
      const paired = entry.pairs.get(next.ch);
      if (paired !== undefined) {
        return makeToken(paired, first.pos);
      }
      this.reader.unread();
    }

    if (entry.single === undefined) {
      return makeToken(TokenType.ILLEGAL, first.pos, first.ch);
    }
    return makeToken(entry.single, first.pos);
  }
}

export interface TokenizeOptions extends ScannerOptions {
  /** Drop WS tokens from the result */
  skipWhitespace?: boolean;
}

/**
 * Scan a whole source into tokens, ending with (and including) EOF
 */
export function tokenize(source: RuneSource, options: TokenizeOptions = {}): Token[] {
  const scanner = new Scanner(source, options);
  const tokens: Token[] = [];

  for (;;) {
    const token = scanner.scan();
    if (token.type === TokenType.WS && options.skipWhitespace) {
      continue;
    }
    tokens.push(token);
    if (token.type === TokenType.EOF) {
      return tokens;
    }
  }
}
