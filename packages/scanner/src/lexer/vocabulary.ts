import { createNoopLogger, type Logger } from '@tokenscan/logger';
import { VocabularyError } from '../errors.js';
import type { Token } from './token.js';
import {
  builtinTokenString,
  CUSTOM_TOKEN_START,
  isCustomTokenKind,
  TokenType,
  type TokenKind,
} from './token-types.js';

/**
 * Host keywords: token kind to display string
 */
export type KeywordEntries = ReadonlyMap<TokenKind, string> | Readonly<Record<number, string>>;

export interface VocabularyOptions {
  logger?: Logger;
}

const BUILTIN_KEYWORDS: ReadonlyArray<readonly [string, TokenKind]> = [
  ['and', TokenType.AND],
  ['or', TokenType.OR],
  ['true', TokenType.TRUE],
  ['false', TokenType.FALSE],
];

function isKeywordMap(entries: KeywordEntries): entries is ReadonlyMap<TokenKind, string> {
  return entries instanceof Map;
}

function toEntries(entries: KeywordEntries): Array<[TokenKind, string]> {
  if (isKeywordMap(entries)) {
    return [...entries];
  }
  const record = entries;
  return Object.keys(record).map((key): [TokenKind, string] => {
    const kind = Number(key);
    return [kind, record[kind]];
  });
}

/**
 * Keyword and display-string tables for a scanner
 *
 * Keywords match case-insensitively. Host kinds must be integers from
 * CUSTOM_TOKEN_START up; picking distinct values is up to the host.
 */
export class Vocabulary {
  private readonly strings = new Map<TokenKind, string>();
  private readonly keywords = new Map<string, TokenKind>();
  private readonly logger: Logger;

  constructor(options: VocabularyOptions = {}) {
    this.logger = options.logger ?? createNoopLogger();
    for (const [name, kind] of BUILTIN_KEYWORDS) {
      this.keywords.set(name, kind);
    }
  }

  /**
   * Canonical string of a kind; '' when the kind is unknown
   */
  tokenString(kind: TokenKind): string {
    return this.strings.get(kind) ?? builtinTokenString(kind);
  }

  /**
   * Kind of a keyword, or IDENT when the name is not a keyword
   */
  lookup(name: string): TokenKind {
    return this.keywords.get(name.toLowerCase()) ?? TokenType.IDENT;
  }

  /**
   * Merge host keywords into this vocabulary
   *
   * Registering a kind again replaces its display string and keyword.
   * All entries are checked before any is applied.
   */
  register(entries: KeywordEntries): this {
    const pairs = toEntries(entries);

    for (const [kind, display] of pairs) {
      if (!isCustomTokenKind(kind)) {
        throw new VocabularyError(
          `Token kind ${kind} is reserved; custom kinds start at ${CUSTOM_TOKEN_START}`,
          kind,
        );
      }
      if (display.length === 0) {
        throw new VocabularyError(`Token kind ${kind} needs a non-empty display string`, kind);
      }
    }

    for (const [kind, display] of pairs) {
      const previous = this.strings.get(kind);
      if (previous !== undefined && this.keywords.get(previous.toLowerCase()) === kind) {
        this.keywords.delete(previous.toLowerCase());
      }
      this.strings.set(kind, display);
      this.keywords.set(display.toLowerCase(), kind);
    }

    this.logger.debug('vocabulary_registered', { kinds: pairs.map(([kind]) => kind) });
    return this;
  }

  /**
   * Independent copy of this vocabulary, optionally with more keywords
   */
  extend(entries?: KeywordEntries): Vocabulary {
    const copy = new Vocabulary({ logger: this.logger });
    for (const [kind, display] of this.strings) {
      copy.strings.set(kind, display);
    }
    for (const [name, kind] of this.keywords) {
      copy.keywords.set(name, kind);
    }
    return entries ? copy.register(entries) : copy;
  }

  /**
   * Registered host keywords as [lower-cased name, kind] pairs
   */
  customKeywords(): Array<[string, TokenKind]> {
    return [...this.keywords].filter(([, kind]) => isCustomTokenKind(kind));
  }

  /**
   * The token's literal, or the canonical string of its kind when the literal is empty
   */
  tokenText(token: Token): string {
    return token.literal !== '' ? token.literal : this.tokenString(token.type);
  }
}

/**
 * Shared vocabulary used by scanners created without one. Register host
 * keywords here during start-up, before any scanning begins.
 */
export const defaultVocabulary = new Vocabulary();

export function registerKeywords(entries: KeywordEntries): Vocabulary {
  return defaultVocabulary.register(entries);
}

/**
 * Fresh vocabulary with only the built-in keywords plus `entries`
 */
export function createVocabulary(entries?: KeywordEntries, options: VocabularyOptions = {}): Vocabulary {
  const vocabulary = new Vocabulary(options);
  return entries ? vocabulary.register(entries) : vocabulary;
}

export function tokenString(kind: TokenKind, vocabulary: Vocabulary = defaultVocabulary): string {
  return vocabulary.tokenString(kind);
}
