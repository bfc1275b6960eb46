export { isDigit, isIdentChar, isIdentFirstChar, isLetter, isWhitespace } from './chars.js';
export { scanBareIdent, scanDelimited, scanQuoted } from './literals.js';
export type { DelimitedOptions, LiteralResult } from './literals.js';
export { Scanner, tokenize } from './scanner.js';
export type { RegexEscapeMode, ScannerOptions, TokenizeOptions } from './scanner.js';
export { makeToken } from './token.js';
export type { Token } from './token.js';
export { DEFAULT_BUFFER_CAPACITY, TokenBuffer } from './token-buffer.js';
export type { TokenBufferOptions } from './token-buffer.js';
export {
  builtinTokenString,
  CUSTOM_TOKEN_START,
  isBuiltinTokenType,
  isCustomTokenKind,
  isErrorToken,
  isOperator,
  precedence,
  tokenCategory,
  tokenName,
  TokenType,
} from './token-types.js';
export type { BuiltinTokenType, TokenCategory, TokenKind } from './token-types.js';
export {
  createVocabulary,
  defaultVocabulary,
  registerKeywords,
  tokenString,
  Vocabulary,
} from './vocabulary.js';
export type { KeywordEntries, VocabularyOptions } from './vocabulary.js';
