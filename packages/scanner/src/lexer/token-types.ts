/**
 * Token kinds for the scanner
 *
 * Kinds are numeric so hosts can add their own from the custom band
 * (CUSTOM_TOKEN_START and up). The numbers are stable identifiers only:
 * the category of a kind comes from the table below, not from its value.
 */

export const TokenType = {
  // Special
  ILLEGAL: 0,
  EOF: 1,
  WS: 2,

  // Punctuation
  LPAREN: 10, // (
  RPAREN: 11, // )
  LBRACKET: 12, // [
  RBRACKET: 13, // ]
  LCURLY: 14, // {
  RCURLY: 15, // }
  COMMA: 16, // ,
  SEMICOLON: 17, // ;
  COLON: 18, // :
  DOT: 19, // .
  SINGLEQUOTE: 20, // '
  DOUBLEQUOTE: 21, // "
  PERCENT: 22, // %
  DOLLAR: 23, // $
  HASH: 24, // #
  ATSIGN: 25, // @

  // Literals
  IDENT: 40, // name, "quoted name"
  NUMBER: 41, // 42, 3.14, -7, .5
  DURATION: 42, // 10s, 250ms, 3d
  STRING: 43, // 'text'
  BADSTRING: 44,
  BADESCAPE: 45,
  TRUE: 46, // true
  FALSE: 47, // false
  REGEX: 48, // /pattern/
  BADREGEX: 49,

  // Operators
  PLUS: 60, // +
  MINUS: 61, // -
  MUL: 62, // *
  DIV: 63, // /
  AMPERSAND: 64, // &
  XOR: 65, // ^
  PIPE: 66, // |
  LSHIFT: 67, // <<
  RSHIFT: 68, // >>
  POW: 69, // **
  ARROW: 70, // ->
  EQARROW: 71, // =>
  AND: 72, // AND
  OR: 73, // OR
  EQ: 74, // =
  NEQ: 75, // != or <>
  EQREGEX: 76, // =~
  NEQREGEX: 77, // !~
  LT: 78, // <
  LTE: 79, // <=
  GT: 80, // >
  GTE: 81, // >=
} as const;

export type BuiltinTokenType = (typeof TokenType)[keyof typeof TokenType];

/**
 * Any token kind: a built-in one or a host-registered one
 */
export type TokenKind = number;

/** First kind available to host vocabularies */
export const CUSTOM_TOKEN_START = 1000;

export type TokenCategory = 'special' | 'punctuation' | 'literal' | 'operator' | 'keyword' | 'unknown';

interface TokenInfo {
  name: string;
  text: string;
  category: Exclude<TokenCategory, 'keyword' | 'unknown'>;
}

const TOKEN_INFO: Record<BuiltinTokenType, Omit<TokenInfo, 'name'>> = {
  [TokenType.ILLEGAL]: { text: 'ILLEGAL', category: 'special' },
  [TokenType.EOF]: { text: 'EOF', category: 'special' },
  [TokenType.WS]: { text: 'WS', category: 'special' },

  [TokenType.LPAREN]: { text: '(', category: 'punctuation' },
  [TokenType.RPAREN]: { text: ')', category: 'punctuation' },
  [TokenType.LBRACKET]: { text: '[', category: 'punctuation' },
  [TokenType.RBRACKET]: { text: ']', category: 'punctuation' },
  [TokenType.LCURLY]: { text: '{', category: 'punctuation' },
  [TokenType.RCURLY]: { text: '}', category: 'punctuation' },
  [TokenType.COMMA]: { text: ',', category: 'punctuation' },
  [TokenType.SEMICOLON]: { text: ';', category: 'punctuation' },
  [TokenType.COLON]: { text: ':', category: 'punctuation' },
  [TokenType.DOT]: { text: '.', category: 'punctuation' },
  [TokenType.SINGLEQUOTE]: { text: "'", category: 'punctuation' },
  [TokenType.DOUBLEQUOTE]: { text: '"', category: 'punctuation' },
  [TokenType.PERCENT]: { text: '%', category: 'punctuation' },
  [TokenType.DOLLAR]: { text: '$', category: 'punctuation' },
  [TokenType.HASH]: { text: '#', category: 'punctuation' },
  [TokenType.ATSIGN]: { text: '@', category: 'punctuation' },

  [TokenType.IDENT]: { text: 'IDENT', category: 'literal' },
  [TokenType.NUMBER]: { text: 'NUMBER', category: 'literal' },
  [TokenType.DURATION]: { text: 'DURATION', category: 'literal' },
  [TokenType.STRING]: { text: 'STRING', category: 'literal' },
  [TokenType.BADSTRING]: { text: 'BADSTRING', category: 'literal' },
  [TokenType.BADESCAPE]: { text: 'BADESCAPE', category: 'literal' },
  [TokenType.TRUE]: { text: 'true', category: 'literal' },
  [TokenType.FALSE]: { text: 'false', category: 'literal' },
  [TokenType.REGEX]: { text: 'REGEX', category: 'literal' },
  [TokenType.BADREGEX]: { text: 'BADREGEX', category: 'literal' },

  [TokenType.PLUS]: { text: '+', category: 'operator' },
  [TokenType.MINUS]: { text: '-', category: 'operator' },
  [TokenType.MUL]: { text: '*', category: 'operator' },
  [TokenType.DIV]: { text: '/', category: 'operator' },
  [TokenType.AMPERSAND]: { text: '&', category: 'operator' },
  [TokenType.XOR]: { text: '^', category: 'operator' },
  [TokenType.PIPE]: { text: '|', category: 'operator' },
  [TokenType.LSHIFT]: { text: '<<', category: 'operator' },
  [TokenType.RSHIFT]: { text: '>>', category: 'operator' },
  [TokenType.POW]: { text: '**', category: 'operator' },
  [TokenType.ARROW]: { text: '->', category: 'operator' },
  [TokenType.EQARROW]: { text: '=>', category: 'operator' },
  [TokenType.AND]: { text: 'AND', category: 'operator' },
  [TokenType.OR]: { text: 'OR', category: 'operator' },
  [TokenType.EQ]: { text: '=', category: 'operator' },
  [TokenType.NEQ]: { text: '!=', category: 'operator' },
  [TokenType.EQREGEX]: { text: '=~', category: 'operator' },
  [TokenType.NEQREGEX]: { text: '!~', category: 'operator' },
  [TokenType.LT]: { text: '<', category: 'operator' },
  [TokenType.LTE]: { text: '<=', category: 'operator' },
  [TokenType.GT]: { text: '>', category: 'operator' },
  [TokenType.GTE]: { text: '>=', category: 'operator' },
};

const BUILTIN_TOKENS: ReadonlyMap<TokenKind, TokenInfo> = new Map<TokenKind, TokenInfo>(
  Object.entries(TokenType).map(([name, kind]): [TokenKind, TokenInfo] => [
    kind,
    { name, ...TOKEN_INFO[kind] },
  ]),
);

/** Binding power of binary operators, low to high */
const PRECEDENCE: ReadonlyMap<TokenKind, number> = new Map<TokenKind, number>([
  [TokenType.OR, 1],
  [TokenType.AND, 2],
  [TokenType.EQ, 3],
  [TokenType.NEQ, 3],
  [TokenType.EQREGEX, 3],
  [TokenType.NEQREGEX, 3],
  [TokenType.LT, 3],
  [TokenType.LTE, 3],
  [TokenType.GT, 3],
  [TokenType.GTE, 3],
  [TokenType.PLUS, 4],
  [TokenType.MINUS, 4],
  [TokenType.MUL, 5],
  [TokenType.DIV, 5],
  [TokenType.PIPE, 6],
  [TokenType.XOR, 6],
  [TokenType.LSHIFT, 6],
  [TokenType.RSHIFT, 6],
  [TokenType.POW, 6],
]);

const ERROR_TOKENS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  TokenType.ILLEGAL,
  TokenType.BADSTRING,
  TokenType.BADESCAPE,
  TokenType.BADREGEX,
]);

export function isBuiltinTokenType(kind: TokenKind): kind is BuiltinTokenType {
  return BUILTIN_TOKENS.has(kind);
}

export function isCustomTokenKind(kind: TokenKind): boolean {
  return Number.isInteger(kind) && kind >= CUSTOM_TOKEN_START;
}

/**
 * Canonical string of a built-in kind; '' for anything else.
 * Use Vocabulary.tokenString() to include host kinds.
 */
export function builtinTokenString(kind: TokenKind): string {
  return BUILTIN_TOKENS.get(kind)?.text ?? '';
}

/**
 * Constant name of a built-in kind (e.g. 'LPAREN'); '' for anything else
 */
export function tokenName(kind: TokenKind): string {
  return BUILTIN_TOKENS.get(kind)?.name ?? '';
}

export function tokenCategory(kind: TokenKind): TokenCategory {
  const info = BUILTIN_TOKENS.get(kind);
  if (info) return info.category;
  return isCustomTokenKind(kind) ? 'keyword' : 'unknown';
}

export function isOperator(kind: TokenKind): boolean {
  return tokenCategory(kind) === 'operator';
}

export function isErrorToken(kind: TokenKind): boolean {
  return ERROR_TOKENS.has(kind);
}

/**
 * Precedence of a binary operator kind; 0 for non-operators
 */
export function precedence(kind: TokenKind): number {
  return PRECEDENCE.get(kind) ?? 0;
}
