/**
 * @tokenscan/scanner - lexical scanner for hand-written DSL parsers
 *
 * @example
 * ```typescript
 * import { Scanner, TokenBuffer, TokenType, registerKeywords } from '@tokenscan/scanner';
 *
 * const SELECT = 1000;
 * registerKeywords({ [SELECT]: 'SELECT' });
 *
 * const tokens = new TokenBuffer(new Scanner("select name where age >= 21"));
 * const first = tokens.scanIgnoreWhitespace(); // { type: SELECT, literal: '' }
 * tokens.unscan();
 * ```
 */

export * from './errors.js';
export * from './lexer/index.js';
export * from './reader/index.js';
