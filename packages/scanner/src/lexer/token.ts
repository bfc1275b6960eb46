import type { Position } from '../reader/position.js';
import type { TokenKind } from './token-types.js';

/**
 * A token produced by the scanner
 */
export interface Token {
  /** The kind of token */
  readonly type: TokenKind;
  /** Position of the token's first character */
  readonly pos: Position;
  /** Text payload; empty for punctuation, operators and keywords */
  readonly literal: string;
}

export function makeToken(type: TokenKind, pos: Position, literal: string = ''): Token {
  return { type, pos, literal };
}
