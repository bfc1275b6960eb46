/**
 * Error types for the scanner
 *
 * Malformed input never throws: it comes back as ILLEGAL, BADSTRING,
 * BADESCAPE or BADREGEX tokens. These errors are for API misuse.
 */

import type { Position } from './reader/position.js';

/**
 * Base class for scanner errors
 */
export abstract class TokenscanError extends Error {
  /** Position where the error occurred (if available) */
  readonly position: Position | null;

  constructor(message: string, position: Position | null = null) {
    const fullMessage = position
      ? `${message} at line ${position.line}, char ${position.char}`
      : message;
    super(fullMessage);
    this.name = this.constructor.name;
    this.position = position;
  }
}

/**
 * Thrown when unread() is called more often than the reader can replay
 */
export class ReaderError extends TokenscanError {
  constructor(message: string, position: Position | null = null) {
    super(message, position);
  }
}

/**
 * Thrown when a host registers a token kind outside the custom band
 */
export class VocabularyError extends TokenscanError {
  /** The rejected token kind */
  readonly kind: number;

  constructor(message: string, kind: number) {
    super(message);
    this.kind = kind;
  }
}

/**
 * Thrown when unscan() exceeds the buffer's history
 */
export class TokenBufferError extends TokenscanError {
  constructor(message: string, position: Position | null = null) {
    super(message, position);
  }
}
