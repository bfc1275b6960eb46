import { createNoopLogger, type Logger } from '@tokenscan/logger';
import { TokenBufferError } from '../errors.js';
import type { Scanner } from './scanner.js';
import type { Token } from './token.js';
import { TokenType } from './token-types.js';

export interface TokenBufferOptions {
  /** Number of tokens kept for unscan(); at least 2 */
  capacity?: number;
  logger?: Logger;
}

export const DEFAULT_BUFFER_CAPACITY = 6;

/**
 * Bounded history of scanned tokens with pushback
 *
 * Tokens are numbered from 1 in the order they are produced. `head` is the
 * newest produced token and `cursor` the one most recently returned; after
 * unscan() the cursor trails the head and scan() replays from the history.
 */
export class TokenBuffer {
  private readonly scanner: Scanner;
  private readonly capacity: number;
  private readonly logger: Logger;
  private readonly history: Array<Token | null>;
  private head: number = 0;
  private cursor: number = 0;

  constructor(scanner: Scanner, options: TokenBufferOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_BUFFER_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 2) {
      throw new TokenBufferError(`Buffer capacity must be an integer of at least 2, got ${capacity}`);
    }

    this.scanner = scanner;
    this.capacity = capacity;
    this.logger = options.logger ?? createNoopLogger();
    this.history = new Array<Token | null>(capacity).fill(null);
  }

  /**
   * Next token: a pushed-back one if any, otherwise a freshly scanned one
   */
  scan(): Token {
    return this.scanWith(() => this.scanner.scan());
  }

  /**
   * Like scan(), but a fresh token is scanned as a regex literal
   */
  scanRegex(): Token {
    return this.scanWith(() => this.scanner.scanRegex());
  }

  /**
   * Next token that is not whitespace
   */
  scanIgnoreWhitespace(): Token {
    for (;;) {
      const token = this.scan();
      if (token.type !== TokenType.WS) {
        return token;
      }
    }
  }

  /**
   * Push back the token most recently returned by scan()
   *
   * At most `capacity - 1` tokens can be pending at once.
   */
  unscan(): void {
    const pending = this.head - this.cursor;
    if (this.cursor === 0 || pending >= this.capacity - 1) {
      this.logger.debug('token_buffer_overflow', { pending, capacity: this.capacity });
      throw new TokenBufferError(
        this.cursor === 0
          ? 'Nothing to unscan'
          : `Cannot unscan more than ${this.capacity - 1} tokens`,
        this.current()?.pos ?? null,
      );
    }
    this.cursor--;
  }

  /**
   * The token most recently returned by scan(), or null before the first
   * scan and after unscanning every token
   */
  current(): Token | null {
    if (this.cursor === 0) return null;
    return this.history[this.cursor % this.capacity];
  }

  /**
   * The next character of the underlying scanner
   */
  peek(): string {
    return this.scanner.peek();
  }

  private scanWith(scan: () => Token): Token {
    if (this.cursor < this.head) {
      this.cursor++;
      return this.at(this.cursor);
    }

    const token = scan();
    this.head++;
    this.cursor = this.head;
    this.history[this.head % this.capacity] = token;
    return token;
  }

  private at(sequence: number): Token {
    const token = this.history[sequence % this.capacity];
    if (token === null) {
      throw new TokenBufferError(`Token ${sequence} is no longer buffered`);
    }
    return token;
  }
}
