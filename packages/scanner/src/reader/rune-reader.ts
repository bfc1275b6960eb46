import { createNoopLogger, type Logger } from '@tokenscan/logger';
import { ReaderError } from '../errors.js';
import { PositionTracker, type Position } from './position.js';

/** Returned by read() once the source is exhausted */
export const EOF = '\0';

/**
 * A string, or any synchronous sequence of string chunks
 */
export type RuneSource = string | Iterable<string>;

/**
 * A character together with the position it was read at
 */
export interface Rune {
  readonly ch: string;
  readonly pos: Position;
}

export interface RuneReaderOptions {
  logger?: Logger;
}

/**
 * Number of runes kept for unread(). Number scanning pushes back two
 * characters, and the ring needs one more slot for the current rune.
 */
const RING_SIZE = 3;

const ORIGIN: Position = { line: 0, char: 0 };

function* codePoints(source: RuneSource): Generator<string> {
  if (typeof source === 'string') {
    yield* source;
    return;
  }
  for (const chunk of source) {
    yield* chunk;
  }
}

/**
 * Pushback-capable reader over a character source
 *
 * Iterates by code point, so astral characters count as one rune.
 * `\r\n` and a lone `\r` are read as `\n`.
 */
export class RuneReader {
  private readonly chars: Iterator<string>;
  private readonly logger: Logger;
  private readonly tracker = new PositionTracker();
  private readonly ring: Rune[] = Array.from({ length: RING_SIZE }, () => ({ ch: EOF, pos: ORIGIN }));
  private index: number = 0;
  private filled: number = 0;
  private unreadCount: number = 0;
  // Character pulled from the source while looking for `\n` after `\r`
  private lookahead: string | null = null;
  private exhausted: boolean = false;

  constructor(source: RuneSource, options: RuneReaderOptions = {}) {
    this.chars = codePoints(source);
    this.logger = options.logger ?? createNoopLogger();
  }

  /**
   * Read the next rune, or EOF once the source is exhausted
   */
  read(): Rune {
    if (this.unreadCount > 0) {
      this.unreadCount--;
      return this.current();
    }

    let ch = this.next();
    if (ch === '\r') {
      const following = this.next();
      if (following !== '\n' && following !== EOF) {
        this.lookahead = following;
      }
      ch = '\n';
    }

    const rune: Rune = { ch, pos: this.tracker.snapshot() };
    this.index = (this.index + 1) % RING_SIZE;
    this.ring[this.index] = rune;
    this.filled = Math.min(this.filled + 1, RING_SIZE);

    // EOF does not move the position, so repeated reads report the same place
    if (ch !== EOF) {
      this.tracker.advance(ch);
    }
    return rune;
  }

  /**
   * Push back the most recently read rune
   */
  unread(): void {
    if (this.unreadCount >= RING_SIZE - 1 || this.unreadCount >= this.filled) {
      throw new ReaderError(
        `Cannot unread more than ${Math.min(RING_SIZE - 1, this.filled)} characters`,
        this.current().pos,
      );
    }
    this.unreadCount++;
  }

  /**
   * The rune most recently returned by read(), without consuming anything
   */
  current(): Rune {
    return this.ring[(this.index - this.unreadCount + RING_SIZE) % RING_SIZE];
  }

  /**
   * The rune the next read() will return
   */
  peek(): Rune {
    const rune = this.read();
    this.unread();
    return rune;
  }

  private next(): string {
    if (this.lookahead !== null) {
      const ch = this.lookahead;
      this.lookahead = null;
      return ch;
    }
    if (this.exhausted) {
      return EOF;
    }

    // A failing source reads as end of input
    let result: IteratorResult<string>;
    try {
      result = this.chars.next();
    } catch (error) {
      this.exhausted = true;
      this.logger.warn('reader_source_failed', { error, position: this.tracker.snapshot() });
      return EOF;
    }

    // A NUL character ends the input as well
    if (result.done || result.value === EOF) {
      this.exhausted = true;
      return EOF;
    }
    return result.value;
  }
}
