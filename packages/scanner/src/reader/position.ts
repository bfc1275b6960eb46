/**
 * Source position of a character or token. Both fields are zero-based.
 */
export interface Position {
  readonly line: number;
  readonly char: number;
}

/**
 * Tracks line and character as characters are consumed
 */
export class PositionTracker {
  private line: number = 0;
  private char: number = 0;

  snapshot(): Position {
    return { line: this.line, char: this.char };
  }

  advance(ch: string): void {
    if (ch === '\n') {
      this.line++;
      this.char = 0;
    } else {
      this.char++;
    }
  }
}
