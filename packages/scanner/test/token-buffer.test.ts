import { describe, expect, it } from 'vitest';
import { createMockLogger } from '@tokenscan/logger/mock';
import { DEFAULT_BUFFER_CAPACITY, Scanner, TokenBuffer, TokenBufferError, TokenType } from '../src/index.js';

function bufferFor(input: string, capacity?: number): TokenBuffer {
  return new TokenBuffer(new Scanner(input), { capacity });
}

describe('TokenBuffer', () => {
  describe('scan and unscan', () => {
    it('returns the same token again after unscan', () => {
      const buffer = bufferFor('a,b');

      const first = buffer.scan();
      buffer.unscan();

      expect(buffer.scan()).toBe(first);
      expect(buffer.scan().type).toBe(TokenType.COMMA);
    });

    it.each([1, 2, 3])('replays %i pushed-back tokens in their original order', (count) => {
      const buffer = bufferFor('a,b,c,d', 4);
      const seen = Array.from({ length: 5 }, () => buffer.scan());

      for (let i = 0; i < count; i++) {
        buffer.unscan();
      }
      const replayed = Array.from({ length: count }, () => buffer.scan());

      replayed.forEach((token, i) => {
        expect(token).toBe(seen[seen.length - count + i]);
      });
      expect(buffer.scan()).toEqual({ type: TokenType.COMMA, pos: { line: 0, char: 5 }, literal: '' });
    });

    it('keeps replaying after the history wraps around', () => {
      const buffer = bufferFor('a,b,c,d', 3);
      const seen = Array.from({ length: 6 }, () => buffer.scan());

      buffer.unscan();
      buffer.unscan();

      expect(buffer.scan()).toBe(seen[4]);
      expect(buffer.scan()).toBe(seen[5]);
      expect(buffer.scan()).toEqual({ type: TokenType.IDENT, pos: { line: 0, char: 6 }, literal: 'd' });
    });

    it('skips whitespace with scanIgnoreWhitespace', () => {
      const buffer = bufferFor('a   = 1');

      expect(buffer.scanIgnoreWhitespace().type).toBe(TokenType.IDENT);
      expect(buffer.scanIgnoreWhitespace().type).toBe(TokenType.EQ);
      expect(buffer.scanIgnoreWhitespace()).toEqual({
        type: TokenType.NUMBER,
        pos: { line: 0, char: 6 },
        literal: '1',
      });
    });

    it('replays a regex token', () => {
      const buffer = bufferFor('x =~ /ab/ and y');

      expect(buffer.scanIgnoreWhitespace().type).toBe(TokenType.IDENT);
      expect(buffer.scanIgnoreWhitespace().type).toBe(TokenType.EQREGEX);
      const regex = buffer.scanRegex();
      expect(regex).toEqual({ type: TokenType.REGEX, pos: { line: 0, char: 5 }, literal: 'ab' });

      buffer.unscan();

      expect(buffer.scanRegex()).toBe(regex);
      expect(buffer.scanIgnoreWhitespace().type).toBe(TokenType.AND);
      expect(buffer.scanIgnoreWhitespace()).toEqual({
        type: TokenType.IDENT,
        pos: { line: 0, char: 14 },
        literal: 'y',
      });
      expect(buffer.scanIgnoreWhitespace().type).toBe(TokenType.EOF);
    });
  });

  describe('limits', () => {
    it('throws when nothing has been scanned', () => {
      expect(() => bufferFor('a').unscan()).toThrow(new TokenBufferError('Nothing to unscan'));
    });

    it('throws after every scanned token has been pushed back', () => {
      const buffer = bufferFor('a');
      buffer.scan();
      buffer.unscan();

      expect(() => buffer.unscan()).toThrow('Nothing to unscan');
    });

    it(`allows ${DEFAULT_BUFFER_CAPACITY - 1} pending tokens by default`, () => {
      const buffer = bufferFor('a b c d');
      for (let i = 0; i < DEFAULT_BUFFER_CAPACITY; i++) {
        buffer.scan();
      }
      for (let i = 0; i < DEFAULT_BUFFER_CAPACITY - 1; i++) {
        buffer.unscan();
      }

      expect(() => buffer.unscan()).toThrow('Cannot unscan more than 5 tokens');
    });

    it('reports where the overflow happened', () => {
      const buffer = bufferFor('a,b', 2);
      buffer.scan();
      buffer.scan();
      buffer.unscan();

      expect(() => buffer.unscan()).toThrow('Cannot unscan more than 1 tokens at line 0, char 0');
    });

    it('logs overflows at debug level', () => {
      const logger = createMockLogger();
      const buffer = new TokenBuffer(new Scanner('a,b'), { capacity: 2, logger });
      buffer.scan();
      buffer.scan();
      buffer.unscan();

      expect(() => buffer.unscan()).toThrow(TokenBufferError);
      expect(logger.debug).toHaveBeenCalledWith('token_buffer_overflow', { pending: 1, capacity: 2 });
    });

    it.each([1, 0, 2.5, -3])('rejects capacity %s', (capacity) => {
      expect(() => bufferFor('a', capacity)).toThrow(
        `Buffer capacity must be an integer of at least 2, got ${capacity}`,
      );
    });
  });

  describe('current and peek', () => {
    it('current is null before the first scan', () => {
      expect(bufferFor('a').current()).toBeNull();
    });

    it('current follows scan and unscan', () => {
      const buffer = bufferFor('a,b');
      const a = buffer.scan();
      const comma = buffer.scan();

      expect(buffer.current()).toBe(comma);
      buffer.unscan();
      expect(buffer.current()).toBe(a);
      buffer.unscan();
      expect(buffer.current()).toBeNull();
    });

    it('peek shows the next character of the input', () => {
      const buffer = bufferFor('a+1');
      buffer.scan();

      expect(buffer.peek()).toBe('+');
    });
  });
});
