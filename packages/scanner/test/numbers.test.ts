import { describe, expect, it } from 'vitest';
import { tokenize, TokenType, type TokenKind } from '../src/index.js';

function pairs(input: string): Array<[TokenKind, string]> {
  return tokenize(input).map((t) => [t.type, t.literal]);
}

describe('number scanning', () => {
  describe('integers and decimals', () => {
    it('scans integers', () => {
      expect(pairs('10')).toEqual([
        [TokenType.NUMBER, '10'],
        [TokenType.EOF, ''],
      ]);
      expect(pairs('007')[0]).toEqual([TokenType.NUMBER, '007']);
    });

    it('scans decimals', () => {
      expect(pairs('3.14')[0]).toEqual([TokenType.NUMBER, '3.14']);
      expect(pairs('.5')[0]).toEqual([TokenType.NUMBER, '.5']);
    });

    it('includes a sign directly before the digits', () => {
      expect(pairs('+3')[0]).toEqual([TokenType.NUMBER, '+3']);
      expect(pairs('-7')[0]).toEqual([TokenType.NUMBER, '-7']);
      expect(pairs('-.5')[0]).toEqual([TokenType.NUMBER, '-.5']);
      expect(pairs('+.5')[0]).toEqual([TokenType.NUMBER, '+.5']);
    });

    it('positions a signed number at its sign', () => {
      expect(tokenize('  -5')[1].pos).toEqual({ line: 0, char: 2 });
    });

    it('stops at a second full stop', () => {
      expect(pairs('1.2.3')).toEqual([
        [TokenType.NUMBER, '1.2'],
        [TokenType.NUMBER, '.3'],
        [TokenType.EOF, ''],
      ]);
    });

    it('leaves a trailing full stop for the next token', () => {
      expect(pairs('1.')).toEqual([
        [TokenType.NUMBER, '1'],
        [TokenType.ILLEGAL, '.'],
        [TokenType.EOF, ''],
      ]);
      expect(pairs('1.x')).toEqual([
        [TokenType.NUMBER, '1'],
        [TokenType.ILLEGAL, '.'],
        [TokenType.IDENT, 'x'],
        [TokenType.EOF, ''],
      ]);
      expect(pairs('1..2')).toEqual([
        [TokenType.NUMBER, '1'],
        [TokenType.ILLEGAL, '.'],
        [TokenType.NUMBER, '.2'],
        [TokenType.EOF, ''],
      ]);
    });

    it('reads a minus between numbers as a sign', () => {
      expect(pairs('3-2')).toEqual([
        [TokenType.NUMBER, '3'],
        [TokenType.NUMBER, '-2'],
        [TokenType.EOF, ''],
      ]);
    });

    it('ends a number at a letter', () => {
      expect(pairs('10x')).toEqual([
        [TokenType.NUMBER, '10'],
        [TokenType.IDENT, 'x'],
        [TokenType.EOF, ''],
      ]);
    });
  });

  describe('signs and full stops that start no number', () => {
    it('scans a lone sign as an operator', () => {
      expect(pairs('+')).toEqual([
        [TokenType.PLUS, ''],
        [TokenType.EOF, ''],
      ]);
      expect(pairs('-')).toEqual([
        [TokenType.MINUS, ''],
        [TokenType.EOF, ''],
      ]);
    });

    it('scans a sign before a letter or a space as an operator', () => {
      expect(pairs('+a')).toEqual([
        [TokenType.PLUS, ''],
        [TokenType.IDENT, 'a'],
        [TokenType.EOF, ''],
      ]);
      expect(pairs('- 3')).toEqual([
        [TokenType.MINUS, ''],
        [TokenType.WS, ' '],
        [TokenType.NUMBER, '3'],
        [TokenType.EOF, ''],
      ]);
    });

    it('does not take a full stop without a digit after it', () => {
      expect(pairs('+.a')).toEqual([
        [TokenType.PLUS, ''],
        [TokenType.ILLEGAL, '.'],
        [TokenType.IDENT, 'a'],
        [TokenType.EOF, ''],
      ]);
      expect(pairs('-.')).toEqual([
        [TokenType.MINUS, ''],
        [TokenType.ILLEGAL, '.'],
        [TokenType.EOF, ''],
      ]);
    });

    it('returns ILLEGAL for a lone full stop', () => {
      expect(pairs('.')).toEqual([
        [TokenType.ILLEGAL, '.'],
        [TokenType.EOF, ''],
      ]);
      expect(pairs('.x')).toEqual([
        [TokenType.ILLEGAL, '.'],
        [TokenType.IDENT, 'x'],
        [TokenType.EOF, ''],
      ]);
    });

    it('scans a minus before > as MINUS', () => {
      expect(pairs('->')).toEqual([
        [TokenType.MINUS, ''],
        [TokenType.GT, ''],
        [TokenType.EOF, ''],
      ]);
    });
  });

  describe('durations', () => {
    it.each(['10s', '5m', '2h', '3d', '1w', '100u', '100µ', '-5s'])('scans %s as a duration', (input) => {
      expect(pairs(input)).toEqual([
        [TokenType.DURATION, input],
        [TokenType.EOF, ''],
      ]);
    });

    it('takes ms as one unit', () => {
      expect(pairs('10ms')).toEqual([
        [TokenType.DURATION, '10ms'],
        [TokenType.EOF, ''],
      ]);
    });

    it('takes only the first character of a longer unit', () => {
      expect(pairs('100µs')).toEqual([
        [TokenType.DURATION, '100µ'],
        [TokenType.IDENT, 's'],
        [TokenType.EOF, ''],
      ]);
      expect(pairs('10min')).toEqual([
        [TokenType.DURATION, '10m'],
        [TokenType.IDENT, 'in'],
        [TokenType.EOF, ''],
      ]);
    });

    it('gives a fractional number no unit', () => {
      expect(pairs('10.5s')).toEqual([
        [TokenType.NUMBER, '10.5'],
        [TokenType.IDENT, 's'],
        [TokenType.EOF, ''],
      ]);
      expect(pairs('.5ms')).toEqual([
        [TokenType.NUMBER, '.5'],
        [TokenType.IDENT, 'ms'],
        [TokenType.EOF, ''],
      ]);
    });

    it('needs the unit directly after the digits', () => {
      expect(pairs('10 s')).toEqual([
        [TokenType.NUMBER, '10'],
        [TokenType.WS, ' '],
        [TokenType.IDENT, 's'],
        [TokenType.EOF, ''],
      ]);
    });
  });
});
