/**
 * arithmo Language Tests: Lexer
 * Token stream, locations and lexical errors
 */

import { describe, expect, it } from 'vitest';
import {
  createLexerState,
  LexerError,
  nextToken,
  TOKEN_TYPES,
  tokenize,
} from '../../src/index.js';
import { expectThrown } from '../helpers/runtime.js';

function types(source: string): string[] {
  return tokenize(source).map((token) => token.type);
}

describe('arithmo Lexer', () => {
  describe('Token Types', () => {
    it('recognizes every operator and delimiter', () => {
      expect(types('+-*/%^()')).toEqual([
        'PLUS',
        'MINUS',
        'STAR',
        'SLASH',
        'PERCENT',
        'CARET',
        'LPAREN',
        'RPAREN',
        'EOF',
      ]);
    });

    it('produces only EOF for empty input', () => {
      expect(tokenize('')).toEqual([
        {
          type: TOKEN_TYPES.EOF,
          value: '',
          span: {
            start: { line: 1, column: 1, offset: 0 },
            end: { line: 1, column: 1, offset: 0 },
          },
        },
      ]);
    });

    it('produces only EOF for whitespace', () => {
      expect(types(' \t\r\n ')).toEqual(['EOF']);
    });

    it('keeps the sign out of number literals', () => {
      expect(tokenize('-5').map((token) => token.value)).toEqual(['-', '5', '']);
    });
  });

  describe('Number Literals', () => {
    it('reads integers and decimals', () => {
      expect(tokenize('12 3.75 0').map((token) => token.value)).toEqual([
        '12',
        '3.75',
        '0',
        '',
      ]);
    });

    it('accepts a leading or trailing decimal point', () => {
      expect(tokenize('.5 5.').map((token) => token.value)).toEqual([
        '.5',
        '5.',
        '',
      ]);
    });

    it('reads adjacent literals and operators without whitespace', () => {
      expect(types('2(3)')).toEqual([
        'NUMBER',
        'LPAREN',
        'NUMBER',
        'RPAREN',
        'EOF',
      ]);
    });
  });

  describe('Locations', () => {
    it('records start and end of each token', () => {
      const tokens = tokenize('12+3.5');
      expect(tokens.map((token) => token.span)).toEqual([
        {
          start: { line: 1, column: 1, offset: 0 },
          end: { line: 1, column: 3, offset: 2 },
        },
        {
          start: { line: 1, column: 3, offset: 2 },
          end: { line: 1, column: 4, offset: 3 },
        },
        {
          start: { line: 1, column: 4, offset: 3 },
          end: { line: 1, column: 7, offset: 6 },
        },
        {
          start: { line: 1, column: 7, offset: 6 },
          end: { line: 1, column: 7, offset: 6 },
        },
      ]);
    });

    it('skips surrounding whitespace', () => {
      const tokens = tokenize('  7 ');
      expect(tokens[0]?.span.start).toEqual({ line: 1, column: 3, offset: 2 });
      expect(tokens[1]?.span.start).toEqual({ line: 1, column: 5, offset: 4 });
    });

    it('advances the line after a newline', () => {
      const tokens = tokenize('1\n+ 2');
      expect(tokens[1]?.span.start).toEqual({ line: 2, column: 1, offset: 2 });
      expect(tokens[2]?.span.start).toEqual({ line: 2, column: 3, offset: 4 });
    });
  });

  describe('Incremental Reading', () => {
    it('returns tokens one at a time', () => {
      const state = createLexerState('4 * 2');
      expect(nextToken(state).value).toBe('4');
      expect(nextToken(state).type).toBe('STAR');
      expect(nextToken(state).value).toBe('2');
      expect(nextToken(state).type).toBe('EOF');
    });

    it('keeps returning EOF once input is exhausted', () => {
      const state = createLexerState('1');
      nextToken(state);
      expect(nextToken(state).type).toBe('EOF');
      expect(nextToken(state).type).toBe('EOF');
    });

    it('leaves the cursor at the end after EOF', () => {
      const state = createLexerState('1\n');
      nextToken(state);
      expect(nextToken(state).span.start).toEqual({
        line: 2,
        column: 1,
        offset: 2,
      });
      nextToken(state);
      expect(state.pos).toBe(2);
    });
  });

  describe('Errors', () => {
    it('rejects unknown characters', () => {
      const err = expectThrown(() => tokenize('2 $ 3'), LexerError);
      expect(err.errorId).toBe('ARITH-L001');
      expect(err.message).toBe("Unknown character '$' at 1:3");
      expect(err.context).toEqual({ char: '$' });
    });

    it('rejects letters directly after a number', () => {
      const err = expectThrown(() => tokenize('2x'), LexerError);
      expect(err.message).toBe("Unknown character 'x' at 1:2");
    });

    it('rejects a literal with two decimal points at its start', () => {
      const err = expectThrown(() => tokenize('2 + 1.2.3'), LexerError);
      expect(err.errorId).toBe('ARITH-L002');
      expect(err.message).toBe("Malformed number literal '1.2.3' at 1:5");
    });

    it('rejects a lone decimal point', () => {
      const err = expectThrown(() => tokenize('1 + .'), LexerError);
      expect(err.message).toBe("Malformed number literal '.' at 1:5");
    });
  });
});
