/**
 * arithmo Printer Tests: Canonical Infix Text
 */

import { describe, expect, it } from 'vitest';
import {
  formatExpression,
  formatNumber,
  parse,
  type ExpressionNode,
} from '../../src/index.js';
import { literal, parseShape, shape } from '../helpers/runtime.js';

function reformat(source: string): string {
  return formatExpression(parse(source));
}

describe('arithmo Printer: formatExpression', () => {
  it('spaces binary operators', () => {
    expect(reformat('1+2*3')).toBe('1 + 2 * 3');
  });

  it('drops redundant parentheses', () => {
    expect(reformat('((4))')).toBe('4');
    expect(reformat('(1-2)-3')).toBe('1 - 2 - 3');
    expect(reformat('2^(3^2)')).toBe('2 ^ 3 ^ 2');
  });

  it('keeps parentheses that change grouping', () => {
    expect(reformat('(1+2)*3')).toBe('(1 + 2) * 3');
    expect(reformat('1-(2-3)')).toBe('1 - (2 - 3)');
    expect(reformat('8/(4*2)')).toBe('8 / (4 * 2)');
    expect(reformat('(2^3)^2')).toBe('(2 ^ 3) ^ 2');
    expect(reformat('2^(1+2)')).toBe('2 ^ (1 + 2)');
  });

  it('writes signs without parentheses where they reparse the same', () => {
    expect(reformat('-2^2')).toBe('-2 ^ 2');
    expect(reformat('2^-1')).toBe('2 ^ -1');
    expect(reformat('2*-3')).toBe('2 * -3');
    expect(reformat('-3*2')).toBe('-3 * 2');
  });

  it('parenthesizes signed bases and nested operands', () => {
    expect(reformat('(-2)^2')).toBe('(-2) ^ 2');
    expect(reformat('-(1+2)')).toBe('-(1 + 2)');
    expect(reformat('-(-3)')).toBe('-(-3)');
  });

  it('parenthesizes a negative literal base', () => {
    const node: ExpressionNode = {
      type: 'BinaryExpr',
      op: '^',
      left: literal(-2),
      right: literal(2),
      span: literal(0).span,
    };
    expect(formatExpression(node)).toBe('(-2) ^ 2');
  });

  it('reparses to the same tree', () => {
    const sources = [
      '1 - (2 - (3 - 4))',
      '((1 + 2) * (3 - 4)) / 5 % 6',
      '-(2 ^ -(3 ^ 2))',
      '(-(1)) ^ (+2) ^ 3',
      '2 * (-(4 % 3))',
      '.5 + 10.',
      `0.${'0'.repeat(150)}1 + 1`,
    ];
    for (const source of sources) {
      const ast = parse(source);
      expect(parseShape(formatExpression(ast))).toEqual(shape(ast));
    }
  });
});

describe('arithmo Printer: formatNumber', () => {
  it('prints ordinary numbers as String() does', () => {
    expect(formatNumber(42)).toBe('42');
    expect(formatNumber(0.5)).toBe('0.5');
  });

  it('expands large integers', () => {
    expect(formatNumber(1e21)).toBe('1000000000000000000000');
  });

  it('expands small fractions', () => {
    expect(formatNumber(1e-7)).toBe('0.0000001');
    expect(formatNumber(1.5e-10)).toBe('0.00000000015');
    expect(formatNumber(-1.5e-7)).toBe('-0.00000015');
  });

  it('expands fractions below 1e-100 without losing digits', () => {
    expect(formatNumber(1e-151)).toBe(`0.${'0'.repeat(150)}1`);
  });

  it('expands large values with a fractional mantissa', () => {
    expect(formatNumber(1.2345e21)).toBe(`12345${'0'.repeat(17)}`);
  });
});
