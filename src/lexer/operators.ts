/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '^': TOKEN_TYPES.CARET,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
};
