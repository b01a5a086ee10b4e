/**
 * Token Readers
 * Functions to read multi-character tokens from source
 */

import type { Token } from '../types.js';
import { ERROR_IDS, LexerError, TOKEN_TYPES } from '../types.js';
import { isDigit, makeToken } from './helpers.js';
import { advance, current, location, type LexerState } from './state.js';

/**
 * Read a numeric literal: the maximal run of digits and decimal points.
 * At most one decimal point is allowed, and at least one digit.
 */
export function readNumber(state: LexerState): Token {
  const start = location(state);
  let value = '';
  let points = 0;

  while (isDigit(current(state)) || current(state) === '.') {
    const ch = advance(state);
    if (ch === '.') points++;
    value += ch;
  }

  if (points > 1 || value === '.') {
    throw new LexerError(ERROR_IDS.MALFORMED_NUMBER, { value }, start);
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, location(state));
}
