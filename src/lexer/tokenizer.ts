/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { ERROR_IDS, LexerError, TOKEN_TYPES } from '../types.js';
import { consumeToken, isDigit, isWhitespace, makeToken } from './helpers.js';
import { SINGLE_CHAR_OPERATORS } from './operators.js';
import { readNumber } from './readers.js';
import {
  advance,
  createLexerState,
  current,
  location,
  type LexerState,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (isWhitespace(current(state))) {
    advance(state);
  }
}

/**
 * Read the next token. Once input is exhausted every call returns EOF.
 *
 * @throws LexerError on an unknown character or a malformed number
 */
export function nextToken(state: LexerState): Token {
  skipWhitespace(state);

  const start = location(state);
  const ch = current(state);

  if (ch === '') {
    return makeToken(TOKEN_TYPES.EOF, '', start, start);
  }

  // Number (positive only - unary minus handled by parser)
  if (isDigit(ch) || ch === '.') {
    return readNumber(state);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return consumeToken(state, singleCharType, start);
  }

  throw new LexerError(ERROR_IDS.UNKNOWN_CHARACTER, { char: ch }, start);
}

export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
