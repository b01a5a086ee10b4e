/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { advance, location, type LexerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, value, span: { start, end } };
}

/** Consume one character as a token of the given type */
export function consumeToken(
  state: LexerState,
  type: TokenType,
  start: SourceLocation
): Token {
  const value = advance(state);
  return makeToken(type, value, start, location(state));
}
