/**
 * Lexer State
 * Cursor over the source text
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return { source, pos: 0, line: 1, column: 1 };
}

/** Character under the cursor, or '' once the source is consumed */
export function current(state: LexerState): string {
  return state.source.charAt(state.pos);
}

export function location(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

/** Consume the character under the cursor; a no-op at end of input */
export function advance(state: LexerState): string {
  const ch = current(state);
  if (ch === '') return ch;

  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}
