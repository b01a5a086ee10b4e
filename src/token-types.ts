import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  NUMBER: 'NUMBER',

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %
  CARET: 'CARET', // ^

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Source text of the token; the literal digits for NUMBER, empty for EOF */
  readonly value: string;
  readonly span: SourceSpan;
}
