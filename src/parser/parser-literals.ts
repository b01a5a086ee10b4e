/**
 * Parser Extension: Primaries
 * Number literals and parenthesized expressions
 */

import { Parser } from './parser.js';
import type { ExpressionNode, NumberLiteralNode } from '../types.js';
import { ERROR_IDS, ParseError, TOKEN_TYPES } from '../types.js';
import { advance, check, current, describeToken } from './state.js';

declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExpressionNode;
    parseNumberLiteral(): NumberLiteralNode;
    parseGrouped(): ExpressionNode;
  }
}

// ============================================================
// PRIMARY
// ============================================================

/**
 * primary := NUMBER | '(' expression ')'
 */
Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.NUMBER)) {
    return this.parseNumberLiteral();
  }

  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    return this.parseGrouped();
  }

  const token = current(this.state);
  throw new ParseError(
    ERROR_IDS.UNEXPECTED_TOKEN,
    { found: describeToken(token) },
    token.span.start
  );
};

// ============================================================
// NUMBER LITERAL
// ============================================================

Parser.prototype.parseNumberLiteral = function (
  this: Parser
): NumberLiteralNode {
  const token = advance(this.state);
  const raw = token.value;
  const value = Number(raw);

  let reason: string | null = null;
  if (raw === '' || !Number.isFinite(value)) {
    reason = 'out of range';
  } else if (this.state.mode === 'integer') {
    if (raw.includes('.')) {
      reason = 'fractional literal in integer mode';
    } else if (!Number.isSafeInteger(value)) {
      reason = 'exceeds the safe integer range';
    }
  }

  if (reason !== null) {
    throw new ParseError(
      ERROR_IDS.INVALID_NUMBER,
      { value: raw, reason },
      token.span.start
    );
  }

  return { type: 'NumberLiteral', value, raw, span: token.span };
};

// ============================================================
// GROUPED EXPRESSION
// ============================================================

/**
 * Parenthesized sub-expression. Grouping does not produce a node:
 * the inner expression is returned as-is.
 */
Parser.prototype.parseGrouped = function (this: Parser): ExpressionNode {
  const lparen = advance(this.state);
  const expression = this.parseExpression();

  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    const token = current(this.state);
    throw new ParseError(
      ERROR_IDS.MISSING_CLOSING_PAREN,
      { openColumn: lparen.span.start.column, found: describeToken(token) },
      token.span.start
    );
  }
  advance(this.state);

  return expression;
};
