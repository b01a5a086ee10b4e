/**
 * Parser Extension: Expression Parsing
 * Precedence chain from additive down to power
 */

import { Parser } from './parser.js';
import type {
  BinaryExprNode,
  BinaryOp,
  ExpressionNode,
  Token,
  TokenType,
  UnaryExprNode,
  UnaryOp,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  enterNesting,
  leaveNesting,
  makeSpan,
  trackHeight,
  type ParserState,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePower(): ExpressionNode;
  }
}

/** Operator token to AST operator */
const BINARY_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.PERCENT]: '%',
  [TOKEN_TYPES.CARET]: '^',
};

function binaryOpFor(type: TokenType): BinaryOp {
  const op = BINARY_OPS[type];
  if (!op) {
    throw new Error(`Token ${type} is not a binary operator`);
  }
  return op;
}

function makeBinary(
  state: ParserState,
  opToken: Token,
  left: ExpressionNode,
  right: ExpressionNode
): BinaryExprNode {
  const node: BinaryExprNode = {
    type: 'BinaryExpr',
    op: binaryOpFor(opToken.type),
    left,
    right,
    span: makeSpan(left.span.start, right.span.end),
  };
  trackHeight(state, node, opToken.span.start);
  return node;
}

// ============================================================
// EXPRESSION PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseAdditive();
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  let left = this.parseMultiplicative();

  while (check(this.state, TOKEN_TYPES.PLUS, TOKEN_TYPES.MINUS)) {
    const opToken = advance(this.state);
    const right = this.parseMultiplicative();
    left = makeBinary(this.state, opToken, left, right);
  }

  return left;
};

Parser.prototype.parseMultiplicative = function (
  this: Parser
): ExpressionNode {
  let left = this.parseUnary();

  while (
    check(this.state, TOKEN_TYPES.STAR, TOKEN_TYPES.SLASH, TOKEN_TYPES.PERCENT)
  ) {
    const opToken = advance(this.state);
    const right = this.parseUnary();
    left = makeBinary(this.state, opToken, left, right);
  }

  return left;
};

/**
 * unary := ('-' | '+')? power
 *
 * One sign per operand; the sign applies to the whole power expression,
 * so -2^2 is -(2^2). Every operand passes through here, so nesting depth
 * is counted here.
 */
Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  enterNesting(this.state);
  try {
    if (check(this.state, TOKEN_TYPES.MINUS, TOKEN_TYPES.PLUS)) {
      const opToken = advance(this.state);
      const op: UnaryOp = opToken.type === TOKEN_TYPES.MINUS ? '-' : '+';
      const operand = this.parsePower();
      const node: UnaryExprNode = {
        type: 'UnaryExpr',
        op,
        operand,
        span: makeSpan(opToken.span.start, operand.span.end),
      };
      trackHeight(this.state, node, opToken.span.start);
      return node;
    }
    return this.parsePower();
  } finally {
    leaveNesting(this.state);
  }
};

/**
 * power := primary ('^' unary)?
 *
 * The exponent is parsed as a unary, which recurses back into power:
 * 2^3^2 groups as 2^(3^2) and 2^-1 is accepted.
 */
Parser.prototype.parsePower = function (this: Parser): ExpressionNode {
  const base = this.parsePrimary();

  if (check(this.state, TOKEN_TYPES.CARET)) {
    const opToken = advance(this.state);
    const exponent = this.parseUnary();
    return makeBinary(this.state, opToken, base, exponent);
  }

  return base;
};
