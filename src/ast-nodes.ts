import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// LITERALS
// ============================================================

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
  /** Literal text as written in the source */
  readonly raw: string;
}

// ============================================================
// OPERATORS
// ============================================================

/** '-' negates its operand, '+' passes it through */
export type UnaryOp = '-' | '+';

export type BinaryOp = '+' | '-' | '*' | '/' | '%' | '^';

/**
 * Unary expression: -operand or +operand.
 * Binds looser than '^', so -2^2 is -(2^2).
 */
export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

/**
 * Binary expression: left op right.
 * Precedence (lowest first): + -, then * / %, then ^ (right-associative).
 */
export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

// ============================================================
// UNION TYPES
// ============================================================

export type ExpressionNode = NumberLiteralNode | UnaryExprNode | BinaryExprNode;

export type NodeType = ExpressionNode['type'];
