/**
 * Canonical Infix Formatting
 * Renders an AST as source text that parses back to the same tree
 */

import type {
  BinaryExprNode,
  BinaryOp,
  ExpressionNode,
} from '../types.js';

const BINARY_PRECEDENCE: Readonly<Record<BinaryOp, number>> = {
  '+': 1,
  '-': 1,
  '*': 2,
  '/': 2,
  '%': 2,
  '^': 4,
};

/**
 * Plain decimal text for a number. Exponent notation is expanded because
 * the lexer only reads digits and one decimal point; the significant
 * digits are kept as String() produces them.
 */
export function formatNumber(value: number): string {
  const text = String(value);
  const exponentAt = text.indexOf('e');
  if (exponentAt === -1) return text;

  const sign = text.startsWith('-') ? '-' : '';
  const mantissa = text.slice(sign.length, exponentAt);
  const exponent = Number(text.slice(exponentAt + 1));

  const pointAt = mantissa.indexOf('.');
  const digits = mantissa.replace('.', '');
  // Position of the decimal point within digits once the exponent is applied
  const point = (pointAt === -1 ? mantissa.length : pointAt) + exponent;

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/** Unary expressions and negative literals both print with a leading sign */
function isSigned(node: ExpressionNode): boolean {
  if (node.type === 'UnaryExpr') return true;
  return (
    node.type === 'NumberLiteral' &&
    (node.value < 0 || Object.is(node.value, -0))
  );
}

function needsParens(
  parent: BinaryExprNode,
  child: ExpressionNode,
  side: 'left' | 'right'
): boolean {
  if (child.type !== 'BinaryExpr') {
    // -2^2 would regroup as -(2^2)
    return isSigned(child) && parent.op === '^' && side === 'left';
  }

  const parentPrecedence = BINARY_PRECEDENCE[parent.op];
  const childPrecedence = BINARY_PRECEDENCE[child.op];
  if (childPrecedence !== parentPrecedence) {
    return childPrecedence < parentPrecedence;
  }

  // Same tier: only the associative side may omit parentheses
  return parent.op === '^' ? side === 'left' : side === 'right';
}

function wrap(text: string, parens: boolean): string {
  return parens ? `(${text})` : text;
}

/**
 * Format an expression with the minimum parentheses needed to reparse
 * to the same tree.
 *
 * @example
 * formatExpression(parse('(1 + 2) * 3'))  // '(1 + 2) * 3'
 * formatExpression(parse('((4))'))        // '4'
 */
export function formatExpression(node: ExpressionNode): string {
  switch (node.type) {
    case 'NumberLiteral':
      return formatNumber(node.value);
    case 'UnaryExpr': {
      const operand = node.operand;
      const parens =
        isSigned(operand) ||
        (operand.type === 'BinaryExpr' && operand.op !== '^');
      return `${node.op}${wrap(formatExpression(operand), parens)}`;
    }
    case 'BinaryExpr': {
      const left = wrap(
        formatExpression(node.left),
        needsParens(node, node.left, 'left')
      );
      const right = wrap(
        formatExpression(node.right),
        needsParens(node, node.right, 'right')
      );
      return `${left} ${node.op} ${right}`;
    }
  }
}
