/**
 * Evaluator
 *
 * Recursive fold over the expression AST. Holds no state besides the
 * context it was created with, so one instance can evaluate any number
 * of trees.
 *
 * Error Handling:
 * - Zero divisor for / throws RuntimeError(ARITH-R001)
 * - Zero divisor for % throws RuntimeError(ARITH-R002)
 * - Integer mode result outside the safe integer range throws
 *   RuntimeError(ARITH-R003)
 *
 * @internal
 */

import type {
  BinaryExprNode,
  ExpressionNode,
  NumberLiteralNode,
  UnaryExprNode,
} from '../../types.js';
import { ERROR_IDS, RuntimeError } from '../../types.js';
import type { EvalContext } from './types.js';

/** Truncate toward zero, normalizing -0 to 0 */
export function toInteger(value: number): number {
  const truncated = Math.trunc(value);
  return truncated === 0 ? 0 : truncated;
}

export class Evaluator {
  constructor(protected readonly ctx: EvalContext) {}

  /** Evaluate a tree from its root */
  evaluate(node: ExpressionNode): number {
    return this.evaluateNode(node, 0);
  }

  /**
   * Dispatch on node type and report the value to observers.
   */
  protected evaluateNode(node: ExpressionNode, depth: number): number {
    let value: number;

    switch (node.type) {
      case 'NumberLiteral':
        value = this.evaluateNumberLiteral(node);
        break;
      case 'UnaryExpr':
        value = this.evaluateUnaryExpr(node, depth);
        break;
      case 'BinaryExpr':
        value = this.evaluateBinaryExpr(node, depth);
        break;
      default: {
        const unknown: never = node;
        throw new Error(`Unknown node type: ${JSON.stringify(unknown)}`);
      }
    }

    this.ctx.observability.onEvaluate?.({ node, value, depth });
    return value;
  }

  protected evaluateNumberLiteral(node: NumberLiteralNode): number {
    return this.ctx.mode === 'integer' ? toInteger(node.value) : node.value;
  }

  /**
   * Evaluate unary expression: -operand or +operand.
   */
  protected evaluateUnaryExpr(node: UnaryExprNode, depth: number): number {
    const operand = this.evaluateNode(node.operand, depth + 1);
    if (node.op === '+') return operand;
    return this.ctx.mode === 'integer' ? toInteger(-operand) : -operand;
  }

  /**
   * Evaluate binary expression: left op right.
   * Both operands are evaluated, left first, before combining.
   */
  protected evaluateBinaryExpr(node: BinaryExprNode, depth: number): number {
    const left = this.evaluateNode(node.left, depth + 1);
    const right = this.evaluateNode(node.right, depth + 1);
    const result = this.combine(node, left, right);
    if (this.ctx.mode !== 'integer') return result;

    const truncated = toInteger(result);
    if (!Number.isSafeInteger(truncated)) {
      throw RuntimeError.fromNode(ERROR_IDS.INTEGER_OVERFLOW, node, {
        op: node.op,
      });
    }
    return truncated;
  }

  protected combine(node: BinaryExprNode, left: number, right: number): number {
    switch (node.op) {
      case '+':
        return left + right;
      case '-':
        return left - right;
      case '*':
        return left * right;
      case '/':
        if (right === 0) {
          throw RuntimeError.fromNode(ERROR_IDS.DIVISION_BY_ZERO, node);
        }
        return left / right;
      case '%':
        if (right === 0) {
          throw RuntimeError.fromNode(ERROR_IDS.MODULO_BY_ZERO, node);
        }
        return left % right;
      case '^':
        return Math.pow(left, right);
    }
  }
}
