/**
 * arithmo Types
 * Single import point for locations, tokens, AST nodes and errors
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';
export type {
  BinaryExprNode,
  BinaryOp,
  ExpressionNode,
  NodeType,
  NumberLiteralNode,
  UnaryExprNode,
  UnaryOp,
} from './ast-nodes.js';
export {
  ERROR_IDS,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorId,
  type ErrorRegistry,
} from './error-registry.js';
export {
  ArithError,
  ConfigError,
  createError,
  LexerError,
  ParseError,
  RuntimeError,
  type ArithErrorData,
} from './error-classes.js';

// ============================================================
// OPTIONS
// ============================================================

/**
 * Arithmetic semantics.
 * - float: IEEE-754 doubles
 * - integer: fractional literals rejected, every result truncated toward zero
 */
export type ArithmeticMode = 'float' | 'integer';

export interface ParseOptions {
  /** Default: 'float' */
  mode?: ArithmeticMode;
  /** Maximum operand nesting (parentheses, signs, exponents). Default: 256 */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 256;
