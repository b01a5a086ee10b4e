/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type {
  ArithmeticMode,
  BinaryExprNode,
  ExpressionNode,
  SourceLocation,
  SourceSpan,
  Token,
  TokenType,
  UnaryExprNode,
} from '../types.js';
import {
  DEFAULT_MAX_DEPTH,
  ERROR_IDS,
  ParseError,
  TOKEN_TYPES,
} from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Current operand nesting level */
  depth: number;
  readonly mode: ArithmeticMode;
  readonly maxDepth: number;
  /** Height of each operator node built so far; literals count as 1 */
  readonly heights: WeakMap<ExpressionNode, number>;
}

export interface ParserStateOptions {
  mode?: ArithmeticMode;
  maxDepth?: number;
}

export function createParserState(
  tokens: Token[],
  options: ParserStateOptions = {}
): ParserState {
  if (tokens.length === 0) {
    throw new Error('Token stream must end with EOF');
  }
  return {
    tokens,
    pos: 0,
    depth: 0,
    mode: options.mode ?? 'float',
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    heights: new WeakMap(),
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

// ============================================================
// NESTING DEPTH
// ============================================================

/**
 * Enter one operand nesting level.
 * @throws ParseError when the level exceeds maxDepth
 * @internal
 */
export function enterNesting(state: ParserState): void {
  state.depth++;
  if (state.depth > state.maxDepth) {
    throw new ParseError(
      ERROR_IDS.NESTING_TOO_DEEP,
      { maxDepth: state.maxDepth },
      current(state).span.start
    );
  }
}

/** @internal */
export function leaveNesting(state: ParserState): void {
  state.depth--;
}

/**
 * Record the height of a new operator node. Operator chains such as
 * 1+1+...+1 are parsed by loops, so enterNesting never sees them; the
 * tree they build is bounded here instead.
 *
 * @param at - Location reported when the limit is exceeded (the operator)
 * @throws ParseError when the tree is taller than maxDepth
 * @internal
 */
export function trackHeight(
  state: ParserState,
  node: UnaryExprNode | BinaryExprNode,
  at: SourceLocation
): void {
  const heightOf = (child: ExpressionNode): number =>
    state.heights.get(child) ?? 1;
  const childHeight =
    node.type === 'UnaryExpr'
      ? heightOf(node.operand)
      : Math.max(heightOf(node.left), heightOf(node.right));
  const height = childHeight + 1;

  if (height > state.maxDepth) {
    throw new ParseError(
      ERROR_IDS.NESTING_TOO_DEEP,
      { maxDepth: state.maxDepth },
      at
    );
  }
  state.heights.set(node, height);
}

// ============================================================
// ERROR HELPERS
// ============================================================

/**
 * Describe a token for error messages.
 * @internal
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.EOF:
      return 'end of input';
    case TOKEN_TYPES.NUMBER:
      return `number ${token.value}`;
    default:
      return `'${token.value}'`;
  }
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
