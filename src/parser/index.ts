/**
 * arithmo Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ExpressionNode, ParseOptions, Token } from '../types.js';
import { DEFAULT_MAX_DEPTH } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse an already-tokenized expression.
 *
 * @param tokens - Token stream ending with EOF
 * @throws ParseError on the first syntax error
 */
export function parseTokens(
  tokens: Token[],
  options: ParseOptions = {}
): ExpressionNode {
  const parser = new Parser(tokens, {
    mode: options.mode ?? 'float',
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
  });
  return parser.parse();
}

/**
 * Parse arithmetic source text into an AST.
 *
 * Throws LexerError or ParseError on the first error.
 *
 * @example
 * ```typescript
 * const ast = parse('2 + 3 * 4');
 * // { type: 'BinaryExpr', op: '+', left: 2, right: { op: '*', ... } }
 * ```
 */
export function parse(
  source: string,
  options: ParseOptions = {}
): ExpressionNode {
  return parseTokens(tokenize(source), options);
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
