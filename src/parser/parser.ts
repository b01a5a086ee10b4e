/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ExpressionNode, Token } from '../types.js';
import { ERROR_IDS, ParseError } from '../types.js';
import {
  type ParserState,
  type ParserStateOptions,
  createParserState,
  current,
  describeToken,
  isAtEnd,
} from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-expr.ts: Precedence chain (additive, multiplicative, unary, power)
 * - parser-literals.ts: Primaries (number literals, parenthesized groups)
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize('2 + 3 * 4'));
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens, position and nesting depth */
  state: ParserState;

  constructor(tokens: Token[], options?: ParserStateOptions) {
    this.state = createParserState(tokens, options);
  }

  /**
   * Parse the complete token stream into one expression.
   * @throws ParseError if tokens remain after the expression
   */
  parse(): ExpressionNode {
    const expression = this.parseExpression();

    if (!isAtEnd(this.state)) {
      const token = current(this.state);
      throw new ParseError(
        ERROR_IDS.TRAILING_TOKENS,
        { found: describeToken(token) },
        token.span.start
      );
    }

    return expression;
  }
}
