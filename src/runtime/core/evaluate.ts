/**
 * Evaluation Entry Points
 */

import { tokenize } from '../../lexer/index.js';
import { parseTokens } from '../../parser/index.js';
import type { ExpressionNode, Token } from '../../types.js';
import { ArithError, DEFAULT_MAX_DEPTH } from '../../types.js';
import { createEvalContext } from './context.js';
import { Evaluator } from './evaluator.js';
import type {
  CalculateOptions,
  CalculationPhase,
  CalculationResult,
  EvaluateOptions,
} from './types.js';

/**
 * Evaluate an AST to a number.
 *
 * @throws RuntimeError on division or modulo by zero
 *
 * @example
 * ```typescript
 * evaluate(parse('2 + 3 * 4')); // 14
 * ```
 */
export function evaluate(
  node: ExpressionNode,
  options: EvaluateOptions = {}
): number {
  return new Evaluator(createEvalContext(options)).evaluate(node);
}

/**
 * Run the full pipeline (tokenize, parse, evaluate) on one line of input.
 *
 * Errors raised by the pipeline are returned, not thrown. Anything that is
 * not an ArithError (including exceptions from observability callbacks)
 * propagates to the caller.
 *
 * @example
 * ```typescript
 * const result = calculate('10 / 0');
 * if (!result.success) {
 *   console.log(result.error.errorId); // 'ARITH-R001'
 * }
 * ```
 */
export function calculate(
  source: string,
  options: CalculateOptions = {}
): CalculationResult {
  const ctx = createEvalContext(options);
  const { observability } = ctx;
  let phase: CalculationPhase = 'lex';

  try {
    const tokens: Token[] = tokenize(source);
    observability.onTokenize?.({ tokens });

    phase = 'parse';
    const ast = parseTokens(tokens, {
      mode: ctx.mode,
      maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    });
    observability.onParse?.({ ast });

    phase = 'evaluate';
    const value = new Evaluator(ctx).evaluate(ast);

    return { success: true, value, ast, tokens };
  } catch (error) {
    if (!(error instanceof ArithError)) {
      throw error;
    }
    observability.onError?.({ error, phase });
    return { success: false, error, phase };
  }
}
