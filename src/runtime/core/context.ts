/**
 * Evaluation Context
 */

import type { EvalContext, EvaluateOptions } from './types.js';

export function createEvalContext(options: EvaluateOptions = {}): EvalContext {
  return {
    mode: options.mode ?? 'float',
    observability: options.observability ?? {},
  };
}
