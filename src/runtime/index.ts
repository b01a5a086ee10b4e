/**
 * arithmo Runtime
 * Evaluation of parsed expressions
 */

export { calculate, evaluate } from './core/evaluate.js';
export { createEvalContext } from './core/context.js';
export { Evaluator, toInteger } from './core/evaluator.js';
export type {
  CalculateOptions,
  CalculationFailure,
  CalculationPhase,
  CalculationResult,
  CalculationSuccess,
  ErrorEvent,
  EvalContext,
  EvaluateEvent,
  EvaluateOptions,
  ObservabilityCallbacks,
  ParseEvent,
  TokenizeEvent,
} from './core/types.js';
