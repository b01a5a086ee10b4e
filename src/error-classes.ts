/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation, SourceSpan } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ArithErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/** Look up errorId and verify it belongs to the expected category */
function lookupDefinition(
  errorId: string,
  category: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all arithmo errors.
 * Provides structured data for host applications to format as needed.
 */
export class ArithError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: ArithErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'ArithError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): ArithErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ArithErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Lexical errors: unknown characters and malformed literals */
export class LexerError extends ArithError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    const definition = lookupDefinition(errorId, 'lexer');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'LexerError';
  }
}

/** Parse-time errors */
export class ParseError extends ArithError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    const definition = lookupDefinition(errorId, 'parse');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'ParseError';
  }
}

/** Evaluation errors */
export class RuntimeError extends ArithError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation
  ) {
    const definition = lookupDefinition(errorId, 'runtime');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    errorId: string,
    node: { span: SourceSpan },
    context: Record<string, unknown> = {}
  ): RuntimeError {
    return new RuntimeError(errorId, context, node.span.start);
  }
}

/** Configuration loading and validation errors */
export class ConfigError extends ArithError {
  constructor(errorId: string, context: Record<string, unknown>) {
    const definition = lookupDefinition(errorId, 'config');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      context,
    });
    this.name = 'ConfigError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create the error class matching the errorId's registry category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('ARITH-R001', {}, location)
 * // RuntimeError: "Division by zero at 1:3"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): ArithError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  switch (definition.category) {
    case 'lexer':
    case 'parse': {
      if (!location) {
        throw new TypeError(`Error ${errorId} requires a source location`);
      }
      return definition.category === 'lexer'
        ? new LexerError(errorId, context, location)
        : new ParseError(errorId, context, location);
    }
    case 'runtime':
      return new RuntimeError(errorId, context, location);
    case 'config':
      return new ConfigError(errorId, context);
  }
}
