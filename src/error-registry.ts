/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime' | 'config';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  /** Input that triggers the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: ARITH-{category}{3-digit} (e.g., ARITH-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

/** Error IDs for programmatic handling */
export const ERROR_IDS = {
  // Lexer errors
  UNKNOWN_CHARACTER: 'ARITH-L001',
  MALFORMED_NUMBER: 'ARITH-L002',

  // Parse errors
  UNEXPECTED_TOKEN: 'ARITH-P001',
  MISSING_CLOSING_PAREN: 'ARITH-P002',
  TRAILING_TOKENS: 'ARITH-P003',
  INVALID_NUMBER: 'ARITH-P004',
  NESTING_TOO_DEEP: 'ARITH-P005',

  // Runtime errors
  DIVISION_BY_ZERO: 'ARITH-R001',
  MODULO_BY_ZERO: 'ARITH-R002',
  INTEGER_OVERFLOW: 'ARITH-R003',

  // Configuration errors
  INVALID_CONFIG: 'ARITH-C001',
} as const;

export type ErrorId = (typeof ERROR_IDS)[keyof typeof ERROR_IDS];

// ============================================================
// ERROR REGISTRY
// ============================================================

/** Error definitions keyed by error ID */
export type ErrorRegistry = ReadonlyMap<string, ErrorDefinition>;

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (ARITH-L0xx)
  {
    errorId: ERROR_IDS.UNKNOWN_CHARACTER,
    category: 'lexer',
    description: 'Unknown character',
    messageTemplate: "Unknown character '{char}'",
    cause:
      'The input contains a character that is not a digit, a decimal point, an operator, a parenthesis or whitespace.',
    resolution:
      'Remove the character. Only + - * / % ^ ( ) and numeric literals are recognized.',
    examples: [
      { description: 'Variable name in expression', code: '2 * x' },
      { description: 'Unsupported operator', code: '2 ** 3  # use ^' },
    ],
  },
  {
    errorId: ERROR_IDS.MALFORMED_NUMBER,
    category: 'lexer',
    description: 'Malformed number literal',
    messageTemplate: "Malformed number literal '{value}'",
    cause:
      'A numeric literal contains more than one decimal point, or is a lone decimal point.',
    resolution:
      'Write the literal with at most one decimal point and at least one digit.',
    examples: [
      { description: 'Two decimal points', code: '1.2.3' },
      { description: 'Lone decimal point', code: '1 + .' },
    ],
  },

  // Parse Errors (ARITH-P0xx)
  {
    errorId: ERROR_IDS.UNEXPECTED_TOKEN,
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Unexpected {found}, expected a number or (',
    cause:
      'An operand was required but an operator, a closing parenthesis or the end of input was found.',
    resolution: 'Supply the missing operand or remove the extra operator.',
    examples: [
      { description: 'Operator without right operand', code: '1 +' },
      { description: 'Doubled sign', code: '--3  # write -(-3)' },
    ],
  },
  {
    errorId: ERROR_IDS.MISSING_CLOSING_PAREN,
    category: 'parse',
    description: 'Missing closing parenthesis',
    messageTemplate:
      'Expected ) to close ( opened at column {openColumn}, found {found}',
    cause: 'A parenthesized expression is not followed by a matching ).',
    resolution: 'Add the closing parenthesis.',
    examples: [{ description: 'Unclosed group', code: '(1 + 2' }],
  },
  {
    errorId: ERROR_IDS.TRAILING_TOKENS,
    category: 'parse',
    description: 'Trailing tokens after expression',
    messageTemplate: 'Unexpected {found} after complete expression',
    cause: 'Input continues after a complete expression was parsed.',
    resolution:
      'Join the parts with an operator, or remove the trailing input.',
    examples: [
      { description: 'Two literals without operator', code: '1 2' },
      { description: 'Unbalanced closing parenthesis', code: '1 + 2)' },
    ],
  },
  {
    errorId: ERROR_IDS.INVALID_NUMBER,
    category: 'parse',
    description: 'Invalid number literal',
    messageTemplate: "Invalid number literal '{value}': {reason}",
    cause:
      'The literal does not convert to a finite number, or is fractional while integer mode is active.',
    resolution:
      'Use a smaller literal, or switch to float mode for fractional values.',
    examples: [{ description: 'Fraction in integer mode', code: '1.5 * 2' }],
  },
  {
    errorId: ERROR_IDS.NESTING_TOO_DEEP,
    category: 'parse',
    description: 'Expression nested too deeply',
    messageTemplate: 'Expression nesting exceeds maximum depth of {maxDepth}',
    cause:
      'Parentheses, signs or exponents are nested deeper than the configured limit.',
    resolution: 'Flatten the expression, or raise maxDepth.',
  },

  // Runtime Errors (ARITH-R0xx)
  {
    errorId: ERROR_IDS.DIVISION_BY_ZERO,
    category: 'runtime',
    description: 'Division by zero',
    messageTemplate: 'Division by zero',
    cause: 'The right operand of / evaluated to zero.',
    resolution: 'Guard the divisor so it is never zero.',
    examples: [
      { description: 'Literal zero divisor', code: '10 / 0' },
      { description: 'Computed zero divisor', code: '1 / (2 - 2)' },
    ],
  },
  {
    errorId: ERROR_IDS.MODULO_BY_ZERO,
    category: 'runtime',
    description: 'Modulo by zero',
    messageTemplate: 'Modulo by zero',
    cause: 'The right operand of % evaluated to zero.',
    resolution: 'Guard the divisor so it is never zero.',
    examples: [{ description: 'Literal zero divisor', code: '7 % 0' }],
  },
  {
    errorId: ERROR_IDS.INTEGER_OVERFLOW,
    category: 'runtime',
    description: 'Integer overflow',
    messageTemplate:
      "Integer overflow: result of '{op}' exceeds the safe integer range",
    cause:
      'In integer mode, an operation produced a value beyond 2^53 - 1 in magnitude, or no finite value at all.',
    resolution:
      'Keep intermediate results smaller, or switch to float mode for approximate results.',
    examples: [
      { description: 'Large power', code: '2 ^ 64' },
      {
        description: 'Product of large operands',
        code: '9007199254740991 * 2',
      },
    ],
  },

  // Configuration Errors (ARITH-C0xx)
  {
    errorId: ERROR_IDS.INVALID_CONFIG,
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause:
      'The configuration file is unreadable or holds unknown keys or values of the wrong type.',
    resolution: 'Fix the reported key in the configuration file.',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new Map(
  ERROR_DEFINITIONS.map(
    (definition) => [definition.errorId, definition] as const
  )
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Unknown character '{char}'", { char: "$" })
 * // Returns: "Unknown character '$'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      // Unclosed brace - return template unchanged
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
