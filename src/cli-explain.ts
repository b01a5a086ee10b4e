/**
 * CLI Error Explanation
 * Renders registry documentation for --explain
 */

import { ERROR_REGISTRY } from './types.js';

const ERROR_ID_PATTERN = /^ARITH-[LPRC]\d{3}$/;

/**
 * Render the description, cause, resolution and examples of an error.
 *
 * @returns Formatted documentation, or null if errorId is malformed or unknown
 *
 * @example
 * explainError('ARITH-R001')
 * // 'ARITH-R001: Division by zero\n\nCause:\n  ...'
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [
    `${definition.errorId}: ${definition.description}`,
    '',
  ];

  if (definition.cause) {
    sections.push('Cause:', `  ${definition.cause}`, '');
  }

  if (definition.resolution) {
    sections.push('Resolution:', `  ${definition.resolution}`, '');
  }

  if (definition.examples && definition.examples.length > 0) {
    sections.push('Examples:');
    for (const example of definition.examples) {
      sections.push(`  ${example.description}`, `    ${example.code}`, '');
    }
  }

  return sections.join('\n').trimEnd();
}
