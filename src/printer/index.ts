/**
 * arithmo Printer
 * Diagnostic renderings of the AST
 */

export { formatExpression, formatNumber } from './format.js';
export { renderTree } from './tree.js';
