/**
 * Tree Printer
 * Renders an AST as nested boxes joined by box-drawing rails
 *
 * ```
 * └┬────┐
 *  │ +  │
 *  └──┬─┘
 *     ├┬────┐
 *     ││  1 │
 *     │└────┘
 *     └┬────┐
 *      │  2 │
 *      └────┘
 * ```
 */

import type { ExpressionNode } from '../types.js';
import { formatNumber } from './format.js';

function nodeLabel(node: ExpressionNode): string {
  switch (node.type) {
    case 'NumberLiteral':
      return formatNumber(node.value).padStart(2);
    case 'UnaryExpr':
    case 'BinaryExpr':
      return node.op.padEnd(2);
  }
}

function childrenOf(node: ExpressionNode): ExpressionNode[] {
  switch (node.type) {
    case 'NumberLiteral':
      return [];
    case 'UnaryExpr':
      return [node.operand];
    case 'BinaryExpr':
      return [node.left, node.right];
  }
}

function drawNode(
  node: ExpressionNode,
  prefix: string,
  hasNextSibling: boolean,
  lines: string[]
): void {
  const label = nodeLabel(node);
  const width = label.length + 2;
  const rail = hasNextSibling ? '│' : ' ';

  lines.push(`${prefix}${hasNextSibling ? '├' : '└'}┬${'─'.repeat(width)}┐`);
  lines.push(`${prefix}${rail}│ ${label} │`);

  const children = childrenOf(node);
  if (children.length === 0) {
    lines.push(`${prefix}${rail}└${'─'.repeat(width)}┘`);
    return;
  }

  lines.push(`${prefix}${rail}└──┬${'─'.repeat(width - 3)}┘`);
  const childPrefix = prefix + (hasNextSibling ? '│   ' : '    ');
  children.forEach((child, index) => {
    drawNode(child, childPrefix, index < children.length - 1, lines);
  });
}

/**
 * Render the AST as a box-drawing tree, one node per box.
 * Operators label their box, children hang below it; literals are leaves.
 */
export function renderTree(node: ExpressionNode): string {
  const lines: string[] = [];
  drawNode(node, '', false, lines);
  return lines.join('\n');
}
