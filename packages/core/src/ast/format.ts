/**
 * Canonical expression text.
 * Every binary operation is parenthesized so the tree shape is visible.
 */

import type { ExpressionNode, OperationNode } from '../ast-nodes.js';

const OPERATOR_TEXT: Readonly<Record<OperationNode['operator'], string>> = {
  add: '+',
  subtract: '-',
  multiply: '*',
  divide: '/',
  mod: '%',
  pow: '^',
  bitor: '|',
  bitand: '&',
  lt: '<',
  gt: '>',
  le: '<=',
  ge: '>=',
  ne: '!=',
  eq: '=',
  and: 'AND',
  or: 'OR',
};

function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

export function formatNode(node: ExpressionNode): string {
  switch (node.type) {
    case 'Nil':
      return 'null';
    case 'Numeric':
      return String(node.value);
    case 'Logical':
      return node.value ? 'true' : 'false';
    case 'String':
      return quote(node.value);
    case 'DateTime':
      return node.value;
    case 'Identifier':
      return node.name;
    case 'Operation': {
      const left = formatNode(node.left);
      const right = formatNode(node.right);
      return `(${left} ${OPERATOR_TEXT[node.operator]} ${right})`;
    }
    case 'Negation':
      return `-${formatNode(node.operand)}`;
    case 'Function':
      return `${node.name}(${node.args.map(formatNode).join(', ')})`;
    case 'Access':
      return `${formatNode(node.container)}[${formatNode(node.index)}]`;
    case 'Case': {
      const parts = ['CASE'];
      if (node.switch) parts.push(formatNode(node.switch));
      for (const branch of node.branches) {
        parts.push(
          'WHEN',
          formatNode(branch.when),
          'THEN',
          formatNode(branch.then)
        );
      }
      if (node.else) parts.push('ELSE', formatNode(node.else));
      parts.push('END');
      return parts.join(' ');
    }
  }
}
