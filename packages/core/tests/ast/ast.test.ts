/**
 * AST Utility Tests
 * Node construction, traversal, dependencies and formatting
 */

import { describe, expect, it } from 'vitest';
import {
  childrenOf,
  dependencies,
  type ExpressionNode,
  formatNode,
  OPERATORS,
  parseExpression,
  visitNode,
} from '../../src/index.js';
import { buildNode, NodeShapeError } from '../../src/ast/index.js';

const one: ExpressionNode = {
  type: 'Numeric',
  resultType: 'numeric',
  value: 1,
};

describe('buildNode', () => {
  it('rejects the wrong number of operands', () => {
    expect(() => buildNode(OPERATORS.add, [one])).toThrowError(
      new NodeShapeError('2', 1)
    );
  });

  it('names the offending operand of a type mismatch', () => {
    const text: ExpressionNode = {
      type: 'String',
      resultType: 'string',
      value: 'x',
    };
    try {
      buildNode(OPERATORS.subtract, [one, text]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(NodeShapeError);
      if (!(err instanceof NodeShapeError)) return;
      expect(err.expect).toBe('numeric or datetime');
      expect(err.actual).toBe('string');
      expect(err.child).toBe('right');
    }
  });

  it('builds an access node from a container and an index', () => {
    const node = buildNode({ type: 'AccessMarker', arity: 2 }, [one, one]);
    expect(node).toMatchObject({ type: 'Access', container: one, index: one });
  });
});

describe('visitNode', () => {
  it('visits children between enter and exit', () => {
    const events: string[] = [];
    visitNode(parseExpression('a + b'), {
      enter: (node) => events.push(`enter ${node.type}`),
      exit: (node) => events.push(`exit ${node.type}`),
    });
    expect(events).toEqual([
      'enter Operation',
      'enter Identifier',
      'exit Identifier',
      'enter Identifier',
      'exit Identifier',
      'exit Operation',
    ]);
  });

  it('passes the parent node', () => {
    const root = parseExpression('abs(x)');
    const parents: (ExpressionNode | null)[] = [];
    visitNode(root, { enter: (_node, parent) => parents.push(parent) });
    expect(parents).toEqual([null, root]);
  });
});

describe('childrenOf', () => {
  it('lists case children in source order', () => {
    const ast = parseExpression('CASE s WHEN 1 THEN 2 ELSE 3 END');
    expect(childrenOf(ast).map(formatNode)).toEqual(['s', '1', '2', '3']);
  });
});

describe('dependencies', () => {
  it('collects identifiers once, in first-seen order', () => {
    expect(
      dependencies(parseExpression('if(Total > 0, total, rate[idx])'))
    ).toEqual(['Total', 'rate', 'idx']);
  });

  it('returns nothing for literals', () => {
    expect(dependencies(parseExpression('1 + 2'))).toEqual([]);
  });
});

describe('formatNode', () => {
  it('quotes and escapes strings', () => {
    expect(
      formatNode({ type: 'String', resultType: 'string', value: "it's" })
    ).toBe("'it\\'s'");
  });

  it('prints negation, access and logic', () => {
    expect(formatNode(parseExpression('-a[1] or not(b)'))).toBe(
      '(-a[1] OR not(b))'
    );
  });

  it('prints null and logical literals', () => {
    expect(formatNode(parseExpression('x = null or false'))).toBe(
      '((x = null) OR false)'
    );
  });
});
