/**
 * Parse Error Tests
 * One test group per error kind, with ids, payloads and locations
 */

import { describe, expect, it } from 'vitest';
import { parseExpression, type Token } from '../../src/index.js';
import { parseFailure, text, tok } from '../helpers/parse.js';

describe('Parse errors', () => {
  describe('too_few_operands', () => {
    it('names the function of a call with an empty last argument', () => {
      const err = parseFailure('max(a,)');
      expect(err.errorId).toBe('TALLY-P001');
      expect(err.reason).toEqual({
        kind: 'too_few_operands',
        operator: 'max',
        expect: 2,
        actual: 1,
      });
      expect(err.message).toBe(
        'max has too few operands (expected 2, got 1) at 1:7'
      );
    });

    it('reports a trailing binary operator', () => {
      const err = parseFailure('1 +');
      expect(err.message).toBe('add has too few operands (expected 2, got 1)');
      expect(err.location).toBeUndefined();
    });

    it('reports a dangling negation', () => {
      expect(parseFailure('-').reason).toEqual({
        kind: 'too_few_operands',
        operator: 'negate',
        expect: 1,
        actual: 0,
      });
    });
  });

  describe('node_invalid', () => {
    it('rejects a call with the wrong argument count', () => {
      const err = parseFailure('if(a, b)');
      expect(err.errorId).toBe('TALLY-P002');
      expect(err.message).toBe('if requires 3 operands, but got 2 at 1:8');
    });

    it('lists the accepted counts of a bounded call', () => {
      const err = parseFailure('round(1, 2, 3)');
      expect(err.reason).toEqual({
        kind: 'node_invalid',
        operator: 'round',
        expect: '1, 2',
        actual: 3,
        child: undefined,
      });
    });

    it('rejects a zero-argument call to a function needing arguments', () => {
      expect(parseFailure('abs()').message).toBe(
        'abs requires 1 operands, but got 0 at 1:4'
      );
    });

    it('rejects a string operand to arithmetic', () => {
      const err = parseFailure("'x' * 2");
      expect(err.reason).toEqual({
        kind: 'node_invalid',
        operator: 'multiply',
        expect: 'numeric',
        actual: 'string',
        child: 'left',
      });
      expect(err.message).toBe(
        'multiply requires numeric operands, but got string'
      );
    });

    it('rejects a numeric operand to and', () => {
      expect(parseFailure('1 and true').reason).toMatchObject({
        expect: 'logical',
        actual: 'numeric',
        child: 'left',
      });
    });

    it('accepts datetime operands to addition', () => {
      expect(parseExpression('2024-01-31 + 1')).toMatchObject({
        type: 'Operation',
        resultType: 'unknown',
      });
    });
  });

  describe('undefined_function', () => {
    it('names the unknown function', () => {
      const err = parseFailure('median(1)');
      expect(err.errorId).toBe('TALLY-P003');
      expect(err.message).toBe('Undefined function median at 1:1');
    });
  });

  describe('unbalanced_bracket', () => {
    it('rejects an unclosed bracket', () => {
      const err = parseFailure('prices[index[1]');
      expect(err.errorId).toBe('TALLY-P004');
      expect(err.kind).toBe('unbalanced_bracket');
    });

    it('rejects a closing bracket without an opening one', () => {
      expect(parseFailure('prices]').message).toBe('Unbalanced bracket at 1:7');
    });

    it('rejects a bracket closing a parenthesis', () => {
      expect(parseFailure('(a]').kind).toBe('unbalanced_bracket');
    });
  });

  describe('unbalanced_parenthesis', () => {
    it('rejects an unclosed parenthesis', () => {
      const err = parseFailure('((a + b) * c');
      expect(err.errorId).toBe('TALLY-P005');
      expect(err.message).toBe('Unbalanced parenthesis');
    });

    it('rejects a closing parenthesis without an opening one', () => {
      expect(parseFailure('(a + b))').message).toBe(
        'Unbalanced parenthesis at 1:8'
      );
    });

    it('rejects a parenthesis closing a bracket', () => {
      expect(parseFailure('a[1)').kind).toBe('unbalanced_parenthesis');
    });

    it('rejects an unclosed argument list', () => {
      expect(parseFailure('max(a, b').kind).toBe('unbalanced_parenthesis');
    });
  });

  describe('unbalanced delimiters in a mixed expression', () => {
    it('parses the balanced form', () => {
      expect(text('(a + b) * c[i + 1]')).toBe('((a + b) * c[(i + 1)])');
    });

    it('reports the dropped parenthesis', () => {
      expect(parseFailure('(a + b * c[i + 1]').kind).toBe(
        'unbalanced_parenthesis'
      );
    });

    it('reports the dropped bracket', () => {
      expect(parseFailure('(a + b) * c[i + 1').kind).toBe(
        'unbalanced_bracket'
      );
    });
  });

  describe('unknown_grouping_token', () => {
    it('rejects grouping values outside open, close and comma', () => {
      const err = parseFailure([
        tok.num(1),
        { category: 'grouping', value: 'semicolon' },
      ]);
      expect(err.errorId).toBe('TALLY-P006');
      expect(err.message).toBe('Unknown grouping token semicolon');
    });
  });

  describe('not_implemented_token_category', () => {
    it('rejects a category the parser has no handler for', () => {
      const tokens: Token[] = JSON.parse(
        '[{ "category": "hexadecimal", "value": "ff" }]'
      );
      const err = parseFailure(tokens);
      expect(err.errorId).toBe('TALLY-P007');
      expect(err.message).toBe(
        'Not implemented for tokens of category hexadecimal'
      );
    });
  });

  describe('invalid_statement', () => {
    it('rejects two adjacent values', () => {
      const err = parseFailure('1 2');
      expect(err.errorId).toBe('TALLY-P008');
      expect(err.message).toBe('Invalid statement');
    });
  });

  describe('unknown_access_token', () => {
    it('rejects access values outside lbracket and rbracket', () => {
      const err = parseFailure([
        tok.id('a'),
        { category: 'access', value: 'lbrace' },
      ]);
      expect(err.errorId).toBe('TALLY-P010');
      expect(err.message).toBe('Unknown access token lbrace');
    });
  });

  describe('error locations', () => {
    it('points at the start of the offending token on later lines', () => {
      const err = parseFailure('a +\n  median(b)');
      expect(err.location).toEqual({ line: 2, column: 3, offset: 6 });
    });
  });
});
