/**
 * Function Registry Tests
 */

import { describe, expect, it } from 'vitest';
import {
  acceptsArity,
  createStandardRegistry,
  describeArity,
  type FunctionDescriptor,
  FunctionRegistry,
  STANDARD_FUNCTIONS,
} from '../../src/index.js';
import { parseFailure, text } from '../helpers/parse.js';

describe('FunctionRegistry', () => {
  it('registers the standard functions by default', () => {
    const registry = createStandardRegistry();
    expect(registry.size).toBe(25);
    expect(registry.size).toBe(STANDARD_FUNCTIONS.length);
    expect(registry.names()[0]).toBe('if');
  });

  it('looks names up case-insensitively', () => {
    const registry = createStandardRegistry();
    expect(registry.get('MAX')?.name).toBe('max');
    expect(registry.has('Substitute')).toBe(true);
    expect(registry.has('median')).toBe(false);
  });

  it('rejects inconsistent arity bounds', () => {
    const registry = new FunctionRegistry();
    expect(() =>
      registry.register({
        name: 'bad',
        minArity: 2,
        maxArity: 1,
        resultType: 'numeric',
      })
    ).toThrowError('Function bad: maxArity must be an integer >= minArity');
  });

  it('rejects an empty name', () => {
    expect(
      () =>
        new FunctionRegistry([
          { name: ' ', minArity: 0, maxArity: 0, resultType: 'unknown' },
        ])
    ).toThrowError(TypeError);
  });

  it('resolves calls through a custom registry', () => {
    const registry = createStandardRegistry().register({
      name: 'median',
      minArity: 1,
      maxArity: null,
      resultType: 'numeric',
    });
    expect(text('median(a, b)', { functionRegistry: registry })).toBe(
      'median(a, b)'
    );
  });

  it('only knows what the custom registry holds', () => {
    const registry = new FunctionRegistry();
    expect(parseFailure('max(1)', { functionRegistry: registry }).kind).toBe(
      'undefined_function'
    );
  });
});

describe('arity helpers', () => {
  const registry = createStandardRegistry();

  it('describes fixed, bounded and variadic arities', () => {
    const arityOf = (name: string): string => {
      const fn = registry.get(name);
      if (fn === undefined) throw new Error(`missing ${name}`);
      return describeArity(fn);
    };
    expect(arityOf('if')).toBe('3');
    expect(arityOf('round')).toBe('1, 2');
    expect(arityOf('max')).toBe('at least 1');
  });

  it('checks counts against the bounds', () => {
    const count: FunctionDescriptor = {
      name: 'count',
      minArity: 0,
      maxArity: null,
      resultType: 'numeric',
    };
    const left: FunctionDescriptor = {
      name: 'left',
      minArity: 2,
      maxArity: 2,
      resultType: 'string',
    };
    expect(acceptsArity(count, 0)).toBe(true);
    expect(acceptsArity(count, 40)).toBe(true);
    expect(acceptsArity(left, 1)).toBe(false);
    expect(acceptsArity(left, 3)).toBe(false);
  });
});
