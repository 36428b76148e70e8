/**
 * Operator and Keyword Tables
 */

import type {
  AccessValue,
  CaseValue,
  CombinatorValue,
  ComparatorValue,
  GroupingValue,
  OperatorValue,
} from '../token-types.js';

/** Symbols that may be written with two characters, checked first */
export const TWO_CHAR_OPERATORS = [
  '<=',
  '>=',
  '!=',
  '<>',
  '==',
  '&&',
  '||',
] as const;

export const SINGLE_CHAR_OPERATORS = [
  '+',
  '-',
  '*',
  '/',
  '^',
  '%',
  '|',
  '&',
  '<',
  '>',
  '=',
  '(',
  ')',
  ',',
  '[',
  ']',
] as const;

export type OperatorText =
  | (typeof TWO_CHAR_OPERATORS)[number]
  | (typeof SINGLE_CHAR_OPERATORS)[number];

/** Classified form of each operator symbol; '-' is resolved by context */
export type SymbolClass =
  | { readonly category: 'operator'; readonly value: OperatorValue }
  | { readonly category: 'comparator'; readonly value: ComparatorValue }
  | { readonly category: 'combinator'; readonly value: CombinatorValue }
  | { readonly category: 'grouping'; readonly value: GroupingValue }
  | { readonly category: 'access'; readonly value: AccessValue };

export const SYMBOLS: Readonly<Record<OperatorText, SymbolClass>> = {
  '+': { category: 'operator', value: 'add' },
  '-': { category: 'operator', value: 'subtract' },
  '*': { category: 'operator', value: 'multiply' },
  '/': { category: 'operator', value: 'divide' },
  '^': { category: 'operator', value: 'pow' },
  '%': { category: 'operator', value: 'mod' },
  '|': { category: 'operator', value: 'bitor' },
  '&': { category: 'operator', value: 'bitand' },
  '<': { category: 'comparator', value: 'lt' },
  '>': { category: 'comparator', value: 'gt' },
  '<=': { category: 'comparator', value: 'le' },
  '>=': { category: 'comparator', value: 'ge' },
  '!=': { category: 'comparator', value: 'ne' },
  '<>': { category: 'comparator', value: 'ne' },
  '=': { category: 'comparator', value: 'eq' },
  '==': { category: 'comparator', value: 'eq' },
  '&&': { category: 'combinator', value: 'and' },
  '||': { category: 'combinator', value: 'or' },
  '(': { category: 'grouping', value: 'open' },
  ')': { category: 'grouping', value: 'close' },
  ',': { category: 'grouping', value: 'comma' },
  '[': { category: 'access', value: 'lbracket' },
  ']': { category: 'access', value: 'rbracket' },
};

/** Word keywords, matched case-insensitively */
export type KeywordClass =
  | { readonly category: 'logical'; readonly value: boolean }
  | { readonly category: 'null'; readonly value: null }
  | { readonly category: 'combinator'; readonly value: CombinatorValue }
  | { readonly category: 'case'; readonly value: CaseValue };

export const KEYWORDS: ReadonlyMap<string, KeywordClass> = new Map<
  string,
  KeywordClass
>([
  ['true', { category: 'logical', value: true }],
  ['false', { category: 'logical', value: false }],
  ['null', { category: 'null', value: null }],
  ['and', { category: 'combinator', value: 'and' }],
  ['or', { category: 'combinator', value: 'or' }],
  ['case', { category: 'case', value: 'open' }],
  ['when', { category: 'case', value: 'when' }],
  ['then', { category: 'case', value: 'then' }],
  ['else', { category: 'case', value: 'else' }],
  ['end', { category: 'case', value: 'close' }],
]);
