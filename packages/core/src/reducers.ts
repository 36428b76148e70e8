/**
 * Reducers
 * Entries of the parser's operator stack
 */

import type { FunctionDescriptor } from './functions/registry.js';
import type { OperatorSymbol } from './token-types.js';

export type Associativity = 'left' | 'right';

/** Binary or unary operator with fixed precedence and arity */
export interface OperatorReducer {
  readonly type: 'Operator';
  readonly op: OperatorSymbol;
  readonly precedence: number;
  readonly associativity: Associativity;
  readonly arity: 1 | 2;
}

/** Pending call; its arity comes from the arity-tracking stack */
export interface FunctionCallReducer {
  readonly type: 'FunctionCall';
  readonly fn: FunctionDescriptor;
}

/** Bounds a parenthesis region; popped explicitly, never reduced */
export interface GroupMarker {
  readonly type: 'GroupMarker';
}

/** Bounds a bracket region; reduced into an Access node by its closing ] */
export interface AccessMarker {
  readonly type: 'AccessMarker';
  readonly arity: 2;
}

export type Reducer =
  | OperatorReducer
  | FunctionCallReducer
  | GroupMarker
  | AccessMarker;

export const GROUP_MARKER: GroupMarker = { type: 'GroupMarker' };
export const ACCESS_MARKER: AccessMarker = { type: 'AccessMarker', arity: 2 };

function operator(
  op: OperatorSymbol,
  precedence: number,
  associativity: Associativity = 'left',
  arity: 1 | 2 = 2
): OperatorReducer {
  return { type: 'Operator', op, precedence, associativity, arity };
}

/** Closed operator table covering every operator, comparator and combinator */
export const OPERATORS: Readonly<Record<OperatorSymbol, OperatorReducer>> = {
  or: operator('or', 1),
  and: operator('and', 2),

  lt: operator('lt', 5),
  gt: operator('gt', 5),
  le: operator('le', 5),
  ge: operator('ge', 5),
  ne: operator('ne', 5),
  eq: operator('eq', 5),

  bitor: operator('bitor', 6),
  bitand: operator('bitand', 7),

  add: operator('add', 10),
  subtract: operator('subtract', 10),

  multiply: operator('multiply', 20),
  divide: operator('divide', 20),
  mod: operator('mod', 20),

  pow: operator('pow', 30, 'right'),
  negate: operator('negate', 40, 'right', 1),
};

/** Fixed operand count, or null when the caller decides */
export function fixedArity(reducer: Reducer): number | null {
  switch (reducer.type) {
    case 'Operator':
    case 'AccessMarker':
      return reducer.arity;
    case 'FunctionCall':
    case 'GroupMarker':
      return null;
  }
}

/** Name used for a reducer in error messages and traces */
export function reducerLabel(reducer: Reducer): string {
  switch (reducer.type) {
    case 'Operator':
      return reducer.op;
    case 'FunctionCall':
      return reducer.fn.name;
    case 'GroupMarker':
      return 'grouping';
    case 'AccessMarker':
      return 'access';
  }
}
