/**
 * Standard Functions
 * Descriptors registered by default when no registry is supplied
 */

import { FunctionRegistry, type FunctionDescriptor } from './registry.js';

export const STANDARD_FUNCTIONS: readonly FunctionDescriptor[] = [
  // Logic
  {
    name: 'if',
    minArity: 3,
    maxArity: 3,
    resultType: 'unknown',
    description: 'Returns the second argument when the first is true, else the third',
  },
  { name: 'not', minArity: 1, maxArity: 1, resultType: 'logical' },
  { name: 'and', minArity: 1, maxArity: null, resultType: 'logical' },
  { name: 'or', minArity: 1, maxArity: null, resultType: 'logical' },
  { name: 'xor', minArity: 1, maxArity: null, resultType: 'logical' },
  {
    name: 'switch',
    minArity: 3,
    maxArity: null,
    resultType: 'unknown',
    description: 'Matches a value against value/result pairs with optional default',
  },

  // Numeric
  { name: 'round', minArity: 1, maxArity: 2, resultType: 'numeric' },
  { name: 'roundup', minArity: 1, maxArity: 2, resultType: 'numeric' },
  { name: 'rounddown', minArity: 1, maxArity: 2, resultType: 'numeric' },
  { name: 'abs', minArity: 1, maxArity: 1, resultType: 'numeric' },
  { name: 'min', minArity: 1, maxArity: null, resultType: 'numeric' },
  { name: 'max', minArity: 1, maxArity: null, resultType: 'numeric' },
  { name: 'sum', minArity: 1, maxArity: null, resultType: 'numeric' },
  { name: 'avg', minArity: 1, maxArity: null, resultType: 'numeric' },
  { name: 'count', minArity: 0, maxArity: null, resultType: 'numeric' },

  // String
  { name: 'concat', minArity: 1, maxArity: null, resultType: 'string' },
  { name: 'left', minArity: 2, maxArity: 2, resultType: 'string' },
  { name: 'right', minArity: 2, maxArity: 2, resultType: 'string' },
  { name: 'mid', minArity: 3, maxArity: 3, resultType: 'string' },
  { name: 'len', minArity: 1, maxArity: 1, resultType: 'numeric' },
  { name: 'find', minArity: 2, maxArity: 2, resultType: 'numeric' },
  { name: 'substitute', minArity: 3, maxArity: 3, resultType: 'string' },
  { name: 'contains', minArity: 2, maxArity: 2, resultType: 'logical' },
  { name: 'upper', minArity: 1, maxArity: 1, resultType: 'string' },
  { name: 'lower', minArity: 1, maxArity: 1, resultType: 'string' },
];

/** Fresh registry holding the standard functions */
export function createStandardRegistry(): FunctionRegistry {
  return new FunctionRegistry(STANDARD_FUNCTIONS);
}
