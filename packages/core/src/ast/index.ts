/**
 * AST Module
 * Node construction, traversal and formatting
 */

export {
  buildIdentifier,
  buildLeaf,
  buildNode,
  type BuildableReducer,
  NIL,
  NodeShapeError,
} from './build.js';
export { formatNode } from './format.js';
export {
  childrenOf,
  dependencies,
  identifiersEqual,
  type NodeVisitor,
  visitNode,
} from './visitor.js';
