/**
 * Tally Module
 * Exports lexer, parser, AST utilities and the function registry
 */

export {
  createLexerState,
  type LexerState,
  nextToken,
  tokenize,
} from './lexer/index.js';
export {
  CaseParser,
  type CaseParserHost,
  type FunctionLookup,
  parse,
  parseExpression,
  Parser,
  type ParserObservability,
  type ParserOptions,
  type ReduceEvent,
  type TokenEvent,
} from './parser/index.js';
export { VERSION, VERSION_INFO, type VersionInfo } from './version.js';

// ============================================================
// TOKENS AND NODES
// ============================================================
export * from './token-types.js';
export type * from './ast-nodes.js';
export {
  ACCESS_MARKER,
  type AccessMarker,
  type Associativity,
  type FunctionCallReducer,
  GROUP_MARKER,
  type GroupMarker,
  OPERATORS,
  type OperatorReducer,
  type Reducer,
  reducerLabel,
} from './reducers.js';

// ============================================================
// AST UTILITIES
// ============================================================
export {
  childrenOf,
  dependencies,
  formatNode,
  identifiersEqual,
  NIL,
  type NodeVisitor,
  visitNode,
} from './ast/index.js';

// ============================================================
// FUNCTIONS
// ============================================================
export {
  acceptsArity,
  createStandardRegistry,
  describeArity,
  type FunctionDescriptor,
  FunctionRegistry,
  STANDARD_FUNCTIONS,
} from './functions/index.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  LEXER_ERROR_IDS,
  LexerError,
  type LexerErrorKind,
  type LexerErrorReason,
  PARSE_ERROR_IDS,
  ParseError,
  type ParseErrorKind,
  type ParseErrorReason,
  TallyError,
  type TallyErrorData,
} from './error-classes.js';
