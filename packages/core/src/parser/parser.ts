/**
 * Parser Class - Core
 *
 * Defines the Parser class: the driving loop, token dispatch and the
 * reduction engine. Token handlers are added via prototype extension from
 * separate modules, using TypeScript declaration merging for type safety.
 */

import type { ExpressionNode } from '../ast-nodes.js';
import {
  buildIdentifier,
  buildLeaf,
  buildNode,
  NIL,
  NodeShapeError,
} from '../ast/build.js';
import { ParseError, type ParseErrorReason } from '../error-classes.js';
import { createStandardRegistry } from '../functions/standard.js';
import { fixedArity, reducerLabel } from '../reducers.js';
import type { Token } from '../token-types.js';
import { CaseParser } from './case-parser.js';
import {
  createParserState,
  type FunctionLookup,
  type ParserOptions,
  type ParserState,
} from './state.js';

/**
 * Operator-precedence parser turning a classified token stream into one AST.
 *
 * Handlers are organized across multiple files:
 * - parser-operators.ts: operators, comparators, combinators (precedence)
 * - parser-functions.ts: function-call tokens
 * - parser-grouping.ts: parentheses and argument separators
 * - parser-access.ts: bracket access
 *
 * A Parser instance serves exactly one parse.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize('max(a, b) * 2'));
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  state: ParserState;

  private registry: FunctionLookup | undefined;
  private cases: CaseParser | undefined;

  constructor(
    tokens: readonly Token[],
    options: ParserOptions = {},
    depth = 0
  ) {
    this.registry = options.functionRegistry;
    this.state = createParserState(tokens, options, depth);
  }

  /** Function lookup, defaulting to the standard registry */
  get functionRegistry(): FunctionLookup {
    this.registry ??= createStandardRegistry();
    return this.registry;
  }

  get caseParser(): CaseParser {
    this.cases ??= new CaseParser(this);
    return this.cases;
  }

  /**
   * Parse the whole token stream into a single expression.
   * Empty input yields the Nil leaf.
   */
  parse(): ExpressionNode {
    const { input, output, operations, observability, depth } = this.state;

    if (input.length === 0) return NIL;

    let token = input.shift();
    while (token !== undefined) {
      this.state.current = token;
      observability.onToken?.({ token, depth });
      this.dispatch(token);
      token = input.shift();
    }

    this.state.current = null;
    while (operations.length > 0) {
      this.consume();
    }

    const result = output[0];
    if (output.length !== 1 || result === undefined) {
      throw this.error({ kind: 'invalid_statement' });
    }
    return result;
  }

  /**
   * Parse a token sub-sequence with a fresh parser sharing this one's
   * registry, case sensitivity and observability.
   */
  subParse(tokens: readonly Token[]): ExpressionNode {
    const parser = new Parser(
      tokens,
      {
        functionRegistry: this.functionRegistry,
        caseSensitive: this.state.caseSensitive,
        observability: this.state.observability,
      },
      this.state.depth + 1
    );
    return parser.parse();
  }

  /** Tokens not yet consumed, shared with the case sub-parser */
  get input(): Token[] {
    return this.state.input;
  }

  // ============================================================
  // REDUCTION ENGINE
  // ============================================================

  /**
   * Pop the top reducer with its operands and push the node they form.
   *
   * @param count - operand count for reducers without a fixed arity
   * @param closesAccess - set only by `]`, the one place an access marker
   *   may be reduced
   */
  consume(count = 2, closesAccess = false): void {
    const { operations, output, observability, depth } = this.state;
    const reducer = operations.pop();

    if (reducer === undefined) {
      throw this.error({ kind: 'invalid_statement' });
    }
    if (reducer.type === 'GroupMarker') {
      throw this.error({ kind: 'unbalanced_parenthesis' });
    }
    if (reducer.type === 'AccessMarker' && !closesAccess) {
      throw this.error({ kind: 'unbalanced_bracket' });
    }

    const operator = reducerLabel(reducer);
    const expect = fixedArity(reducer) ?? count;
    if (expect > output.length) {
      throw this.error({
        kind: 'too_few_operands',
        operator,
        expect,
        actual: output.length,
      });
    }

    const operands = output.splice(output.length - expect, expect);

    let node: ExpressionNode;
    try {
      node = buildNode(reducer, operands);
    } catch (err) {
      if (err instanceof NodeShapeError) {
        throw this.error({
          kind: 'node_invalid',
          operator,
          expect: err.expect,
          actual: err.actual,
          child: err.child,
        });
      }
      throw err;
    }

    output.push(node);
    observability.onReduce?.({ reducer, operands, node, depth });
  }

  // ============================================================
  // DISPATCH
  // ============================================================

  private dispatch(token: Token): void {
    const { output, caseSensitive } = this.state;

    switch (token.category) {
      case 'datetime':
      case 'numeric':
      case 'logical':
      case 'string':
      case 'null':
        output.push(buildLeaf(token));
        return;
      case 'identifier':
        output.push(buildIdentifier(token, caseSensitive));
        return;
      case 'operator':
      case 'comparator':
      case 'combinator':
        this.parseBinaryOperation(token);
        return;
      case 'function':
        this.parseFunction(token);
        return;
      case 'case':
        this.caseParser.parse(token, output);
        return;
      case 'access':
        this.parseAccess(token);
        return;
      case 'grouping':
        this.parseGrouping(token);
        return;
      default:
        // Reachable only with tokens built outside the type system
        throw this.unknownCategory(token);
    }
  }

  private unknownCategory(token: { readonly category: unknown }): ParseError {
    return this.error({
      kind: 'not_implemented_token_category',
      category: String(token.category),
    });
  }

  /** Build a ParseError located at the token being handled */
  error(reason: ParseErrorReason): ParseError {
    return new ParseError(reason, this.state.current?.span?.start);
  }
}
