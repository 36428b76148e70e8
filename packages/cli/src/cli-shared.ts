/**
 * CLI Shared Utilities
 * Output formatting, error formatting and tracing for tally-parse
 */

import * as yaml from 'yaml';
import {
  describeToken,
  type ExpressionNode,
  formatNode,
  type ParserObservability,
  reducerLabel,
  TallyError,
  type Token,
} from '@tally-expr/core';
import type { OutputFormat } from './config.js';

export { VERSION } from '@tally-expr/core';

/** Spans are positional noise in printed trees and token lists */
function omitSpans(key: unknown, value: unknown): unknown {
  return key === 'span' ? undefined : value;
}

function serialize(value: unknown, format: 'json' | 'yaml'): string {
  if (format === 'yaml') {
    return yaml.stringify(value, omitSpans).trimEnd();
  }
  return JSON.stringify(value, omitSpans, 2);
}

/**
 * Convert a parsed expression to printable text
 *
 * @param node - Root of the parsed expression
 * @param format - json and yaml print the node tree, text the canonical
 *   expression
 */
export function formatOutput(
  node: ExpressionNode,
  format: OutputFormat
): string {
  if (format === 'text') return formatNode(node);
  return serialize(node, format);
}

/** One `category value` line per token in text format */
export function formatTokens(
  tokens: readonly Token[],
  format: OutputFormat
): string {
  if (format !== 'text') return serialize(tokens, format);
  return tokens
    .map((token) => `${token.category} ${JSON.stringify(token.value)}`)
    .join('\n');
}

/** One name per line in text format */
export function formatDependencies(
  names: readonly string[],
  format: OutputFormat
): string {
  if (format !== 'text') return serialize(names, format);
  return names.join('\n');
}

/**
 * Format error for stderr output
 *
 * Tally errors print as `[errorId] message`. When the source text is known
 * and the error has a location, the offending line follows with a caret
 * under the column.
 *
 * @example
 * ```
 * [TALLY-P005] Unbalanced parenthesis at 1:7
 *   1 | (a + b))
 *     |       ^
 * ```
 */
export function formatError(err: Error, source?: string): string {
  if (!(err instanceof TallyError)) {
    return err.message;
  }

  const header = `[${err.errorId}] ${err.message}`;
  const location = err.location;
  if (source === undefined || location === undefined) {
    return header;
  }

  const content = source.split('\n')[location.line - 1];
  if (content === undefined) {
    return header;
  }

  const lineNumber = String(location.line);
  const padding = ' '.repeat(lineNumber.length);
  const caret = ' '.repeat(Math.max(location.column - 1, 0)) + '^';
  return [
    header,
    `  ${lineNumber} | ${content}`,
    `  ${padding} | ${caret}`,
  ].join('\n');
}

/**
 * Observability callbacks writing one line per token and per reduction.
 * Nested CASE segments are indented by their depth.
 */
export function createTrace(
  write: (line: string) => void
): ParserObservability {
  const indent = (depth: number): string => '  '.repeat(depth);
  return {
    onToken: ({ token, depth }) => {
      write(`${indent(depth)}token ${token.category} ${describeToken(token)}`);
    },
    onReduce: ({ reducer, node, depth }) => {
      const label = reducerLabel(reducer);
      write(`${indent(depth)}reduce ${label} => ${formatNode(node)}`);
    },
  };
}
