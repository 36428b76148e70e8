#!/usr/bin/env node
/**
 * CLI Parse Entry Point
 *
 * Implements main(), parseArgs() and runParse() for the tally-parse binary.
 * Prints the AST, token stream or dependencies of one expression.
 */

import * as fs from 'fs';
import {
  dependencies,
  parse,
  type ParserOptions,
  tokenize,
} from '@tally-expr/core';
import {
  createTrace,
  formatDependencies,
  formatError,
  formatOutput,
  formatTokens,
  VERSION,
} from './cli-shared.js';
import {
  createDefaultConfig,
  isOutputFormat,
  loadConfig,
  OUTPUT_FORMATS,
  type OutputFormat,
  type ParseConfig,
} from './config.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'parse';
      /** Expression text, or '-' for stdin */
      expression: string;
      format: OutputFormat | undefined;
      caseSensitive: boolean | undefined;
      tokens: boolean;
      deps: boolean;
      trace: boolean;
    }
  | { mode: 'help' | 'version' };

const KNOWN_FLAGS = [
  '--help',
  '-h',
  '--version',
  '-v',
  '--format',
  '--tokens',
  '--deps',
  '--case-sensitive',
  '--trace',
];

/**
 * Parse command-line arguments into structured command
 *
 * Positional arguments are joined with spaces, so unquoted expressions work.
 * Arguments after `--` are always positional.
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const separator = argv.indexOf('--');
  const options = separator === -1 ? argv : argv.slice(0, separator);
  const rest = separator === -1 ? [] : argv.slice(separator + 1);

  if (options.includes('--help') || options.includes('-h')) {
    return { mode: 'help' };
  }
  if (options.includes('--version') || options.includes('-v')) {
    return { mode: 'version' };
  }

  let format: OutputFormat | undefined;
  const positional: string[] = [];

  for (let i = 0; i < options.length; i++) {
    const arg = options[i];
    if (arg === undefined) continue;

    if (arg === '--format') {
      const value = options[i + 1];
      if (!isOutputFormat(value)) {
        throw new Error(
          `Invalid --format value: ${value ?? ''}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`
        );
      }
      format = value;
      i++;
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      if (!KNOWN_FLAGS.includes(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      continue;
    }

    positional.push(arg);
  }

  positional.push(...rest);
  if (positional.length === 0) {
    throw new Error('Missing expression argument');
  }

  return {
    mode: 'parse',
    expression: positional.join(' '),
    format,
    caseSensitive: options.includes('--case-sensitive') ? true : undefined,
    tokens: options.includes('--tokens'),
    deps: options.includes('--deps'),
    trace: options.includes('--trace'),
  };
}

/** Streams and input used by runParse */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): string;
}

/**
 * Tokenize and parse one expression and print the requested view
 *
 * Flags override the configuration file. Errors are written to stderr.
 *
 * @returns Process exit code: 0 on success, 1 on error
 */
export function runParse(
  args: Extract<ParsedArgs, { mode: 'parse' }>,
  config: ParseConfig,
  io: CliIO
): number {
  const format = args.format ?? config.format;
  const source =
    args.expression === '-' ? io.readStdin().trim() : args.expression;

  try {
    const tokens = tokenize(source);
    if (args.tokens) {
      io.stdout(formatTokens(tokens, format));
      return 0;
    }

    const options: ParserOptions = {
      caseSensitive: args.caseSensitive ?? config.caseSensitive,
      observability: args.trace ? createTrace(io.stderr) : undefined,
    };
    const ast = parse(tokens, options);

    io.stdout(
      args.deps
        ? formatDependencies(dependencies(ast), format)
        : formatOutput(ast, format)
    );
    return 0;
  } catch (err) {
    io.stderr(
      formatError(err instanceof Error ? err : new Error(String(err)), source)
    );
    return 1;
  }
}

function showHelp(): void {
  console.log(`Usage:
  tally-parse [options] <expression>  Parse an expression and print its AST
  tally-parse [options] -             Read the expression from stdin
  tally-parse --help                  Show this help message
  tally-parse --version               Show version information

Options:
  --format <format>   Output format: json, yaml, text (default: json)
  --tokens            Print the token stream instead of the AST
  --deps              Print the identifiers the expression depends on
  --case-sensitive    Compare identifiers case-sensitively
  --trace             Write each token and reduction to stderr

Configuration:
  .tallyrc.json in the working directory may set "caseSensitive" and
  "format"; command-line flags take precedence.

Examples:
  tally-parse "price * (1 + rate)"
  tally-parse --format text "2 ^ 3 ^ 2"
  tally-parse --deps "if(total > limit, total, limit)"
  echo "max(a, b)" | tally-parse -`);
}

/**
 * Entry point for the tally-parse binary
 *
 * Writes results to stdout and errors to stderr.
 * Sets process.exitCode to 1 on any error.
 */
export function main(): void {
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        showHelp();
        return;

      case 'version':
        console.log(VERSION);
        return;

      case 'parse': {
        const config = loadConfig(process.cwd()) ?? createDefaultConfig();
        process.exitCode = runParse(parsed, config, {
          stdout: (text) => console.log(text),
          stderr: (text) => console.error(text),
          readStdin: () => fs.readFileSync(0, 'utf-8'),
        });
        return;
      }
    }
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
