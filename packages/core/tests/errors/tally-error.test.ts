/**
 * Error Taxonomy Tests
 * Registry entries, message rendering and structured error data
 */

import { describe, expect, it } from 'vitest';
import {
  ERROR_REGISTRY,
  LEXER_ERROR_IDS,
  LexerError,
  PARSE_ERROR_IDS,
  ParseError,
  renderMessage,
  TallyError,
} from '../../src/index.js';

describe('ERROR_REGISTRY', () => {
  it('defines every lexer and parse error id', () => {
    expect(ERROR_REGISTRY.size).toBe(12);
    for (const errorId of Object.values(PARSE_ERROR_IDS)) {
      expect(ERROR_REGISTRY.get(errorId)?.category).toBe('parse');
    }
    for (const errorId of Object.values(LEXER_ERROR_IDS)) {
      expect(ERROR_REGISTRY.get(errorId)?.category).toBe('lexer');
    }
  });
});

describe('renderMessage', () => {
  it('substitutes placeholders', () => {
    expect(renderMessage('Undefined function {name}', { name: 'median' })).toBe(
      'Undefined function median'
    );
  });

  it('coerces non-string values', () => {
    expect(
      renderMessage('{operator} has {actual}', { operator: 'add', actual: 1 })
    ).toBe('add has 1');
  });

  it('renders missing values as empty text', () => {
    expect(renderMessage('[{missing}]', {})).toBe('[]');
  });

  it('returns a template with an unclosed brace unchanged', () => {
    expect(renderMessage('broken {name', { name: 'x' })).toBe('broken {name');
  });
});

describe('ParseError', () => {
  const location = { line: 3, column: 5, offset: 20 };

  it('renders its message from the registry template', () => {
    const err = new ParseError(
      { kind: 'undefined_function', name: 'median' },
      location
    );
    expect(err).toBeInstanceOf(TallyError);
    expect(err.name).toBe('ParseError');
    expect(err.errorId).toBe('TALLY-P003');
    expect(err.kind).toBe('undefined_function');
    expect(err.message).toBe('Undefined function median at 3:5');
  });

  it('exposes structured data without the location suffix', () => {
    const err = new ParseError(
      { kind: 'unknown_grouping_token', token: 'semicolon' },
      location
    );
    expect(err.toData()).toEqual({
      errorId: 'TALLY-P006',
      message: 'Unknown grouping token semicolon',
      location,
      context: { kind: 'unknown_grouping_token', token: 'semicolon' },
    });
  });

  it('formats through a host formatter', () => {
    const err = new ParseError({ kind: 'invalid_statement' });
    expect(err.format()).toBe('Invalid statement');
    expect(err.format((data) => `${data.errorId}: ${data.message}`)).toBe(
      'TALLY-P008: Invalid statement'
    );
  });
});

describe('LexerError', () => {
  it('always carries a location', () => {
    const err = new LexerError(
      { kind: 'unexpected_character', char: '#' },
      { line: 1, column: 7, offset: 6 }
    );
    expect(err.name).toBe('LexerError');
    expect(err.location.column).toBe(7);
    expect(err.message).toBe('Unexpected character # at 1:7');
  });
});

describe('TallyError', () => {
  it('rejects unknown error ids', () => {
    expect(
      () => new TallyError({ errorId: 'TALLY-X999', message: 'nope' })
    ).toThrowError('Unknown error ID: TALLY-X999');
  });

  it('requires an error id', () => {
    expect(() => new TallyError({ errorId: '', message: 'nope' })).toThrowError(
      'errorId is required'
    );
  });
});
