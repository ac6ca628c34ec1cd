import { describe, it, expect } from 'vitest';
import {
  QueryBuilderError,
  UnsupportedOperatorError,
  UnsupportedJoinTypeError,
  UnsupportedAggregateError,
  InvalidQueryError,
  InvalidIdentifierError,
  InvalidPathError,
  QueryExecutionError,
} from '../../src/errors.js';

describe('builder errors', () => {
  const cases: Array<[string, QueryBuilderError]> = [
    ['UnsupportedOperatorError', new UnsupportedOperatorError('~')],
    ['UnsupportedJoinTypeError', new UnsupportedJoinTypeError('SIDEWAYS')],
    ['UnsupportedAggregateError', new UnsupportedAggregateError('MEDIAN')],
    ['InvalidQueryError', new InvalidQueryError('no table')],
    ['InvalidIdentifierError', new InvalidIdentifierError('a;b')],
    ['InvalidPathError', new InvalidPathError('a b')],
  ];

  it.each(cases)('%s has its own name', (name, err) => {
    expect(err.name).toBe(name);
  });

  it.each(cases)('%s is instanceof QueryBuilderError and Error', (_name, err) => {
    expect(err).toBeInstanceOf(QueryBuilderError);
    expect(err).toBeInstanceOf(Error);
  });

  it.each(cases)('%s has a stack trace', (_name, err) => {
    expect(err.stack).toBeDefined();
  });
});

describe('UnsupportedOperatorError', () => {
  it('stores the operator and generates a default message', () => {
    const err = new UnsupportedOperatorError('~');
    expect(err.operator).toBe('~');
    expect(err.message).toBe('Unsupported comparison operator: ~');
  });

  it('uses custom message when provided', () => {
    const err = new UnsupportedOperatorError('<', 'my message');
    expect(err.message).toBe('my message');
    expect(err.operator).toBe('<');
  });
});

describe('UnsupportedJoinTypeError / UnsupportedAggregateError', () => {
  it('store the rejected value', () => {
    expect(new UnsupportedJoinTypeError('SIDEWAYS').joinType).toBe('SIDEWAYS');
    expect(new UnsupportedAggregateError('MEDIAN').func).toBe('MEDIAN');
  });
});

describe('InvalidIdentifierError / InvalidPathError', () => {
  it('quote the rejected value in the message', () => {
    expect(new InvalidIdentifierError('a"b').message).toBe('Invalid identifier: "a\\"b"');
    expect(new InvalidPathError('a b').message).toBe('Invalid property path: "a b"');
  });
});

describe('QueryExecutionError', () => {
  it('is not a builder error', () => {
    const err = new QueryExecutionError('boom', 'SELECT 1');
    expect(err).toBeInstanceOf(QueryExecutionError);
    expect(err).toBeInstanceOf(Error);
    expect(err).not.toBeInstanceOf(QueryBuilderError);
    expect(err.name).toBe('QueryExecutionError');
  });

  it('stores sql and cause', () => {
    const root = new Error('root');
    const err = new QueryExecutionError('boom', 'SELECT 1', root);
    expect(err.sql).toBe('SELECT 1');
    expect(err.cause).toBe(root);
    expect(err.message).toBe('boom');
  });

  it('cause is undefined when not provided', () => {
    expect(new QueryExecutionError('boom', 'SELECT 1').cause).toBeUndefined();
  });
});
