import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the Query class and clause constructors', async () => {
    const api = await import('../../src/index.js');
    expect(typeof api.Query).toBe('function');
    for (const name of [
      'table',
      'column',
      'coalesce',
      'predicate',
      'filter',
      'order',
      'projection',
      'group',
      'aggregation',
      'offset',
      'limit',
      'count',
      'unique',
      'countUnique',
      'join',
    ] as const) {
      expect(typeof api[name]).toBe('function');
    }
  });

  it('exports PostgresQueryRunner class', async () => {
    const { PostgresQueryRunner } = await import('../../src/index.js');
    expect(typeof PostgresQueryRunner).toBe('function'); // class is a function
  });

  it('exports error classes usable with instanceof', async () => {
    const { QueryBuilderError, InvalidQueryError } = await import('../../src/index.js');
    const err = new InvalidQueryError('no table');
    expect(err).toBeInstanceOf(InvalidQueryError);
    expect(err).toBeInstanceOf(QueryBuilderError);
    expect(err.name).toBe('InvalidQueryError');
  });

  it('does NOT export compileClause (internal)', async () => {
    const api = await import('../../src/index.js');
    expect('compileClause' in api).toBe(false);
  });

  it('does NOT export createParamSink (internal)', async () => {
    const api = await import('../../src/index.js');
    expect('createParamSink' in api).toBe(false);
  });

  it('builds and renders end to end', async () => {
    const { Query, filter, predicate, numbered } = await import('../../src/index.js');
    const q = new Query('people').append(filter([predicate('age', '>', 30)]));
    expect(q.render(numbered())).toEqual({
      sql: 'SELECT * FROM "people" WHERE ("age" > $1)',
      params: [30],
    });
  });
});
