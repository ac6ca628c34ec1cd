import { describe, it, expect, vi } from 'vitest';
import pg from 'pg';
import { PostgresQueryRunner } from '../../src/runner/postgres-runner.js';
import { Query } from '../../src/query/query.js';
import { filter, limit, predicate, projection, unique } from '../../src/query/clauses.js';
import { InvalidQueryError, QueryExecutionError } from '../../src/errors.js';
import { createLogger } from '../../src/logger.js';

// Helper to create a mock pool
function makeMockPool(rows: object[]) {
  return {
    query: vi.fn().mockResolvedValue({ rows, rowCount: rows.length }),
    connect: vi.fn(),
    end: vi.fn().mockResolvedValue(undefined),
  };
}

function makeRunner(pool: ReturnType<typeof makeMockPool>) {
  return new PostgresQueryRunner({ pool: pool as unknown as pg.Pool });
}

describe('PostgresQueryRunner.run()', () => {
  it('renders with numbered placeholders and returns rows', async () => {
    const rows = [{ name: 'ada' }];
    const pool = makeMockPool(rows);
    const q = new Query('people')
      .append(filter([predicate('age', '>', 30), predicate('city', 'IN', ['Oslo', 'Bergen'])]))
      .append(projection(['name']));

    const result = await makeRunner(pool).run(q);

    expect(result).toEqual(rows);
    expect(pool.query).toHaveBeenCalledOnce();
    const [calledSql, calledParams] = pool.query.mock.calls[0]!;
    expect(calledSql).toBe('SELECT "name" FROM "people" WHERE ("age" > $1) AND ("city" IN ($2, $3))');
    expect(calledParams).toEqual([30, 'Oslo', 'Bergen']);
  });

  it('wraps pool.query errors in QueryExecutionError', async () => {
    const pool = makeMockPool([]);
    const root = new Error('relation "people" does not exist');
    pool.query.mockRejectedValueOnce(root);

    const error = await makeRunner(pool).run(new Query('people')).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(QueryExecutionError);
    expect(error).toMatchObject({ sql: 'SELECT * FROM "people"', cause: root });
  });

  it('lets builder errors through without touching the pool', async () => {
    const pool = makeMockPool([]);
    await expect(makeRunner(pool).run(new Query())).rejects.toBeInstanceOf(InvalidQueryError);
    expect(pool.query).not.toHaveBeenCalled();
  });

  it('logs the statement at debug level', async () => {
    const pool = makeMockPool([]);
    const logger = createLogger({ level: 'debug' });
    const child = createLogger({ level: 'debug' });
    const debug = vi.spyOn(child, 'debug').mockImplementation(() => undefined);
    vi.spyOn(logger, 'child').mockReturnValue(child);

    const runner = new PostgresQueryRunner({ pool: pool as unknown as pg.Pool, logger });
    await runner.run(new Query('people').append(filter([predicate('age', '>', 30)])));

    expect(logger.child).toHaveBeenCalledWith({ component: 'postgres-runner' });
    expect(debug).toHaveBeenCalledWith(
      { sql: 'SELECT * FROM "people" WHERE ("age" > $1)', paramCount: 1 },
      'Executing query',
    );
  });
});

describe('PostgresQueryRunner.count()', () => {
  it('appends a count to a copy of the query and parses the result', async () => {
    const pool = makeMockPool([{ count: '42' }]);
    const q = new Query('people').append(filter([predicate('age', '>', 30)]));

    expect(await makeRunner(pool).count(q)).toBe(42);
    expect(pool.query.mock.calls[0]![0]).toBe('SELECT COUNT(*) AS "count" FROM "people" WHERE ("age" > $1)');
    expect(q.stages).toHaveLength(2);
  });

  it('counts distinct projected rows after a trailing Unique', async () => {
    const pool = makeMockPool([{ count: 7 }]);
    const q = new Query('people').append(projection(['city'])).append(unique());

    expect(await makeRunner(pool).count(q)).toBe(7);
    expect(pool.query.mock.calls[0]![0]).toBe(
      'SELECT COUNT(*) AS "count" FROM (SELECT DISTINCT "city" FROM "people") AS tmp',
    );
  });

  it('counts a projected query as a subquery', async () => {
    const pool = makeMockPool([{ count: '3' }]);
    const q = new Query('people').append(filter([predicate('age', '>', 30)])).append(projection(['name']));

    expect(await makeRunner(pool).count(q)).toBe(3);
    expect(pool.query).toHaveBeenCalledWith(
      'SELECT COUNT(*) AS "count" FROM (SELECT "name" FROM "people" WHERE ("age" > $1)) AS tmp',
      [30],
    );
    expect(q.stages).toHaveLength(3);
  });

  it('counts a limited query as a subquery', async () => {
    const pool = makeMockPool([{ count: '5' }]);
    await makeRunner(pool).count(new Query('people').append(limit(5)));
    expect(pool.query.mock.calls[0]![0]).toBe(
      'SELECT COUNT(*) AS "count" FROM (SELECT * FROM "people" LIMIT 5) AS tmp',
    );
  });

  it('fails when the database returns no rows', async () => {
    const pool = makeMockPool([]);
    await expect(makeRunner(pool).count(new Query('people'))).rejects.toThrow(
      'Count query returned no rows',
    );
  });
});

describe('PostgresQueryRunner.close()', () => {
  it('ends the pool', async () => {
    const pool = makeMockPool([]);
    await makeRunner(pool).close();
    expect(pool.end).toHaveBeenCalledOnce();
  });
});
