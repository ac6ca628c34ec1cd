import pg from 'pg';
import { QueryExecutionError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { count as countStage } from '../query/clauses.js';
import { numbered } from '../query/placeholders.js';
import type { Query } from '../query/query.js';
import type { BoundValue, CompiledQuery, StageKind } from '../query/types.js';
import type { QueryRunner } from '../types.js';

export interface PostgresRunnerConfig {
  pool: pg.Pool;
  logger?: Logger;
}

const COUNTABLE_IN_PLACE: ReadonlySet<StageKind> = new Set<StageKind>(['table', 'join', 'filter']);

function wrapInCount({ sql, params }: CompiledQuery): CompiledQuery {
  return { sql: `SELECT COUNT(*) AS "count" FROM (${sql}) AS tmp`, params };
}

interface CountRow {
  [column: string]: unknown;
  count: string | number | bigint;
}

/**
 * Runs queries on a pg pool with `$1, $2, ...` placeholders. Builder errors
 * (invalid identifiers, bad stage order) surface unchanged; driver errors
 * are wrapped in QueryExecutionError.
 */
export class PostgresQueryRunner implements QueryRunner {
  private readonly pool: pg.Pool;
  private readonly logger: Logger;

  constructor(config: PostgresRunnerConfig) {
    this.pool = config.pool;
    this.logger = (config.logger ?? silentLogger()).child({ component: 'postgres-runner' });
  }

  async run<R extends Record<string, unknown> = Record<string, unknown>>(query: Query): Promise<R[]> {
    const { sql, params } = query.render(numbered());
    return this.execute<R>(sql, params);
  }

  /**
   * Number of rows `query` returns. A query made only of Table, Join and
   * Filter stages gets a Count stage on a copy; any other query is counted
   * as a subquery, so projections, grouping, DISTINCT and LIMIT keep their
   * effect on the result.
   */
  async count(query: Query): Promise<number> {
    const { sql, params } = query.stages.every((stage) => COUNTABLE_IN_PLACE.has(stage.kind))
      ? query.clone().append(countStage()).render(numbered())
      : wrapInCount(query.render(numbered()));
    const rows = await this.execute<CountRow>(sql, params);
    const first = rows[0];
    if (first === undefined) {
      throw new QueryExecutionError('Count query returned no rows', sql);
    }
    // pg returns COUNT(*) (bigint) as a string
    return Number(first.count);
  }

  private async execute<R extends Record<string, unknown>>(sql: string, params: BoundValue[]): Promise<R[]> {
    this.logger.debug({ sql, paramCount: params.length }, 'Executing query');

    let result: pg.QueryResult<R>;
    try {
      result = await this.pool.query<R>(sql, params);
    } catch (err) {
      this.logger.error({ err, sql }, 'Query failed');
      throw new QueryExecutionError(`Failed to run query: ${String(err)}`, sql, err);
    }
    return result.rows;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
