import type { Query } from './query/query.js';

/**
 * Executes rendered queries. The runner owns placeholder style and
 * parameter binding; callers only hand over a Query.
 */
export interface QueryRunner {
  run<R extends Record<string, unknown> = Record<string, unknown>>(query: Query): Promise<R[]>;
  /** Row count of the query's result set. */
  count(query: Query): Promise<number>;
  close(): Promise<void>;
}
