/**
 * Environment configuration for the PostgreSQL runner.
 * Validated with TypeBox.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import pg from 'pg';

export const EnvSchema = Type.Object({
  DATABASE_URL: Type.String({ minLength: 1 }),
  PG_POOL_MAX: Type.Integer({ default: 10, minimum: 1 }),
  /** 0 disables the timeout. */
  STATEMENT_TIMEOUT_MS: Type.Integer({ default: 30_000, minimum: 0 }),
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' },
  ),
});

export type Env = Static<typeof EnvSchema>;

export interface RunnerConfig {
  database: {
    url: string;
    poolMax: number;
    statementTimeoutMs: number;
  };
  logger: {
    level: Env['LOG_LEVEL'];
  };
}

const parseInteger = (raw: string | undefined, fallback: number): number =>
  raw !== undefined && raw !== '' ? Number(raw) : fallback;

/**
 * Parse and validate environment variables.
 */
export const loadConfig = (env: NodeJS.ProcessEnv): RunnerConfig => {
  const rawEnv = {
    DATABASE_URL: env['DATABASE_URL'],
    PG_POOL_MAX: parseInteger(env['PG_POOL_MAX'], 10),
    STATEMENT_TIMEOUT_MS: parseInteger(env['STATEMENT_TIMEOUT_MS'], 30_000),
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
  };

  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return {
    database: {
      url: rawEnv.DATABASE_URL,
      poolMax: rawEnv.PG_POOL_MAX,
      statementTimeoutMs: rawEnv.STATEMENT_TIMEOUT_MS,
    },
    logger: {
      level: rawEnv.LOG_LEVEL,
    },
  };
};

export const createPool = (config: RunnerConfig): pg.Pool =>
  new pg.Pool({
    connectionString: config.database.url,
    max: config.database.poolMax,
    ...(config.database.statementTimeoutMs > 0
      ? { statement_timeout: config.database.statementTimeoutMs }
      : {}),
  });
