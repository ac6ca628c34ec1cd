export { Query } from './query/query.js';
export {
  aggregation,
  coalesce,
  column,
  count,
  countUnique,
  filter,
  group,
  isColumn,
  join,
  limit,
  offset,
  order,
  predicate,
  projection,
  table,
  unique,
} from './query/clauses.js';
export type {
  AggregateSpec,
  ColumnJoinOptions,
  JoinOptions,
  OrderSpec,
  PredicateJoinOptions,
  PredicateValue,
} from './query/clauses.js';
export { renderClause } from './query/compiler.js';
export type { CompiledClause } from './query/compiler.js';
export { appendStage, joinsEqual } from './query/combinator.js';
export type { PipelineState } from './query/combinator.js';
export { renderStages } from './query/render.js';
export { numbered } from './query/placeholders.js';
export type { Placeholder, PlaceholderFn } from './query/placeholders.js';
export {
  AGGREGATE_FUNCTIONS,
  BOOLEAN_COMBINATORS,
  COMPARISON_OPERATORS,
  JOIN_TYPES,
  SORT_DIRECTIONS,
} from './query/types.js';
export type {
  AggregateFunction,
  BooleanCombinator,
  BoundValue,
  CoalescedColumn,
  Column,
  ColumnSpec,
  ComparisonOperator,
  CompiledQuery,
  JoinType,
  Operand,
  Predicate,
  ProjectedColumn,
  SortDirection,
  Stage,
  StageKind,
} from './query/types.js';
export { validateName, validatePath, MULTI_VALUED_MARKER } from './validate.js';
export {
  QueryBuilderError,
  UnsupportedOperatorError,
  UnsupportedJoinTypeError,
  UnsupportedAggregateError,
  InvalidQueryError,
  InvalidIdentifierError,
  InvalidPathError,
  QueryExecutionError,
} from './errors.js';
export type { QueryRunner } from './types.js';
export { PostgresQueryRunner } from './runner/postgres-runner.js';
export type { PostgresRunnerConfig } from './runner/postgres-runner.js';
export { loadConfig, createPool } from './config.js';
export type { RunnerConfig } from './config.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
