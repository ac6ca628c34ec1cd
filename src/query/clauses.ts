import {
  InvalidQueryError,
  UnsupportedAggregateError,
  UnsupportedJoinTypeError,
  UnsupportedOperatorError,
} from '../errors.js';
import { isMultiValued, stripMultiValued, validateName, validatePath } from '../validate.js';
import {
  AGGREGATE_FUNCTIONS,
  BOOLEAN_COMBINATORS,
  COMPARISON_OPERATORS,
  JOIN_TYPES,
  SORT_DIRECTIONS,
} from './types.js';
import type {
  AggregateExpression,
  AggregationStage,
  BoundValue,
  CoalescedColumn,
  Column,
  ColumnSpec,
  CountStage,
  CountUniqueStage,
  FilterStage,
  GroupStage,
  JoinCondition,
  JoinStage,
  LimitStage,
  OffsetStage,
  Operand,
  OrderStage,
  Predicate,
  PredicateOperator,
  ProjectedColumn,
  ProjectionStage,
  SortDirection,
  Stage,
  TableStage,
  UniqueStage,
} from './types.js';

/** Operators a null right-hand side may be compared with. */
const NULL_OPERATORS: readonly PredicateOperator[] = ['=', '!=', '<>', 'IS', 'IS NOT'];
const PREDICATE_OPERATORS: readonly PredicateOperator[] = [...COMPARISON_OPERATORS, 'NOT LIKE'];

export type PredicateValue = BoundValue | readonly BoundValue[] | Column | null;
export type OrderSpec = string | readonly [path: string, direction: string];
export type AggregateSpec = readonly [func: string, column?: ColumnSpec | null, alias?: string];

interface JoinBaseOptions {
  /** INNER (default), OUTER, LEFT OUTER or CROSS. */
  how?: string;
  alias?: string;
  /** Left-hand table; resolved from the preceding Table or Join when omitted. */
  lhs?: string;
}

export interface ColumnJoinOptions extends JoinBaseOptions {
  leftColumn: string;
  /** Defaults to `=`. */
  op?: string;
  rightColumn: string;
  predicates?: never;
}

export interface PredicateJoinOptions extends JoinBaseOptions {
  predicates: readonly Predicate[];
  leftColumn?: never;
  op?: never;
  rightColumn?: never;
}

export type JoinOptions = ColumnJoinOptions | PredicateJoinOptions;

function lookup<T extends string>(allowed: readonly T[], value: string): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

function isScalar(value: unknown): value is BoundValue {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint' ||
    value instanceof Date
  );
}

export function isColumn(value: unknown): value is Column {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'column';
}

function validateColumnName(name: string): void {
  if (name !== '*') {
    validatePath(name);
  }
}

/** Validates a column reference wherever it enters a clause. */
function validateColumnSpec(spec: ProjectedColumn): void {
  if (typeof spec === 'string') {
    validateColumnName(spec);
    return;
  }
  if (spec.kind === 'coalesce') {
    spec.names.forEach(validateColumnName);
    validatePath(spec.alias);
    return;
  }
  validateColumnName(spec.name);
  if (spec.table !== undefined) validateName(spec.table);
  if (spec.alias !== undefined) validatePath(spec.alias);
}

function nonNegativeInteger(value: number, keyword: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidQueryError(`${keyword} must be a non-negative integer, got ${value}`);
  }
  return value;
}

export function table(name: string): TableStage {
  validateName(name);
  return { kind: 'table', name };
}

export function column(name: string, options: { table?: string; alias?: string } = {}): Column {
  const col: Column = {
    kind: 'column',
    name,
    ...(options.table !== undefined ? { table: options.table } : {}),
    ...(options.alias !== undefined ? { alias: options.alias } : {}),
  };
  validateColumnSpec(col);
  return col;
}

export function coalesce(names: readonly string[], alias: string): CoalescedColumn {
  if (names.length === 0) {
    throw new InvalidQueryError('COALESCE needs at least one column');
  }
  const col: CoalescedColumn = { kind: 'coalesce', names: [...names], alias };
  validateColumnSpec(col);
  return col;
}

function toOperand(rhs: PredicateValue): Operand {
  if (rhs === null || rhs === 'NULL' || rhs === 'null') {
    return { kind: 'null' };
  }
  if (isScalar(rhs)) {
    return { kind: 'literal', value: rhs };
  }
  if (isColumn(rhs)) {
    validateColumnSpec(rhs);
    return { kind: 'column', column: rhs };
  }
  return { kind: 'list', values: [...rhs] };
}

/**
 * A single comparison. The right-hand side is classified once here:
 * null, a literal, a list of literals (for IN) or another column.
 *
 * A left-hand path ending in `[*]` names a multi-valued property stored as
 * one encoded string. The marker is stripped and, for non-null values, the
 * comparison becomes a substring match: `=` turns into LIKE, `!=` and `<>`
 * into NOT LIKE, and the value is wrapped in `%`.
 */
export function predicate(lhs: string, op: string, rhs: PredicateValue): Predicate {
  const comparison = lookup(COMPARISON_OPERATORS, op.toUpperCase());
  if (comparison === undefined) {
    throw new UnsupportedOperatorError(op);
  }
  let operator: PredicateOperator = comparison;
  let operand = toOperand(rhs);
  let path = lhs;

  if (isMultiValued(lhs)) {
    path = stripMultiValued(lhs);
    if (operand.kind === 'list' || operand.kind === 'column') {
      throw new UnsupportedOperatorError(
        operator,
        `Multi-valued property ${lhs} can only be compared with a single literal or null`,
      );
    }
    if (operand.kind === 'literal') {
      operand = { kind: 'literal', value: `%${String(operand.value)}%` };
      if (operator === '=') {
        operator = 'LIKE';
      } else if (operator === '!=' || operator === '<>') {
        operator = 'NOT LIKE';
      }
    }
  }
  validatePath(path);

  if (operand.kind === 'null' && !NULL_OPERATORS.includes(operator)) {
    throw new UnsupportedOperatorError(operator, `Operator ${operator} cannot be used with NULL`);
  }
  if (operand.kind === 'list' && operator !== 'IN') {
    throw new UnsupportedOperatorError(operator, `Operator ${operator} cannot be used with a list`);
  }
  if (operator === 'IN') {
    if (operand.kind !== 'list') {
      throw new UnsupportedOperatorError(operator, 'IN requires a list of values');
    }
    if (operand.values.length === 0) {
      throw new InvalidQueryError(`IN list for ${path} is empty`);
    }
  }

  return { kind: 'predicate', lhs: path, op: operator, rhs: operand };
}

export function filter(predicates: readonly Predicate[], combinator: string = 'AND'): FilterStage {
  const op = lookup(BOOLEAN_COMBINATORS, combinator.trim().toUpperCase());
  if (op === undefined) {
    throw new UnsupportedOperatorError(combinator);
  }
  if (predicates.length === 0) {
    throw new InvalidQueryError('Filter needs at least one predicate');
  }
  return { kind: 'filter', predicates: [...predicates], combinator: op };
}

export function order(columns: readonly OrderSpec[]): OrderStage {
  const resolved = columns.map((spec): readonly [string, SortDirection] => {
    if (typeof spec === 'string') {
      validatePath(spec);
      return [spec, 'ASC'];
    }
    const [path, direction] = spec;
    validatePath(path);
    const dir = lookup(SORT_DIRECTIONS, direction.toUpperCase());
    if (dir === undefined) {
      throw new InvalidQueryError(`Unsupported sort direction: ${direction}`);
    }
    return [path, dir];
  });
  return { kind: 'order', columns: resolved };
}

export function projection(columns: readonly ProjectedColumn[]): ProjectionStage {
  columns.forEach(validateColumnSpec);
  return { kind: 'projection', columns: [...columns] };
}

export function group(columns: readonly ColumnSpec[]): GroupStage {
  columns.forEach(validateColumnSpec);
  return { kind: 'group', columns: [...columns] };
}

/**
 * Aggregates as `[func, column, alias]` triples. The column defaults to `*`
 * and the alias to the lower-cased SQL function name. NUNIQUE counts
 * distinct values.
 */
export function aggregation(aggs: readonly AggregateSpec[]): AggregationStage {
  const aggregates = aggs.map(([func, col, alias]): AggregateExpression => {
    const fn = lookup(AGGREGATE_FUNCTIONS, func.toUpperCase());
    if (fn === undefined) {
      throw new UnsupportedAggregateError(func);
    }
    const target = col ?? '*';
    validateColumnSpec(target);
    if (alias !== undefined) {
      validatePath(alias);
      return { func: fn, column: target, alias };
    }
    return { func: fn, column: target };
  });
  return { kind: 'aggregation', aggregates, groupColumns: [] };
}

export function offset(n: number): OffsetStage {
  return { kind: 'offset', count: nonNegativeInteger(n, 'OFFSET') };
}

export function limit(n: number): LimitStage {
  return { kind: 'limit', count: nonNegativeInteger(n, 'LIMIT') };
}

export function count(): CountStage {
  return { kind: 'count' };
}

export function unique(): UniqueStage {
  return { kind: 'unique' };
}

export function countUnique(columns: readonly ProjectedColumn[] = []): CountUniqueStage {
  columns.forEach(validateColumnSpec);
  return { kind: 'count-unique', columns: [...columns] };
}

/**
 * Joins `name` onto the preceding table, either on a single column
 * comparison or on an AND-ed list of predicates (whose values are bound).
 */
export function join(name: string, options: JoinOptions): JoinStage {
  validateName(name);
  const how = lookup(JOIN_TYPES, (options.how ?? 'INNER').trim().toUpperCase());
  if (how === undefined) {
    throw new UnsupportedJoinTypeError(options.how ?? '');
  }
  if (options.alias !== undefined) validateName(options.alias);
  if (options.lhs !== undefined) validateName(options.lhs);

  const { predicates, leftColumn, rightColumn } = options;
  let condition: JoinCondition;
  if (predicates !== undefined) {
    if (leftColumn !== undefined || rightColumn !== undefined) {
      throw new InvalidQueryError('Join takes either a column condition or predicates, not both');
    }
    if (predicates.length === 0) {
      throw new InvalidQueryError(`Join on ${name} needs at least one predicate`);
    }
    condition = { kind: 'predicates', predicates: [...predicates] };
  } else {
    if (leftColumn === undefined || rightColumn === undefined) {
      throw new InvalidQueryError(`Join on ${name} needs leftColumn and rightColumn, or predicates`);
    }
    validatePath(leftColumn);
    validatePath(rightColumn);
    const op = lookup(COMPARISON_OPERATORS, (options.op ?? '=').toUpperCase());
    if (op === undefined || op === 'IN') {
      throw new UnsupportedOperatorError(options.op ?? '');
    }
    condition = { kind: 'columns', leftColumn, op, rightColumn };
  }

  return {
    kind: 'join',
    name,
    condition,
    how,
    ...(options.lhs !== undefined ? { lhs: options.lhs } : {}),
    ...(options.alias !== undefined ? { alias: options.alias } : {}),
  };
}

function validatePredicate(pred: Predicate): void {
  validatePath(pred.lhs);
  if (lookup(PREDICATE_OPERATORS, pred.op) === undefined) {
    throw new UnsupportedOperatorError(pred.op);
  }
  if (pred.rhs.kind === 'column') {
    validateColumnSpec(pred.rhs.column);
  }
}

function validateJoin(stage: JoinStage): void {
  validateName(stage.name);
  if (lookup(JOIN_TYPES, stage.how) === undefined) {
    throw new UnsupportedJoinTypeError(stage.how);
  }
  for (const name of [stage.alias, stage.lhs, stage.source]) {
    if (name !== undefined) validateName(name);
  }
  const { condition } = stage;
  if (condition.kind === 'predicates') {
    if (condition.predicates.length === 0) {
      throw new InvalidQueryError(`Join on ${stage.name} needs at least one predicate`);
    }
    condition.predicates.forEach(validatePredicate);
    return;
  }
  validatePath(condition.leftColumn);
  validatePath(condition.rightColumn);
  if (lookup(COMPARISON_OPERATORS, condition.op) === undefined || condition.op === 'IN') {
    throw new UnsupportedOperatorError(condition.op);
  }
}

/**
 * Checks every identifier and keyword a clause writes into SQL text.
 * appendStage and the renderers run this on each clause they receive, so
 * object literals typed as a Stage are held to the same rules as the
 * factories above.
 */
export function validateClause(clause: Stage | Predicate): void {
  switch (clause.kind) {
    case 'predicate':
      validatePredicate(clause);
      return;
    case 'table':
      validateName(clause.name);
      return;
    case 'projection':
    case 'group':
    case 'count-unique':
      clause.columns.forEach(validateColumnSpec);
      return;
    case 'filter':
      if (lookup(BOOLEAN_COMBINATORS, clause.combinator) === undefined) {
        throw new UnsupportedOperatorError(clause.combinator);
      }
      if (clause.predicates.length === 0) {
        throw new InvalidQueryError('Filter needs at least one predicate');
      }
      clause.predicates.forEach(validatePredicate);
      return;
    case 'order':
      for (const [path, direction] of clause.columns) {
        validatePath(path);
        if (lookup(SORT_DIRECTIONS, direction) === undefined) {
          throw new InvalidQueryError(`Unsupported sort direction: ${direction}`);
        }
      }
      return;
    case 'aggregation':
      clause.groupColumns.forEach(validateColumnSpec);
      for (const agg of clause.aggregates) {
        if (lookup(AGGREGATE_FUNCTIONS, agg.func) === undefined) {
          throw new UnsupportedAggregateError(agg.func);
        }
        validateColumnSpec(agg.column);
        if (agg.alias !== undefined) validatePath(agg.alias);
      }
      return;
    case 'offset':
    case 'limit':
      nonNegativeInteger(clause.count, clause.kind.toUpperCase());
      return;
    case 'count':
    case 'unique':
      return;
    case 'join':
      validateJoin(clause);
      return;
  }
}
