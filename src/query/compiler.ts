import { InvalidQueryError } from '../errors.js';
import { validateClause } from './clauses.js';
import { toPlaceholderFn } from './placeholders.js';
import type { Placeholder, PlaceholderFn } from './placeholders.js';
import type {
  AggregationStage,
  BoundValue,
  ColumnSpec,
  CountUniqueStage,
  FilterStage,
  GroupStage,
  JoinStage,
  OrderStage,
  Predicate,
  ProjectedColumn,
  ProjectionStage,
  Stage,
} from './types.js';

export interface CompiledClause {
  text: string;
  params: BoundValue[];
}

/**
 * Collects bound values in the order their placeholders are written.
 * Shared across clauses so numbered placeholders continue where the
 * previous clause stopped.
 */
export interface ParamSink {
  readonly params: BoundValue[];
  readonly placeholder: PlaceholderFn;
}

export function createParamSink(placeholder: Placeholder): ParamSink {
  return { params: [], placeholder: toPlaceholderFn(placeholder) };
}

/** Drops every value bound so far; numbering restarts at 1. */
export function resetParamSink(sink: ParamSink): void {
  sink.params.splice(0);
}

function bind(sink: ParamSink, value: BoundValue): string {
  sink.params.push(value);
  return sink.placeholder(sink.params.length);
}

/** Double-quotes an identifier. `*` is left bare. */
export function quote(identifier: string): string {
  return identifier === '*' ? identifier : `"${identifier}"`;
}

/** Column as an expression: table-qualified, without its alias. */
function columnReference(col: ColumnSpec): string {
  if (typeof col === 'string') {
    return quote(col);
  }
  return col.table !== undefined ? `"${col.table}".${quote(col.name)}` : quote(col.name);
}

function coalesceExpression(names: readonly string[]): string {
  return `COALESCE(${names.map(quote).join(', ')})`;
}

/** Column as a select-list item, with its alias. */
export function columnText(col: ProjectedColumn): string {
  if (typeof col === 'string') {
    return quote(col);
  }
  if (col.kind === 'coalesce') {
    return `${coalesceExpression(col.names)} AS "${col.alias}"`;
  }
  const ref = columnReference(col);
  return col.alias !== undefined ? `${ref} AS "${col.alias}"` : ref;
}

function compilePredicate(pred: Predicate, sink: ParamSink): string {
  const lhs = quote(pred.lhs);
  const { rhs } = pred;
  switch (rhs.kind) {
    case 'null': {
      const negated = pred.op === '!=' || pred.op === '<>' || pred.op === 'IS NOT';
      return negated ? `(${lhs} IS NOT NULL)` : `(${lhs} IS NULL)`;
    }
    case 'column':
      return `(${lhs} ${pred.op} ${columnReference(rhs.column)})`;
    case 'list': {
      const markers = rhs.values.map((value) => bind(sink, value));
      return `(${lhs} ${pred.op} (${markers.join(', ')}))`;
    }
    case 'literal':
      return `(${lhs} ${pred.op} ${bind(sink, rhs.value)})`;
  }
}

/** OR filters are parenthesized so they compose when chained with AND. */
function compileFilter(stage: FilterStage, sink: ParamSink): string {
  const text = stage.predicates
    .map((pred) => compilePredicate(pred, sink))
    .join(` ${stage.combinator} `);
  return stage.combinator === 'OR' ? `(${text})` : text;
}

function compileOrder(stage: OrderStage): string {
  return stage.columns.map(([path, direction]) => `"${path}" ${direction}`).join(', ');
}

function compileProjection(stage: ProjectionStage): string {
  return stage.columns.map(columnText).join(', ');
}

// Column entries always render table-qualified and quoted (even `*`) and
// drop their alias, unlike columnText.
function compileGroup(stage: GroupStage): string {
  return stage.columns
    .map((col) => {
      if (typeof col === 'string') return quote(col);
      return col.table !== undefined ? `"${col.table}"."${col.name}"` : quote(col.name);
    })
    .join(', ');
}

function compileAggregation(stage: AggregationStage): string {
  const exprs = stage.groupColumns.map(columnText);
  for (const agg of stage.aggregates) {
    const distinct = agg.func === 'NUNIQUE';
    const func = distinct ? 'COUNT' : agg.func;
    const target = agg.column === '*' ? '*' : columnReference(agg.column);
    const alias = agg.alias ?? func.toLowerCase();
    exprs.push(`${func}(${distinct ? 'DISTINCT ' : ''}${target}) AS "${alias}"`);
  }
  return exprs.join(', ');
}

function compileCountUnique(stage: CountUniqueStage): string {
  if (stage.columns.length === 0) {
    return 'COUNT(*) AS "count"';
  }
  const exprs = stage.columns.map((col) =>
    typeof col !== 'string' && col.kind === 'coalesce'
      ? coalesceExpression(col.names)
      : columnReference(col),
  );
  return `COUNT(DISTINCT ${exprs.join(', ')}) AS "count"`;
}

function compileJoin(stage: JoinStage, sink: ParamSink): string {
  let target = `"${stage.name}"`;
  let tableRef = target;
  if (stage.alias !== undefined) {
    target += ` AS "${stage.alias}"`;
    tableRef = `"${stage.alias}"`;
  }

  const { condition } = stage;
  let on: string;
  if (condition.kind === 'columns') {
    const source = stage.source ?? stage.lhs;
    if (source === undefined) {
      throw new InvalidQueryError(`Join on ${stage.name} has no left-hand table`);
    }
    on = `"${source}"."${condition.leftColumn}" ${condition.op} ${tableRef}."${condition.rightColumn}"`;
  } else {
    on = condition.predicates.map((pred) => compilePredicate(pred, sink)).join(' AND ');
  }
  return `${stage.how} JOIN ${target} ON ${on}`;
}

/**
 * Renders the text a single clause contributes, binding its values into
 * `sink`. The query renderer decides where that text goes.
 */
export function compileClause(clause: Stage | Predicate, sink: ParamSink): string {
  switch (clause.kind) {
    case 'predicate':
      return compilePredicate(clause, sink);
    case 'table':
      return `"${clause.name}"`;
    case 'projection':
      return compileProjection(clause);
    case 'filter':
      return compileFilter(clause, sink);
    case 'order':
      return compileOrder(clause);
    case 'group':
      return compileGroup(clause);
    case 'aggregation':
      return compileAggregation(clause);
    case 'offset':
    case 'limit':
      return String(clause.count);
    case 'count':
      return 'COUNT(*) AS "count"';
    case 'unique':
      return 'SELECT DISTINCT *';
    case 'count-unique':
      return compileCountUnique(clause);
    case 'join':
      return compileJoin(clause, sink);
  }
}

/**
 * Renders one clause on its own.
 *
 * @example
 * renderClause(predicate('age', '>', 30), '?')
 * // => { text: '("age" > ?)', params: [30] }
 */
export function renderClause(clause: Stage | Predicate, placeholder: Placeholder = '?'): CompiledClause {
  validateClause(clause);
  const sink = createParamSink(placeholder);
  const text = compileClause(clause, sink);
  return { text, params: sink.params };
}
