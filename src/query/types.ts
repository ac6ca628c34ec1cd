export const COMPARISON_OPERATORS = [
  '=', '<>', '!=', '<', '>', '<=', '>=', 'LIKE', 'IN', 'IS', 'IS NOT',
] as const;
export const BOOLEAN_COMBINATORS = ['AND', 'OR'] as const;
export const JOIN_TYPES = ['INNER', 'OUTER', 'LEFT OUTER', 'CROSS'] as const;
export const AGGREGATE_FUNCTIONS = ['COUNT', 'SUM', 'MIN', 'MAX', 'AVG', 'NUNIQUE'] as const;
export const SORT_DIRECTIONS = ['ASC', 'DESC'] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];
/** Operators a predicate may carry after multi-valued rewriting. */
export type PredicateOperator = ComparisonOperator | 'NOT LIKE';
export type BooleanCombinator = (typeof BOOLEAN_COMBINATORS)[number];
export type JoinType = (typeof JOIN_TYPES)[number];
export type AggregateFunction = (typeof AGGREGATE_FUNCTIONS)[number];
export type SortDirection = (typeof SORT_DIRECTIONS)[number];

/** A value that is bound as a parameter, never written into SQL text. */
export type BoundValue = string | number | boolean | bigint | Date;

export interface Column {
  readonly kind: 'column';
  readonly name: string;
  readonly table?: string;
  readonly alias?: string;
}

/** First non-null of several columns; used to merge same-named columns after a join. */
export interface CoalescedColumn {
  readonly kind: 'coalesce';
  readonly names: readonly string[];
  readonly alias: string;
}

export type ColumnSpec = string | Column;
export type ProjectedColumn = ColumnSpec | CoalescedColumn;

/** Right-hand side of a predicate, classified once at construction. */
export type Operand =
  | { readonly kind: 'null' }
  | { readonly kind: 'literal'; readonly value: BoundValue }
  | { readonly kind: 'list'; readonly values: readonly BoundValue[] }
  | { readonly kind: 'column'; readonly column: Column };

export interface Predicate {
  readonly kind: 'predicate';
  readonly lhs: string;
  readonly op: PredicateOperator;
  readonly rhs: Operand;
}

export interface AggregateExpression {
  readonly func: AggregateFunction;
  readonly column: ColumnSpec;
  readonly alias?: string;
}

export type JoinCondition =
  | {
      readonly kind: 'columns';
      readonly leftColumn: string;
      readonly op: ComparisonOperator;
      readonly rightColumn: string;
    }
  | { readonly kind: 'predicates'; readonly predicates: readonly Predicate[] };

export interface TableStage {
  readonly kind: 'table';
  readonly name: string;
}

export interface ProjectionStage {
  readonly kind: 'projection';
  readonly columns: readonly ProjectedColumn[];
}

export interface FilterStage {
  readonly kind: 'filter';
  readonly predicates: readonly Predicate[];
  readonly combinator: BooleanCombinator;
}

export interface OrderStage {
  readonly kind: 'order';
  readonly columns: readonly (readonly [path: string, direction: SortDirection])[];
}

export interface GroupStage {
  readonly kind: 'group';
  readonly columns: readonly ColumnSpec[];
}

export interface AggregationStage {
  readonly kind: 'aggregation';
  readonly aggregates: readonly AggregateExpression[];
  /** Copied from an immediately preceding Group stage when appended to a query. */
  readonly groupColumns: readonly ColumnSpec[];
}

export interface OffsetStage {
  readonly kind: 'offset';
  readonly count: number;
}

export interface LimitStage {
  readonly kind: 'limit';
  readonly count: number;
}

export interface CountStage {
  readonly kind: 'count';
}

export interface UniqueStage {
  readonly kind: 'unique';
}

export interface CountUniqueStage {
  readonly kind: 'count-unique';
  readonly columns: readonly ProjectedColumn[];
}

export interface JoinStage {
  readonly kind: 'join';
  readonly name: string;
  /** Left-hand table as given by the caller. */
  readonly lhs?: string;
  /** Left-hand table after resolution against the preceding Table or Join. */
  readonly source?: string;
  readonly condition: JoinCondition;
  readonly how: JoinType;
  readonly alias?: string;
}

export type Stage =
  | TableStage
  | ProjectionStage
  | FilterStage
  | OrderStage
  | GroupStage
  | AggregationStage
  | OffsetStage
  | LimitStage
  | CountStage
  | UniqueStage
  | CountUniqueStage
  | JoinStage;

export type StageKind = Stage['kind'];

export interface CompiledQuery {
  sql: string;
  params: BoundValue[];
}
