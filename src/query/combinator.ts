import { isDeepStrictEqual } from 'node:util';
import { InvalidQueryError } from '../errors.js';
import { validateClause } from './clauses.js';
import type { CountUniqueStage, JoinStage, Stage } from './types.js';

export interface PipelineState {
  readonly stages: readonly Stage[];
  /** Names of every Table appended, in order. */
  readonly tables: readonly string[];
}

export const EMPTY_PIPELINE: PipelineState = { stages: [], tables: [] };

/**
 * Joins are compared on what the caller gave, not on the resolved
 * left-hand table: appending the same join twice in a row keeps one.
 */
export function joinsEqual(a: JoinStage, b: JoinStage): boolean {
  return (
    a.name === b.name &&
    a.lhs === b.lhs &&
    a.how === b.how &&
    a.alias === b.alias &&
    isDeepStrictEqual(a.condition, b.condition)
  );
}

function withStage(state: PipelineState, stages: readonly Stage[], stage: Stage): PipelineState {
  return { stages: [...stages, stage], tables: state.tables };
}

/**
 * Appends `stage` to the pipeline, applying the rewrite rules that look at
 * the current last stage. May reject the stage, drop it, or fold earlier
 * stages into it. Never mutates `state`.
 */
export function appendStage(state: PipelineState, stage: Stage): PipelineState {
  validateClause(stage);
  const { stages } = state;
  const last = stages[stages.length - 1];

  switch (stage.kind) {
    case 'aggregation': {
      if (stages.some((prev) => prev.kind === 'projection')) {
        throw new InvalidQueryError('cannot have Aggregation after Projection');
      }
      if (last?.kind === 'group') {
        return withStage(state, stages, { ...stage, groupColumns: last.columns });
      }
      return withStage(state, stages, stage);
    }

    case 'join': {
      if (last?.kind === 'join' && joinsEqual(last, stage)) {
        return state;
      }
      if (last === undefined || (last.kind !== 'table' && last.kind !== 'join')) {
        throw new InvalidQueryError('Join must follow Table or Join');
      }
      return withStage(state, stages, { ...stage, source: stage.lhs ?? last.name });
    }

    case 'count': {
      if (last?.kind !== 'unique') {
        return withStage(state, stages, stage);
      }
      let remaining = stages.slice(0, -1);
      const beforeUnique = remaining[remaining.length - 1];
      let folded: CountUniqueStage = { kind: 'count-unique', columns: [] };
      if (beforeUnique?.kind === 'projection') {
        remaining = remaining.slice(0, -1);
        folded = { kind: 'count-unique', columns: beforeUnique.columns };
      }
      return withStage(state, remaining, folded);
    }

    case 'count-unique': {
      if (last?.kind === 'projection') {
        return withStage(state, stages.slice(0, -1), { ...stage, columns: last.columns });
      }
      return withStage(state, stages, stage);
    }

    case 'table':
      return { stages: [...stages, stage], tables: [...state.tables, stage.name] };

    case 'projection':
    case 'filter':
    case 'order':
    case 'group':
    case 'offset':
    case 'limit':
    case 'unique':
      return withStage(state, stages, stage);
  }
}
