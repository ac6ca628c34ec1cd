import { InvalidQueryError } from '../errors.js';
import { validateClause } from './clauses.js';
import { compileClause, createParamSink, resetParamSink } from './compiler.js';
import type { ParamSink } from './compiler.js';
import type { Placeholder } from './placeholders.js';
import type { CompiledQuery, Stage } from './types.js';

interface FoldState {
  sql: string;
  previous: Stage | null;
}

/**
 * Places one stage's text relative to what has been assembled so far.
 * SELECT always ends up in front regardless of when it was appended;
 * everything that binds values (filters, joins) is appended at the end, so
 * bound values stay in the same order as their placeholders.
 */
function placeText(stage: Stage, text: string, sql: string, previous: Stage | null): string {
  switch (stage.kind) {
    case 'table':
      return `FROM ${text}`;
    case 'projection':
    case 'aggregation':
      return `SELECT ${text} ${sql}`;
    case 'filter': {
      let keyword = 'WHERE';
      if (previous?.kind === 'aggregation') {
        keyword = 'HAVING';
      } else if (previous?.kind === 'filter') {
        keyword = 'AND';
      }
      return `${sql} ${keyword} ${text}`;
    }
    case 'group':
      return `${sql} GROUP BY ${text}`;
    case 'order':
      return `${sql} ORDER BY ${text}`;
    case 'limit':
      return `${sql} LIMIT ${text}`;
    case 'offset':
      return `${sql} OFFSET ${text}`;
    case 'join':
      return `${sql} ${text}`;
    case 'unique':
      return sql.startsWith('SELECT ')
        ? `SELECT DISTINCT ${sql.slice('SELECT '.length)}`
        : `SELECT DISTINCT * ${sql}`;
    case 'count':
      // Query.append folds Unique + Count into count-unique; this branch
      // only runs for stage lists built without it.
      return previous?.kind === 'unique'
        ? `SELECT ${text} FROM (${sql}) AS tmp`
        : `SELECT ${text} ${sql}`;
    case 'count-unique':
      return stage.columns.length > 0
        ? `SELECT ${text} ${sql}`
        : `SELECT ${text} FROM (SELECT DISTINCT * ${sql}) AS tmp`;
  }
}

function foldStage(acc: FoldState, stage: Stage, sink: ParamSink): FoldState {
  // A Table replaces the text built so far, so the values bound for it go too.
  if (stage.kind === 'table') {
    resetParamSink(sink);
  }
  const text = compileClause(stage, sink);
  return { sql: placeText(stage, text, acc.sql, acc.previous), previous: stage };
}

/**
 * Lowers a stage list to SQL text plus its bound values in a single
 * left-to-right pass. Pure: the same stages and placeholder always give the
 * same result.
 */
export function renderStages(stages: readonly Stage[], placeholder: Placeholder): CompiledQuery {
  if (!stages.some((stage) => stage.kind === 'table')) {
    throw new InvalidQueryError('no table');
  }
  stages.forEach(validateClause);
  const sink = createParamSink(placeholder);
  const { sql } = stages.reduce<FoldState>(
    (acc, stage) => foldStage(acc, stage, sink),
    { sql: '', previous: null },
  );
  return {
    sql: sql.startsWith('SELECT') ? sql : `SELECT * ${sql}`,
    params: sink.params,
  };
}
