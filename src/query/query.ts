import { table } from './clauses.js';
import { appendStage, EMPTY_PIPELINE } from './combinator.js';
import type { PipelineState } from './combinator.js';
import { renderStages } from './render.js';
import type { Placeholder } from './placeholders.js';
import type { CompiledQuery, Stage } from './types.js';

/**
 * An ordered pipeline of clause stages that renders to one parameterized
 * SELECT. Stages are appended in pipeline order (table, joins, filters,
 * projection, ...) and rewritten as they arrive; see appendStage.
 *
 * @example
 * const q = new Query('people')
 *   .append(filter([predicate('age', '>', 30)]))
 *   .append(projection(['name']));
 * q.render('?');
 * // => { sql: 'SELECT "name" FROM "people" WHERE ("age" > ?)', params: [30] }
 */
export class Query {
  private state: PipelineState = EMPTY_PIPELINE;

  /** A table name seeds a Table stage; a stage list is appended in order. */
  constructor(source?: string | Iterable<Stage>) {
    if (typeof source === 'string') {
      this.append(table(source));
    } else if (source !== undefined) {
      this.extend(source);
    }
  }

  get stages(): readonly Stage[] {
    return this.state.stages;
  }

  get tables(): readonly string[] {
    return this.state.tables;
  }

  lastStage(): Stage | undefined {
    return this.state.stages[this.state.stages.length - 1];
  }

  append(stage: Stage): this {
    this.state = appendStage(this.state, stage);
    return this;
  }

  extend(stages: Iterable<Stage>): this {
    for (const stage of stages) {
      this.append(stage);
    }
    return this;
  }

  /** Independent copy; stages are immutable, so they are shared. */
  clone(): Query {
    const copy = new Query();
    copy.state = this.state;
    return copy;
  }

  render(placeholder: Placeholder = '?'): CompiledQuery {
    return renderStages(this.state.stages, placeholder);
  }
}
