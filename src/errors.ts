/**
 * Base class for every error raised while building or rendering a query.
 * All of them signal a defect in the caller's input: discard the query and
 * rebuild it, never retry.
 */
export class QueryBuilderError extends Error {
  override readonly name: string = 'QueryBuilderError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedOperatorError extends QueryBuilderError {
  override readonly name = 'UnsupportedOperatorError';

  constructor(
    readonly operator: string,
    message?: string,
  ) {
    super(message ?? `Unsupported comparison operator: ${operator}`);
  }
}

export class UnsupportedJoinTypeError extends QueryBuilderError {
  override readonly name = 'UnsupportedJoinTypeError';

  constructor(readonly joinType: string) {
    super(`Unsupported join type: ${joinType}`);
  }
}

export class UnsupportedAggregateError extends QueryBuilderError {
  override readonly name = 'UnsupportedAggregateError';

  constructor(readonly func: string) {
    super(`Unsupported aggregate function: ${func}`);
  }
}

/** Structurally invalid query: bad stage order, no table, bad counts. */
export class InvalidQueryError extends QueryBuilderError {
  override readonly name = 'InvalidQueryError';
}

export class InvalidIdentifierError extends QueryBuilderError {
  override readonly name = 'InvalidIdentifierError';

  constructor(readonly identifier: string) {
    super(`Invalid identifier: ${JSON.stringify(identifier)}`);
  }
}

export class InvalidPathError extends QueryBuilderError {
  override readonly name = 'InvalidPathError';

  constructor(readonly path: string) {
    super(`Invalid property path: ${JSON.stringify(path)}`);
  }
}

/** Raised by the runner when the database rejects a rendered query. */
export class QueryExecutionError extends Error {
  override readonly name = 'QueryExecutionError';

  constructor(
    message: string,
    readonly sql: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
