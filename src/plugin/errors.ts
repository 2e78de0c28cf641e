/**
 * Errors raised by the table host
 */

/**
 * Error thrown when a query names an unknown table or column, or a predicate of the wrong type
 */
export class QueryError extends Error {
  constructor(
    message: string,
    public readonly table?: string,
    public readonly column?: string
  ) {
    super(message);
    this.name = 'QueryError';
  }
}

/**
 * Error thrown when a table refuses a query before calling upstream
 */
export class UnsupportedQueryError extends Error {
  constructor(
    public readonly table: string,
    public readonly requiredColumns: string[],
    reason: string
  ) {
    super(
      `${reason}, 'List' call on ${table} requires an '=' qual for one or more of the following columns: ` +
      requiredColumns.join(', ')
    );
    this.name = 'UnsupportedQueryError';
  }
}

/**
 * Error thrown when a column transform cannot convert a value
 */
export class TransformError extends Error {
  constructor(
    public readonly column: string,
    public readonly value: unknown,
    reason: string
  ) {
    super(`Column "${column}": ${reason}`);
    this.name = 'TransformError';
  }
}
