/**
 * Custom error classes for the logsift application.
 */

/**
 * Base application error class.
 */
export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * A filter expression could not be parsed. Aborts the whole query.
 */
export class FilterSyntaxError extends AppError {
  constructor(
    message: string,
    /** The complete filter expression. */
    readonly source: string,
    /** 0-based offset of the offending fragment in the source. */
    readonly position: number,
    /** The offending substring. */
    readonly fragment: string
  ) {
    super(`Invalid filter '${source}': ${message}`);
    this.name = 'FilterSyntaxError';
  }

  static empty(source: string): FilterSyntaxError {
    return new FilterSyntaxError('filter expression is empty', source, 0, source);
  }

  static danglingConnector(source: string, position: number, fragment: string): FilterSyntaxError {
    return new FilterSyntaxError(
      `'${fragment}' at position ${position} is not followed by a clause`,
      source,
      position,
      fragment
    );
  }

  static expectedPattern(source: string, position: number, fragment: string): FilterSyntaxError {
    return new FilterSyntaxError(
      `expected a search pattern at position ${position} but found '${fragment}'`,
      source,
      position,
      fragment
    );
  }

  static nothingToNegate(source: string, position: number, fragment: string): FilterSyntaxError {
    return new FilterSyntaxError(
      `'${fragment}' at position ${position} has nothing to negate`,
      source,
      position,
      fragment
    );
  }

  static unterminatedGroup(source: string, position: number): FilterSyntaxError {
    const fragment = source.slice(position);
    return new FilterSyntaxError(
      `unterminated '${fragment}' at position ${position}, missing ')'`,
      source,
      position,
      fragment
    );
  }

  static expectedClose(source: string, position: number, fragment: string): FilterSyntaxError {
    return new FilterSyntaxError(
      `expected ')' to close 'not(' but found '${fragment}' at position ${position}`,
      source,
      position,
      fragment
    );
  }

  static emptyPattern(source: string, position: number, fragment: string): FilterSyntaxError {
    return new FilterSyntaxError(
      `'${fragment}' at position ${position} has no pattern after the field name`,
      source,
      position,
      fragment
    );
  }

  static missingConnector(source: string, position: number, fragment: string): FilterSyntaxError {
    return new FilterSyntaxError(
      `expected AND or OR before '${fragment}' at position ${position}`,
      source,
      position,
      fragment
    );
  }
}

/**
 * Errors related to the query command.
 */
export class QueryError extends AppError {
  constructor(message: string) {
    super(message);
    this.name = 'QueryError';
  }

  static invalidTimestamp(value: string): QueryError {
    return new QueryError(
      `Unable to parse timestamp '${value}'. Expected UNIX timestamp or ISO format (YYYY-MM-DDTHH:MM:SS)`
    );
  }

  static missingTimestamp(): QueryError {
    return new QueryError('TIMESTAMP argument is required. Use --show-fields to list fields without one.');
  }

  static invalidFields(invalid: readonly string[], available: readonly string[]): QueryError {
    return new QueryError(
      `Invalid fields: ${invalid.join(', ')}. Available fields: ${available.join(', ')}`
    );
  }

  static invalidRange(value: number | string): QueryError {
    return new QueryError(`Invalid range '${value}'. Use a whole number of seconds >= 0 (e.g. 120)`);
  }

  static invalidLimit(value: number | string): QueryError {
    return new QueryError(`Invalid limit '${value}'. Use a whole number >= 1`);
  }

  static invalidCenter(value: number): QueryError {
    return new QueryError(`Invalid target ${value}: expected whole epoch seconds`);
  }

  static databaseNotFound(path: string): QueryError {
    return new QueryError(`Database file '${path}' not found`);
  }
}

/**
 * Errors related to the ingest command.
 */
export class IngestError extends AppError {
  constructor(message: string) {
    super(message);
    this.name = 'IngestError';
  }

  static invalidDate(value: string): IngestError {
    return new IngestError(`Invalid date '${value}'. Use YYYY-MM-DD (e.g. 2023-10-15)`);
  }

  static fileTooLarge(path: string, size: number, max: number): IngestError {
    return new IngestError(`File too large: ${path} (${size} bytes exceeds maximum of ${max} bytes)`);
  }

  static ioError(message: string): IngestError {
    return new IngestError(`I/O error: ${message}`);
  }
}

/**
 * The entry store could not be opened or written. Aborts the whole run.
 */
export class StoreError extends AppError {
  constructor(message: string) {
    super(message);
    this.name = 'StoreError';
  }

  static openFailed(path: string, cause: unknown): StoreError {
    return new StoreError(`Cannot open database '${path}': ${describeError(cause)}`);
  }

  static missingTable(path: string): StoreError {
    return new StoreError(`Database '${path}' has no logs table. Run ingest to create it.`);
  }

  static outdatedSchema(path: string): StoreError {
    return new StoreError(`Database '${path}' has no timestamp column. Run ingest once to upgrade it.`);
  }

  static operationFailed(operation: string, cause: unknown): StoreError {
    return new StoreError(`Database ${operation} failed: ${describeError(cause)}`);
  }
}

/** Message of an unknown thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
