/**
 * Query command implementation - selects stored entries around a timestamp.
 */

import { DEFAULT_OUTPUT_FIELDS, OUTPUT_FIELDS, WITH_TIME_OUTPUT_FIELDS } from './constants.js';
import { QueryError } from './errors.js';
import { parseFilters } from './filter.js';
import { planQuery } from './planner.js';
import { SqliteEntryStore } from './sqlite.js';
import { parseTargetTimestamp } from './timestamp.js';
import type { EpochRange, OutputField, ParsedFilter, StoredEntry } from './types.js';
import { fileExists } from './utils/validation.js';

/** Request parameters for the query command. */
export interface QueryRequest {
  /** Target as epoch seconds or an ISO-like UTC date time. */
  timestamp: string;
  database: string;
  rangeSeconds: number;
  /** Filter expressions, AND-combined. */
  filters: string[];
  /** Explicit output fields in order. */
  fields?: string[];
  /** Include the ts column in the default projection. */
  withTime: boolean;
  limit?: number;
}

/** Result of the query operation. */
export interface QueryOutcome {
  center: number;
  range: EpochRange;
  fields: OutputField[];
  filters: ParsedFilter[];
  entries: StoredEntry[];
}

function isOutputField(value: string): value is OutputField {
  return OUTPUT_FIELDS.some((field) => field === value);
}

/**
 * Chooses the output projection.
 * @throws QueryError if an explicit field is unknown or missing from the database
 */
export function resolveOutputFields(
  requested: readonly string[] | undefined,
  withTime: boolean,
  available: readonly string[]
): OutputField[] {
  if (!requested || requested.length === 0) {
    return withTime ? [...WITH_TIME_OUTPUT_FIELDS] : [...DEFAULT_OUTPUT_FIELDS];
  }

  const names = requested.map((name) => name.trim()).filter((name) => name !== '');
  const fields: OutputField[] = [];
  const invalid: string[] = [];

  for (const name of names) {
    if (isOutputField(name) && available.includes(name)) {
      fields.push(name);
    } else {
      invalid.push(name);
    }
  }

  if (invalid.length > 0 || fields.length === 0) {
    throw QueryError.invalidFields(invalid, available.filter(isOutputField));
  }

  return fields;
}

/** Splits a comma-separated --fields value. */
export function splitFieldList(value: string): string[] {
  return value.split(',').map((name) => name.trim());
}

/**
 * Executes the query command.
 *
 * The timestamp and every filter are parsed before the database is opened,
 * so a malformed query never touches the store.
 *
 * @throws FilterSyntaxError if a filter is malformed
 * @throws QueryError if the timestamp, window or fields are invalid or the database is missing
 * @throws StoreError if the database cannot be read
 */
export function executeQuery(request: QueryRequest): QueryOutcome {
  const center = parseTargetTimestamp(request.timestamp);
  const filters = parseFilters(request.filters);

  if (!fileExists(request.database)) {
    throw QueryError.databaseNotFound(request.database);
  }

  const store = SqliteEntryStore.open(request.database, { readonly: true });
  try {
    const fields = resolveOutputFields(request.fields, request.withTime, store.fields());
    const result = planQuery(store, {
      center,
      radiusSeconds: request.rangeSeconds,
      filters,
      limit: request.limit,
    });

    return { center, range: result.range, fields, filters, entries: result.entries };
  } finally {
    store.close();
  }
}

/**
 * Lists the fields available for projection. A missing database reports the
 * default schema.
 */
export function listFields(database: string): string[] {
  if (!fileExists(database)) {
    return [...OUTPUT_FIELDS];
  }

  const store = SqliteEntryStore.open(database, { readonly: true });
  try {
    return store.fields();
  } finally {
    store.close();
  }
}
