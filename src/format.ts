/**
 * Output projection and line formatting for query results.
 */

import { OUTPUT_SEPARATOR } from './constants.js';
import type { OutputField, StoredEntry } from './types.js';

/** Value of one output field. */
export function fieldValue(entry: StoredEntry, field: OutputField): string | number {
  switch (field) {
    case 'id':
      return entry.id;
    case 'ts':
      return entry.epochSeconds;
    case 'timestamp':
      return entry.isoTimestamp;
    case 'component':
      return entry.component;
    case 'message':
      return entry.message;
  }
}

/** Field-addressable record holding the selected fields in order. */
export function projectEntry(
  entry: StoredEntry,
  fields: readonly OutputField[]
): Partial<Record<OutputField, string | number>> {
  const record: Partial<Record<OutputField, string | number>> = {};
  for (const field of fields) {
    record[field] = fieldValue(entry, field);
  }
  return record;
}

/** Column header line; ts is shown as UNIX_TS. */
export function formatHeader(fields: readonly OutputField[]): string {
  return fields
    .map((field) => (field === 'ts' ? 'UNIX_TS' : field.toUpperCase()))
    .join(OUTPUT_SEPARATOR);
}

/** One output line for an entry. */
export function formatRow(entry: StoredEntry, fields: readonly OutputField[]): string {
  return fields.map((field) => String(fieldValue(entry, field))).join(OUTPUT_SEPARATOR);
}
