/**
 * Entry store contract and the in-memory implementation.
 */

import { OUTPUT_FIELDS } from './constants.js';
import { matchesAll } from './predicate.js';
import type { LogEntry, OutputField, ParsedFilter, StoredEntry } from './types.js';

/**
 * Selection of stored entries.
 */
export interface EntryQuery {
  /** Inclusive lower bound in epoch seconds. */
  from: number;
  /** Inclusive upper bound in epoch seconds. */
  to: number;
  /** Every filter must match. */
  filters: readonly ParsedFilter[];
  /** Maximum number of rows from the head of the ordering. */
  limit?: number;
}

/**
 * Append-only table of log entries.
 *
 * Implementations assign increasing ids in append order and return
 * selections ordered by epochSeconds, then id.
 */
export interface EntryStore {
  /** Writes a batch of entries in order, all or nothing. Returns the count written. */
  append(entries: readonly LogEntry[]): number;
  select(query: EntryQuery): StoredEntry[];
  /** Column names available for output projection. */
  fields(): string[];
  count(): number;
  close(): void;
}

/** Ascending by time, insertion order within the same second. */
export function compareStoredEntries(a: StoredEntry, b: StoredEntry): number {
  return a.epochSeconds - b.epochSeconds || a.id - b.id;
}

/**
 * Entry store held in process memory.
 */
export class MemoryEntryStore implements EntryStore {
  private readonly rows: StoredEntry[] = [];
  private nextId = 1;

  append(entries: readonly LogEntry[]): number {
    for (const entry of entries) {
      this.rows.push({ id: this.nextId++, ...entry });
    }
    return entries.length;
  }

  select(query: EntryQuery): StoredEntry[] {
    const matches = this.rows
      .filter((row) => row.epochSeconds >= query.from && row.epochSeconds <= query.to)
      .filter((row) => matchesAll(query.filters, row))
      .sort(compareStoredEntries)
      .map((row) => ({ ...row }));

    return query.limit === undefined ? matches : matches.slice(0, query.limit);
  }

  fields(): OutputField[] {
    return [...OUTPUT_FIELDS];
  }

  count(): number {
    return this.rows.length;
  }

  close(): void {
    // Nothing to release
  }
}
