/**
 * Query planning over a time window.
 */

import { QueryError } from './errors.js';
import type { EntryStore } from './store.js';
import type { EpochRange, ParsedFilter, QueryWindow, StoredEntry } from './types.js';

/**
 * A time-windowed query.
 */
export interface QueryPlan extends QueryWindow {
  /** AND-combined filters; empty keeps every entry in the window. */
  filters: readonly ParsedFilter[];
  /** Optional cap on the number of entries returned. */
  limit?: number;
}

/**
 * Entries selected by a plan.
 */
export interface QueryResult {
  range: EpochRange;
  /** Ascending by time, insertion order within a second. Empty is a normal outcome. */
  entries: StoredEntry[];
}

/** Inclusive bounds of a window: [center - radius, center + radius]. */
export function resolveWindow(window: QueryWindow): EpochRange {
  return {
    from: window.center - window.radiusSeconds,
    to: window.center + window.radiusSeconds,
  };
}

function validatePlan(plan: QueryPlan): void {
  if (!Number.isInteger(plan.center)) {
    throw QueryError.invalidCenter(plan.center);
  }
  if (!Number.isInteger(plan.radiusSeconds) || plan.radiusSeconds < 0) {
    throw QueryError.invalidRange(plan.radiusSeconds);
  }
  if (plan.limit !== undefined && (!Number.isInteger(plan.limit) || plan.limit < 1)) {
    throw QueryError.invalidLimit(plan.limit);
  }
}

/**
 * Retrieves the window's entries that satisfy every filter.
 * @throws QueryError if the window or limit is invalid
 */
export function planQuery(store: EntryStore, plan: QueryPlan): QueryResult {
  validatePlan(plan);

  const range = resolveWindow(plan);
  const entries = store.select({
    from: range.from,
    to: range.to,
    filters: plan.filters,
    limit: plan.limit,
  });

  return { range, entries };
}
