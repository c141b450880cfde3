/**
 * Filter evaluation, in memory and as SQL.
 */

import type { FilterClause, FilterField, LogEntry, ParsedFilter } from './types.js';

/** Name of the SQL function a store must register for compiled filters. */
export const CONTAINS_FUNCTION = 'logsift_contains';

/** Column searched for each filter field. */
const FIELD_COLUMNS: Record<FilterField, string> = {
  component: 'component',
  message: 'message',
  timestamp: 'timestamp',
  ts: 'ts',
};

/**
 * SQL condition with positional parameters.
 */
export interface SqlCondition {
  sql: string;
  params: string[];
}

/**
 * Case-insensitive substring test shared by the evaluator and the SQL
 * function, so both paths agree on every value.
 */
export function containsIgnoreCase(haystack: unknown, needle: unknown): boolean {
  if (haystack === null || haystack === undefined || needle === null || needle === undefined) {
    return false;
  }
  return String(haystack).toLowerCase().includes(String(needle).toLowerCase());
}

/** Text of the entry field a clause searches. */
export function fieldText(entry: LogEntry, field: FilterField | null): string {
  const target: FilterField = field ?? 'message';
  switch (target) {
    case 'component':
      return entry.component;
    case 'timestamp':
      return entry.isoTimestamp;
    case 'ts':
      return String(entry.epochSeconds);
    case 'message':
      return entry.message;
  }
}

/** Evaluates one clause against an entry. */
export function matchesClause(clause: FilterClause, entry: LogEntry): boolean {
  const found = containsIgnoreCase(fieldText(entry, clause.field), clause.pattern);
  return clause.negated ? !found : found;
}

/**
 * Evaluates a filter by folding its terms left to right.
 *
 * Every clause is evaluated; the running result is combined with each
 * clause result in the order written, so `a AND b OR c` is `(a AND b) OR c`.
 */
export function matchesFilter(filter: ParsedFilter, entry: LogEntry): boolean {
  const [first, ...rest] = filter.terms;
  let result = matchesClause(first.clause, entry);

  for (const term of rest) {
    const value = matchesClause(term.clause, entry);
    result = term.connector === 'AND' ? result && value : result || value;
  }

  return result;
}

/** True when the entry satisfies every filter (and for no filters at all). */
export function matchesAll(filters: readonly ParsedFilter[], entry: LogEntry): boolean {
  return filters.every((filter) => matchesFilter(filter, entry));
}

function compileClause(clause: FilterClause): SqlCondition {
  const column = FIELD_COLUMNS[clause.field ?? 'message'];
  const test = `${CONTAINS_FUNCTION}(${column}, ?)`;
  return {
    sql: clause.negated ? `NOT ${test}` : test,
    params: [clause.pattern],
  };
}

/**
 * Compiles a filter to SQL. Each connector wraps the running condition in
 * parentheses, so the fold order survives SQL's AND-before-OR precedence and
 * the clause order is unchanged.
 */
export function compileFilter(filter: ParsedFilter): SqlCondition {
  const [first, ...rest] = filter.terms;
  const compiled = compileClause(first.clause);
  let sql = compiled.sql;
  const params = [...compiled.params];

  for (const term of rest) {
    const next = compileClause(term.clause);
    sql = `(${sql} ${term.connector} ${next.sql})`;
    params.push(...next.params);
  }

  return { sql, params };
}

/**
 * Compiles several filters into one AND-combined condition, or null for none.
 */
export function compileFilters(filters: readonly ParsedFilter[]): SqlCondition | null {
  if (filters.length === 0) {
    return null;
  }

  const compiled = filters.map((filter) => compileFilter(filter));
  return {
    sql: compiled.map((condition) => `(${condition.sql})`).join(' AND '),
    params: compiled.flatMap((condition) => condition.params),
  };
}
