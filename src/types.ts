/**
 * Type definitions for the logsift CLI application.
 */

import type { OUTPUT_FIELDS } from './constants.js';

/**
 * Calendar date used to anchor times of day found in log lines.
 */
export interface CalendarDate {
  year: number;
  /** 1-12. */
  month: number;
  /** 1-31. */
  day: number;
}

/**
 * Time of day as written in a log line.
 */
export interface TimeOfDay {
  hours: number;
  minutes: number;
  seconds: number;
  milliseconds: number;
}

/**
 * A reconstructed log entry.
 */
export interface LogEntry {
  /** Seconds since the Unix epoch (UTC, milliseconds truncated). */
  epochSeconds: number;
  /** The same instant as epochSeconds, rendered as YYYY-MM-DDTHH:mm:ssZ. */
  isoTimestamp: string;
  /** Component derived from the source filename. */
  component: string;
  /** First line remainder plus continuation lines joined by line breaks. */
  message: string;
}

/**
 * A log entry as held by an entry store.
 */
export interface StoredEntry extends LogEntry {
  /** Insertion order assigned by the store. */
  id: number;
}

/** Fields a filter clause can search. */
export type FilterField = 'component' | 'message' | 'timestamp' | 'ts';

/** Connectors between filter clauses. */
export type Connector = 'AND' | 'OR';

/**
 * One `[negation] [field:] pattern` unit of a filter.
 */
export interface FilterClause {
  negated: boolean;
  /** Field to search; null searches the message. */
  field: FilterField | null;
  pattern: string;
}

/** The leading clause of a filter, which has no connector. */
export interface FirstTerm {
  connector: 'FIRST';
  clause: FilterClause;
}

/** A clause joined to the running result by a connector. */
export interface ChainedTerm {
  connector: Connector;
  clause: FilterClause;
}

/**
 * A parsed filter expression, folded strictly left to right.
 */
export interface ParsedFilter {
  /** The expression as supplied. */
  source: string;
  terms: readonly [FirstTerm, ...ChainedTerm[]];
}

/**
 * Time window around a target instant.
 */
export interface QueryWindow {
  /** Target instant in epoch seconds. */
  center: number;
  radiusSeconds: number;
}

/** Inclusive epoch-second bounds. */
export interface EpochRange {
  from: number;
  to: number;
}

/** Field names available for output projection. */
export type OutputField = (typeof OUTPUT_FIELDS)[number];

/**
 * Props for the Ink App component.
 */
export interface AppProps {
  /** The command to execute (ingest or query). */
  command?: string;
  /** Positional arguments after the command. */
  args: string[];
  /** Flags parsed by meow. */
  flags: UiFlags;
}

/**
 * Flags understood by the interactive front end.
 */
export interface UiFlags {
  date?: string;
  database: string;
  directory: string;
  pattern: string;
  range: number;
  filter: string[];
  withtime: boolean;
  fields?: string;
  limit?: number;
}
