/**
 * Input validation utilities shared by the command line and the Ink front end.
 */

import * as fs from 'node:fs';
import { QueryError } from '../errors.js';
import { parseCalendarDate } from '../timestamp.js';
import type { CalendarDate } from '../types.js';

const WHOLE_NUMBER_REGEX = /^\d+$/;

function parseWholeNumber(value: string): number | null {
  const trimmed = value.trim();
  if (!WHOLE_NUMBER_REGEX.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Validates a query radius in seconds.
 * @throws QueryError if the value is not a whole number >= 0
 */
export function validateRange(value: string): number {
  const parsed = parseWholeNumber(value);
  if (parsed === null) {
    throw QueryError.invalidRange(value);
  }
  return parsed;
}

/**
 * Validates a result limit.
 * @throws QueryError if the value is not a whole number >= 1
 */
export function validateLimit(value: string): number {
  const parsed = parseWholeNumber(value);
  if (parsed === null || parsed < 1) {
    throw QueryError.invalidLimit(value);
  }
  return parsed;
}

/**
 * Validates a date string in YYYY-MM-DD format.
 * @throws IngestError if invalid
 */
export function validateDate(value: string): CalendarDate {
  return parseCalendarDate(value);
}

/**
 * Checks if a file exists.
 */
export function fileExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}
