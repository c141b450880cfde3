/**
 * Timestamp recognition and conversion. All instants are UTC.
 */

import { format, isValid, parse } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import {
  DATE_FORMAT_DASHED,
  DATE_REGEX,
  DISPLAY_TIMESTAMP_FORMAT,
  EPOCH_REGEX,
  ISO_TIMESTAMP_FORMAT,
  TARGET_TIMESTAMP_FORMATS,
  TIMESTAMP_REGEX,
} from './constants.js';
import { IngestError, QueryError } from './errors.js';
import type { CalendarDate, TimeOfDay } from './types.js';

/**
 * A time of day found inside a log line.
 */
export interface TimestampMatch {
  /** The matched text, e.g. "14:45:36.507". */
  span: string;
  /** Offset of the span within the line. */
  index: number;
  time: TimeOfDay;
  /** Effective date plus time of day. */
  instant: Date;
  epochSeconds: number;
  /** Text after the span, leading whitespace trimmed. */
  rest: string;
}

/**
 * Converts regex groups to a time of day, or null when a component is out of range.
 */
function toTimeOfDay(match: RegExpMatchArray): TimeOfDay | null {
  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const seconds = parseInt(match[3], 10);
  const milliseconds = parseInt(match[4], 10);

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  return { hours, minutes, seconds, milliseconds };
}

/** Combines a calendar date and a time of day into a UTC instant. */
export function composeInstant(date: CalendarDate, time: TimeOfDay): Date {
  return new UTCDate(
    date.year,
    date.month - 1,
    date.day,
    time.hours,
    time.minutes,
    time.seconds,
    time.milliseconds
  );
}

/** Whole seconds since the epoch; sub-second precision is dropped. */
export function toEpochSeconds(instant: Date): number {
  return Math.floor(instant.getTime() / 1000);
}

/**
 * Finds the first valid HH:MM:SS.mmm time of day in a line.
 *
 * Timestamp-shaped text with an out-of-range hour, minute or second is
 * skipped as noise. Returns null when the line holds no valid timestamp.
 */
export function recognizeTimestamp(line: string, date: CalendarDate): TimestampMatch | null {
  for (const match of line.matchAll(TIMESTAMP_REGEX)) {
    const time = toTimeOfDay(match);
    if (!time) {
      continue;
    }

    const span = match[0];
    const index = match.index ?? 0;
    const instant = composeInstant(date, time);

    return {
      span,
      index,
      time,
      instant,
      epochSeconds: toEpochSeconds(instant),
      rest: line.slice(index + span.length).trimStart(),
    };
  }

  return null;
}

/** Canonical ISO twin of an epoch-seconds value (YYYY-MM-DDTHH:mm:ssZ). */
export function formatIsoTimestamp(epochSeconds: number): string {
  return format(new UTCDate(epochSeconds * 1000), ISO_TIMESTAMP_FORMAT);
}

/** Readable UTC rendering for banners (YYYY-MM-DD HH:mm:ss). */
export function formatDisplayTimestamp(epochSeconds: number): string {
  return format(new UTCDate(epochSeconds * 1000), DISPLAY_TIMESTAMP_FORMAT);
}

/**
 * Parses an ingestion date in YYYY-MM-DD format.
 * @throws IngestError if the value is not a real calendar date
 */
export function parseCalendarDate(value: string): CalendarDate {
  const trimmed = value.trim();
  if (!DATE_REGEX.test(trimmed)) {
    throw IngestError.invalidDate(value);
  }

  const parsed = parse(trimmed, DATE_FORMAT_DASHED, new UTCDate(0));
  if (!isValid(parsed)) {
    throw IngestError.invalidDate(value);
  }

  return {
    year: parsed.getFullYear(),
    month: parsed.getMonth() + 1,
    day: parsed.getDate(),
  };
}

/** Today's date in UTC. */
export function todayUtc(): CalendarDate {
  const now = new UTCDate();
  return {
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate(),
  };
}

/** Formats a calendar date as YYYY-MM-DD. */
export function formatCalendarDate(date: CalendarDate): string {
  return format(new UTCDate(date.year, date.month - 1, date.day), DATE_FORMAT_DASHED);
}

/**
 * Parses a query target given as epoch seconds or as an ISO-like UTC date time.
 * @throws QueryError if no accepted format matches
 */
export function parseTargetTimestamp(value: string): number {
  const trimmed = value.trim();

  if (EPOCH_REGEX.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  for (const targetFormat of TARGET_TIMESTAMP_FORMATS) {
    const parsed = parse(trimmed, targetFormat, new UTCDate(0));
    if (isValid(parsed)) {
      return toEpochSeconds(parsed);
    }
  }

  throw QueryError.invalidTimestamp(value);
}
