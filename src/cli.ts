/**
 * CLI interface using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_DATABASE, DEFAULT_RANGE_SECONDS, LOG_FILE_PATTERN } from './constants.js';
import { AppError } from './errors.js';
import { splitFieldList } from './query.js';
import type { CalendarDate } from './types.js';
import { validateDate, validateLimit, validateRange } from './utils/validation.js';

/** Turns a validation failure into a commander argument error. */
function asArgument<T>(validate: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return validate(value);
    } catch (error) {
      if (error instanceof AppError) {
        throw new InvalidArgumentError(error.message);
      }
      throw error;
    }
  };
}

/** Collect repeated --filter options. */
function collectFilter(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Parsed arguments for the ingest command. */
export interface IngestArgs {
  /** Undefined means today (UTC). */
  date?: CalendarDate;
  database: string;
  directory: string;
  pattern: string;
}

/** Parsed arguments for the query command. */
export interface QueryArgs {
  timestamp?: string;
  database: string;
  range: number;
  filters: string[];
  withTime: boolean;
  fields?: string[];
  limit?: number;
  showFields: boolean;
}

/** Create and configure the CLI program. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('logsift')
    .description('Ingest multi-line service logs into SQLite and query them around a point in time')
    .version('0.1.0');

  program
    .command('ingest')
    .description('Segment *.log files into timestamped entries and store them in the database')
    .option('-d, --date <date>', 'Date for the times of day found in the logs (YYYY-MM-DD, UTC). Defaults to today.', asArgument(validateDate))
    .option('--database <path>', 'SQLite database file path', DEFAULT_DATABASE)
    .option('--directory <dir>', 'Directory to search for log files', '.')
    .option('--pattern <glob>', 'File name pattern of the log files', LOG_FILE_PATTERN)
    .action((options: { date?: CalendarDate; database: string; directory: string; pattern: string }) => {
      // Store parsed args for later retrieval
      program.ingestArgs = {
        date: options.date,
        database: options.database,
        directory: options.directory,
        pattern: options.pattern,
      };
    });

  program
    .command('query')
    .description('Show entries within a time range around a timestamp')
    .argument('[timestamp]', 'UNIX timestamp (1697381136) or ISO date time in UTC (2023-10-15T14:45:36)')
    .option('--database <path>', 'SQLite database file path', DEFAULT_DATABASE)
    .option('-r, --range <seconds>', 'Seconds before and after the timestamp', asArgument(validateRange), DEFAULT_RANGE_SECONDS)
    .option(
      '-f, --filter <expr>',
      "Filter expression, repeatable and AND-combined (e.g. 'error AND component:reaper', 'not(debug)', '!warning')",
      collectFilter,
      []
    )
    .option('--withtime', 'Include the ts (UNIX timestamp) column in the output', false)
    .option('--fields <list>', "Fields to print and their order, comma-separated (e.g. 'timestamp,component,message')")
    .option('-l, --limit <n>', 'Maximum number of entries to print', asArgument(validateLimit))
    .option('--show-fields', 'List the available fields and exit', false)
    .action(
      (
        timestamp: string | undefined,
        options: {
          database: string;
          range: number;
          filter: string[];
          withtime: boolean;
          fields?: string;
          limit?: number;
          showFields: boolean;
        }
      ) => {
        // Store parsed args for later retrieval
        program.queryArgs = {
          timestamp,
          database: options.database,
          range: options.range,
          filters: options.filter,
          withTime: options.withtime,
          fields: options.fields === undefined ? undefined : splitFieldList(options.fields),
          limit: options.limit,
          showFields: options.showFields,
        };
      }
    );

  return program;
}

// Extend Command type to include our custom properties
declare module 'commander' {
  interface Command {
    ingestArgs?: IngestArgs;
    queryArgs?: QueryArgs;
  }
}
