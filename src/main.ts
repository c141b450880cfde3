/**
 * Command dispatch for the logsift CLI.
 */

import { CommanderError } from 'commander';
import { createProgram, type IngestArgs, type QueryArgs } from './cli.js';
import { formatHeader, formatRow } from './format.js';
import { describeIngestEvent } from './progress.js';
import { executeIngest, type IngestEvent } from './ingest.js';
import { executeQuery, listFields } from './query.js';
import { formatCalendarDate, formatDisplayTimestamp, todayUtc } from './timestamp.js';
import { QueryError } from './errors.js';

/** Where the CLI writes its output. */
export interface ConsoleIO {
  log(message: string): void;
  error(message: string): void;
}

const RULE = '-'.repeat(80);

function reportIngestEvent(io: ConsoleIO, event: IngestEvent): void {
  for (const line of describeIngestEvent(event)) {
    if (line.level === 'warning' || line.level === 'error') {
      io.error(line.text);
    } else {
      io.log(line.text);
    }
  }
}

async function runIngest(io: ConsoleIO, args: IngestArgs): Promise<number> {
  const date = args.date ?? todayUtc();

  io.log(`Using reference date: ${formatCalendarDate(date)}`);
  io.log(`Database: ${args.database}`);
  io.log(`Search directory: ${args.directory}`);

  const outcome = await executeIngest(
    { directory: args.directory, database: args.database, date, pattern: args.pattern },
    (event) => reportIngestEvent(io, event)
  );

  if (outcome.discovered.length === 0) {
    io.log(`No ${args.pattern} files found in the specified directory.`);
    return 0;
  }

  io.log('');
  io.log(`Completed! Processed ${outcome.totalEntries} total log entries.`);
  if (outcome.skipped.length > 0) {
    io.error(`Skipped ${outcome.skipped.length} unreadable file(s).`);
  }
  io.log(`Database saved to: ${args.database}`);
  return 0;
}

function runQuery(io: ConsoleIO, args: QueryArgs): number {
  if (args.showFields) {
    io.log('Available fields:');
    for (const field of listFields(args.database)) {
      io.log(`  ${field}`);
    }
    return 0;
  }

  if (args.timestamp === undefined) {
    throw QueryError.missingTimestamp();
  }

  const outcome = executeQuery({
    timestamp: args.timestamp,
    database: args.database,
    rangeSeconds: args.range,
    filters: args.filters,
    fields: args.fields,
    withTime: args.withTime,
    limit: args.limit,
  });

  io.log(
    `Querying logs from ${formatDisplayTimestamp(outcome.range.from)} to ${formatDisplayTimestamp(outcome.range.to)} (UTC)`
  );
  if (args.filters.length > 0) {
    io.log(`Filters: ${args.filters.join(', ')}`);
  }

  if (outcome.entries.length === 0) {
    io.log('No matching log entries found. Try widening the time window with --range.');
    return 0;
  }

  io.log('');
  io.log(`Found ${outcome.entries.length} matching entries:`);
  io.log(RULE);
  io.log(formatHeader(outcome.fields));
  io.log(RULE);
  for (const entry of outcome.entries) {
    io.log(formatRow(entry, outcome.fields));
  }
  return 0;
}

/**
 * Runs the CLI.
 * @param argv Full argument vector, including the node and script entries
 * @returns The process exit code
 */
export async function main(argv: readonly string[], io: ConsoleIO = console): Promise<number> {
  const program = createProgram();

  // Subcommands do not inherit settings applied after they were added
  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    command.configureOutput({
      writeOut: (str) => io.log(str.trimEnd()),
      writeErr: (str) => io.error(str.trimEnd()),
    });
  }

  try {
    await program.parseAsync([...argv]);

    // Handle ingest command
    if (program.ingestArgs) {
      return await runIngest(io, program.ingestArgs);
    }

    // Handle query command
    if (program.queryArgs) {
      return runQuery(io, program.queryArgs);
    }

    // No command specified - show help
    io.log(program.helpInformation().trimEnd());
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof Error) {
      io.error(`Error: ${error.message}`);
      return 1;
    }
    io.error('Error: An unknown error occurred');
    return 1;
  }
}
