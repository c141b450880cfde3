#!/usr/bin/env node
/**
 * Interactive entry point for logsift using Ink.
 */

// eslint-disable-next-line @typescript-eslint/no-unused-vars
import React from 'react';
import { render } from 'ink';
import meow from 'meow';
import App from './components/App.js';
import { DEFAULT_DATABASE, DEFAULT_RANGE_SECONDS, LOG_FILE_PATTERN } from './constants.js';
import type { UiFlags } from './types.js';

const cli = meow(
  `
  Usage
    $ logsift-ui <command> [options]

  Commands
    ingest             Segment *.log files into the database
    query <timestamp>  Show entries around a timestamp

  Options for ingest:
    --date <date>      Date for the times of day in the logs (YYYY-MM-DD, UTC)
    --directory <dir>  Directory to search for log files
    --pattern <glob>   File name pattern of the log files

  Options for query:
    --range <seconds>  Seconds before and after the timestamp
    --filter <expr>    Filter expression (repeatable)
    --withtime         Include the UNIX timestamp column
    --fields <list>    Comma-separated output fields
    --limit <n>        Maximum number of entries

  Shared options:
    --database <path>  SQLite database file path

  Examples
    $ logsift-ui ingest --date 2023-10-15 --directory ./logs
    $ logsift-ui query 2023-10-15T14:45:36 --filter "error AND component:reaper"
`,
  {
    importMeta: import.meta,
    flags: {
      date: {
        type: 'string',
      },
      database: {
        type: 'string',
        default: DEFAULT_DATABASE,
      },
      directory: {
        type: 'string',
        default: '.',
      },
      pattern: {
        type: 'string',
        default: LOG_FILE_PATTERN,
      },
      range: {
        type: 'number',
        default: DEFAULT_RANGE_SECONDS,
      },
      filter: {
        type: 'string',
        isMultiple: true,
        default: [],
      },
      withtime: {
        type: 'boolean',
        default: false,
      },
      fields: {
        type: 'string',
      },
      limit: {
        type: 'number',
      },
    },
  }
);

// Extract command and arguments
const command = cli.input[0];
const args = cli.input.slice(1);

const flags: UiFlags = {
  date: cli.flags.date,
  database: cli.flags.database,
  directory: cli.flags.directory,
  pattern: cli.flags.pattern,
  range: cli.flags.range,
  filter: cli.flags.filter,
  withtime: cli.flags.withtime,
  fields: cli.flags.fields,
  limit: cli.flags.limit,
};

render(<App command={command} args={args} flags={flags} />);
