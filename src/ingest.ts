/**
 * Ingest command implementation - segments log files into the entry store.
 */

import { componentName } from './component.js';
import { LOG_FILE_PATTERN } from './constants.js';
import { AppError, describeError } from './errors.js';
import { LogSegmenter, type SegmentResult } from './segmenter.js';
import { SqliteEntryStore } from './sqlite.js';
import type { EntryStore } from './store.js';
import type { CalendarDate, LogEntry } from './types.js';
import { discoverLogFiles, fileSource, type LogSource } from './utils/fileio.js';

/** Progress reported while ingesting. */
export type IngestEvent =
  | { type: 'file-start'; path: string; component: string }
  | { type: 'file-done'; path: string; component: string; entries: number; discardedLines: number }
  | { type: 'file-skipped'; path: string; reason: string };

/** Per-file result. */
export interface IngestedFile {
  path: string;
  component: string;
  entries: number;
  /** Lines before the first timestamp, which have no entry to join. */
  discardedLines: number;
}

/** A file that could not be ingested. */
export interface SkippedFile {
  path: string;
  reason: string;
}

/** Result of an ingestion run. */
export interface IngestOutcome {
  files: IngestedFile[];
  skipped: SkippedFile[];
  totalEntries: number;
  discardedLines: number;
}

/** Options shared by every file of a run. */
export interface IngestOptions {
  /** Calendar date anchoring the times of day found in the files. */
  date: CalendarDate;
  onProgress?: (event: IngestEvent) => void;
}

/** Request parameters for the ingest command. */
export interface IngestRequest {
  directory: string;
  database: string;
  date: CalendarDate;
  /** Glob for log files; defaults to *.log. */
  pattern?: string;
}

/** Outcome of the ingest command, including the files it found. */
export interface IngestCommandOutcome extends IngestOutcome {
  discovered: string[];
}

/** Segments one source completely before anything is written. */
async function segmentSource(
  source: LogSource,
  component: string,
  date: CalendarDate
): Promise<SegmentResult> {
  const segmenter = new LogSegmenter(component, date);
  const entries: LogEntry[] = [];

  for await (const line of source.lines()) {
    const entry = segmenter.push(line);
    if (entry) {
      entries.push(entry);
    }
  }

  const last = segmenter.finish();
  if (last) {
    entries.push(last);
  }

  return { entries, discardedLines: segmenter.discardedLines };
}

/**
 * Segments each source independently and appends its entries to the store.
 *
 * A source that cannot be read is reported and skipped; earlier files stay
 * written. Store failures abort the run.
 */
export async function ingestSources(
  store: EntryStore,
  sources: readonly LogSource[],
  options: IngestOptions
): Promise<IngestOutcome> {
  const report = options.onProgress ?? (() => undefined);
  const outcome: IngestOutcome = { files: [], skipped: [], totalEntries: 0, discardedLines: 0 };

  for (const source of sources) {
    const component = componentName(source.filename);
    report({ type: 'file-start', path: source.path, component });

    let segmented: SegmentResult;
    try {
      segmented = await segmentSource(source, component, options.date);
    } catch (error) {
      const reason = error instanceof AppError ? error.message : `I/O error: ${describeError(error)}`;
      outcome.skipped.push({ path: source.path, reason });
      report({ type: 'file-skipped', path: source.path, reason });
      continue;
    }

    const written = store.append(segmented.entries);
    outcome.files.push({
      path: source.path,
      component,
      entries: written,
      discardedLines: segmented.discardedLines,
    });
    outcome.totalEntries += written;
    outcome.discardedLines += segmented.discardedLines;
    report({
      type: 'file-done',
      path: source.path,
      component,
      entries: written,
      discardedLines: segmented.discardedLines,
    });
  }

  return outcome;
}

/**
 * Executes the ingest command: discovers log files and stores their entries.
 * @throws StoreError if the database cannot be opened or written
 */
export async function executeIngest(
  request: IngestRequest,
  onProgress?: (event: IngestEvent) => void
): Promise<IngestCommandOutcome> {
  const discovered = await discoverLogFiles(request.directory, request.pattern ?? LOG_FILE_PATTERN);
  if (discovered.length === 0) {
    return { discovered, files: [], skipped: [], totalEntries: 0, discardedLines: 0 };
  }

  const store = SqliteEntryStore.open(request.database);
  try {
    const outcome = await ingestSources(store, discovered.map(fileSource), {
      date: request.date,
      onProgress,
    });
    return { discovered, ...outcome };
  } finally {
    store.close();
  }
}
