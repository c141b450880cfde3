/**
 * File discovery and reading for ingestion.
 */

import { promises as fs } from 'fs';
import { basename } from 'path';
import { glob } from 'glob';
import { LOG_FILE_PATTERN, MAX_FILE_SIZE } from '../constants.js';
import { IngestError } from '../errors.js';

/**
 * A log file handed to the segmenter.
 */
export interface LogSource {
  /** Filename without directory, used for the component name. */
  filename: string;
  /** Path used in diagnostics. */
  path: string;
  /** Lines of the file in order. */
  lines(): AsyncIterable<string>;
}

/**
 * Finds log files in a directory (not recursively), sorted by path.
 * @param directory Directory to search
 * @param pattern Glob matched against file names
 */
export async function discoverLogFiles(
  directory: string,
  pattern: string = LOG_FILE_PATTERN
): Promise<string[]> {
  const matches = await glob(pattern, { cwd: directory, nodir: true, absolute: true });
  return matches.sort();
}

/**
 * Reads a file and validates its size.
 * @param filePath The file to read
 * @param maxSize Maximum allowed file size in bytes
 * @returns The file contents
 * @throws IngestError if the file is too large or cannot be read
 */
export async function readFileWithSizeLimit(filePath: string, maxSize: number): Promise<string> {
  let size: number;
  try {
    size = (await fs.stat(filePath)).size;
  } catch (error) {
    throw IngestError.ioError(error instanceof Error ? error.message : String(error));
  }

  if (size > maxSize) {
    throw IngestError.fileTooLarge(filePath, size, maxSize);
  }

  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw IngestError.ioError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Yields the lines of a file. A trailing newline does not produce an extra
 * line; carriage returns are left for the segmenter to strip.
 */
export async function* readLines(
  filePath: string,
  maxSize: number = MAX_FILE_SIZE
): AsyncGenerator<string> {
  const contents = await readFileWithSizeLimit(filePath, maxSize);
  const lines = contents.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  yield* lines;
}

/** Wraps a file path as a log source. */
export function fileSource(filePath: string): LogSource {
  return {
    filename: basename(filePath),
    path: filePath,
    lines: () => readLines(filePath),
  };
}
