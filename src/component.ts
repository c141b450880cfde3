/**
 * Component naming from log filenames.
 */

import * as path from 'node:path';
import { COMPONENT_PREFIX_REGEX, LOG_EXTENSION_REGEX } from './constants.js';

/**
 * Derives the component name for a log file.
 *
 * Strips a leading numeric prefix such as "01 - " and a trailing ".log",
 * e.g. "01 - reaper.log" becomes "reaper". Never returns an empty string:
 * when stripping consumes everything, the stem (or the filename) is used.
 *
 * @throws Error if the filename is empty
 */
export function componentName(filename: string): string {
  const basename = path.basename(filename);
  if (basename.trim() === '') {
    throw new Error('componentName requires a non-empty filename');
  }

  const stem = basename.replace(LOG_EXTENSION_REGEX, '');
  const name = stem.replace(COMPONENT_PREFIX_REGEX, '').trim();
  if (name !== '') {
    return name;
  }

  return stem.trim() || basename;
}
