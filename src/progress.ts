/**
 * Progress lines for ingest events, shared by the console and Ink front ends.
 */

import type { IngestEvent } from './ingest.js';

export type ProgressLevel = 'info' | 'success' | 'warning' | 'error';

/** One line of progress output. */
export interface ProgressLine {
  level: ProgressLevel;
  text: string;
}

/** Lines reported for a single ingest event. */
export function describeIngestEvent(event: IngestEvent): ProgressLine[] {
  switch (event.type) {
    case 'file-start':
      return [{ level: 'info', text: `  ${event.path} -> component: ${event.component}` }];
    case 'file-done': {
      const lines: ProgressLine[] = [
        { level: 'success', text: `Processed ${event.entries} entries from ${event.component}` },
      ];
      if (event.discardedLines > 0) {
        lines.push({
          level: 'warning',
          text: `Warning: ${event.discardedLines} line(s) before the first timestamp in ${event.path} were discarded`,
        });
      }
      return lines;
    }
    case 'file-skipped':
      return [{ level: 'error', text: `Error processing ${event.path}: ${event.reason}` }];
  }
}
