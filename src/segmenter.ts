/**
 * Log segmentation: turns a file's lines into timestamp-anchored entries.
 */

import { formatIsoTimestamp, recognizeTimestamp } from './timestamp.js';
import type { CalendarDate, LogEntry } from './types.js';

/** An entry whose message is still collecting continuation lines. */
interface PendingEntry {
  epochSeconds: number;
  lines: string[];
}

/**
 * Segmenter state. `idle` has no open entry, `accumulating` holds one.
 */
export type SegmenterState =
  | { kind: 'idle' }
  | { kind: 'accumulating'; entry: PendingEntry };

/**
 * Result of segmenting a complete line sequence.
 */
export interface SegmentResult {
  entries: LogEntry[];
  /** Non-blank lines seen before the first timestamp. */
  discardedLines: number;
}

/**
 * Line-by-line state machine for one log file.
 *
 * A line carrying a timestamp closes the open entry and starts a new one;
 * any other line is a continuation of the open entry, or is discarded when
 * no entry has been opened yet.
 */
export class LogSegmenter {
  private state: SegmenterState = { kind: 'idle' };
  private discarded = 0;

  constructor(
    private readonly component: string,
    private readonly date: CalendarDate
  ) {}

  /** Current state, exposed for inspection. */
  get current(): SegmenterState {
    return this.state;
  }

  /** Lines dropped because they preceded the first timestamp. */
  get discardedLines(): number {
    return this.discarded;
  }

  /**
   * Feeds one line.
   * @returns The entry finalized by this line, if any
   */
  push(rawLine: string): LogEntry | null {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

    // Blank lines carry no content in either state
    if (line === '') {
      return null;
    }

    const match = recognizeTimestamp(line, this.date);

    if (match) {
      const finished = this.finalize();
      this.state = {
        kind: 'accumulating',
        entry: { epochSeconds: match.epochSeconds, lines: [match.rest] },
      };
      return finished;
    }

    if (this.state.kind === 'accumulating') {
      this.state.entry.lines.push(line);
    } else {
      this.discarded++;
    }
    return null;
  }

  /**
   * Signals end of input.
   * @returns The last open entry, if any
   */
  finish(): LogEntry | null {
    const finished = this.finalize();
    this.state = { kind: 'idle' };
    return finished;
  }

  private finalize(): LogEntry | null {
    if (this.state.kind === 'idle') {
      return null;
    }

    const { epochSeconds, lines } = this.state.entry;
    return {
      epochSeconds,
      isoTimestamp: formatIsoTimestamp(epochSeconds),
      component: this.component,
      message: lines.join('\n'),
    };
  }
}

/**
 * Segments a complete sequence of lines from one file.
 */
export function segmentLines(
  lines: Iterable<string>,
  component: string,
  date: CalendarDate
): SegmentResult {
  const segmenter = new LogSegmenter(component, date);
  const entries: LogEntry[] = [];

  for (const line of lines) {
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
