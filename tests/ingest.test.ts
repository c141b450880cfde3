import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { IngestError } from '../src/errors.js';
import { executeIngest, ingestSources, type IngestEvent } from '../src/ingest.js';
import { SqliteEntryStore } from '../src/sqlite.js';
import { MemoryEntryStore } from '../src/store.js';
import type { CalendarDate } from '../src/types.js';
import type { LogSource } from '../src/utils/fileio.js';

const date: CalendarDate = { year: 2023, month: 10, day: 15 };

function memorySource(filename: string, lines: string[]): LogSource {
  return {
    filename,
    path: `/logs/${filename}`,
    lines: async function* () {
      yield* lines;
    },
  };
}

function failingSource(filename: string, error: Error): LogSource {
  return {
    filename,
    path: `/logs/${filename}`,
    lines: async function* () {
      yield '10:00:00.000 partial';
      throw error;
    },
  };
}

describe('ingestSources', () => {
  it('stores each file under its component', async () => {
    const store = new MemoryEntryStore();

    const outcome = await ingestSources(
      store,
      [
        memorySource('01 - reaper.log', ['preamble', '14:45:30.100 Error: disk full', '  at write()']),
        memorySource('02-alchemist.log', ['14:45:35.900 warning: cache cold']),
      ],
      { date }
    );

    expect(outcome.totalEntries).toBe(2);
    expect(outcome.discardedLines).toBe(1);
    expect(outcome.files).toEqual([
      { path: '/logs/01 - reaper.log', component: 'reaper', entries: 1, discardedLines: 1 },
      { path: '/logs/02-alchemist.log', component: 'alchemist', entries: 1, discardedLines: 0 },
    ]);

    const stored = store.select({ from: 0, to: 2_000_000_000, filters: [] });
    expect(stored.map((entry) => [entry.id, entry.component, entry.message])).toEqual([
      [1, 'reaper', 'Error: disk full\n  at write()'],
      [2, 'alchemist', 'warning: cache cold'],
    ]);
  });

  it('skips unreadable files without writing any of their entries', async () => {
    const store = new MemoryEntryStore();
    const events: IngestEvent[] = [];

    const outcome = await ingestSources(
      store,
      [
        failingSource('broken.log', new Error('permission denied')),
        failingSource('huge.log', IngestError.fileTooLarge('/logs/huge.log', 10, 5)),
        memorySource('ok.log', ['10:00:01.000 fine']),
      ],
      { date, onProgress: (event) => events.push(event) }
    );

    expect(outcome.skipped).toEqual([
      { path: '/logs/broken.log', reason: 'I/O error: permission denied' },
      {
        path: '/logs/huge.log',
        reason: 'File too large: /logs/huge.log (10 bytes exceeds maximum of 5 bytes)',
      },
    ]);
    expect(outcome.totalEntries).toBe(1);
    expect(store.count()).toBe(1);
    expect(events.map((event) => event.type)).toEqual([
      'file-start',
      'file-skipped',
      'file-start',
      'file-skipped',
      'file-start',
      'file-done',
    ]);
  });
});

describe('executeIngest', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'logsift-ingest-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('ingests every log file in the directory', async () => {
    fs.writeFileSync(
      path.join(tempDir, '01 - reaper.log'),
      '14:45:30.100 Error: disk full\r\n  at write()\r\n14:45:40.000 heartbeat ok\r\n'
    );
    fs.writeFileSync(path.join(tempDir, '02-alchemist.log'), '14:45:35.900 warning: cache cold\n');
    fs.writeFileSync(path.join(tempDir, 'notes.txt'), '14:45:35.900 not a log\n');
    const dbPath = path.join(tempDir, 'logs.db');

    const outcome = await executeIngest({ directory: tempDir, database: dbPath, date });

    expect(outcome.discovered).toEqual([
      path.join(tempDir, '01 - reaper.log'),
      path.join(tempDir, '02-alchemist.log'),
    ]);
    expect(outcome.totalEntries).toBe(3);

    const store = SqliteEntryStore.open(dbPath, { readonly: true });
    try {
      const entries = store.select({ from: 1697381100, to: 1697381200, filters: [] });
      expect(entries.map((entry) => [entry.epochSeconds, entry.component, entry.message])).toEqual([
        [1697381130, 'reaper', 'Error: disk full\n  at write()'],
        [1697381135, 'alchemist', 'warning: cache cold'],
        [1697381140, 'reaper', 'heartbeat ok'],
      ]);
    } finally {
      store.close();
    }
  });

  it('appends again on a repeated run', async () => {
    fs.writeFileSync(path.join(tempDir, 'gateway.log'), '08:00:00.000 up\n');
    const dbPath = path.join(tempDir, 'logs.db');

    await executeIngest({ directory: tempDir, database: dbPath, date });
    await executeIngest({ directory: tempDir, database: dbPath, date });

    const store = SqliteEntryStore.open(dbPath, { readonly: true });
    try {
      expect(store.count()).toBe(2);
    } finally {
      store.close();
    }
  });

  it('does not create a database when no files are found', async () => {
    const dbPath = path.join(tempDir, 'logs.db');

    const outcome = await executeIngest({ directory: tempDir, database: dbPath, date });

    expect(outcome.discovered).toEqual([]);
    expect(outcome.totalEntries).toBe(0);
    expect(fs.existsSync(dbPath)).toBe(false);
  });

  it('honors a custom pattern', async () => {
    fs.writeFileSync(path.join(tempDir, 'service.txt'), '08:00:00.000 up\n');
    fs.writeFileSync(path.join(tempDir, 'other.log'), '08:00:00.000 ignored\n');
    const dbPath = path.join(tempDir, 'logs.db');

    const outcome = await executeIngest({ directory: tempDir, database: dbPath, date, pattern: '*.txt' });

    expect(outcome.discovered).toEqual([path.join(tempDir, 'service.txt')]);
    expect(outcome.files.map((file) => file.component)).toEqual(['service.txt']);
  });
});
