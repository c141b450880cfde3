import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import Database from 'better-sqlite3';
import { StoreError } from '../src/errors.js';
import { parseFilter, parseFilters } from '../src/filter.js';
import { SqliteEntryStore } from '../src/sqlite.js';
import { MemoryEntryStore, type EntryStore } from '../src/store.js';
import { formatIsoTimestamp } from '../src/timestamp.js';
import type { LogEntry } from '../src/types.js';

const BASE = 1697328000;

function makeEntry(offset: number, component: string, message: string): LogEntry {
  return {
    epochSeconds: BASE + offset,
    isoTimestamp: formatIsoTimestamp(BASE + offset),
    component,
    message,
  };
}

const sample: LogEntry[] = [
  makeEntry(100, 'reaper', 'started'),
  makeEntry(50, 'alchemist', 'Error: disk full'),
  makeEntry(100, 'alchemist', 'warning: slow'),
  makeEntry(300, 'reaper', 'debug tick'),
];

const factories: Array<[string, () => EntryStore]> = [
  ['MemoryEntryStore', () => new MemoryEntryStore()],
  ['SqliteEntryStore', () => SqliteEntryStore.open(':memory:')],
];

describe.each(factories)('%s', (_name, createStore) => {
  let store: EntryStore;

  beforeEach(() => {
    store = createStore();
    store.append(sample);
  });

  afterEach(() => {
    store.close();
  });

  it('counts appended entries', () => {
    expect(store.count()).toBe(4);
    expect(store.append([makeEntry(400, 'reaper', 'more')])).toBe(1);
    expect(store.count()).toBe(5);
  });

  it('orders by time, then by insertion within a second', () => {
    const entries = store.select({ from: BASE + 50, to: BASE + 100, filters: [] });

    expect(entries.map((entry) => entry.id)).toEqual([2, 1, 3]);
    expect(entries.map((entry) => entry.message)).toEqual(['Error: disk full', 'started', 'warning: slow']);
  });

  it('includes both window bounds', () => {
    const entries = store.select({ from: BASE + 100, to: BASE + 300, filters: [] });

    expect(entries.map((entry) => entry.id)).toEqual([1, 3, 4]);
  });

  it('returns entries with every stored field', () => {
    const [entry] = store.select({ from: BASE + 300, to: BASE + 300, filters: [] });

    expect(entry).toEqual({
      id: 4,
      epochSeconds: 1697328300,
      isoTimestamp: '2023-10-15T00:05:00Z',
      component: 'reaper',
      message: 'debug tick',
    });
  });

  it('applies filters', () => {
    const alchemist = store.select({ from: BASE, to: BASE + 1000, filters: [parseFilter('component:alchemist')] });
    expect(alchemist.map((entry) => entry.id)).toEqual([2, 3]);

    const combined = store.select({
      from: BASE,
      to: BASE + 1000,
      filters: parseFilters(['component:alchemist', '!warning']),
    });
    expect(combined.map((entry) => entry.id)).toEqual([2]);
  });

  it('folds filters left to right', () => {
    const entries = store.select({
      from: BASE,
      to: BASE + 1000,
      filters: [parseFilter('tick OR started AND component:reaper')],
    });

    expect(entries.map((entry) => entry.id)).toEqual([1, 4]);
  });

  it('matches ts clauses as text', () => {
    const entries = store.select({ from: BASE, to: BASE + 1000, filters: [parseFilter('ts:1697328300')] });

    expect(entries.map((entry) => entry.id)).toEqual([4]);
  });

  it('caps results at the limit', () => {
    const entries = store.select({ from: BASE, to: BASE + 1000, filters: [], limit: 2 });

    expect(entries.map((entry) => entry.id)).toEqual([2, 1]);
  });

  it('returns entries the caller cannot use to change the store', () => {
    const [first] = store.select({ from: BASE + 300, to: BASE + 300, filters: [] });
    first.message = 'changed';

    const [again] = store.select({ from: BASE + 300, to: BASE + 300, filters: [] });
    expect(again.message).toBe('debug tick');
  });

  it('returns an empty list for an empty window', () => {
    expect(store.select({ from: BASE + 101, to: BASE + 299, filters: [] })).toEqual([]);
  });

  it('lists the projection fields', () => {
    expect(store.fields()).toEqual(['id', 'ts', 'timestamp', 'component', 'message']);
  });
});

describe('SqliteEntryStore on disk', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'logsift-store-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('persists entries across connections', () => {
    const dbPath = path.join(tempDir, 'logs.db');

    const writer = SqliteEntryStore.open(dbPath);
    writer.append(sample);
    writer.close();

    const reader = SqliteEntryStore.open(dbPath, { readonly: true });
    try {
      expect(reader.count()).toBe(4);
    } finally {
      reader.close();
    }
  });

  it('fails to open a missing file when it must exist', () => {
    expect(() => SqliteEntryStore.open(path.join(tempDir, 'missing.db'), { readonly: true })).toThrow(
      StoreError
    );
  });

  it('reports a read-only database without a logs table', () => {
    const dbPath = path.join(tempDir, 'other.db');
    const other = new Database(dbPath);
    other.exec('CREATE TABLE notes (body TEXT)');
    other.close();

    expect(() => SqliteEntryStore.open(dbPath, { readonly: true })).toThrow(
      `Database '${dbPath}' has no logs table. Run ingest to create it.`
    );
  });

  it('does not migrate an older database opened read-only', () => {
    const dbPath = path.join(tempDir, 'legacy.db');
    const legacy = new Database(dbPath);
    legacy.exec('CREATE TABLE logs (id INTEGER PRIMARY KEY AUTOINCREMENT, ts INTEGER, component TEXT, message TEXT)');
    legacy.close();

    expect(() => SqliteEntryStore.open(dbPath, { readonly: true })).toThrow(
      `Database '${dbPath}' has no timestamp column. Run ingest once to upgrade it.`
    );

    const check = new Database(dbPath, { readonly: true });
    try {
      const columns = check.prepare<[], { name: string }>('PRAGMA table_info(logs)').all();
      expect(columns.map((column) => column.name)).toEqual(['id', 'ts', 'component', 'message']);
    } finally {
      check.close();
    }
  });

  it('rejects writes through a read-only store', () => {
    const dbPath = path.join(tempDir, 'logs.db');
    SqliteEntryStore.open(dbPath).close();

    const reader = SqliteEntryStore.open(dbPath, { readonly: true });
    try {
      expect(() => reader.append(sample)).toThrow(StoreError);
    } finally {
      reader.close();
    }
  });

  it('fails to open a file that is not a database', () => {
    const dbPath = path.join(tempDir, 'notes.db');
    fs.writeFileSync(dbPath, 'plain text, not a database\n'.repeat(200));

    expect(() => SqliteEntryStore.open(dbPath)).toThrow(StoreError);
  });

  it('adds and backfills the ISO column on older databases', () => {
    const dbPath = path.join(tempDir, 'legacy.db');
    const legacy = new Database(dbPath);
    legacy.exec(`
      CREATE TABLE logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts INTEGER NOT NULL,
        component VARCHAR(255) NOT NULL,
        message TEXT NOT NULL
      )
    `);
    legacy
      .prepare('INSERT INTO logs (ts, component, message) VALUES (?, ?, ?)')
      .run(1697381136, 'reaper', 'legacy row');
    legacy.close();

    const store = SqliteEntryStore.open(dbPath);
    try {
      expect(store.fields()).toEqual(['id', 'ts', 'component', 'message', 'timestamp']);
      expect(store.select({ from: 1697381136, to: 1697381136, filters: [] })).toEqual([
        {
          id: 1,
          epochSeconds: 1697381136,
          isoTimestamp: '2023-10-15T14:45:36Z',
          component: 'reaper',
          message: 'legacy row',
        },
      ]);
    } finally {
      store.close();
    }
  });
});
