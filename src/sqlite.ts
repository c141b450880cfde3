/**
 * SQLite entry store backed by better-sqlite3.
 */

import Database from 'better-sqlite3';
import { StoreError } from './errors.js';
import { CONTAINS_FUNCTION, compileFilters, containsIgnoreCase } from './predicate.js';
import type { EntryQuery, EntryStore } from './store.js';
import { formatIsoTimestamp } from './timestamp.js';
import type { LogEntry, StoredEntry } from './types.js';

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ts INTEGER NOT NULL,
    timestamp VARCHAR(50) NOT NULL,
    component VARCHAR(255) NOT NULL,
    message TEXT NOT NULL
  )
`;

const CREATE_INDEXES_SQL = `
  CREATE INDEX IF NOT EXISTS idx_logs_ts ON logs(ts);
  CREATE INDEX IF NOT EXISTS idx_logs_timestamp ON logs(timestamp);
  CREATE INDEX IF NOT EXISTS idx_logs_component ON logs(component);
  CREATE INDEX IF NOT EXISTS idx_logs_ts_component ON logs(ts, component);
`;

/** Row shape of the logs table. */
interface LogRow {
  id: number;
  ts: number;
  timestamp: string;
  component: string;
  message: string;
}

interface ColumnInfo {
  name: string;
}

/**
 * Options for opening a SQLite store.
 */
export interface SqliteStoreOptions {
  /**
   * Open an existing database for reading only. The schema is checked, never
   * created or migrated.
   */
  readonly?: boolean;
}

function toStoredEntry(row: LogRow): StoredEntry {
  return {
    id: row.id,
    epochSeconds: row.ts,
    isoTimestamp: row.timestamp,
    component: row.component,
    message: row.message,
  };
}

/**
 * Entry store in a SQLite `logs` table.
 *
 * Filters are compiled to SQL; containment goes through a registered
 * function that shares its implementation with the in-memory evaluator.
 */
export class SqliteEntryStore implements EntryStore {
  private constructor(private readonly db: Database.Database) {}

  /**
   * Opens (or creates) a database and prepares the schema.
   * @throws StoreError if the database cannot be opened, is not a usable SQLite
   * file, or (read-only) has no current logs table
   */
  static open(path: string, options: SqliteStoreOptions = {}): SqliteEntryStore {
    const readOnly = options.readonly ?? false;

    let db: Database.Database;
    try {
      db = new Database(path, { readonly: readOnly, fileMustExist: readOnly });
    } catch (error) {
      throw StoreError.openFailed(path, error);
    }

    const store = new SqliteEntryStore(db);
    try {
      if (readOnly) {
        store.verify(path);
      } else {
        store.setup();
      }
    } catch (error) {
      db.close();
      if (error instanceof StoreError) {
        throw error;
      }
      throw StoreError.openFailed(path, error);
    }
    return store;
  }

  private registerFunctions(): void {
    this.db.function(CONTAINS_FUNCTION, { deterministic: true }, (haystack: unknown, needle: unknown) =>
      containsIgnoreCase(haystack, needle) ? 1 : 0
    );
  }

  /** Checks a read-only database without touching it. */
  private verify(path: string): void {
    this.registerFunctions();

    const table = this.db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'logs'")
      .get();
    if (!table) {
      throw StoreError.missingTable(path);
    }
    if (!this.fields().includes('timestamp')) {
      throw StoreError.outdatedSchema(path);
    }
  }

  private setup(): void {
    this.registerFunctions();

    this.db.exec(CREATE_TABLE_SQL);

    if (!this.fields().includes('timestamp')) {
      this.addTimestampColumn();
    }

    this.db.exec(CREATE_INDEXES_SQL);
  }

  /** Upgrades databases created before the ISO timestamp column existed. */
  private addTimestampColumn(): void {
    const migrate = this.db.transaction(() => {
      this.db.exec('ALTER TABLE logs ADD COLUMN timestamp VARCHAR(50)');

      const rows = this.db
        .prepare<[], Pick<LogRow, 'id' | 'ts'>>('SELECT id, ts FROM logs WHERE timestamp IS NULL')
        .all();
      const update = this.db.prepare<[string, number]>('UPDATE logs SET timestamp = ? WHERE id = ?');

      for (const row of rows) {
        update.run(formatIsoTimestamp(row.ts), row.id);
      }
    });

    migrate();
  }

  append(entries: readonly LogEntry[]): number {
    try {
      const insert = this.db.prepare<[number, string, string, string]>(
        'INSERT INTO logs (ts, timestamp, component, message) VALUES (?, ?, ?, ?)'
      );
      const write = this.db.transaction((batch: readonly LogEntry[]) => {
        for (const entry of batch) {
          insert.run(entry.epochSeconds, entry.isoTimestamp, entry.component, entry.message);
        }
        return batch.length;
      });

      return write(entries);
    } catch (error) {
      throw StoreError.operationFailed('insert', error);
    }
  }

  select(query: EntryQuery): StoredEntry[] {
    const where = ['ts BETWEEN ? AND ?'];
    const params: Array<string | number> = [query.from, query.to];

    const condition = compileFilters(query.filters);
    if (condition) {
      where.push(condition.sql);
      params.push(...condition.params);
    }

    let sql = `
      SELECT id, ts, timestamp, component, message
      FROM logs
      WHERE ${where.join(' AND ')}
      ORDER BY ts ASC, id ASC
    `;
    if (query.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(query.limit);
    }

    try {
      return this.db
        .prepare<Array<string | number>, LogRow>(sql)
        .all(...params)
        .map(toStoredEntry);
    } catch (error) {
      throw StoreError.operationFailed('query', error);
    }
  }

  fields(): string[] {
    return this.db
      .prepare<[], ColumnInfo>('PRAGMA table_info(logs)')
      .all()
      .map((column) => column.name);
  }

  count(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM logs').get();
    return row?.count ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
