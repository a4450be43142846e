import Database from 'better-sqlite3';
import type { Instant } from '../../types/ids.js';
import type { DatasetEntry, DatasetStore, SetOptions } from '../DatasetStore.js';
import { nowInstant } from '../../utils/time.js';
import { ConfigError } from '../../errors.js';
import { ensureSchema } from './schema.js';
import { mapDatasetRow, type DatasetItemRow, type DatasetRow } from './rowMapper.js';

export interface SqliteDatasetStoreOptions {
  path?: string;
  now?: () => Instant;
}

/**
 * Array values are kept one row per element in `dataset_items`, so `append` writes a
 * single row however long the dataset grows.
 */
export class SqliteDatasetStore implements DatasetStore {
  private readonly db: Database.Database;
  private readonly nowFn: () => Instant;

  constructor(options: SqliteDatasetStoreOptions = {}) {
    const path = options.path ?? ':memory:';
    this.db = new Database(path);
    this.db.pragma('foreign_keys = ON');
    ensureSchema(this.db);
    this.nowFn = options.now ?? nowInstant;
  }

  close(): void {
    this.db.close();
  }

  set(key: string, value: unknown, options: SetOptions = {}): void {
    const setTx = this.db.transaction(() => {
      const isList = Array.isArray(value);
      this.db.prepare('DELETE FROM dataset_items WHERE key = ?').run(key);
      this.db
        .prepare(
          `INSERT INTO datasets (key, valueJson, isList, broadcast, updatedAt) VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(key) DO UPDATE SET valueJson = excluded.valueJson, isList = excluded.isList,
             broadcast = excluded.broadcast, updatedAt = excluded.updatedAt`
        )
        .run(key, isList ? null : JSON.stringify(value), isList ? 1 : 0, options.broadcast ? 1 : 0, this.nowFn());
      if (isList) {
        const insert = this.db.prepare('INSERT INTO dataset_items (key, seq, valueJson) VALUES (?, ?, ?)');
        value.forEach((item: unknown, seq) => insert.run(key, seq, JSON.stringify(item)));
      }
    });
    setTx();
  }

  append(key: string, value: unknown): void {
    const appendTx = this.db.transaction(() => {
      const row = this.db
        .prepare<[string], Pick<DatasetRow, 'isList'>>('SELECT isList FROM datasets WHERE key = ?')
        .get(key);
      if (!row) {
        this.set(key, [value]);
        return;
      }
      if (!row.isList) {
        throw new ConfigError(`Dataset '${key}' is not a list`);
      }
      this.db
        .prepare(
          `INSERT INTO dataset_items (key, seq, valueJson)
           VALUES (?, (SELECT COALESCE(MAX(seq) + 1, 0) FROM dataset_items WHERE key = ?), ?)`
        )
        .run(key, key, JSON.stringify(value));
      this.db.prepare('UPDATE datasets SET updatedAt = ? WHERE key = ?').run(this.nowFn(), key);
    });
    appendTx();
  }

  get(key: string): unknown {
    return this.entry(key)?.value;
  }

  has(key: string): boolean {
    return this.db.prepare<[string], { key: string }>('SELECT key FROM datasets WHERE key = ?').get(key) !== undefined;
  }

  isBroadcast(key: string): boolean {
    const row = this.db
      .prepare<[string], Pick<DatasetRow, 'broadcast'>>('SELECT broadcast FROM datasets WHERE key = ?')
      .get(key);
    return Boolean(row?.broadcast);
  }

  entry(key: string): DatasetEntry | undefined {
    const row = this.db.prepare<[string], DatasetRow>('SELECT * FROM datasets WHERE key = ?').get(key);
    if (!row) return undefined;
    const items = row.isList
      ? this.db
          .prepare<[string], DatasetItemRow>('SELECT valueJson FROM dataset_items WHERE key = ? ORDER BY seq')
          .all(key)
      : [];
    return mapDatasetRow(row, items);
  }

  /** Number of rows behind a list dataset; 0 for scalars and unknown keys. */
  itemCount(key: string): number {
    const row = this.db
      .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM dataset_items WHERE key = ?')
      .get(key);
    return row?.n ?? 0;
  }

  keys(prefix = ''): string[] {
    return this.db
      .prepare<[], { key: string }>('SELECT key FROM datasets ORDER BY key')
      .all()
      .map((row) => row.key)
      .filter((key) => key.startsWith(prefix));
  }
}
