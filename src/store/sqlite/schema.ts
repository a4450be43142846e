import Database from 'better-sqlite3';

export function ensureSchema(db: Database.Database): void {
  db.exec(`
    PRAGMA journal_mode = WAL;

    CREATE TABLE IF NOT EXISTS datasets (
      key TEXT PRIMARY KEY,
      valueJson TEXT,
      isList INTEGER NOT NULL,
      broadcast INTEGER NOT NULL,
      updatedAt TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS dataset_items (
      key TEXT NOT NULL REFERENCES datasets(key) ON DELETE CASCADE,
      seq INTEGER NOT NULL,
      valueJson TEXT NOT NULL,
      PRIMARY KEY (key, seq)
    );
  `);
}
