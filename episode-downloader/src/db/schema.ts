import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { getConfig } from '../config.js';

let db: Database.Database | null = null;

/**
 * Open a database and make sure the schema exists. Pass ":memory:" for a
 * throwaway store.
 */
export function openDatabase(filename: string): Database.Database {
  if (filename !== ':memory:') {
    const dir = path.dirname(filename);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const database = new Database(filename);
  if (filename !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }
  initSchema(database);
  return database;
}

export function getDatabase(): Database.Database {
  if (!db) {
    const config = getConfig();
    db = openDatabase(path.join(config.dataPath, 'downloads.db'));
  }
  return db;
}

function initSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS download_records (
      key TEXT PRIMARY KEY,
      position INTEGER NOT NULL,
      data TEXT NOT NULL
    )
  `);

  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_download_records_position ON download_records(position);
  `);

  console.log('[DB] Schema initialized');
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
