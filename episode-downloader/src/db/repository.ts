import type Database from 'better-sqlite3';
import { DownloadRecordSchema } from '../types/schemas.js';
import type { DownloadRecord } from '../types/download.js';
import { StorageError, errorMessage } from '../utils/errors.js';

/**
 * Durable home of the record set: read once at startup, rewritten after every
 * state transition. Single writer, last write wins.
 */
export interface RecordStore {
  loadRecords(): DownloadRecord[];
  saveRecords(records: DownloadRecord[]): void;
}

interface RecordRow {
  key: string;
  data: string;
}

function isRecordRow(row: unknown): row is RecordRow {
  return typeof row === 'object' && row !== null
    && 'key' in row && typeof row.key === 'string'
    && 'data' in row && typeof row.data === 'string';
}

export class SqliteRecordStore implements RecordStore {
  constructor(private readonly db: Database.Database) {}

  loadRecords(): DownloadRecord[] {
    const rows: unknown[] = this.db.prepare(`
      SELECT key, data FROM download_records
      ORDER BY position ASC
    `).all();

    const records: DownloadRecord[] = [];
    for (const row of rows) {
      if (!isRecordRow(row)) continue;
      const record = parseRecord(row);
      if (record) {
        records.push(record);
      }
    }

    console.log(`[Store] Loaded ${records.length} downloads`);
    return records;
  }

  saveRecords(records: DownloadRecord[]): void {
    const clear = this.db.prepare('DELETE FROM download_records');
    const insert = this.db.prepare(`
      INSERT INTO download_records (key, position, data)
      VALUES (?, ?, ?)
    `);

    const replaceAll = this.db.transaction((items: DownloadRecord[]) => {
      clear.run();
      items.forEach((record, position) => {
        insert.run(record.key, position, JSON.stringify(record));
      });
    });

    try {
      replaceAll(records);
    } catch (error) {
      throw new StorageError(`Failed to save downloads: ${errorMessage(error)}`, undefined, { cause: error });
    }
  }
}

function parseRecord(row: RecordRow): DownloadRecord | null {
  let json: unknown;
  try {
    json = JSON.parse(row.data);
  } catch (error) {
    console.warn(`[Store] Skipping unreadable record ${row.key}: ${errorMessage(error)}`);
    return null;
  }

  const parsed = DownloadRecordSchema.safeParse(json);
  if (!parsed.success) {
    console.warn(`[Store] Skipping invalid record ${row.key}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    return null;
  }
  return parsed.data;
}
