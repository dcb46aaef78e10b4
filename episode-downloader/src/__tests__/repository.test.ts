import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../db/schema.js';
import { SqliteRecordStore } from '../db/repository.js';
import { makeRecord } from './helpers.js';

describe('SqliteRecordStore', () => {
  let db: Database.Database;
  let store: SqliteRecordStore;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    db = openDatabase(':memory:');
    store = new SqliteRecordStore(db);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    db.close();
  });

  it('round-trips the record set in order', () => {
    const records = [
      makeRecord({ key: 'b_ep2_sub', episodeNumber: 2, status: 'downloading', progress: 0.4 }),
      makeRecord({
        key: 'a_ep1_sub',
        status: 'completed',
        progress: 1,
        fileSizeBytes: 1234,
        filePath: '/downloads/a_ep1_sub.ts',
        subtitles: [{ label: 'English', language: 'en', filePath: '/downloads/subtitles/a_ep1_sub_english.vtt' }],
      }),
    ];

    store.saveRecords(records);

    expect(store.loadRecords()).toEqual(records);
  });

  it('replaces the previous set on every save', () => {
    store.saveRecords([makeRecord({ key: 'one' }), makeRecord({ key: 'two' })]);
    store.saveRecords([makeRecord({ key: 'two' })]);

    expect(store.loadRecords().map(r => r.key)).toEqual(['two']);
  });

  it('starts empty', () => {
    expect(store.loadRecords()).toEqual([]);
  });

  it('skips rows that do not validate', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    store.saveRecords([makeRecord({ key: 'good' })]);
    db.prepare('INSERT INTO download_records (key, position, data) VALUES (?, ?, ?)')
      .run('broken', 1, JSON.stringify({ key: 'broken', status: 'exploded' }));
    db.prepare('INSERT INTO download_records (key, position, data) VALUES (?, ?, ?)')
      .run('garbled', 2, '{not json');

    expect(store.loadRecords().map(r => r.key)).toEqual(['good']);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('fills defaults for fields missing from older rows', () => {
    const { subtitles: _subtitles, errorMessage: _errorMessage, ...legacy } = makeRecord({ key: 'legacy' });
    db.prepare('INSERT INTO download_records (key, position, data) VALUES (?, ?, ?)')
      .run('legacy', 0, JSON.stringify(legacy));

    const [record] = store.loadRecords();

    expect(record.subtitles).toEqual([]);
    expect(record.errorMessage).toBeNull();
  });
});
