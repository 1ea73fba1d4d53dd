import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { migrateDatabase, openCacheDatabase } from '../../src/db/migrate.js';
import { SCHEMA_VERSION } from '../../src/db/schema.js';

describe('migrateDatabase', () => {
  it('geo_records テーブルを作成し user_version を設定する', () => {
    const db = new Database(':memory:');
    migrateDatabase(db);

    const tables = db
      .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table'`)
      .all()
      .map((t) => t.name);
    expect(tables).toContain('geo_records');
    expect(db.pragma('user_version', { simple: true })).toBe(SCHEMA_VERSION);
  });

  it('2 回実行しても失敗しない', () => {
    const db = new Database(':memory:');
    migrateDatabase(db);
    expect(() => migrateDatabase(db)).not.toThrow();
  });
});

describe('openCacheDatabase', () => {
  it('マイグレーション済みのインメモリ DB を返す', () => {
    const db = openCacheDatabase();
    expect(db.memory).toBe(true);
    expect(db.pragma('user_version', { simple: true })).toBe(SCHEMA_VERSION);
  });
});
