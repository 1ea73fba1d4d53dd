/**
 * wafscope — Geo cache SQLite schema
 *
 * ジオロケーションキャッシュはプロセス内の ':memory:' データベースにだけ置く。
 * 実行をまたいだ永続化はしない。
 */

/** Bumped whenever SCHEMA_SQL changes. */
export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
-- ============================================================
-- ジオロケーション結果（キャッシュキー単位）
-- ============================================================
CREATE TABLE IF NOT EXISTS geo_records (
  cache_key     TEXT PRIMARY KEY,          -- IPv4 は /24 の代表アドレス、IPv6 はアドレスそのもの
  query         TEXT NOT NULL,             -- エンドポイントが解決したアドレス
  record_json   TEXT NOT NULL,             -- GeoRecord の JSON
  fetched_at    TEXT NOT NULL
);
`;
