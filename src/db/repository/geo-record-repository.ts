import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { GeoRecord } from '../../types/geo.js';

/**
 * Raw row shape returned by better-sqlite3 for the `geo_records` table.
 * Column names are snake_case as defined in the schema.
 */
interface GeoRecordRow {
  cache_key: string;
  query: string;
  record_json: string;
  fetched_at: string;
}

const optionalString = z.string().optional();
const optionalNumber = z.number().optional();

/** Shape check for record_json read back from the table. */
const GeoRecordSchema: z.ZodType<GeoRecord> = z.object({
  query: z.string(),
  location: z.object({
    continent: optionalString,
    continentCode: optionalString,
    country: optionalString,
    countryCode: optionalString,
    region: optionalString,
    regionName: optionalString,
    city: optionalString,
    district: optionalString,
    zip: optionalString,
    lat: optionalNumber,
    lon: optionalNumber,
    timezone: optionalString,
    offset: optionalNumber,
    currency: optionalString,
  }),
  network: z.object({
    isp: optionalString,
    org: optionalString,
    as: optionalString,
    asname: optionalString,
  }),
  threat: z.object({
    mobile: z.boolean(),
    proxy: z.boolean(),
    hosting: z.boolean(),
  }),
});

function parseRecord(json: string): GeoRecord {
  const raw: unknown = JSON.parse(json);
  return GeoRecordSchema.parse(raw);
}

/**
 * Repository for the `geo_records` table.
 *
 * Entries are only ever added: no update, no delete.
 */
export class GeoRecordRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Find the record cached under a key. Returns undefined if not cached. */
  findByKey(cacheKey: string): GeoRecord | undefined {
    const stmt = this.db.prepare<[string], GeoRecordRow>(
      `SELECT cache_key, query, record_json, fetched_at
       FROM geo_records
       WHERE cache_key = ?`,
    );

    const row = stmt.get(cacheKey);
    return row ? parseRecord(row.record_json) : undefined;
  }

  /**
   * Store a record unless the key is already present, and return whichever
   * record the table holds afterwards. The check and the insert run in one
   * transaction, so the first stored record for a key is the one every caller sees.
   */
  insertIfAbsent(cacheKey: string, record: GeoRecord): GeoRecord {
    const insert = this.db.prepare<[string, string, string, string]>(
      `INSERT OR IGNORE INTO geo_records (cache_key, query, record_json, fetched_at)
       VALUES (?, ?, ?, ?)`,
    );
    const select = this.db.prepare<[string], GeoRecordRow>(
      `SELECT cache_key, query, record_json, fetched_at
       FROM geo_records
       WHERE cache_key = ?`,
    );

    const run = this.db.transaction((): GeoRecordRow | undefined => {
      insert.run(cacheKey, record.query, JSON.stringify(record), new Date().toISOString());
      return select.get(cacheKey);
    });

    const row = run();
    return row ? parseRecord(row.record_json) : record;
  }

  count(): number {
    const row = this.db
      .prepare<[], { cnt: number }>('SELECT COUNT(*) AS cnt FROM geo_records')
      .get();
    return row?.cnt ?? 0;
  }
}
