/**
 * wafscope — Geo cache
 *
 * キャッシュキー（IPv4 は /24、IPv6 はアドレス全体）ごとにリモート呼び出しを高々 1 回にする。
 *
 * - ヒット時はストアの値をそのまま返し、ネットワークには触れない。
 * - 同じキーへの同時ミスは 1 つの in-flight Promise を共有する。
 * - 取得結果は insertIfAbsent で格納し、格納済みの値を返す（全呼び出し元が同じ値を見る）。
 * - 失敗は保存しない。次回のアクセスで再試行できる。
 */

import type { GeoCacheStats, GeoClient, GeoRecord } from '../types/geo.js';
import { GeoLookupError } from '../types/geo.js';
import type { GeoRecordRepository } from '../db/repository/geo-record-repository.js';
import { cacheKeyFor } from './subnet.js';
import { logger as rootLogger, type Logger } from '../logger.js';

export class GeoCache {
  private readonly store: GeoRecordRepository;
  private readonly client: GeoClient;
  private readonly log: Logger;
  private readonly inflight = new Map<string, Promise<GeoRecord>>();
  private hits = 0;
  private misses = 0;
  private remoteCalls = 0;
  private failures = 0;

  constructor(store: GeoRecordRepository, client: GeoClient, logger: Logger = rootLogger) {
    this.store = store;
    this.client = client;
    this.log = logger.child({ component: 'geo-cache' });
  }

  /**
   * Resolve an address to its GeoRecord, calling out at most once per cache key.
   * Rejects with GeoLookupError when the remote lookup fails.
   */
  lookup(address: string): Promise<GeoRecord> {
    const key = cacheKeyFor(address);

    // ストアの確認から in-flight 登録までは同期的に行う（間に await を挟まない）
    const cached = this.store.findByKey(key);
    if (cached) {
      this.hits++;
      return Promise.resolve(cached);
    }

    const pending = this.inflight.get(key);
    if (pending) {
      this.hits++;
      return pending;
    }

    this.misses++;
    this.log.debug({ address, key }, 'geo cache miss');
    const request = this.fetchAndStore(key).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, request);
    return request;
  }

  /** Cached record for an address, without any network access. */
  peek(address: string): GeoRecord | undefined {
    return this.store.findByKey(cacheKeyFor(address));
  }

  stats(): GeoCacheStats {
    return {
      entries: this.store.count(),
      hits: this.hits,
      misses: this.misses,
      remoteCalls: this.remoteCalls,
      failures: this.failures,
    };
  }

  private async fetchAndStore(key: string): Promise<GeoRecord> {
    this.remoteCalls++;
    let record: GeoRecord;
    try {
      record = await this.client.fetch(key);
    } catch (err) {
      this.failures++;
      const error =
        err instanceof GeoLookupError
          ? err
          : new GeoLookupError(
              `Geolocation lookup for ${key} failed: ${err instanceof Error ? err.message : String(err)}`,
              key,
              { cause: err },
            );
      this.log.warn({ key, err: error.message }, 'geo lookup failed');
      throw error;
    }
    return this.store.insertIfAbsent(key, record);
  }
}
