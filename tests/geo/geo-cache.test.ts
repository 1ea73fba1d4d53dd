import { describe, it, expect, beforeEach } from 'vitest';
import { openCacheDatabase } from '../../src/db/migrate.js';
import { GeoRecordRepository } from '../../src/db/repository/geo-record-repository.js';
import { GeoCache } from '../../src/geo/geo-cache.js';
import { GeoLookupError } from '../../src/types/geo.js';
import { createLogger } from '../../src/logger.js';
import { FakeGeoClient } from '../helpers/fake-geo-client.js';
import { sampleGeoRecord } from '../helpers/audit-log.js';

describe('GeoCache', () => {
  let client: FakeGeoClient;
  let repo: GeoRecordRepository;
  let cache: GeoCache;

  beforeEach(() => {
    client = new FakeGeoClient();
    repo = new GeoRecordRepository(openCacheDatabase());
    cache = new GeoCache(repo, client, createLogger('silent'));
  });

  it('同じ /24 のアドレスはリモート呼び出し 1 回で済む', async () => {
    const first = await cache.lookup('203.0.113.5');
    const second = await cache.lookup('203.0.113.200');

    expect(client.calls).toEqual(['203.0.113.0']);
    expect(first).toEqual(sampleGeoRecord('203.0.113.0'));
    expect(second).toEqual(first);
    expect(cache.stats()).toEqual({ entries: 1, hits: 1, misses: 1, remoteCalls: 1, failures: 0 });
  });

  it('同じキーへの同時ミスは 1 つのリクエストを共有する', async () => {
    const results = await Promise.all([
      cache.lookup('198.51.100.1'),
      cache.lookup('198.51.100.2'),
      cache.lookup('198.51.100.3'),
    ]);

    expect(client.calls).toEqual(['198.51.100.0']);
    expect(results[1]).toEqual(results[0]);
    expect(results[2]).toEqual(results[0]);
    expect(cache.stats()).toMatchObject({ entries: 1, hits: 2, misses: 1, remoteCalls: 1 });
  });

  it('IPv6 はアドレスごとに別のキーになる', async () => {
    await cache.lookup('2001:db8::1');
    await cache.lookup('2001:db8::2');
    expect(client.calls).toEqual(['2001:db8::1', '2001:db8::2']);
  });

  it('失敗は保存せず、次のアクセスで再試行する', async () => {
    client.failNext(new GeoLookupError('Geolocation lookup for 192.0.2.0 failed: quota', '192.0.2.0'));

    await expect(cache.lookup('192.0.2.10')).rejects.toThrow(
      'Geolocation lookup for 192.0.2.0 failed: quota',
    );
    expect(repo.count()).toBe(0);

    const record = await cache.lookup('192.0.2.11');
    expect(record.query).toBe('192.0.2.0');
    expect(client.calls).toEqual(['192.0.2.0', '192.0.2.0']);
    expect(cache.stats()).toEqual({ entries: 1, hits: 0, misses: 2, remoteCalls: 2, failures: 1 });
  });

  it('GeoLookupError 以外の失敗は GeoLookupError に包む', async () => {
    client.failNext(new Error('boom'));

    const error: unknown = await cache.lookup('198.51.100.7').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(GeoLookupError);
    if (!(error instanceof GeoLookupError)) return;
    expect(error.message).toBe('Geolocation lookup for 198.51.100.0 failed: boom');
    expect(error.key).toBe('198.51.100.0');
  });

  it('peek はネットワークに触れずにキャッシュ済みの値だけを返す', async () => {
    expect(cache.peek('203.0.113.9')).toBeUndefined();
    await cache.lookup('203.0.113.9');
    expect(cache.peek('203.0.113.99')).toEqual(sampleGeoRecord('203.0.113.0'));
    expect(client.calls).toHaveLength(1);
  });
});
