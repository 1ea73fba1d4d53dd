import { describe, it, expect } from 'vitest';
import { cacheKeyFor, getSubnet24 } from '../../src/geo/subnet.js';

describe('getSubnet24', () => {
  it('IPv4 は /24 の代表アドレスにする', () => {
    expect(getSubnet24('203.0.113.77')).toBe('203.0.113.0');
    expect(getSubnet24(' 10.1.2.3 ')).toBe('10.1.2.0');
  });

  it('IPv6 はそのまま返す', () => {
    expect(getSubnet24('2001:db8::1')).toBe('2001:db8::1');
  });

  it('IP アドレスでなければ undefined', () => {
    expect(getSubnet24('not-an-ip')).toBeUndefined();
    expect(getSubnet24('256.1.1.1')).toBeUndefined();
    expect(getSubnet24('')).toBeUndefined();
  });
});

describe('cacheKeyFor', () => {
  it('同じ /24 のアドレスは同じキーになる', () => {
    expect(cacheKeyFor('198.51.100.5')).toBe(cacheKeyFor('198.51.100.250'));
  });

  it('IP アドレスでない入力はトリムしてそのままキーにする', () => {
    expect(cacheKeyFor(' unknown-host ')).toBe('unknown-host');
  });
});
