/**
 * wafscope — Geo cache key derivation
 *
 * 監査ログは狭いアドレス範囲からのバースト的なリクエストが多いため、
 * IPv4 は /24 単位でまとめてリモート呼び出しを減らす。IPv6 はまとめない。
 */

import net from 'node:net';

/**
 * The /24 representative of an IPv4 address (`a.b.c.0`), the unchanged literal
 * of an IPv6 address, or undefined when the input is not an IP address.
 */
export function getSubnet24(address: string): string | undefined {
  const trimmed = address.trim();
  if (net.isIPv4(trimmed)) {
    const [a, b, c] = trimmed.split('.');
    return `${a}.${b}.${c}.0`;
  }
  if (net.isIPv6(trimmed)) {
    return trimmed;
  }
  return undefined;
}

/** Cache key for an address; non-IP input is used as its own key. */
export function cacheKeyFor(address: string): string {
  return getSubnet24(address) ?? address.trim();
}
