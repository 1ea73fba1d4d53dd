/**
 * wafscope — Geolocation type definitions
 */

export interface GeoLocation {
  continent?: string;
  continentCode?: string;
  country?: string;
  countryCode?: string;
  region?: string;
  regionName?: string;
  city?: string;
  district?: string;
  zip?: string;
  lat?: number;
  lon?: number;
  timezone?: string;
  /** UTC offset in seconds */
  offset?: number;
  currency?: string;
}

export interface GeoNetwork {
  isp?: string;
  org?: string;
  /** AS number and name, e.g. "AS64500 Example Networks" */
  as?: string;
  asname?: string;
}

export interface GeoThreat {
  mobile: boolean;
  proxy: boolean;
  hosting: boolean;
}

/** Geolocation and network metadata for one cache key. */
export interface GeoRecord {
  /** The address the endpoint actually resolved (the cache key) */
  query: string;
  location: GeoLocation;
  network: GeoNetwork;
  threat: GeoThreat;
}

/** Resolves one cache key against a remote source. */
export interface GeoClient {
  fetch(key: string): Promise<GeoRecord>;
}

export interface GeoCacheStats {
  entries: number;
  hits: number;
  misses: number;
  remoteCalls: number;
  failures: number;
}

/** A remote lookup failed or returned an unusable payload. Never cached. */
export class GeoLookupError extends Error {
  readonly key: string;

  constructor(message: string, key: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GeoLookupError';
    this.key = key;
  }
}
