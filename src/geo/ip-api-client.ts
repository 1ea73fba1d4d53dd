/**
 * wafscope — ip-api.com client
 *
 * キャッシュキー 1 件につき 1 回、JSON エンドポイントへ全フィールドを要求する。
 * レスポンスは zod で検証し、失敗・不正な形はすべて GeoLookupError にする。
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { GeoClient, GeoRecord } from '../types/geo.js';
import { GeoLookupError } from '../types/geo.js';

/** Every field requested from the endpoint. */
export const GEO_FIELDS = [
  'status',
  'message',
  'query',
  'continent',
  'continentCode',
  'country',
  'countryCode',
  'region',
  'regionName',
  'city',
  'district',
  'zip',
  'lat',
  'lon',
  'timezone',
  'offset',
  'currency',
  'isp',
  'org',
  'as',
  'asname',
  'mobile',
  'proxy',
  'hosting',
] as const;

// ──────────────────────────────────────────────────────────────────────────────
// Response schema

const IpApiResponseSchema = z.object({
  status: z.enum(['success', 'fail']),
  message: z.string().optional(),
  query: z.string().optional(),
  continent: z.string().optional(),
  continentCode: z.string().optional(),
  country: z.string().optional(),
  countryCode: z.string().optional(),
  region: z.string().optional(),
  regionName: z.string().optional(),
  city: z.string().optional(),
  district: z.string().optional(),
  zip: z.string().optional(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  timezone: z.string().optional(),
  offset: z.number().int().optional(),
  currency: z.string().optional(),
  isp: z.string().optional(),
  org: z.string().optional(),
  as: z.string().optional(),
  asname: z.string().optional(),
  mobile: z.boolean().optional(),
  proxy: z.boolean().optional(),
  hosting: z.boolean().optional(),
});

type IpApiResponse = z.infer<typeof IpApiResponseSchema>;

/** Empty strings from the endpoint mean "not known". */
function text(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

export function toGeoRecord(key: string, body: IpApiResponse): GeoRecord {
  return {
    query: body.query ?? key,
    location: {
      continent: text(body.continent),
      continentCode: text(body.continentCode),
      country: text(body.country),
      countryCode: text(body.countryCode),
      region: text(body.region),
      regionName: text(body.regionName),
      city: text(body.city),
      district: text(body.district),
      zip: text(body.zip),
      lat: body.lat,
      lon: body.lon,
      timezone: text(body.timezone),
      offset: body.offset,
      currency: text(body.currency),
    },
    network: {
      isp: text(body.isp),
      org: text(body.org),
      as: text(body.as),
      asname: text(body.asname),
    },
    threat: {
      mobile: body.mobile ?? false,
      proxy: body.proxy ?? false,
      hosting: body.hosting ?? false,
    },
  };
}

// ──────────────────────────────────────────────────────────────────────────────
// Client

export interface IpApiClientOptions {
  /** Base URL; the cache key is appended as the last path segment. */
  endpoint: string;
  timeoutMs: number;
  /** Pre-configured axios instance (tests pass one with an in-process adapter). */
  http?: AxiosInstance;
}

export class IpApiClient implements GeoClient {
  private readonly endpoint: string;
  private readonly http: AxiosInstance;

  constructor(options: IpApiClientOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs });
  }

  /** Build the request URL for one key (IPv6 colons stay literal). */
  urlFor(key: string): string {
    return `${this.endpoint}/${encodeURIComponent(key).replace(/%3A/gi, ':')}`;
  }

  async fetch(key: string): Promise<GeoRecord> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(this.urlFor(key), {
        params: { fields: GEO_FIELDS.join(',') },
      });
      data = response.data;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new GeoLookupError(`Geolocation request for ${key} failed: ${reason}`, key, {
        cause: err,
      });
    }

    const parsed = IpApiResponseSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new GeoLookupError(`Malformed geolocation response for ${key}: ${issues}`, key, {
        cause: parsed.error,
      });
    }

    if (parsed.data.status === 'fail') {
      throw new GeoLookupError(
        `Geolocation lookup for ${key} failed: ${parsed.data.message ?? 'no reason given'}`,
        key,
      );
    }

    return toGeoRecord(key, parsed.data);
  }
}
