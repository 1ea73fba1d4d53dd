/**
 * wafscope — MCP server context
 *
 * ツール・リソースが共有する状態。セッション（インデックス + ビュー）とジオキャッシュ。
 */

import type { AppConfig } from '../config.js';
import type { AuditSession } from '../engine/session.js';
import type { GeoCache } from '../geo/geo-cache.js';
import type { Logger } from '../logger.js';

export interface ServerContext {
  session: AuditSession;
  geoCache: GeoCache;
  config: AppConfig;
  logger: Logger;
}
