#!/usr/bin/env node
/**
 * wafscope — ModSecurity audit log explorer
 *
 * MCP Server エントリポイント。
 * stdio トランスポートで LLM Agent と接続する。ログは stderr に出す。
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, type AppConfig } from './config.js';
import { logger } from './logger.js';
import { AuditSession } from './engine/session.js';
import { openCacheDatabase } from './db/migrate.js';
import { GeoRecordRepository } from './db/repository/geo-record-repository.js';
import { GeoCache } from './geo/geo-cache.js';
import { IpApiClient } from './geo/ip-api-client.js';
import { createMcpServer } from './mcp/server.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    logger.fatal({ err }, 'invalid configuration');
    process.exit(1);
  }
}

const config = readConfig();
logger.level = config.logLevel;

const session = new AuditSession();
if (config.logPath) {
  try {
    session.load(config.logPath, { logger });
  } catch (err) {
    logger.fatal({ err }, 'cannot load audit log');
    process.exit(1);
  }
}

const db = openCacheDatabase();
const geoCache = new GeoCache(
  new GeoRecordRepository(db),
  new IpApiClient({ endpoint: config.geo.endpoint, timeoutMs: config.geo.timeoutMs }),
  logger,
);

const server = createMcpServer({ session, geoCache, config, logger });
const transport = new StdioServerTransport();
await server.connect(transport);
logger.info({ geo: config.geo.enabled, logPath: config.logPath }, 'wafscope MCP server ready');
