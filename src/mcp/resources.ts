/**
 * wafscope — MCP Resources
 *
 * Read-only resources for browsing the current index.
 */

import { ResourceTemplate, type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from './context.js';
import type { GroupIndex } from '../engine/group-index.js';

/** Number of rule ids listed in the summary. */
const TOP_RULES = 10;

function statusCounts(index: GroupIndex): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const group of index) {
    const key = group.status !== undefined ? String(group.status) : 'none';
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

/** ルール id ごとの発火トランザクション数（多い順、同数は id 順） */
function topRules(index: GroupIndex): Array<{ ruleId: string; transactions: number }> {
  const counts = new Map<string, number>();
  for (const group of index) {
    for (const id of group.ruleIds) {
      counts.set(id, (counts.get(id) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, TOP_RULES)
    .map(([ruleId, transactions]) => ({ ruleId, transactions }));
}

export function registerResources(server: McpServer, context: ServerContext): void {
  const { session, geoCache } = context;

  // 1. wafscope://summary — index counts, status histogram, top rules, cache stats
  server.resource(
    'summary',
    'wafscope://summary',
    { description: 'Summary of the loaded audit log, the active search and the geo cache' },
    async (uri) => {
      const index = session.index;
      const summary = {
        sourcePath: index.sourcePath || null,
        builtAt: session.loaded ? index.builtAt : null,
        ingest: session.stats ?? null,
        transactions: index.size,
        activeQuery: session.query,
        visible: session.view.length,
        statusCounts: statusCounts(index),
        topRules: topRules(index),
        geoCache: geoCache.stats(),
      };
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'application/json',
            text: JSON.stringify(summary, null, 2),
          },
        ],
      };
    },
  );

  // 2. wafscope://groups/{transactionId} — verbatim raw sections of one transaction
  server.resource(
    'group-raw',
    new ResourceTemplate('wafscope://groups/{transactionId}', { list: undefined }),
    { description: 'Raw serial-format text of one transaction, boundary lines included' },
    async (uri, variables) => {
      const value = variables['transactionId'];
      const transactionId = Array.isArray(value) ? value[0] : value;
      const position = transactionId !== undefined ? session.index.positionOf(transactionId) : undefined;
      const raw = position !== undefined ? session.index.rawContent(position) : undefined;
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'text/plain',
            text: raw ?? `Transaction not found: ${transactionId ?? ''}`,
          },
        ],
      };
    },
  );
}
