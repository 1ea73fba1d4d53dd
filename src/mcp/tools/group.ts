/**
 * wafscope — MCP Group Detail Tool
 *
 * 1 トランザクションの全フィールドとセクション本文を返す。
 * ジオロケーションが有効なら、クライアントアドレスをジオキャッシュで引いて添える。
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ServerContext } from '../context.js';
import type { AuditGroup } from '../../types/audit.js';
import type { GeoRecord } from '../../types/geo.js';
import { GeoLookupError } from '../../types/geo.js';

interface GroupDetail {
  position: number;
  transactionId: string;
  uniqueId?: string;
  timestamp?: string;
  clientAddress: string;
  clientPort?: number;
  serverAddress?: string;
  serverPort?: number;
  host: string;
  requestLine?: string;
  status?: number;
  ruleIds: readonly string[];
  ruleFile?: string;
  sections: Array<{ letter: string; content: string }>;
  geo?: GeoRecord;
  geoError?: string;
}

function toDetail(position: number, group: AuditGroup): GroupDetail {
  return {
    position,
    transactionId: group.transactionId,
    uniqueId: group.uniqueId,
    timestamp: group.timestamp?.toISOString(),
    clientAddress: group.clientAddress,
    clientPort: group.clientPort,
    serverAddress: group.serverAddress,
    serverPort: group.serverPort,
    host: group.host,
    requestLine: group.requestLine,
    status: group.status,
    ruleIds: group.ruleIds,
    ruleFile: group.ruleFile,
    sections: group.sections.map((s) => ({ letter: s.letter, content: s.content })),
  };
}

export function registerGroupTool(server: McpServer, context: ServerContext): void {
  const { session, geoCache, config } = context;

  server.tool(
    'get_group',
    'Get one audit transaction with all sections, by transaction id or index position',
    {
      transactionId: z.string().optional().describe('Boundary id of the transaction'),
      position: z.number().int().nonnegative().optional().describe('Position in the index'),
      includeGeo: z
        .boolean()
        .optional()
        .describe('Attach geolocation of the client address (default: true when enabled)'),
    },
    async ({ transactionId, position, includeGeo }) => {
      const index = session.index;
      const resolved =
        transactionId !== undefined ? index.positionOf(transactionId) : position;
      if (resolved === undefined) {
        const text =
          transactionId !== undefined
            ? `Transaction not found: ${transactionId}`
            : 'transactionId or position parameter required';
        return { content: [{ type: 'text', text }], isError: true };
      }

      const group = index.at(resolved);
      if (!group) {
        return {
          content: [{ type: 'text', text: `Position out of range: ${resolved}` }],
          isError: true,
        };
      }

      const detail = toDetail(resolved, group);
      if (config.geo.enabled && (includeGeo ?? true)) {
        try {
          detail.geo = await geoCache.lookup(group.clientAddress);
        } catch (err) {
          if (!(err instanceof GeoLookupError)) throw err;
          detail.geoError = err.message;
        }
      }

      return { content: [{ type: 'text', text: JSON.stringify(detail, null, 2) }] };
    },
  );
}
