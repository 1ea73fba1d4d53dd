/**
 * wafscope — MCP Search Tool
 *
 * Sets the session's active query and returns one page of the filtered view,
 * projected onto the requested columns.
 *
 * Query syntax: free text, or `domain:`, `ip:`/`address:`, `rule:`/`ruleid:`/`id:`,
 * `auditid:`, `status:`/`http:` followed by a value.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ServerContext } from '../context.js';
import { GROUP_COLUMNS } from '../../types/audit.js';
import { parseSearchQuery } from '../../engine/query.js';

const DEFAULT_LIMIT = 50;

export function registerSearchTool(server: McpServer, context: ServerContext): void {
  const { session } = context;

  server.tool(
    'search',
    'Filter indexed transactions. Free text, or prefix with domain:, ip:, rule:, auditid:, status:',
    {
      query: z.string().optional().describe('Search string (empty or omitted: all transactions)'),
      order: z
        .enum(['file', 'newest'])
        .optional()
        .describe('Row order: file order (default) or newest first'),
      offset: z.number().int().nonnegative().optional().describe('Rows to skip (default: 0)'),
      limit: z
        .number()
        .int()
        .positive()
        .optional()
        .describe(`Maximum rows to return (default: ${DEFAULT_LIMIT})`),
      columns: z
        .array(z.enum(GROUP_COLUMNS))
        .optional()
        .describe('Columns to include (default: all)'),
    },
    async ({ query, order, offset, limit, columns }) => {
      if (!session.loaded) {
        return {
          content: [{ type: 'text', text: 'No audit log loaded. Run ingest_log first.' }],
          isError: true,
        };
      }

      const text = query ?? '';
      const view = session.applySearch(text, order ?? 'file');

      const start = offset ?? 0;
      const page = view.slice(start, start + (limit ?? DEFAULT_LIMIT));
      const selected = columns ?? GROUP_COLUMNS;
      const rows = page.map((position) => ({
        position,
        ...session.index.project(position, selected),
      }));

      const result = {
        query: text,
        parsed: parseSearchQuery(text),
        order: session.order,
        total: view.length,
        offset: start,
        rows,
      };
      return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
    },
  );
}
