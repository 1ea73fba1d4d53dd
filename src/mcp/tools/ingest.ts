/**
 * wafscope — MCP Ingest Tools
 *
 * ingest_log: 監査ログを読み込んで新しいインデックスに差し替える。
 * refresh:    現在のファイルを最初から読み直す（差分読み込みはしない）。
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ServerContext } from '../context.js';
import type { IngestResult, ProgressCallback, ProgressEvent } from '../../types/engine.js';

function summarize(
  action: string,
  result: IngestResult,
  visible: number,
  trail: readonly ProgressEvent[],
): string {
  const { stats, index } = result;
  return [
    `${action} ${index.sourcePath}`,
    `Transactions: ${stats.groups} (${stats.sections} sections)`,
    `Discarded incomplete transactions: ${stats.incomplete}`,
    `Size: ${stats.bytes} bytes, ${stats.lines} lines`,
    `Visible with current query: ${visible}`,
    'Progress:',
    ...trail.map((e) => `  [${e.phase}] ${(e.fraction * 100).toFixed(0)}% ${e.message}`),
  ].join('\n');
}

export function registerIngestTools(server: McpServer, context: ServerContext): void {
  const { session, config } = context;
  const log = context.logger.child({ component: 'mcp-ingest' });

  // 粗い間隔で届く進捗を記録し、ログにも流す
  const recorder = (trail: ProgressEvent[]): ProgressCallback => (event) => {
    trail.push(event);
    log.debug(
      { phase: event.phase, fraction: Number(event.fraction.toFixed(3)) },
      event.message,
    );
  };

  // 1. ingest_log
  server.tool(
    'ingest_log',
    'Parse a ModSecurity serial audit log and replace the current transaction index',
    {
      path: z
        .string()
        .optional()
        .describe('Path to the audit log (default: WAFSCOPE_LOG_PATH)'),
    },
    async ({ path }) => {
      const target = path ?? config.logPath;
      if (!target) {
        return {
          content: [
            { type: 'text', text: 'path parameter required (no WAFSCOPE_LOG_PATH configured)' },
          ],
          isError: true,
        };
      }
      const trail: ProgressEvent[] = [];
      try {
        const result = session.load(target, { onProgress: recorder(trail), logger: context.logger });
        return {
          content: [
            { type: 'text', text: summarize('Ingested', result, session.view.length, trail) },
          ],
        };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { content: [{ type: 'text', text: `Ingest failed: ${message}` }], isError: true };
      }
    },
  );

  // 2. refresh
  server.tool(
    'refresh',
    'Re-parse the currently loaded audit log from scratch and re-apply the active search',
    async () => {
      if (!session.loaded) {
        return {
          content: [{ type: 'text', text: 'No audit log loaded. Run ingest_log first.' }],
          isError: true,
        };
      }
      const trail: ProgressEvent[] = [];
      try {
        const result = session.refresh({ onProgress: recorder(trail), logger: context.logger });
        return {
          content: [
            { type: 'text', text: summarize('Refreshed', result, session.view.length, trail) },
          ],
        };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { content: [{ type: 'text', text: `Refresh failed: ${message}` }], isError: true };
      }
    },
  );
}
