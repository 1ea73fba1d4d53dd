/**
 * wafscope — MCP Geolocation Tool
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ServerContext } from '../context.js';
import { cacheKeyFor } from '../../geo/subnet.js';

export function registerGeoTool(server: McpServer, context: ServerContext): void {
  const { geoCache, config } = context;

  server.tool(
    'lookup_address',
    'Look up geolocation, network and threat flags for a client address (cached per /24 for IPv4)',
    {
      address: z.string().min(1).describe('IPv4 or IPv6 address'),
    },
    async ({ address }) => {
      if (!config.geo.enabled) {
        return {
          content: [
            { type: 'text', text: 'Geolocation lookups are disabled (WAFSCOPE_GEO_ENABLED=false)' },
          ],
          isError: true,
        };
      }
      try {
        const record = await geoCache.lookup(address);
        const result = { address, cacheKey: cacheKeyFor(address), record };
        return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { content: [{ type: 'text', text: `Lookup failed: ${message}` }], isError: true };
      }
    },
  );
}
