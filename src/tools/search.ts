import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EthContacts } from '../sdk.js';
import { jsonResult } from './results.js';

export function registerSearchTool(server: McpServer, contacts: EthContacts): void {
  server.registerTool('search_contacts', {
    description: 'Search contacts by name, ENS name, ETH address, email or phone using fuzzy matching. Returns ranked results.',
    inputSchema: {
      query: z.string().describe('Search query'),
      limit: z.number().int().positive().optional().default(20).describe('Maximum results to return'),
    },
  }, async ({ query, limit }) => {
    const results = await contacts.search(query, limit);
    return jsonResult(results);
  });
}
