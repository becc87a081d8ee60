import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EthContacts } from '../sdk.js';
import { jsonResult } from './results.js';

export function registerListTool(server: McpServer, contacts: EthContacts): void {
  server.registerTool('list_contacts', {
    description: 'List contacts sorted by display name, optionally only those with an ETH address, an ENS name, or either.',
    inputSchema: {
      filter: z.enum(['all', 'wallet', 'ens', 'either']).optional().default('all')
        .describe('"wallet": has ETH address, "ens": has ENS name, "either": has one of them'),
    },
  }, async ({ filter }) => {
    const results = await contacts.list(filter);
    return jsonResult(results);
  });
}
