import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EthContacts } from '../sdk.js';
import { ContactNotFoundError } from '../utils/index.js';
import { errorResult, jsonResult } from './results.js';

export function registerGetTool(server: McpServer, contacts: EthContacts): void {
  server.registerTool('get_contact', {
    description: 'Get a contact by ID, including its ETH address and ENS name.',
    inputSchema: {
      contactId: z.string().describe('Contact ID'),
    },
  }, async ({ contactId }) => {
    const contact = await contacts.getById(contactId);
    if (!contact) return errorResult(new ContactNotFoundError(contactId));
    return jsonResult(contact);
  });
}
