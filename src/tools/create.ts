import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EthContacts } from '../sdk.js';
import { ethAddressSchema } from '../contacts/index.js';
import { errorResult, jsonResult } from './results.js';

export function registerCreateTool(server: McpServer, contacts: EthContacts): void {
  server.registerTool('create_contact', {
    description: 'Create a new contact. Provide at least a display name. '
      + 'When both ethAddress and ensName are given, the address goes on the contact record and the ENS name is kept as an override.',
    inputSchema: {
      displayName: z.string().min(1).describe('Display name'),
      phoneNumber: z.string().optional(),
      email: z.string().optional(),
      ethAddress: ethAddressSchema.optional().describe('0x followed by 40 hex characters'),
      ensName: z.string().optional().describe('ENS name, e.g. "vitalik.eth"'),
    },
  }, async (args) => {
    const contactId = await contacts.createContact(args);
    if (contactId === null) {
      return errorResult(`Failed to create contact ${args.displayName}`);
    }
    return jsonResult({ contactId, displayName: args.displayName, message: 'Contact created successfully' });
  });
}
