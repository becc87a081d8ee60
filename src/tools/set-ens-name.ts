import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EthContacts } from '../sdk.js';
import { errorResult, jsonResult } from './results.js';

export function registerSetEnsNameTool(server: McpServer, contacts: EthContacts): void {
  server.registerTool('set_ens_name', {
    description: 'Store an ENS name on an existing contact, replacing any ETH address held in the same field. '
      + 'Does not change the saved ENS override.',
    inputSchema: {
      contactId: z.string().describe('Contact ID'),
      ensName: z.string().min(1).describe('ENS name, e.g. "vitalik.eth"'),
    },
  }, async ({ contactId, ensName }) => {
    const updated = await contacts.setEnsName(contactId, ensName);
    if (!updated) {
      return errorResult(`Could not write ENS name for contact ${contactId}`);
    }
    return jsonResult({ contactId, ensName, message: 'ENS name saved' });
  });
}
