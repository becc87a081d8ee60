import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EthContacts } from '../sdk.js';
import { jsonResult } from './results.js';

export function registerSaveEnsOverrideTool(server: McpServer, contacts: EthContacts): void {
  server.registerTool('save_ens_override', {
    description: 'Save a fallback ENS name for a contact. It is shown only when the contact record itself holds no ENS name. '
      + 'The save is best-effort: a refused write is logged by the server, not reported here.',
    inputSchema: {
      contactId: z.string().describe('Contact ID'),
      ensName: z.string().min(1).describe('ENS name, e.g. "vitalik.eth"'),
    },
  }, async ({ contactId, ensName }) => {
    await contacts.saveEnsOverride(contactId, ensName);
    return jsonResult({ contactId, ensName, message: 'ENS override submitted (best-effort)' });
  });
}
