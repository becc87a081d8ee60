import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EthContacts } from '../sdk.js';
import { InvalidArgumentError } from '../utils/index.js';
import { errorResult, jsonResult } from './results.js';

export function registerSetEthAddressTool(server: McpServer, contacts: EthContacts): void {
  server.registerTool('set_eth_address', {
    description: 'Store an ETH address on an existing contact, replacing any ENS name held in the same field.',
    inputSchema: {
      contactId: z.string().describe('Contact ID'),
      address: z.string().describe('0x followed by 40 hex characters'),
    },
  }, async ({ contactId, address }) => {
    let updated: boolean;
    try {
      updated = await contacts.setWalletAddress(contactId, address);
    } catch (err) {
      if (err instanceof InvalidArgumentError) return errorResult(err);
      throw err;
    }
    if (!updated) {
      return errorResult(`Could not write ETH address for contact ${contactId}`);
    }
    return jsonResult({ contactId, ethAddress: address, message: 'ETH address saved' });
  });
}
