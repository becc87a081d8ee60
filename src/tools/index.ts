import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EthContacts } from '../sdk.js';
import { registerListTool } from './list.js';
import { registerGetTool } from './get.js';
import { registerSearchTool } from './search.js';
import { registerCreateTool } from './create.js';
import { registerSetEthAddressTool } from './set-eth-address.js';
import { registerSetEnsNameTool } from './set-ens-name.js';
import { registerSaveEnsOverrideTool } from './save-ens-override.js';

export function registerAllTools(server: McpServer, contacts: EthContacts): void {
  registerListTool(server, contacts);
  registerGetTool(server, contacts);
  registerSearchTool(server, contacts);
  registerCreateTool(server, contacts);
  registerSetEthAddressTool(server, contacts);
  registerSetEnsNameTool(server, contacts);
  registerSaveEnsOverrideTool(server, contacts);
}
