import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { EthContacts } from './sdk.js';
import { FileContactDatabase, FilePreferenceStore } from './store/index.js';
import { registerAllTools } from './tools/index.js';
import { registerAllResources } from './resources/index.js';
import type { AppConfig } from './config.js';
import { logger } from './utils/index.js';

export const SERVER_NAME = 'ethcontacts';
export const SERVER_VERSION = '0.1.0';

/** Build an MCP server exposing the given contacts. */
export function buildServer(contacts: EthContacts): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerAllTools(server, contacts);
  registerAllResources(server, contacts);
  return server;
}

/** Build an MCP server backed by the file stores under `config.storePath`. */
export function createServer(config: AppConfig): { server: McpServer; database: FileContactDatabase } {
  const database = new FileContactDatabase(config.storePath, { defaultCountry: config.defaultCountry });
  const preferences = new FilePreferenceStore(config.storePath, config.preferencesNamespace);
  const contacts = new EthContacts(database, preferences, { defaultCountry: config.defaultCountry });
  const server = buildServer(contacts);

  logger.info('MCP server created, store path:', config.storePath);

  return { server, database };
}
