import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EthContacts } from '../sdk.js';
import { toSummary } from '../types/index.js';
import { ContactNotFoundError } from '../utils/index.js';

export function registerAllResources(server: McpServer, contacts: EthContacts): void {
  // contacts://all - summary list of all contacts
  server.registerResource('all-contacts', 'contacts://all', {
    title: 'All Contacts',
    description: 'Summary list of all contacts with their ETH address and ENS name',
    mimeType: 'application/json',
  }, async (uri) => {
    const summaries = (await contacts.listAll()).map(toSummary);
    return {
      contents: [{
        uri: uri.href,
        text: JSON.stringify(summaries, null, 2),
        mimeType: 'application/json',
      }],
    };
  });

  // contacts://eth - contacts carrying an ETH address or ENS name
  server.registerResource('eth-contacts', 'contacts://eth', {
    title: 'Ethereum Contacts',
    description: 'Contacts that have an ETH address, an ENS name, or both',
    mimeType: 'application/json',
  }, async (uri) => {
    const summaries = (await contacts.listWithEitherEthField()).map(toSummary);
    return {
      contents: [{
        uri: uri.href,
        text: JSON.stringify(summaries, null, 2),
        mimeType: 'application/json',
      }],
    };
  });

  // contacts://{contactId} - individual contact detail
  server.registerResource('contact-detail',
    new ResourceTemplate('contacts://{contactId}', {
      list: async () => {
        const all = await contacts.listAll();
        return {
          resources: all.map(c => ({
            uri: `contacts://${c.contactId}`,
            name: c.displayName || c.contactId,
            mimeType: 'application/json',
          })),
        };
      },
    }),
    {
      title: 'Contact Detail',
      description: 'Full details for a specific contact',
      mimeType: 'application/json',
    },
    async (uri, variables) => {
      const value = variables.contactId;
      const contactId = Array.isArray(value) ? value[0] : value;
      const contact = contactId === undefined ? null : await contacts.getById(contactId);
      if (!contact) throw new ContactNotFoundError(contactId ?? uri.href);
      return {
        contents: [{
          uri: uri.href,
          text: JSON.stringify(contact, null, 2),
          mimeType: 'application/json',
        }],
      };
    },
  );
}
