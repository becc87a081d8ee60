import type { Contact, EthFilter } from '../types/index.js';
import { hasEns, hasEthAddress } from '../types/index.js';

export function matchesFilter(contact: Contact, filter: EthFilter): boolean {
  switch (filter) {
    case 'all':
      return true;
    case 'wallet':
      return hasEthAddress(contact);
    case 'ens':
      return hasEns(contact);
    case 'either':
      return hasEthAddress(contact) || hasEns(contact);
  }
}

export function filterContacts(contacts: Contact[], filter: EthFilter): Contact[] {
  return contacts.filter(c => matchesFilter(c, filter));
}
