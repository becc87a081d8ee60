import Fuse, { type IFuseOptions } from 'fuse.js';
import type { CountryCode } from 'libphonenumber-js';
import type { Contact, ContactSummary } from '../types/index.js';
import { toSummary } from '../types/index.js';
import { normalizeEthAddress, normalizePhone } from './normalize.js';

export interface SearchDocument {
  contact: Contact;
  ethAddress?: string;
  normalizedPhone?: string;
}

const FUSE_OPTIONS: IFuseOptions<SearchDocument> = {
  keys: [
    { name: 'contact.displayName', weight: 0.35 },
    { name: 'contact.ensName', weight: 0.25 },
    { name: 'ethAddress', weight: 0.15 },
    { name: 'contact.email', weight: 0.1 },
    { name: 'contact.phoneNumber', weight: 0.1 },
    { name: 'normalizedPhone', weight: 0.05 },
  ],
  threshold: 0.4,
  includeScore: true,
  ignoreLocation: true,
  minMatchCharLength: 2,
};

/** Index entry for one contact; phones are normalised in `defaultCountry`. */
export function toSearchDocument(contact: Contact, defaultCountry: CountryCode = 'US'): SearchDocument {
  const document: SearchDocument = { contact };
  if (contact.ethAddress) document.ethAddress = normalizeEthAddress(contact.ethAddress);
  if (contact.phoneNumber) document.normalizedPhone = normalizePhone(contact.phoneNumber, defaultCountry);
  return document;
}

export function searchContacts(
  contacts: Contact[],
  query: string,
  limit: number = 20,
  defaultCountry: CountryCode = 'US',
): ContactSummary[] {
  if (!query.trim()) {
    return contacts.slice(0, limit).map(toSummary);
  }

  const documents = contacts.map(contact => toSearchDocument(contact, defaultCountry));
  const fuse = new Fuse(documents, FUSE_OPTIONS);
  const results = fuse.search(query.trim(), { limit });

  return results.map(r => toSummary(r.item.contact));
}
