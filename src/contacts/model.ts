import type { Contact } from '../types/index.js';

export interface ContactFields {
  contactId: string;
  displayName?: string | null;
  phoneNumber?: string | null;
  email?: string | null;
  photoUri?: string | null;
  ethAddress?: string | null;
  ensName?: string | null;
}

/**
 * Build an immutable Contact. Absent optional fields are left off the object
 * rather than stored as `undefined`; a missing display name becomes `''`.
 */
export function buildContact(fields: ContactFields): Contact {
  const contact: { -readonly [K in keyof Contact]: Contact[K] } = {
    contactId: fields.contactId,
    displayName: fields.displayName ?? '',
  };
  if (fields.phoneNumber != null) contact.phoneNumber = fields.phoneNumber;
  if (fields.email != null) contact.email = fields.email;
  if (fields.photoUri != null) contact.photoUri = fields.photoUri;
  if (fields.ethAddress != null) contact.ethAddress = fields.ethAddress;
  if (fields.ensName != null) contact.ensName = fields.ensName;
  return Object.freeze(contact);
}

/** Case-insensitive display name order. Array#sort is stable, so ties keep source order. */
export function sortByDisplayName(contacts: Contact[]): Contact[] {
  return [...contacts].sort((a, b) => {
    const left = a.displayName.toLowerCase();
    const right = b.displayName.toLowerCase();
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  });
}
