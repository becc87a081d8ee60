/**
 * A contact merged from the relational contact source and the preference store.
 * Built fresh on every query; never mutated after construction.
 */
export interface Contact {
  readonly contactId: string;
  /** Empty when the source has no structured-name row for the contact. */
  readonly displayName: string;
  readonly phoneNumber?: string;
  readonly email?: string;
  readonly photoUri?: string;
  readonly ethAddress?: string;
  readonly ensName?: string;
}

export type AuxiliaryKind = 'wallet-address' | 'ens-name' | 'neither';

/**
 * Contents of the auxiliary slot on a structured-name row. The slot holds one value,
 * so a wallet address and an ENS name read from it can never both be set.
 */
export type AuxiliaryValue =
  | { kind: 'wallet-address'; value: string }
  | { kind: 'ens-name'; value: string }
  | { kind: 'unclassified'; value: string }
  | { kind: 'absent' };

export interface ContactSummary {
  contactId: string;
  displayName: string;
  ethAddress?: string;
  ensName?: string;
}

export type EthFilter = 'all' | 'wallet' | 'ens' | 'either';

export function hasEthAddress(contact: Contact): boolean {
  return !!contact.ethAddress?.trim();
}

export function hasEns(contact: Contact): boolean {
  return !!contact.ensName?.trim();
}

export function toSummary(contact: Contact): ContactSummary {
  return {
    contactId: contact.contactId,
    displayName: contact.displayName,
    ethAddress: contact.ethAddress,
    ensName: contact.ensName,
  };
}
