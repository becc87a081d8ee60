import type { CountryCode } from 'libphonenumber-js';
import type {
  Contact, ContactSummary, EthFilter, PreferenceStore, RelationalContactSource,
} from './types/index.js';
import {
  ContactMutations, Reconciler, filterContacts, searchContacts, type NewContactInput,
} from './contacts/index.js';

/**
 * Contacts enriched with an Ethereum wallet address and ENS name.
 *
 * Reads merge the relational contact source with ENS overrides kept in the
 * preference store. Writes go to one store or the other and are not atomic
 * across the two.
 */
export interface EthContactsOptions {
  /** Region for phone numbers written without a country code. */
  defaultCountry?: CountryCode;
}

export class EthContacts {
  private reconciler: Reconciler;
  private mutations: ContactMutations;
  private defaultCountry: CountryCode;

  constructor(source: RelationalContactSource, preferences: PreferenceStore, options: EthContactsOptions = {}) {
    this.reconciler = new Reconciler(source, preferences);
    this.mutations = new ContactMutations(source, preferences);
    this.defaultCountry = options.defaultCountry ?? 'US';
  }

  // --- Queries ---

  listAll(): Promise<Contact[]> {
    return this.reconciler.listAll();
  }

  async list(filter: EthFilter): Promise<Contact[]> {
    return filterContacts(await this.reconciler.listAll(), filter);
  }

  listWithWallet(): Promise<Contact[]> {
    return this.list('wallet');
  }

  listWithEns(): Promise<Contact[]> {
    return this.list('ens');
  }

  listWithEitherEthField(): Promise<Contact[]> {
    return this.list('either');
  }

  getById(contactId: string): Promise<Contact | null> {
    return this.reconciler.getById(contactId);
  }

  async search(query: string, limit?: number): Promise<ContactSummary[]> {
    return searchContacts(await this.reconciler.listAll(), query, limit, this.defaultCountry);
  }

  // --- Mutations ---

  setWalletAddress(contactId: string, address: string): Promise<boolean> {
    return this.mutations.setWalletAddress(contactId, address);
  }

  setEnsName(contactId: string, ensName: string): Promise<boolean> {
    return this.mutations.setEnsName(contactId, ensName);
  }

  saveEnsOverride(contactId: string, ensName: string): Promise<void> {
    return this.mutations.saveEnsOverride(contactId, ensName);
  }

  createContact(input: NewContactInput): Promise<string | null> {
    return this.mutations.createContact(input);
  }
}
