import type { PreferenceStore, RelationalContactSource } from '../types/index.js';
import { InvalidEthAddressError, createLogger } from '../utils/index.js';
import { isEthAddress } from './classify.js';

const log = createLogger('mutations');

export interface NewContactInput {
  displayName: string;
  phoneNumber?: string;
  email?: string;
  ethAddress?: string;
  ensName?: string;
}

/**
 * Write paths for the Ethereum fields. Store failures are logged and reported
 * through the return value; only a malformed wallet address throws.
 */
export class ContactMutations {
  private source: RelationalContactSource;
  private preferences: PreferenceStore;

  constructor(source: RelationalContactSource, preferences: PreferenceStore) {
    this.source = source;
    this.preferences = preferences;
  }

  /**
   * Store a wallet address in the contact's auxiliary slot.
   * @throws InvalidEthAddressError before any write when `address` is malformed
   * @returns false when the contact has no name row or the write was refused
   */
  async setWalletAddress(contactId: string, address: string): Promise<boolean> {
    if (!isEthAddress(address)) {
      throw new InvalidEthAddressError(address);
    }
    return this.writeAuxiliary(contactId, address);
  }

  /** Store an ENS name in the auxiliary slot. The preference override is left alone. */
  async setEnsName(contactId: string, ensName: string): Promise<boolean> {
    return this.writeAuxiliary(contactId, ensName);
  }

  async saveEnsOverride(contactId: string, ensName: string): Promise<void> {
    try {
      await this.preferences.setEnsOverride(contactId, ensName);
    } catch (err) {
      log.error(`Failed to save ENS override for ${contactId}:`, err);
    }
  }

  /**
   * Create a contact, then attach its Ethereum fields. Attaching is best-effort:
   * once the base record exists its id is returned even if later steps fail.
   * @returns the new contact id, or null if the base record couldn't be created
   */
  async createContact(input: NewContactInput): Promise<string | null> {
    let contactId: string | null;
    try {
      contactId = await this.source.createContact(input.displayName, input.phoneNumber, input.email);
    } catch (err) {
      log.error('Failed to add contact', input.displayName, err);
      return null;
    }
    if (contactId === null) {
      log.error('Contact source returned no id for', input.displayName);
      return null;
    }

    const auxiliary = input.ethAddress ?? input.ensName;
    if (auxiliary !== undefined && !(await this.writeAuxiliary(contactId, auxiliary))) {
      log.warn(`Contact ${contactId} created without its auxiliary value`);
    }

    if (input.ensName?.trim()) {
      await this.saveEnsOverride(contactId, input.ensName);
    }

    log.info('Created contact:', contactId, input.displayName);
    return contactId;
  }

  private async writeAuxiliary(contactId: string, value: string): Promise<boolean> {
    try {
      const updated = await this.source.setAuxiliaryField(contactId, value);
      if (!updated) log.warn(`Contact ${contactId} has no name row to update`);
      return updated;
    } catch (err) {
      log.error(`Failed to write auxiliary field for ${contactId}:`, err);
      return false;
    }
  }
}
