import type {
  AuxiliaryValue, Contact, DataRow, PreferenceStore, RelationalContactSource,
} from '../types/index.js';
import { CONTACT_MIME_TYPES } from '../types/index.js';
import { PermissionDeniedError, createLogger } from '../utils/index.js';
import { auxiliaryFields, toAuxiliaryValue } from './classify.js';
import { buildContact, sortByDisplayName } from './model.js';

const log = createLogger('reconciler');

/** Scratch record for one contact id during a listing pass. */
interface TempContactData {
  displayName?: string;
  auxiliary?: AuxiliaryValue;
  phone?: string;
  email?: string;
  photoUri?: string;
}

/**
 * Merges rows from the relational contact source with ENS overrides from the
 * preference store. An ENS name found in the auxiliary slot takes precedence
 * over the override; wallet addresses only ever come from the slot.
 */
export class Reconciler {
  private source: RelationalContactSource;
  private preferences: PreferenceStore;

  constructor(source: RelationalContactSource, preferences: PreferenceStore) {
    this.source = source;
    this.preferences = preferences;
  }

  /** Every contact, sorted by case-insensitive display name. Empty if the source can't be read. */
  async listAll(): Promise<Contact[]> {
    let rows: DataRow[];
    try {
      rows = await this.source.listDataRows(CONTACT_MIME_TYPES);
    } catch (err) {
      if (err instanceof PermissionDeniedError) {
        log.error(`Read permission not granted on ${this.source.name}`, err.message);
      } else {
        log.error(`Failed to list contacts from ${this.source.name}:`, err);
      }
      return [];
    }

    const scratch = new Map<string, TempContactData>();
    for (const row of rows) {
      let data = scratch.get(row.contactId);
      if (!data) {
        data = {};
        scratch.set(row.contactId, data);
      }
      accumulate(data, row);
    }

    const overrides = await this.readOverrides();
    const contacts: Contact[] = [];
    for (const [contactId, data] of scratch) {
      const override = overrides.get(contactId);
      const { ethAddress, ensName } = auxiliaryFields(data.auxiliary ?? { kind: 'absent' });
      contacts.push(buildContact({
        contactId,
        displayName: data.displayName,
        phoneNumber: data.phone,
        email: data.email,
        photoUri: data.photoUri,
        ethAddress,
        ensName: ensName ?? override,
      }));
    }

    log.debug(`Reconciled ${contacts.length} contacts from ${rows.length} rows`);
    return sortByDisplayName(contacts);
  }

  /**
   * A single contact, or null when it has no header, no display name, or the
   * source can't be read.
   */
  async getById(contactId: string): Promise<Contact | null> {
    try {
      const header = await this.source.getContactHeader(contactId);
      if (!header?.displayName) return null;

      const phoneNumber = await this.source.queryField(contactId, 'phone');
      const email = await this.source.queryField(contactId, 'email');
      const auxiliary = toAuxiliaryValue(await this.source.getAuxiliaryField(contactId));
      const { ethAddress, ensName } = auxiliaryFields(auxiliary);

      return buildContact({
        contactId,
        displayName: header.displayName,
        phoneNumber,
        email,
        photoUri: header.photoUri,
        ethAddress,
        ensName: ensName ?? await this.readOverride(contactId),
      });
    } catch (err) {
      log.error(`Failed to read contact ${contactId} from ${this.source.name}:`, err);
      return null;
    }
  }

  private async readOverrides(): Promise<Map<string, string>> {
    try {
      return await this.preferences.listEnsOverrides();
    } catch (err) {
      log.warn(`Ignoring ENS overrides, ${this.preferences.name} unreadable:`, err);
      return new Map();
    }
  }

  private async readOverride(contactId: string): Promise<string | undefined> {
    try {
      return await this.preferences.getEnsOverride(contactId);
    } catch (err) {
      log.warn(`Ignoring ENS override for ${contactId}, ${this.preferences.name} unreadable:`, err);
      return undefined;
    }
  }
}

function accumulate(data: TempContactData, row: DataRow): void {
  switch (row.mimeType) {
    case 'structured-name':
      // A contact has one name row; later ones are ignored.
      if (data.auxiliary) return;
      data.displayName = row.primaryValue;
      data.auxiliary = toAuxiliaryValue(row.auxiliaryValue);
      return;
    case 'phone':
      data.phone ??= row.primaryValue;
      return;
    case 'email':
      data.email ??= row.primaryValue;
      return;
    case 'photo':
      data.photoUri ??= row.photoUri;
      return;
  }
}
