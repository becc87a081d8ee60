import * as fs from 'node:fs/promises';
import type { CountryCode } from 'libphonenumber-js';
import type {
  ContactHeader, DataRow, FieldKind, MimeType, RelationalContactSource,
} from '../types/index.js';
import { StoreError, createLogger, describeError, errnoCode } from '../utils/index.js';
import { ContactTables, contactTablesSnapshotSchema } from './contact-tables.js';
import { contactsLockPath, contactsPath } from './file-layout.js';
import { FileLock } from './lock.js';
import { toStoreError } from './fs-errors.js';

const log = createLogger('file-database');

/**
 * Relational contact source persisted as a single JSON file.
 * Every call reads the file afresh; writes hold a lock file while they
 * read, modify and rewrite it.
 */
export class FileContactDatabase implements RelationalContactSource {
  readonly name = 'file';
  readonly storePath: string;
  private filePath: string;
  private lock: FileLock;
  private defaultCountry: CountryCode;

  constructor(storePath: string, options: { defaultCountry?: CountryCode } = {}) {
    this.storePath = storePath;
    this.filePath = contactsPath(storePath);
    this.lock = new FileLock(contactsLockPath(storePath));
    this.defaultCountry = options.defaultCountry ?? 'US';
  }

  async init(): Promise<void> {
    try {
      await fs.mkdir(this.storePath, { recursive: true });
    } catch (err) {
      throw toStoreError(this.name, 'write', err);
    }
  }

  async listDataRows(mimeTypes: readonly MimeType[]): Promise<DataRow[]> {
    return (await this.load()).listDataRows(mimeTypes);
  }

  async getContactHeader(contactId: string): Promise<ContactHeader | null> {
    return (await this.load()).getContactHeader(contactId);
  }

  async queryField(contactId: string, kind: FieldKind): Promise<string | undefined> {
    return (await this.load()).queryField(contactId, kind);
  }

  async getAuxiliaryField(contactId: string): Promise<string | undefined> {
    return (await this.load()).getAuxiliaryField(contactId);
  }

  async setAuxiliaryField(contactId: string, value: string): Promise<boolean> {
    return this.write(async tables => {
      const updated = await tables.setAuxiliaryField(contactId, value);
      return { result: updated, changed: updated };
    });
  }

  async createContact(displayName: string, phoneNumber?: string, email?: string): Promise<string | null> {
    return this.write(async tables => {
      const contactId = await tables.createContact(displayName, phoneNumber, email);
      return { result: contactId, changed: contactId !== null };
    });
  }

  private async load(): Promise<ContactTables> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return new ContactTables({ name: this.name, defaultCountry: this.defaultCountry });
      }
      throw toStoreError(this.name, 'read', err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreError(`[${this.name}] ${this.filePath} is not valid JSON: ${describeError(err)}`);
    }
    const parsed = contactTablesSnapshotSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreError(`[${this.name}] ${this.filePath} is malformed: ${parsed.error.message}`);
    }
    return new ContactTables({
      name: this.name,
      snapshot: parsed.data,
      defaultCountry: this.defaultCountry,
    });
  }

  private async write<T>(
    fn: (tables: ContactTables) => Promise<{ result: T; changed: boolean }>,
  ): Promise<T> {
    try {
      return await this.lock.withLock(async () => {
        const tables = await this.load();
        const { result, changed } = await fn(tables);
        if (changed) {
          await fs.writeFile(this.filePath, JSON.stringify(tables.toSnapshot(), null, 2), 'utf-8');
          log.debug('Wrote', this.filePath);
        }
        return result;
      });
    } catch (err) {
      throw toStoreError(this.name, 'write', err);
    }
  }
}
