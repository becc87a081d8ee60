import { z } from 'zod';
import type { CountryCode } from 'libphonenumber-js';
import type {
  ContactHeader, DataRow, FieldKind, MimeType, RelationalContactSource,
} from '../types/index.js';
import { normalizePhone } from '../contacts/normalize.js';
import { PermissionDeniedError } from '../utils/index.js';

const mimeTypeSchema = z.enum(['structured-name', 'phone', 'email', 'photo']);

const dataRecordSchema = z.object({
  id: z.number().int(),
  contactId: z.number().int(),
  mimeType: mimeTypeSchema,
  /** Display name, phone number or email address. */
  data1: z.string().optional(),
  /** Auxiliary slot on structured-name rows: a wallet address or an ENS name. */
  data15: z.string().optional(),
  /** E.164 form of a phone row's number. */
  normalizedNumber: z.string().optional(),
  photoUri: z.string().optional(),
});

export const contactTablesSnapshotSchema = z.object({
  nextContactId: z.number().int().positive(),
  nextDataId: z.number().int().positive(),
  contacts: z.array(z.object({ id: z.number().int() })),
  data: z.array(dataRecordSchema),
});

export type DataRecord = z.infer<typeof dataRecordSchema>;
export type ContactTablesSnapshot = z.infer<typeof contactTablesSnapshotSchema>;
export type NewDataRecord = Omit<DataRecord, 'id' | 'contactId'>;

export interface TablePermissions {
  read: boolean;
  write: boolean;
}

export interface ContactTablesOptions {
  name?: string;
  snapshot?: ContactTablesSnapshot;
  permissions?: Partial<TablePermissions>;
  defaultCountry?: CountryCode;
}

export function emptySnapshot(): ContactTablesSnapshot {
  return { nextContactId: 1, nextDataId: 1, contacts: [], data: [] };
}

/**
 * In-memory contact database: a contacts table plus a data table of
 * MIME-typed rows, the layout the reconciler reads. Contact ids are
 * sequential integers exposed as strings.
 */
export class ContactTables implements RelationalContactSource {
  readonly name: string;
  private snapshot: ContactTablesSnapshot;
  private permissions: TablePermissions;
  private defaultCountry: CountryCode;

  constructor(options: ContactTablesOptions = {}) {
    this.name = options.name ?? 'memory';
    this.snapshot = structuredClone(options.snapshot ?? emptySnapshot());
    this.permissions = { read: true, write: true, ...options.permissions };
    this.defaultCountry = options.defaultCountry ?? 'US';
  }

  setPermissions(permissions: Partial<TablePermissions>): void {
    this.permissions = { ...this.permissions, ...permissions };
  }

  toSnapshot(): ContactTablesSnapshot {
    return structuredClone(this.snapshot);
  }

  // --- Fixture helpers (bypass permissions) ---

  insertContact(): string {
    const id = this.snapshot.nextContactId++;
    this.snapshot.contacts.push({ id });
    return String(id);
  }

  insertRow(contactId: string, row: NewDataRecord): void {
    const id = parseContactId(contactId);
    if (id === undefined || !this.hasContact(id)) {
      throw new Error(`No contact record for id ${contactId}`);
    }
    this.snapshot.data.push({ ...row, id: this.snapshot.nextDataId++, contactId: id });
  }

  // --- RelationalContactSource ---

  async listDataRows(mimeTypes: readonly MimeType[]): Promise<DataRow[]> {
    this.assertAccess('read');
    const wanted = new Set(mimeTypes);
    const known = new Set(this.snapshot.contacts.map(c => c.id));
    return this.snapshot.data
      .filter(row => wanted.has(row.mimeType) && known.has(row.contactId))
      .sort((a, b) => a.contactId - b.contactId || a.id - b.id)
      .map(toDataRow);
  }

  async getContactHeader(contactId: string): Promise<ContactHeader | null> {
    this.assertAccess('read');
    const id = parseContactId(contactId);
    if (id === undefined || !this.hasContact(id)) return null;

    const name = this.firstRow(id, 'structured-name');
    const photo = this.rowsOf(id, 'photo').find(row => row.photoUri !== undefined);
    const header: ContactHeader = { displayName: name?.data1 ?? '' };
    if (photo?.photoUri !== undefined) header.photoUri = photo.photoUri;
    return header;
  }

  async queryField(contactId: string, kind: FieldKind): Promise<string | undefined> {
    this.assertAccess('read');
    const id = parseContactId(contactId);
    if (id === undefined) return undefined;
    return this.rowsOf(id, kind).find(row => row.data1 !== undefined)?.data1;
  }

  async getAuxiliaryField(contactId: string): Promise<string | undefined> {
    this.assertAccess('read');
    const id = parseContactId(contactId);
    if (id === undefined) return undefined;
    return this.firstRow(id, 'structured-name')?.data15;
  }

  async setAuxiliaryField(contactId: string, value: string): Promise<boolean> {
    this.assertAccess('write');
    const id = parseContactId(contactId);
    if (id === undefined) return false;
    const row = this.firstRow(id, 'structured-name');
    if (!row) return false;
    row.data15 = value;
    return true;
  }

  async createContact(displayName: string, phoneNumber?: string, email?: string): Promise<string | null> {
    this.assertAccess('write');

    // Build the whole batch before touching the tables so it applies all-or-nothing.
    const contactId = this.snapshot.nextContactId;
    let nextDataId = this.snapshot.nextDataId;
    const rows: DataRecord[] = [
      { id: nextDataId++, contactId, mimeType: 'structured-name', data1: displayName },
    ];
    if (phoneNumber?.trim()) {
      rows.push({
        id: nextDataId++,
        contactId,
        mimeType: 'phone',
        data1: phoneNumber,
        normalizedNumber: normalizePhone(phoneNumber, this.defaultCountry),
      });
    }
    if (email?.trim()) {
      rows.push({ id: nextDataId++, contactId, mimeType: 'email', data1: email });
    }

    this.snapshot.contacts.push({ id: contactId });
    this.snapshot.data.push(...rows);
    this.snapshot.nextContactId = contactId + 1;
    this.snapshot.nextDataId = nextDataId;
    return String(contactId);
  }

  // --- Internals ---

  private assertAccess(access: 'read' | 'write'): void {
    if (!this.permissions[access]) {
      throw new PermissionDeniedError(this.name, access);
    }
  }

  private hasContact(id: number): boolean {
    return this.snapshot.contacts.some(c => c.id === id);
  }

  private rowsOf(id: number, mimeType: MimeType): DataRecord[] {
    return this.snapshot.data
      .filter(row => row.contactId === id && row.mimeType === mimeType)
      .sort((a, b) => a.id - b.id);
  }

  private firstRow(id: number, mimeType: MimeType): DataRecord | undefined {
    return this.rowsOf(id, mimeType)[0];
  }
}

/** Only the canonical decimal form is an id; "01" or "+1" name no contact. */
function parseContactId(contactId: string): number | undefined {
  return /^(0|[1-9]\d*)$/.test(contactId) ? Number(contactId) : undefined;
}

function toDataRow(record: DataRecord): DataRow {
  const row: DataRow = { contactId: String(record.contactId), mimeType: record.mimeType };
  if (record.data1 !== undefined) row.primaryValue = record.data1;
  if (record.mimeType === 'structured-name' && record.data15 !== undefined) {
    row.auxiliaryValue = record.data15;
  }
  if (record.photoUri !== undefined) row.photoUri = record.photoUri;
  return row;
}
