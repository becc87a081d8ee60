export type MimeType = 'structured-name' | 'phone' | 'email' | 'photo';

export const CONTACT_MIME_TYPES: readonly MimeType[] = ['structured-name', 'phone', 'email', 'photo'];

/** One row of the relational data table, projected to the columns the reconciler reads. */
export interface DataRow {
  contactId: string;
  mimeType: MimeType;
  /** Display name, phone number or email address, depending on `mimeType`. */
  primaryValue?: string;
  /** Auxiliary slot of a structured-name row. */
  auxiliaryValue?: string;
  photoUri?: string;
}

export interface ContactHeader {
  displayName: string;
  photoUri?: string;
}

export type FieldKind = 'phone' | 'email';

/**
 * Row-oriented contact database the reconciler reads from.
 * Implementations throw PermissionDeniedError when access is refused.
 */
export interface RelationalContactSource {
  readonly name: string;

  /** Rows of the given MIME types, ordered by contact id ascending. */
  listDataRows(mimeTypes: readonly MimeType[]): Promise<DataRow[]>;
  getContactHeader(contactId: string): Promise<ContactHeader | null>;
  /** First row of the given kind for the contact. */
  queryField(contactId: string, kind: FieldKind): Promise<string | undefined>;
  getAuxiliaryField(contactId: string): Promise<string | undefined>;
  /** Updates the existing structured-name row; false when the contact has none. */
  setAuxiliaryField(contactId: string, value: string): Promise<boolean>;
  /** Creates the contact with its name, phone and email rows as one batch. */
  createContact(displayName: string, phoneNumber?: string, email?: string): Promise<string | null>;
}

/** Namespaced key-value store holding ENS overrides under `ENS_<contactId>`. */
export interface PreferenceStore {
  readonly name: string;

  getEnsOverride(contactId: string): Promise<string | undefined>;
  /** Every override, keyed by contact id. */
  listEnsOverrides(): Promise<Map<string, string>>;
  setEnsOverride(contactId: string, ensName: string): Promise<void>;
}

const ENS_PREFIX = 'ENS_';

export function ensPreferenceKey(contactId: string): string {
  return `${ENS_PREFIX}${contactId}`;
}

/** Collect `ENS_<contactId>` entries into a map keyed by contact id. Other keys are skipped. */
export function ensOverridesFrom(entries: Iterable<[string, string]>): Map<string, string> {
  const overrides = new Map<string, string>();
  for (const [key, value] of entries) {
    if (key.startsWith(ENS_PREFIX)) overrides.set(key.slice(ENS_PREFIX.length), value);
  }
  return overrides;
}
