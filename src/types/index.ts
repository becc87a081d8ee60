export type { Contact, ContactSummary, AuxiliaryKind, AuxiliaryValue, EthFilter } from './contact.js';
export { hasEthAddress, hasEns, toSummary } from './contact.js';
export type {
  MimeType, DataRow, ContactHeader, FieldKind, RelationalContactSource, PreferenceStore,
} from './source.js';
export { CONTACT_MIME_TYPES, ensPreferenceKey, ensOverridesFrom } from './source.js';
