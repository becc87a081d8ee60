export { ContactTables, emptySnapshot, type ContactTablesSnapshot, type DataRecord, type TablePermissions } from './contact-tables.js';
export { FileContactDatabase } from './file-database.js';
export { InMemoryPreferenceStore, FilePreferenceStore } from './preferences.js';
export { FileLock } from './lock.js';
export { toStoreError } from './fs-errors.js';
export * from './file-layout.js';
