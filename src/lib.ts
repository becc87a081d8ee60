export { EthContacts, type EthContactsOptions } from './sdk.js';
export * from './types/index.js';
export * from './contacts/index.js';
export {
  ContactTables, FileContactDatabase, InMemoryPreferenceStore, FilePreferenceStore,
  type ContactTablesSnapshot, type TablePermissions,
} from './store/index.js';
export { loadConfig, type AppConfig } from './config.js';
export { buildServer, createServer } from './server.js';
export {
  StoreError, PermissionDeniedError, InvalidArgumentError, InvalidEthAddressError, ConfigError,
} from './utils/index.js';
