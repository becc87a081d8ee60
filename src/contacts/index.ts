export { classify, toAuxiliaryValue, auxiliaryFields, isEthAddress, ethAddressSchema, ETH_ADDRESS_REGEX } from './classify.js';
export { buildContact, sortByDisplayName, type ContactFields } from './model.js';
export { normalizePhone, normalizeEthAddress } from './normalize.js';
export { filterContacts, matchesFilter } from './filters.js';
export { searchContacts, toSearchDocument, type SearchDocument } from './search.js';
export { Reconciler } from './reconcile.js';
export { ContactMutations, type NewContactInput } from './mutations.js';
