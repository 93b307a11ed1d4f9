export { LdapClient } from './client.js';
export type { LdapClientConfig, LdapSearchRequest } from './client.js';

export { LdapGroupSource, createLdapGroupSource, DEFAULT_GROUP_OBJECT_CLASS } from './group-source.js';
export type { LdapGroupSourceConfig } from './group-source.js';

export { formatObjectGuid, normalizeGuidString } from './guid.js';
