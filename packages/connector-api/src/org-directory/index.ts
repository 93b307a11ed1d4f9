/**
 * Organisation Directory Connector
 *
 * Exports for the directory service integration.
 */

export { OrgDirectoryClient, DEFAULT_BASE_URL, DEFAULT_RETRY } from './client.js';
export type { OrgDirectoryClientConfig } from './client.js';

export { OrgDirectoryConnector, createOrgDirectoryConnector } from './connector.js';
export type { OrgDirectoryConnectorConfig } from './connector.js';

export { toTargetGroup, toTargetUser } from './mapping.js';
