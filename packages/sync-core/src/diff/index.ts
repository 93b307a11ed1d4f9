export { diffGroup, isEmptyPatch, buildCreatePayload, SYNCED_GROUP_FIELDS } from './field-diff.js';
