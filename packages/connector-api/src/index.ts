/**
 * @dirsync/connector-api
 *
 * REST connector for the organisation directory service
 */

export * from './org-directory/index.js';
