/**
 * @dirsync/connector-ldap
 *
 * Source directory connector for LDAP / Active Directory
 */

export * from './ldap/index.js';
