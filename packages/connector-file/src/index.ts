/**
 * @dirsync/connector-file
 *
 * Flat-file membership import and diagnostic member export
 */

export {
  MembersFileSource,
  createMembersFileSource,
  type MembersFileSourceConfig,
} from './members-file-source.js';

export {
  MemberCsvExporter,
  createMemberCsvExporter,
  safeGroupFileName,
  MEMBER_EXPORT_COLUMNS,
  type MemberCsvExporterConfig,
} from './member-csv-exporter.js';
