/**
 * Member CSV Exporter
 *
 * Diagnostic dump of the current target members of each processed group.
 * Export failures are logged and never propagate into the sync.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import {
  createSilentLogger,
  type Logger,
  type MembershipDiagnostics,
  type TargetUser,
} from '@dirsync/core';

export interface MemberCsvExporterConfig {
  /** Output directory, created on first export */
  dir: string;
  /** Field delimiter (default: ';') */
  delimiter?: string;
  logger?: Logger;
}

export const MEMBER_EXPORT_COLUMNS = [
  'id',
  'nickname',
  'email',
  'last_name',
  'first_name',
  'middle_name',
  'position',
  'departmentId',
] as const;

type ExportRow = { [K in (typeof MEMBER_EXPORT_COLUMNS)[number]]: string };

/** Letters, digits, space, '-' and '_' survive; spaces then become '_' */
export function safeGroupFileName(groupName: string): string {
  const kept = Array.from(groupName)
    .filter((ch) => /[\p{L}\p{N} _-]/u.test(ch))
    .join('')
    .trim()
    .replace(/ /g, '_');
  return kept || 'unnamed_group';
}

function toRow(user: TargetUser): ExportRow {
  return {
    id: user.id,
    nickname: user.primaryHandle,
    email: user.email ?? '',
    last_name: user.name?.last ?? '',
    first_name: user.name?.first ?? '',
    middle_name: user.name?.middle ?? '',
    position: user.position ?? '',
    departmentId: user.departmentId === undefined ? '' : String(user.departmentId),
  };
}

export class MemberCsvExporter implements MembershipDiagnostics {
  private readonly logger: Logger;

  constructor(readonly config: MemberCsvExporterConfig) {
    this.logger = config.logger ?? createSilentLogger();
  }

  filePathFor(groupName: string): string {
    return join(this.config.dir, `${safeGroupFileName(groupName)}.csv`);
  }

  render(members: readonly TargetUser[]): string {
    return stringify(members.map(toRow), {
      header: true,
      columns: [...MEMBER_EXPORT_COLUMNS],
      delimiter: this.config.delimiter ?? ';',
      bom: true,
    });
  }

  async exportMembers(groupName: string, members: readonly TargetUser[]): Promise<void> {
    const filePath = this.filePathFor(groupName);
    try {
      await mkdir(this.config.dir, { recursive: true });
      await writeFile(filePath, this.render(members), 'utf-8');
      this.logger.debug('Exported group members', { group: groupName, filePath, count: members.length });
    } catch (error) {
      this.logger.error('Failed to export group members', { group: groupName, filePath, error });
    }
  }
}

export function createMemberCsvExporter(config: MemberCsvExporterConfig): MemberCsvExporter {
  return new MemberCsvExporter(config);
}
