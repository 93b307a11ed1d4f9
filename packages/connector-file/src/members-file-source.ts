/**
 * Membership File Source
 *
 * Reads the desired members of a source group from a flat CSV export, one
 * file per group, named after the group's display name. The reader never
 * throws: a missing or unreadable file yields no handles, which the sync
 * engine treats as "no data" and skips.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse } from 'csv-parse/sync';
import {
  createSilentLogger,
  toMemberHandle,
  type Logger,
  type MembershipSource,
  type SourceGroup,
  type SourceMemberHandle,
} from '@dirsync/core';

export interface MembersFileSourceConfig {
  /** Directory holding the per-group CSV files */
  dir: string;
  /** Prepended to the file name (default: '') */
  filePrefix?: string;
  /** Field delimiter (default: ';') */
  delimiter?: string;
  /** Zero-based column holding the member address (default: 1) */
  addressColumn?: number;
  /** Whether the first row is a header (default: true) */
  headers?: boolean;
  logger?: Logger;
}

const EDGE_QUOTES = /^[\s"']+|[\s"']+$/g;

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export class MembersFileSource implements MembershipSource {
  private readonly logger: Logger;

  constructor(readonly config: MembersFileSourceConfig) {
    this.logger = config.logger ?? createSilentLogger();
  }

  /**
   * File name for a group: spaces and path separators become '_'
   */
  fileNameFor(displayName: string): string {
    const formatted = displayName.trim().replace(/[ /\\]/g, '_');
    return `${this.config.filePrefix ?? ''}${formatted}.csv`;
  }

  filePathFor(displayName: string): string {
    return join(this.config.dir, this.fileNameFor(displayName));
  }

  async fetchMemberHandles(group: SourceGroup): Promise<SourceMemberHandle[]> {
    if (!group.displayName.trim()) {
      this.logger.error('Group has no display name; cannot locate its members file', {
        stableId: group.stableId,
      });
      return [];
    }

    const filePath = this.filePathFor(group.displayName);

    let content: Buffer;
    try {
      content = await readFile(filePath);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        this.logger.warn('Members file not found', { group: group.displayName, filePath });
      } else {
        this.logger.error('Members file could not be read', { group: group.displayName, filePath, error });
      }
      return [];
    }

    let addresses: string[];
    try {
      addresses = this.parseAddresses(content);
    } catch (error) {
      this.logger.error('Members file could not be parsed', { group: group.displayName, filePath, error });
      return [];
    }

    const handles = new Set<SourceMemberHandle>();
    for (const address of addresses) {
      const handle = toMemberHandle(address);
      if (!handle) {
        this.logger.warn('Member address has no local part; skipped', {
          group: group.displayName,
          address,
        });
        continue;
      }
      handles.add(handle);
    }

    this.logger.info('Read members file', {
      group: group.displayName,
      filePath,
      addresses: addresses.length,
      handles: handles.size,
    });
    return [...handles];
  }

  /**
   * Extract non-empty member addresses from CSV content
   */
  parseAddresses(content: string | Buffer): string[] {
    const rows: unknown = parse(content, {
      delimiter: this.config.delimiter ?? ';',
      bom: true,
      trim: true,
      relax_quotes: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
    if (!Array.isArray(rows)) return [];

    const column = this.config.addressColumn ?? 1;
    const dataRows = this.config.headers === false ? rows : rows.slice(1);
    const addresses: string[] = [];

    for (const row of dataRows) {
      if (!Array.isArray(row)) continue;
      const cell: unknown = row[column];
      if (typeof cell !== 'string') continue;
      const address = cell.replace(EDGE_QUOTES, '');
      if (address) addresses.push(address);
    }

    return addresses;
  }
}

/**
 * Factory function to create a membership file source
 */
export function createMembersFileSource(config: MembersFileSourceConfig): MembersFileSource {
  return new MembersFileSource(config);
}
