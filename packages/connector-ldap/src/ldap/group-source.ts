/**
 * LDAP Group Source
 *
 * Implements SourceDirectory: reads distribution groups and maps them to
 * SourceGroup records.
 */

import type { Entry } from 'ldapts';
import {
  createSilentLogger,
  type Logger,
  type SourceDirectory,
  type SourceGroup,
} from '@dirsync/core';
import { LdapClient, type LdapClientConfig } from './client.js';
import { formatObjectGuid, normalizeGuidString } from './guid.js';

export interface LdapGroupSourceConfig extends LdapClientConfig {
  /** Search base for groups */
  baseDN: string;
  /** Search filter (default: '(objectClass=msExchDynamicDistributionList)') */
  filter?: string;
  /** Entries without this objectClass are dropped (default: msExchDynamicDistributionList) */
  groupObjectClass?: string;
}

export const DEFAULT_GROUP_OBJECT_CLASS = 'msExchDynamicDistributionList';

const GROUP_ATTRIBUTES = ['objectGUID', 'objectClass', 'displayName', 'cn', 'mail', 'description'];

type AttributeValue = Entry[string] | undefined;

function firstString(value: AttributeValue): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined) return undefined;
  const text = typeof first === 'string' ? first : first.toString('utf-8');
  const trimmed = text.trim();
  return trimmed || undefined;
}

function allStrings(value: AttributeValue): string[] {
  if (value === undefined) return [];
  const values: Array<string | Buffer> = Array.isArray(value) ? value : [value];
  return values.map((v) => (typeof v === 'string' ? v : v.toString('utf-8')));
}

function readGuid(value: AttributeValue): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined) return undefined;
  return typeof first === 'string' ? normalizeGuidString(first) : formatObjectGuid(first);
}

export class LdapGroupSource implements SourceDirectory {
  private readonly client: LdapClient;
  private readonly logger: Logger;

  constructor(readonly config: LdapGroupSourceConfig, client?: LdapClient) {
    this.logger = config.logger ?? createSilentLogger();
    this.client = client ?? new LdapClient(config);
  }

  async fetchGroups(filter?: string): Promise<SourceGroup[]> {
    const objectClass = this.config.groupObjectClass ?? DEFAULT_GROUP_OBJECT_CLASS;
    const entries = await this.client.search({
      baseDN: this.config.baseDN,
      filter: filter ?? this.config.filter ?? `(objectClass=${objectClass})`,
      attributes: GROUP_ATTRIBUTES,
      binaryAttributes: ['objectGUID'],
    });

    const wanted = objectClass.toLowerCase();
    const groups: SourceGroup[] = [];
    for (const entry of entries) {
      const classes = allStrings(entry['objectClass']).map((c) => c.toLowerCase());
      if (!classes.includes(wanted)) continue;
      groups.push(this.toSourceGroup(entry));
    }

    this.logger.info('Fetched source groups', { entries: entries.length, groups: groups.length });
    return groups;
  }

  private toSourceGroup(entry: Entry): SourceGroup {
    const stableId = readGuid(entry['objectGUID']);
    if (!stableId) {
      this.logger.warn('Source group has no usable objectGUID', { dn: entry.dn });
    }

    return {
      stableId: stableId ?? '',
      displayName: firstString(entry['displayName']) ?? firstString(entry['cn']) ?? '',
      mail: firstString(entry['mail']),
      description: firstString(entry['description']),
      dn: entry.dn,
    };
  }
}

/**
 * Factory function for creating an LDAP group source
 */
export function createLdapGroupSource(config: LdapGroupSourceConfig): LdapGroupSource {
  return new LdapGroupSource(config);
}
