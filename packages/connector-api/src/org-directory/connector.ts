/**
 * Organisation Directory Connector
 *
 * Implements TargetService on top of OrgDirectoryClient. Failures are
 * returned as RemoteResult values so the sync engine can stay fail-soft.
 */

import {
  createSilentLogger,
  remoteFail,
  remoteOk,
  wrapError,
  type TargetService,
  type TargetGroup,
  type TargetUser,
  type MemberType,
  type GroupPatch,
  type CreateGroupPayload,
  type RemoteResult,
  type DeleteOutcome,
  type AddMemberOutcome,
  type RemoveMemberOutcome,
  type Logger,
} from '@dirsync/core';
import { OrgDirectoryClient, type OrgDirectoryClientConfig } from './client.js';
import { toTargetGroup, toTargetUser } from './mapping.js';

export interface OrgDirectoryConnectorConfig extends OrgDirectoryClientConfig {
  /** Page size for group listing (default: 1000) */
  groupsPageSize?: number;
  /** Page size for user listing (default: 1000) */
  usersPageSize?: number;
  /**
   * Users with a numeric id below this value are service accounts and are
   * dropped from listings. Unset keeps every non-robot user.
   */
  minUserId?: number;
}

export class OrgDirectoryConnector implements TargetService {
  readonly config: OrgDirectoryConnectorConfig;
  private readonly client: OrgDirectoryClient;
  private readonly logger: Logger;

  constructor(config: OrgDirectoryConnectorConfig, client?: OrgDirectoryClient) {
    this.config = config;
    this.logger = config.logger ?? createSilentLogger();
    this.client = client ?? new OrgDirectoryClient(config);
  }

  async listGroups(): Promise<RemoteResult<TargetGroup[]>> {
    return this.settle('listGroups', async () => {
      const groups = await this.client.listAllGroups(this.config.groupsPageSize ?? 1000);
      this.logger.info('Fetched target groups', { count: groups.length });
      return groups.map(toTargetGroup);
    });
  }

  async listUsers(): Promise<RemoteResult<TargetUser[]>> {
    return this.settle('listUsers', async () => {
      const users = await this.client.listAllUsers(this.config.usersPageSize ?? 1000);
      const kept = users.map(toTargetUser).filter((user) => this.isHumanAccount(user));
      this.logger.info('Fetched target users', {
        count: kept.length,
        filtered: users.length - kept.length,
      });
      return kept;
    });
  }

  async listGroupMembers(groupId: number): Promise<RemoteResult<TargetUser[]>> {
    return this.settle('listGroupMembers', async () => {
      const members = await this.client.getGroupMembers(groupId);
      this.logger.debug('Fetched group members', {
        groupId,
        users: members.users.length,
        groups: members.groups.length,
        departments: members.departments.length,
      });
      return members.users.map(toTargetUser);
    });
  }

  async createGroup(payload: CreateGroupPayload): Promise<RemoteResult<TargetGroup>> {
    return this.settle('createGroup', async () => toTargetGroup(await this.client.createGroup(payload)));
  }

  async patchGroup(groupId: number, patch: GroupPatch): Promise<RemoteResult<TargetGroup>> {
    return this.settle('patchGroup', async () =>
      toTargetGroup(await this.client.patchGroup(groupId, patch))
    );
  }

  async deleteGroup(groupId: number): Promise<RemoteResult<DeleteOutcome>> {
    return this.settle('deleteGroup', async () => {
      const response = await this.client.deleteGroup(groupId);
      return { removed: response.removed };
    });
  }

  async addMember(
    groupId: number,
    type: MemberType,
    memberId: string
  ): Promise<RemoteResult<AddMemberOutcome>> {
    return this.settle('addMember', async () => {
      const response = await this.client.addMember(groupId, type, memberId);
      return { added: response.added };
    });
  }

  async removeMember(
    groupId: number,
    type: MemberType,
    memberId: string
  ): Promise<RemoteResult<RemoveMemberOutcome>> {
    return this.settle('removeMember', async () => {
      const response = await this.client.removeMember(groupId, type, memberId);
      return { removed: response.deleted };
    });
  }

  async testConnection(): Promise<boolean> {
    return this.client.testConnection();
  }

  private isHumanAccount(user: TargetUser): boolean {
    if (user.isRobot) return false;
    const { minUserId } = this.config;
    if (minUserId === undefined) return true;
    const numericId = Number(user.id);
    return !Number.isFinite(numericId) || numericId >= minUserId;
  }

  private async settle<T>(operation: string, fn: () => Promise<T>): Promise<RemoteResult<T>> {
    try {
      return remoteOk(await fn());
    } catch (error) {
      const wrapped = wrapError(error, 'target');
      this.logger.error(`Directory API ${operation} failed`, { error: wrapped });
      return remoteFail(wrapped);
    }
  }
}

/**
 * Factory function for creating directory connectors
 */
export function createOrgDirectoryConnector(
  config: OrgDirectoryConnectorConfig
): OrgDirectoryConnector {
  return new OrgDirectoryConnector(config);
}
