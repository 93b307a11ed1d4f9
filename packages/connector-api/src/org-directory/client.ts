/**
 * Organisation Directory API Client
 *
 * REST client for the directory service (`/directory/v1/org/{orgId}`).
 * Authenticates with an OAuth token, validates every response with zod
 * and repeats transient failures through `withRetries`.
 */

import type { z } from 'zod';
import {
  ConnectorError,
  createSilentLogger,
  isTransientError,
  withRetries,
  groupsPageSchema,
  usersPageSchema,
  groupMembersSchema,
  wireGroupSchema,
  deleteGroupResponseSchema,
  addMemberResponseSchema,
  removeMemberResponseSchema,
  type Logger,
  type RetryConfig,
  type MemberType,
  type CreateGroupPayload,
  type GroupPatch,
  type WireGroup,
  type WireUser,
  type GroupMembers,
} from '@dirsync/core';

export const DEFAULT_BASE_URL = 'https://api360.yandex.net';

/** Linear 2s, 4s between three attempts */
export const DEFAULT_RETRY: RetryConfig = {
  attempts: 3,
  baseDelayMs: 2000,
  maxDelayMs: 60_000,
  backoff: 'linear',
  jitter: 0,
};

export interface OrgDirectoryClientConfig {
  /** Organisation id */
  orgId: string;
  /** OAuth token */
  token: string;
  /** API base URL (default: https://api360.yandex.net) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Retry policy for transient failures (default: DEFAULT_RETRY) */
  retry?: RetryConfig;
  logger?: Logger;
  /** Timer used between retries; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function extractErrorMessage(text: string): string | undefined {
  if (!text.trim().startsWith('{')) return text.trim() || undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null && 'message' in parsed) {
      return typeof parsed.message === 'string' ? parsed.message : undefined;
    }
    return text;
  } catch {
    return text;
  }
}

function statusError(method: HttpMethod, path: string, status: number, detail: string): ConnectorError {
  const context = { method, path, status };
  const message = `Directory API ${method} ${path} failed: HTTP ${status}${detail ? ` ${detail}` : ''}`;

  if (status === 401) {
    return new ConnectorError({
      code: 'AUTHENTICATION_FAILED',
      message,
      connectorId: 'target',
      suggestion: 'Check the OAuth token and that it has not expired.',
      context,
    });
  }
  if (status === 403) {
    return new ConnectorError({
      code: 'PERMISSION_DENIED',
      message,
      connectorId: 'target',
      suggestion: 'Grant the token directory read/write scopes for this organisation.',
      context,
    });
  }
  if (status === 404) {
    return new ConnectorError({ code: 'NOT_FOUND', message, connectorId: 'target', context });
  }
  if (status === 429) {
    return new ConnectorError({
      code: 'RATE_LIMITED',
      message,
      connectorId: 'target',
      suggestion: 'Wait and retry, or raise sync.mutationDelayMs.',
      context,
    });
  }
  if (status >= 500) {
    return new ConnectorError({ code: 'SERVER_ERROR', message, connectorId: 'target', context });
  }
  if (status === 400 || status === 422) {
    return new ConnectorError({ code: 'VALIDATION_ERROR', message, connectorId: 'target', context });
  }
  return new ConnectorError({
    code: method === 'GET' ? 'READ_FAILED' : 'WRITE_FAILED',
    message,
    connectorId: 'target',
    context,
  });
}

/** Settings left out of `retry` keep the directory API defaults */
function retryWithDefaults(retry: RetryConfig = {}): RetryConfig {
  return {
    attempts: retry.attempts ?? DEFAULT_RETRY.attempts,
    baseDelayMs: retry.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs,
    maxDelayMs: retry.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs,
    jitter: retry.jitter ?? DEFAULT_RETRY.jitter,
    backoff: retry.backoff ?? DEFAULT_RETRY.backoff,
  };
}

export class OrgDirectoryClient {
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly retry: RetryConfig;

  constructor(private readonly config: OrgDirectoryClientConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.logger = config.logger ?? createSilentLogger();
    this.retry = retryWithDefaults(config.retry);
  }

  /**
   * List one page of groups
   */
  async listGroupsPage(page: number, perPage: number) {
    return this.request('GET', `/groups?page=${page}&perPage=${perPage}`, groupsPageSchema);
  }

  /**
   * List one page of users
   */
  async listUsersPage(page: number, perPage: number) {
    return this.request('GET', `/users?page=${page}&perPage=${perPage}`, usersPageSchema);
  }

  /**
   * Read every page of groups; fails as a whole if any page fails
   */
  async listAllGroups(perPage: number): Promise<WireGroup[]> {
    return this.collectPages(async (page) => {
      const response = await this.listGroupsPage(page, perPage);
      return { items: response.groups, pages: response.pages };
    });
  }

  /**
   * Read every page of users; fails as a whole if any page fails
   */
  async listAllUsers(perPage: number): Promise<WireUser[]> {
    return this.collectPages(async (page) => {
      const response = await this.listUsersPage(page, perPage);
      return { items: response.users, pages: response.pages };
    });
  }

  async getGroupMembers(groupId: number): Promise<GroupMembers> {
    return this.request('GET', `/groups/${groupId}/members`, groupMembersSchema);
  }

  async createGroup(payload: CreateGroupPayload): Promise<WireGroup> {
    return this.request('POST', '/groups', wireGroupSchema, payload);
  }

  async patchGroup(groupId: number, patch: GroupPatch): Promise<WireGroup> {
    return this.request('PATCH', `/groups/${groupId}`, wireGroupSchema, patch);
  }

  async deleteGroup(groupId: number) {
    return this.request('DELETE', `/groups/${groupId}`, deleteGroupResponseSchema);
  }

  async addMember(groupId: number, type: MemberType, memberId: string) {
    return this.request('POST', `/groups/${groupId}/members`, addMemberResponseSchema, {
      type,
      id: memberId,
    });
  }

  async removeMember(groupId: number, type: MemberType, memberId: string) {
    return this.request(
      'DELETE',
      `/groups/${groupId}/members/${type}/${encodeURIComponent(memberId)}`,
      removeMemberResponseSchema
    );
  }

  /**
   * Check that the token is accepted, without retries
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.send('GET', '/users?perPage=1', usersPageSchema);
      return true;
    } catch (error) {
      this.logger.error('Directory API token check failed', { error });
      return false;
    }
  }

  private async collectPages<TItem>(
    fetchPage: (page: number) => Promise<{ items: TItem[]; pages: number }>
  ): Promise<TItem[]> {
    const items: TItem[] = [];
    let page = 1;
    let pages = 1;

    do {
      const result = await fetchPage(page);
      items.push(...result.items);
      pages = result.pages;
      page += 1;
    } while (page <= pages);

    return items;
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: Schema<T>,
    body?: unknown
  ): Promise<T> {
    return withRetries(
      () => this.send(method, path, schema, body),
      this.retry,
      isTransientError,
      {
        sleep: this.config.sleep,
        onRetry: (error, next) =>
          this.logger.warn('Retrying directory API request', {
            method,
            path,
            attempt: next.attempt,
            attempts: next.attempts,
            delayMs: next.delayMs,
            error,
          }),
      }
    );
  }

  /**
   * Make a single API request
   */
  private async send<T>(
    method: HttpMethod,
    path: string,
    schema: Schema<T>,
    body?: unknown
  ): Promise<T> {
    const url = `${this.baseUrl}/directory/v1/org/${encodeURIComponent(this.config.orgId)}${path}`;
    const timeoutMs = this.config.timeoutMs ?? 30_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    this.logger.debug('Directory API request', { method, path, body });

    // The timer covers the body as well as the headers.
    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: `OAuth ${this.config.token}`,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (err) {
      if (controller.signal.aborted || (err instanceof Error && err.name === 'AbortError')) {
        throw new ConnectorError({
          code: 'TIMEOUT',
          message: `Directory API ${method} ${path} timed out after ${timeoutMs}ms`,
          connectorId: 'target',
          suggestion: 'Increase target.timeoutMs or check network connectivity.',
          context: { method, path },
        });
      }

      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Failed to connect to directory API: ${err instanceof Error ? err.message : String(err)}`,
        connectorId: 'target',
        cause: err instanceof Error ? err : undefined,
        context: { method, path },
      });
    } finally {
      clearTimeout(timeout);
    }

    this.logger.debug('Directory API response', {
      method,
      path,
      status: response.status,
      requestId: response.headers.get('x-request-id') ?? undefined,
    });

    if (!response.ok) {
      throw statusError(method, path, response.status, extractErrorMessage(text) ?? '');
    }

    let payload: unknown = {};
    if (text.trim()) {
      try {
        payload = JSON.parse(text);
      } catch (err) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Directory API ${method} ${path} returned invalid JSON`,
          connectorId: 'target',
          cause: err instanceof Error ? err : undefined,
          context: { method, path },
        });
      }
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Directory API ${method} ${path} returned an unexpected payload: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
          .join('; ')}`,
        connectorId: 'target',
        context: { method, path },
      });
    }
    return parsed.data;
  }
}
