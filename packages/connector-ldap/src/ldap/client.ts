/**
 * LDAP Client
 *
 * Wrapper around ldapts for one-shot directory reads: every search binds,
 * runs and unbinds on its own connection.
 */

import { Client, InvalidCredentialsError, type Entry } from 'ldapts';
import { ConnectorError, createSilentLogger, type Logger } from '@dirsync/core';

export interface LdapClientConfig {
  /** ldap:// or ldaps:// URL */
  url: string;
  bindDN: string;
  password: string;
  /** Operation and connect timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Verify the server certificate on ldaps:// (default: true) */
  tlsRejectUnauthorized?: boolean;
  logger?: Logger;
}

export interface LdapSearchRequest {
  baseDN: string;
  filter: string;
  attributes: string[];
  /** Attributes returned as raw Buffers (e.g. objectGUID) */
  binaryAttributes?: string[];
}

export class LdapClient {
  private readonly logger: Logger;

  constructor(private readonly config: LdapClientConfig) {
    this.logger = config.logger ?? createSilentLogger();
  }

  async search(request: LdapSearchRequest): Promise<Entry[]> {
    const timeout = this.config.timeoutMs ?? 30_000;
    const client = new Client({
      url: this.config.url,
      timeout,
      connectTimeout: timeout,
      tlsOptions: { rejectUnauthorized: this.config.tlsRejectUnauthorized !== false },
    });

    try {
      await this.bind(client);

      try {
        const { searchEntries } = await client.search(request.baseDN, {
          scope: 'sub',
          filter: request.filter,
          attributes: request.attributes,
          explicitBufferAttributes: request.binaryAttributes ?? [],
          paged: true,
        });
        this.logger.debug('LDAP search finished', {
          baseDN: request.baseDN,
          filter: request.filter,
          entries: searchEntries.length,
        });
        return searchEntries;
      } catch (error) {
        throw new ConnectorError({
          code: 'READ_FAILED',
          message: `LDAP search failed: ${error instanceof Error ? error.message : String(error)}`,
          connectorId: 'ldap',
          suggestion: 'Check source.baseDN and source.filter.',
          cause: error instanceof Error ? error : undefined,
          context: { baseDN: request.baseDN, filter: request.filter },
        });
      }
    } finally {
      await client.unbind().catch((error: unknown) => {
        this.logger.warn('LDAP unbind failed', { error });
      });
    }
  }

  private async bind(client: Client): Promise<void> {
    try {
      await client.bind(this.config.bindDN, this.config.password);
    } catch (error) {
      if (error instanceof InvalidCredentialsError) {
        throw new ConnectorError({
          code: 'AUTHENTICATION_FAILED',
          message: `LDAP bind rejected for ${this.config.bindDN}`,
          connectorId: 'ldap',
          suggestion: 'Check source.bindDN and source.password.',
          cause: error,
        });
      }
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `LDAP connection failed: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: 'ldap',
        suggestion: 'Check source.url, network access and TLS settings.',
        cause: error instanceof Error ? error : undefined,
        context: { url: this.config.url },
      });
    }
  }
}
