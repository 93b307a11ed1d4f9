/**
 * Outcome of a single remote operation.
 *
 * Remote calls never throw across the collaborator boundary; callers
 * branch on `ok` instead.
 */

import type { ConnectorError } from '../errors/connector-error.js';

export type RemoteResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ConnectorError };

export function remoteOk<T>(value: T): RemoteResult<T> {
  return { ok: true, value };
}

export function remoteFail<T>(error: ConnectorError): RemoteResult<T> {
  return { ok: false, error };
}

/** Response of a group delete */
export interface DeleteOutcome {
  removed: boolean;
}

/** Response of a member add; `added: false` means the member was already present */
export interface AddMemberOutcome {
  added: boolean;
}

/** Response of a member removal; `removed: false` means the member was already gone */
export interface RemoveMemberOutcome {
  removed: boolean;
}
