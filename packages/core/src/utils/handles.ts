/**
 * Handle helpers
 *
 * A handle is the case-insensitive local part of a mail address. Source
 * member addresses, target nicknames and aliases are all compared in this
 * form.
 */

import type { SourceMemberHandle } from '../types/index.js';

export function normalizeHandle(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Part of an address before the first "@".
 * Returns undefined when there is no "@" or nothing precedes it.
 */
export function localPart(address: string): string | undefined {
  const at = address.indexOf('@');
  if (at <= 0) return undefined;
  return address.slice(0, at);
}

export function isSourceMemberHandle(value: string): value is SourceMemberHandle {
  return (
    value.length > 0 &&
    !value.includes('@') &&
    value === value.trim() &&
    value === value.toLowerCase()
  );
}

/** Member address → handle; undefined for addresses without a usable local part */
export function toMemberHandle(address: string): SourceMemberHandle | undefined {
  const local = localPart(address.trim());
  if (local === undefined) return undefined;
  const handle = normalizeHandle(local);
  return isSourceMemberHandle(handle) ? handle : undefined;
}

/** Target label for a group mail address (its local part, case preserved) */
export function labelFromMail(mail: string | undefined): string | undefined {
  if (!mail) return undefined;
  return localPart(mail.trim());
}
