/**
 * objectGUID rendering
 *
 * Active Directory stores objectGUID as 16 raw bytes in mixed-endian
 * order: the first three fields are little-endian. The rendered form is
 * the brace-wrapped, lower-case string already embedded in sync tags.
 */

function hex(bytes: Uint8Array, indices: readonly number[]): string {
  return indices.map((i) => (bytes[i] ?? 0).toString(16).padStart(2, '0')).join('');
}

export function formatObjectGuid(bytes: Uint8Array): string | undefined {
  if (bytes.length !== 16) return undefined;
  return `{${[
    hex(bytes, [3, 2, 1, 0]),
    hex(bytes, [5, 4]),
    hex(bytes, [7, 6]),
    hex(bytes, [8, 9]),
    hex(bytes, [10, 11, 12, 13, 14, 15]),
  ].join('-')}}`;
}

const GUID_STRING = /^\{?([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})\}?$/i;

/** Accepts an already rendered GUID, with or without braces */
export function normalizeGuidString(value: string): string | undefined {
  const match = GUID_STRING.exec(value.trim());
  return match?.[1] ? `{${match[1].toLowerCase()}}` : undefined;
}
