/**
 * Snapshot cache
 *
 * An explicit `{ data, fetchedAt }` value with pull-based refresh. Callers
 * hold the value; nothing here is global.
 */

export interface CachedValue<T> {
  readonly data: T;
  readonly fetchedAt: Date;
}

export function createCachedValue<T>(data: T, now: Date = new Date()): CachedValue<T> {
  return { data, fetchedAt: now };
}

export function isStale<T>(cache: CachedValue<T>, maxAgeMs: number, now: Date = new Date()): boolean {
  return now.getTime() - cache.fetchedAt.getTime() > maxAgeMs;
}

/**
 * Return `cache` unchanged while it is fresh; otherwise fetch and wrap the
 * new data. A missing cache always fetches.
 */
export async function refreshIfStale<T>(
  cache: CachedValue<T> | undefined,
  maxAgeMs: number,
  fetch: () => Promise<T>,
  now: () => Date = () => new Date()
): Promise<CachedValue<T>> {
  if (cache && !isStale(cache, maxAgeMs, now())) {
    return cache;
  }
  const data = await fetch();
  return createCachedValue(data, now());
}
