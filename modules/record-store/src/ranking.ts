import type { Store, UserRecord } from './types.js';

function followRank(value: boolean | null): number {
  if (value === false) return 0;
  if (value === null) return 1;
  return 2;
}

function epoch(iso: string): number {
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? 0 : ms;
}

export function compareUsers(a: UserRecord, b: UserRecord): number {
  return (
    b.counts.like - a.counts.like ||
    followRank(a.isFollowing) - followRank(b.isFollowing) ||
    Number(b.counts.like > 0 && b.counts.collect > 0) - Number(a.counts.like > 0 && a.counts.collect > 0) ||
    epoch(b.lastSeenAt) - epoch(a.lastSeenAt) ||
    (a.userId < b.userId ? -1 : a.userId > b.userId ? 1 : 0)
  );
}

/**
 * Orders users for the operator: most likes first, then users the operator
 * does not follow yet, then users who both liked and collected, then the most
 * recently seen.
 */
export function rankUsers(store: Store, limit?: number): UserRecord[] {
  const ranked = Object.values(store.users).sort(compareUsers);
  return typeof limit === 'number' ? ranked.slice(0, Math.max(0, limit)) : ranked;
}
