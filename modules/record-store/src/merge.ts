import { UnknownUserError } from '../../errors/src/index.js';
import {
  emptyCounts,
  findUser,
  withUsers,
  type EngagementEvent,
  type MergeResult,
  type Store,
  type UserRecord,
} from './types.js';

function toEpoch(iso: string): number {
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? 0 : ms;
}

function earlier(a: string, b: string): string {
  return toEpoch(b) < toEpoch(a) ? b : a;
}

function later(a: string, b: string): string {
  return toEpoch(b) > toEpoch(a) ? b : a;
}

function profileKey(event: EngagementEvent): string {
  return `${String(toEpoch(event.observedAt)).padStart(15, '0')}|${event.sourceEventId}`;
}

function cloneRecord(record: UserRecord): UserRecord {
  return {
    ...record,
    counts: { ...record.counts },
    seenEventIds: [...record.seenEventIds],
  };
}

function createRecord(event: EngagementEvent): UserRecord {
  return {
    userId: event.actorId,
    displayName: event.actorDisplayName,
    counts: emptyCounts(),
    firstSeenAt: event.observedAt,
    lastSeenAt: event.observedAt,
    lastCommentedAt: null,
    seenEventIds: [],
    isFollowing: null,
    profileImageUrl: null,
    profileSource: '',
  };
}

/** Profile fields come from the event with the greatest key, nulls included. */
function applyProfile(record: UserRecord, event: EngagementEvent): void {
  const key = profileKey(event);
  if (key < record.profileSource) return;
  record.profileSource = key;
  record.displayName = event.actorDisplayName;
  record.isFollowing = event.isFollowing;
  record.profileImageUrl = event.profileImageUrl;
}

/**
 * Folds `events` into a copy of `store`. Events whose id the actor's record
 * already holds are ignored, so re-applying a batch changes nothing; the
 * final store does not depend on the order of `events`.
 */
export function merge(store: Store, events: Iterable<EngagementEvent>): MergeResult {
  const touched = new Map<string, { record: UserRecord; seen: Set<string>; changed: boolean }>();
  const newlyCounted: EngagementEvent[] = [];

  for (const event of events) {
    let entry = touched.get(event.actorId);
    if (!entry) {
      const existing = findUser(store, event.actorId);
      const record = existing ? cloneRecord(existing) : createRecord(event);
      entry = { record, seen: new Set(record.seenEventIds), changed: false };
      touched.set(event.actorId, entry);
    }
    const { record, seen } = entry;
    if (seen.has(event.sourceEventId)) continue;

    entry.changed = true;
    seen.add(event.sourceEventId);
    record.counts[event.actionKind] += 1;
    record.firstSeenAt = earlier(record.firstSeenAt, event.observedAt);
    record.lastSeenAt = later(record.lastSeenAt, event.observedAt);
    applyProfile(record, event);
    newlyCounted.push(event);
  }

  const updates: Array<[string, UserRecord]> = [];
  for (const [userId, { record, seen, changed }] of touched) {
    if (!changed) continue;
    record.seenEventIds = [...seen].sort();
    updates.push([userId, record]);
  }

  return { store: { version: store.version, users: withUsers(store.users, updates) }, newlyCounted };
}

/**
 * Marks that the operator submitted a comment to `userId` at `at`. The only
 * store mutation besides `merge`.
 */
export function recordCommented(store: Store, userId: string, at: string = new Date().toISOString()): Store {
  const existing = findUser(store, userId);
  if (!existing) throw new UnknownUserError(userId);
  const record = cloneRecord(existing);
  record.lastCommentedAt = record.lastCommentedAt ? later(record.lastCommentedAt, at) : at;
  return { version: store.version, users: withUsers(store.users, [[userId, record]]) };
}
