/** Engagement data shared by the extractor, the store and the template selector */

export const ACTION_KINDS = ['like', 'follow', 'comment', 'collect', 'other'] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export type ActionCounts = Record<ActionKind, number>;

export interface EngagementEvent {
  /** Platform user id of the actor */
  readonly actorId: string;
  readonly actorDisplayName: string;
  readonly actionKind: ActionKind;
  /** Item the action targeted, when the entry names one */
  readonly targetId: string | null;
  /** ISO-8601 timestamp */
  readonly observedAt: string;
  /** Stable id used for deduplication */
  readonly sourceEventId: string;
  readonly actionText: string;
  readonly profileImageUrl: string | null;
  /** Whether the operator already follows the actor; null when the entry does not say */
  readonly isFollowing: boolean | null;
}

export interface UserRecord {
  userId: string;
  displayName: string;
  counts: ActionCounts;
  firstSeenAt: string;
  lastSeenAt: string;
  lastCommentedAt: string | null;
  /** Sorted, unique */
  seenEventIds: string[];
  isFollowing: boolean | null;
  profileImageUrl: string | null;
  /**
   * `observedAt|sourceEventId` of the event the profile fields were taken
   * from; the greatest key wins so the result does not depend on merge order.
   */
  profileSource: string;
}

export const STORE_VERSION = 1;

export interface Store {
  version: typeof STORE_VERSION;
  users: Record<string, UserRecord>;
}

export interface MergeResult {
  store: Store;
  newlyCounted: EngagementEvent[];
}

export function isActionKind(value: unknown): value is ActionKind {
  return ACTION_KINDS.some((kind) => kind === value);
}

export function emptyCounts(): ActionCounts {
  return { like: 0, follow: 0, comment: 0, collect: 0, other: 0 };
}

export function emptyStore(): Store {
  return { version: STORE_VERSION, users: {} };
}

/** Record stored under `userId`; inherited keys such as "constructor" are not users. */
export function findUser(store: Store, userId: string): UserRecord | undefined {
  return Object.hasOwn(store.users, userId) ? store.users[userId] : undefined;
}

/**
 * Users of `base` with `updates` laid over them. Built with
 * Object.fromEntries so a "__proto__" id stays an ordinary key.
 */
export function withUsers(
  base: Record<string, UserRecord>,
  updates: Iterable<[string, UserRecord]>,
): Record<string, UserRecord> {
  return Object.fromEntries([...Object.entries(base), ...updates]);
}

export function totalCount(counts: ActionCounts): number {
  return ACTION_KINDS.reduce((sum, kind) => sum + counts[kind], 0);
}
