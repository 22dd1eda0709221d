import crypto from 'node:crypto';
import { ExtractionError } from '../../errors/src/index.js';
import type { ActionKind, EngagementEvent } from '../../record-store/src/types.js';
import type { RawActivityEntry } from './surface.js';
import { isAbsoluteTimestamp, parseRoomTimestamp } from './timestamp.js';

/** Placeholder avatar the platform shows for users without a profile image */
export const NO_PROFILE_IMAGE = 'img_noprofile.gif';

const ACTION_PATTERNS: Array<[RegExp, ActionKind]> = [
  [/いいね/, 'like'],
  [/コレ！|コレ!/, 'collect'],
  [/フォロー/, 'follow'],
  [/コメント/, 'comment'],
];

export function classifyAction(actionText: string): ActionKind {
  for (const [pattern, kind] of ACTION_PATTERNS) {
    if (pattern.test(actionText)) return kind;
  }
  return 'other';
}

/** User id is the image file name: ".../1234abcd.jpg?_ex=64x64" → "1234abcd" */
export function actorIdFromImageUrl(url: string): string | null {
  const match = url.trim().match(/\/([^/?#]+?)(?:\.\w+)?(?:[?#].*)?$/);
  return match ? match[1] : null;
}

export function hasNoProfileImage(raw: RawActivityEntry): boolean {
  return Boolean(raw.profileImageUrl && raw.profileImageUrl.includes(NO_PROFILE_IMAGE));
}

function clean(value: string | null | undefined): string {
  return String(value ?? '').replace(/\s+/g, ' ').trim();
}

function parseFailure(message: string, field: string): ExtractionError {
  return new ExtractionError(message, 'parse', { field });
}

/**
 * Fallback id for entries the page gives no key. Relative timestamps
 * ("5分前") change between runs, so only absolute timestamp text goes into
 * the hash; without one, repeated identical actions by one actor on the
 * same target share an id and are counted once.
 */
export function deriveEventId(parts: {
  actorId: string;
  actionKind: ActionKind;
  actionText: string;
  timestampText: string;
  targetId: string | null;
}): string {
  const stamp = isAbsoluteTimestamp(parts.timestampText) ? parts.timestampText : '';
  const material = [parts.actorId, parts.actionKind, parts.actionText, stamp, parts.targetId ?? ''].join('|');
  return crypto.createHash('sha1').update(material).digest('hex');
}

/** Key identifying a raw entry within one extraction pass, before parsing. */
export function rawEntryKey(raw: RawActivityEntry): string {
  const key = clean(raw.key);
  if (key) return `key:${key}`;
  return JSON.stringify([
    clean(raw.userId),
    clean(raw.userName),
    clean(raw.profileImageUrl),
    clean(raw.actionText),
    clean(raw.timestampText),
    clean(raw.targetId),
  ]);
}

/**
 * Turns one rendered notification into an EngagementEvent. Throws an
 * ExtractionError with reason "parse" when a required field is missing.
 */
export function parseEntry(raw: RawActivityEntry, now: Date = new Date()): EngagementEvent {
  const userName = clean(raw.userName);
  if (!userName) throw parseFailure('entry has no user name', 'userName');

  const profileImageUrl = clean(raw.profileImageUrl) || null;
  const actorId = clean(raw.userId) || (profileImageUrl ? actorIdFromImageUrl(profileImageUrl) : null);
  if (!actorId) throw parseFailure(`entry for ${userName} has no user id`, 'userId');

  const actionText = clean(raw.actionText);
  if (!actionText) throw parseFailure(`entry for ${userName} has no action text`, 'actionText');

  const timestampText = clean(raw.timestampText);
  const observedAt = parseRoomTimestamp(timestampText, now);
  if (!observedAt) throw parseFailure(`entry for ${userName} has an unreadable timestamp "${timestampText}"`, 'timestampText');

  const actionKind = classifyAction(actionText);
  const targetId = clean(raw.targetId) || null;
  const sourceEventId = clean(raw.key) || deriveEventId({ actorId, actionKind, actionText, timestampText, targetId });

  return Object.freeze({
    actorId,
    actorDisplayName: userName,
    actionKind,
    targetId,
    observedAt,
    sourceEventId,
    actionText,
    profileImageUrl,
    isFollowing: raw.isFollowing,
  });
}
