import type { ActionKind, EngagementEvent } from '../src/types.js';

export function event(
  actorId: string,
  sourceEventId: string,
  actionKind: ActionKind = 'like',
  observedAt = '2026-03-01T10:00:00.000Z',
  extra: Partial<EngagementEvent> = {},
): EngagementEvent {
  return Object.freeze({
    actorId,
    actorDisplayName: `name-${actorId}`,
    actionKind,
    targetId: null,
    observedAt,
    sourceEventId,
    actionText: `${actionKind} text`,
    profileImageUrl: `https://img.example.test/${actorId}.jpg`,
    isFollowing: null,
    ...extra,
  });
}
