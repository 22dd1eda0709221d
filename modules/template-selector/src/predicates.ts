import { totalCount, type UserRecord } from '../../record-store/src/types.js';
import type { Predicate } from './types.js';

export function evaluate(predicate: Predicate, record: UserRecord): boolean {
  if ('countAtLeast' in predicate) {
    return record.counts[predicate.countAtLeast.kind] >= predicate.countAtLeast.min;
  }
  if ('countBelow' in predicate) {
    return record.counts[predicate.countBelow.kind] < predicate.countBelow.max;
  }
  if ('totalAtLeast' in predicate) {
    return totalCount(record.counts) >= predicate.totalAtLeast;
  }
  if ('isFollowing' in predicate) {
    // unknown follow state never matches
    return record.isFollowing !== null && record.isFollowing === predicate.isFollowing;
  }
  if ('commentedBefore' in predicate) {
    return (record.lastCommentedAt !== null) === predicate.commentedBefore;
  }
  if ('all' in predicate) {
    return predicate.all.every((p) => evaluate(p, record));
  }
  if ('any' in predicate) {
    return predicate.any.some((p) => evaluate(p, record));
  }
  return !evaluate(predicate.not, record);
}
