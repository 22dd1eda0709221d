import test from 'node:test';
import assert from 'node:assert/strict';

import { rankUsers } from '../src/ranking.js';
import { merge } from '../src/merge.js';
import { emptyStore } from '../src/types.js';
import { event } from './fixtures.js';

test('rankUsers puts the most likes first, then users not followed yet', () => {
  const { store } = merge(emptyStore(), [
    event('few', 'f1', 'like', '2026-03-01T00:00:00.000Z', { isFollowing: true }),
    event('many', 'm1'),
    event('many', 'm2'),
    event('unfollowed', 'u1', 'like', '2026-03-01T00:00:00.000Z', { isFollowing: false }),
    event('follower', 'x1', 'follow'),
  ]);
  assert.deepEqual(
    rankUsers(store).map((u) => u.userId),
    ['many', 'unfollowed', 'few', 'follower'],
  );
});

test('rankUsers prefers like+collect and then recency', () => {
  const { store } = merge(emptyStore(), [
    event('plain', 'p1', 'like', '2026-03-09T00:00:00.000Z'),
    event('both', 'b1', 'like', '2026-03-01T00:00:00.000Z'),
    event('both', 'b2', 'collect', '2026-03-01T00:00:00.000Z'),
    event('recent', 'r1', 'like', '2026-03-10T00:00:00.000Z'),
  ]);
  assert.deepEqual(
    rankUsers(store).map((u) => u.userId),
    ['both', 'recent', 'plain'],
  );
  assert.deepEqual(rankUsers(store, 1).map((u) => u.userId), ['both']);
});
