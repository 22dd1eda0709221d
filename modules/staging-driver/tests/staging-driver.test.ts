import test from 'node:test';
import assert from 'node:assert/strict';

import { stage } from '../src/index.js';
import { ExtractionError } from '../../errors/src/index.js';
import { MemoryLogger } from '../../logging/src/index.js';
import { FakeCommentBox, FakeSurface, entry } from '../../activity-extractor/tests/fake-surface.js';
import type { ActivitySurface } from '../../activity-extractor/src/surface.js';

test('stages text into an editable box without submitting', async () => {
  const box = new FakeCommentBox('u1');
  const surface = new FakeSurface([[entry('u1')]], { boxes: [box] });

  const outcome = await stage(surface, 'u1', 'ありがとうございます！', { logger: new MemoryLogger() });
  assert.equal(outcome, 'staged');
  assert.equal(box.text, 'ありがとうございます！');
  assert.equal(box.submitted, false);
  assert.deepEqual(surface.staged, [{ userId: 'u1', text: 'ありがとうございます！' }]);
});

test('returns user_not_found when the entry is not on the page', async () => {
  const surface = new FakeSurface([[entry('u1')]], { boxes: [new FakeCommentBox('u1')] });

  const outcome = await stage(surface, 'u2', 'hello', { logger: new MemoryLogger() });
  assert.equal(outcome, 'user_not_found');
  assert.deepEqual(surface.staged, []);
});

test('returns input_blocked for a box that does not take input', async () => {
  const box = new FakeCommentBox('u1', false);
  const surface = new FakeSurface([[entry('u1')]], { boxes: [box] });
  const logger = new MemoryLogger();

  const outcome = await stage(surface, 'u1', 'hello', { logger });
  assert.equal(outcome, 'input_blocked');
  assert.equal(box.text, '');
  assert.deepEqual(logger.byLevel('warn').map((e) => e.event), ['comment box is not editable']);
});

test('does not retry after input_blocked', async () => {
  let lookups = 0;
  const blocked = new FakeCommentBox('u1', false);
  const surface: ActivitySurface<FakeCommentBox> = {
    open: async () => undefined,
    listEntries: async () => [],
    loadMore: async () => false,
    locateCommentBox: async () => {
      lookups += 1;
      return blocked;
    },
    setText: async () => undefined,
  };
  assert.equal(await stage(surface, 'u1', 'hello', { logger: new MemoryLogger() }), 'input_blocked');
  assert.equal(lookups, 1);
});

test('a hung page fails with a timeout', async () => {
  const surface: ActivitySurface<FakeCommentBox> = {
    open: async () => undefined,
    listEntries: async () => [],
    loadMore: async () => false,
    locateCommentBox: () => new Promise<FakeCommentBox | null>(() => undefined),
    setText: async () => undefined,
  };
  await assert.rejects(stage(surface, 'u1', 'hello', { timeoutMs: 20, logger: new MemoryLogger() }), (err: unknown) => {
    assert.ok(err instanceof ExtractionError);
    assert.equal(err.reason, 'timeout');
    assert.equal(err.message, 'stage comment for u1 timed out after 20ms');
    return true;
  });
});
