import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs/promises';

import { collect, previewForUser, stageForUser, type SurfaceFactory } from '../src/pipeline.js';
import { ExtractionError, StoreLockedError, UnknownUserError } from '../../errors/src/index.js';
import { MemoryLogger } from '../../logging/src/index.js';
import { merge } from '../../record-store/src/merge.js';
import { load, save } from '../../record-store/src/store.js';
import { emptyStore } from '../../record-store/src/types.js';
import { event } from '../../record-store/tests/fixtures.js';
import type { Template } from '../../template-selector/src/types.js';
import { FakeCommentBox, FakeSurface, entry } from '../../activity-extractor/tests/fake-surface.js';

const TEMPLATES: Template[] = [
  { id: 'many-likes', when: { countAtLeast: { kind: 'like', min: 3 } }, text: 'Thanks for {likeCount} likes, {displayName}!' },
  { id: 'fallback', when: 'fallback', text: 'Thanks!' },
];

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'engage-pipeline-'));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

function sessionFor(surface: FakeSurface) {
  const closes: Array<{ keepPage?: boolean }> = [];
  let opened = 0;
  const openSurface: SurfaceFactory = async () => {
    opened += 1;
    return {
      surface,
      close: async (options = {}) => {
        closes.push(options);
      },
    };
  };
  return { openSurface, closes, opened: () => opened };
}

async function seedStore(storePath: string) {
  const { store } = merge(emptyStore(), [event('alice', 'e1'), event('alice', 'e2'), event('alice', 'e3'), event('bob', 'e4')]);
  await save(storePath, store);
}

test('collect merges a pass into the store', async () => {
  await withTempDir(async (dir) => {
    const storePath = path.join(dir, 'records.json');
    const surface = new FakeSurface([
      [entry('alice'), entry('bob')],
      [entry('alice', { actionText: 'User aliceさんがあなたの商品をコレ！しました' })],
    ]);
    const session = sessionFor(surface);

    const result = await collect({ storePath, openSurface: session.openSurface, logger: new MemoryLogger() }, { maxPages: 5 });

    assert.equal(result.newlyCounted.length, 3);
    assert.equal(result.users, 2);
    assert.equal(result.stats.stopReason, 'end_of_feed');
    assert.deepEqual(session.closes, [{}]);

    const store = await load(storePath);
    assert.deepEqual(store.users.alice.counts, { like: 1, follow: 0, comment: 0, collect: 1, other: 0 });
    assert.equal(store.users.bob.counts.like, 1);
  });
});

test('collecting the same feed again counts nothing', async () => {
  await withTempDir(async (dir) => {
    const storePath = path.join(dir, 'records.json');
    const surface = new FakeSurface([[entry('alice'), entry('bob'), entry('carol')]]);
    const { openSurface } = sessionFor(surface);
    const deps = { storePath, openSurface, logger: new MemoryLogger() };

    await collect(deps, { maxPages: 3 });
    const before = await fs.readFile(storePath, 'utf-8');

    const again = await collect(deps, { maxPages: 3 });
    assert.equal(again.newlyCounted.length, 0);
    assert.equal(again.stats.stopReason, 'known_territory');
    assert.equal(await fs.readFile(storePath, 'utf-8'), before);
  });
});

test('a failed pass leaves the store untouched', async () => {
  await withTempDir(async (dir) => {
    const storePath = path.join(dir, 'records.json');
    await seedStore(storePath);
    const before = await fs.readFile(storePath, 'utf-8');
    const surface = new FakeSurface([[entry('dave')]], { openError: new Error('net::ERR_CONNECTION_RESET') });
    const session = sessionFor(surface);

    await assert.rejects(
      collect({ storePath, openSurface: session.openSurface, logger: new MemoryLogger() }, { maxPages: 2 }),
      (err: unknown) => err instanceof ExtractionError && err.reason === 'navigation',
    );
    assert.equal(await fs.readFile(storePath, 'utf-8'), before);
    assert.equal(session.closes.length, 1);
  });
});

test('an aborted pass writes nothing', async () => {
  await withTempDir(async (dir) => {
    const storePath = path.join(dir, 'records.json');
    const controller = new AbortController();
    controller.abort();
    const { openSurface } = sessionFor(new FakeSurface([[entry('alice')]]));

    await assert.rejects(
      collect({ storePath, openSurface, logger: new MemoryLogger() }, { maxPages: 2, signal: controller.signal }),
      (err: unknown) => err instanceof ExtractionError && err.reason === 'aborted',
    );
    await assert.rejects(fs.access(storePath));
  });
});

test('collect refuses to merge while another process holds the store lock', async () => {
  await withTempDir(async (dir) => {
    const storePath = path.join(dir, 'records.json');
    await fs.writeFile(
      `${storePath}.lock`,
      JSON.stringify({ pid: 999999, host: os.hostname(), createdAt: Date.now() }),
      'utf-8',
    );
    const { openSurface } = sessionFor(new FakeSurface([[entry('alice')]]));

    await assert.rejects(
      collect(
        { storePath, openSurface, logger: new MemoryLogger(), lockOptions: { isProcessRunning: () => true } },
        { maxPages: 1 },
      ),
      StoreLockedError,
    );
    await assert.rejects(fs.access(storePath));
  });
});

test('previewForUser picks the first matching template', async () => {
  await withTempDir(async (dir) => {
    const storePath = path.join(dir, 'records.json');
    await seedStore(storePath);

    assert.deepEqual(await previewForUser(storePath, TEMPLATES, 'alice'), {
      userId: 'alice',
      templateId: 'many-likes',
      renderedText: 'Thanks for 3 likes, name-alice!',
    });
    assert.equal((await previewForUser(storePath, TEMPLATES, 'bob')).templateId, 'fallback');
    await assert.rejects(previewForUser(storePath, TEMPLATES, 'nobody'), UnknownUserError);
  });
});

test('stageForUser fills the comment box and leaves the tab open', async () => {
  await withTempDir(async (dir) => {
    const storePath = path.join(dir, 'records.json');
    await seedStore(storePath);
    const box = new FakeCommentBox('alice');
    const surface = new FakeSurface([[entry('alice')]], { boxes: [box] });
    const session = sessionFor(surface);

    const result = await stageForUser(
      { storePath, templates: TEMPLATES, openSurface: session.openSurface, logger: new MemoryLogger() },
      'alice',
    );
    assert.equal(result.outcome, 'staged');
    assert.equal(result.request?.templateId, 'many-likes');
    assert.equal(box.text, 'Thanks for 3 likes, name-alice!');
    assert.equal(box.submitted, false);
    assert.equal(surface.opens, 1);
    assert.deepEqual(session.closes, [{ keepPage: true }]);
  });
});

test('staging a user missing from the page reports user_not_found and keeps the store', async () => {
  await withTempDir(async (dir) => {
    const storePath = path.join(dir, 'records.json');
    await seedStore(storePath);
    const before = await fs.readFile(storePath, 'utf-8');
    const surface = new FakeSurface([[entry('alice')]], { boxes: [new FakeCommentBox('alice')] });
    const session = sessionFor(surface);

    const result = await stageForUser(
      { storePath, templates: TEMPLATES, openSurface: session.openSurface, logger: new MemoryLogger() },
      'bob',
    );
    assert.equal(result.outcome, 'user_not_found');
    assert.equal(result.request?.templateId, 'fallback');
    assert.deepEqual(surface.staged, []);
    assert.equal(await fs.readFile(storePath, 'utf-8'), before);
  });
});

test('staging a user absent from the store does not touch the browser', async () => {
  await withTempDir(async (dir) => {
    const storePath = path.join(dir, 'records.json');
    await seedStore(storePath);
    const session = sessionFor(new FakeSurface([[entry('alice')]]));

    const result = await stageForUser(
      { storePath, templates: TEMPLATES, openSurface: session.openSurface, logger: new MemoryLogger() },
      'nobody',
    );
    assert.deepEqual(result, { outcome: 'user_not_found', request: null });
    assert.equal(session.opened(), 0);
  });
});

function failingClose(surface: FakeSurface): SurfaceFactory {
  return async () => ({
    surface,
    close: async () => {
      throw new Error('Target closed');
    },
  });
}

test('a failing close does not hide the extraction error', async () => {
  await withTempDir(async (dir) => {
    const storePath = path.join(dir, 'records.json');
    const logger = new MemoryLogger();
    const surface = new FakeSurface([[entry('dave')]], { openError: new Error('net::ERR_CONNECTION_RESET') });

    await assert.rejects(
      collect({ storePath, openSurface: failingClose(surface), logger }, { maxPages: 2 }),
      (err: unknown) => err instanceof ExtractionError && err.reason === 'navigation',
    );
    assert.deepEqual(
      logger.byLevel('warn').map((e) => [e.event, e.data]),
      [['closing the browser session failed', { error: 'Target closed' }]],
    );
  });
});

test('a failing close after staging still reports the outcome', async () => {
  await withTempDir(async (dir) => {
    const storePath = path.join(dir, 'records.json');
    await seedStore(storePath);
    const logger = new MemoryLogger();
    const surface = new FakeSurface([[entry('alice')]], { boxes: [new FakeCommentBox('alice')] });

    const result = await stageForUser({ storePath, templates: TEMPLATES, openSurface: failingClose(surface), logger }, 'alice');
    assert.equal(result.outcome, 'staged');
    assert.equal(logger.byLevel('warn').at(-1)?.event, 'closing the browser session failed');
  });
});

test('ids inherited from Object are not users of the store', async () => {
  await withTempDir(async (dir) => {
    const storePath = path.join(dir, 'records.json');
    await seedStore(storePath);
    const session = sessionFor(new FakeSurface([[entry('alice')]]));

    await assert.rejects(previewForUser(storePath, TEMPLATES, 'toString'), UnknownUserError);
    const result = await stageForUser(
      { storePath, templates: TEMPLATES, openSurface: session.openSurface, logger: new MemoryLogger() },
      'constructor',
    );
    assert.deepEqual(result, { outcome: 'user_not_found', request: null });
    assert.equal(session.opened(), 0);
  });
});
