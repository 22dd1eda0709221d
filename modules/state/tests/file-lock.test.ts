import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';

import { FileLock, withFileLock } from '../src/file-lock.js';
import { StoreLockedError } from '../../errors/src/index.js';

async function tempTarget(): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'engage-lock-'));
  return path.join(root, 'users.json');
}

test('acquire creates the lock file and release removes it', async () => {
  const target = await tempTarget();
  const lock = new FileLock(target);
  lock.acquire();
  assert.equal(lock.isHeld, true);
  const info = JSON.parse(await fs.readFile(`${target}.lock`, 'utf-8'));
  assert.equal(info.pid, process.pid);
  lock.release();
  assert.equal(lock.isHeld, false);
  await assert.rejects(fs.access(`${target}.lock`));
});

test('a second lock on the same target fails while the first is held', async () => {
  const target = await tempTarget();
  const first = new FileLock(target);
  first.acquire();
  try {
    assert.throws(() => new FileLock(target).acquire(), StoreLockedError);
  } finally {
    first.release();
  }
});

test('a lock left by a dead process is replaced', async () => {
  const target = await tempTarget();
  await fs.writeFile(
    `${target}.lock`,
    JSON.stringify({ pid: 999999, host: os.hostname(), createdAt: 1 }),
    'utf-8',
  );
  const lock = new FileLock(target, { isProcessRunning: () => false });
  lock.acquire();
  const info = JSON.parse(await fs.readFile(`${target}.lock`, 'utf-8'));
  assert.equal(info.pid, process.pid);
  lock.release();
});

test('a lock held by a live process is respected', async () => {
  const target = await tempTarget();
  await fs.writeFile(
    `${target}.lock`,
    JSON.stringify({ pid: 424242, host: os.hostname(), createdAt: 1 }),
    'utf-8',
  );
  const lock = new FileLock(target, { isProcessRunning: (pid) => pid === 424242 });
  assert.throws(() => lock.acquire(), /locked by pid 424242/);
});

test('withFileLock releases the lock when the callback throws', async () => {
  const target = await tempTarget();
  await assert.rejects(
    withFileLock(target, async () => {
      throw new Error('boom');
    }),
    /boom/,
  );
  await assert.rejects(fs.access(`${target}.lock`));
});
