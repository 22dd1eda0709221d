import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { StoreLockedError, errnoCode } from '../../errors/src/index.js';

export interface LockInfo {
  pid: number;
  host: string;
  createdAt: number;
}

export interface FileLockOptions {
  /** Liveness probe for the pid recorded in an existing lock. */
  isProcessRunning?: (pid: number) => boolean;
}

function defaultIsProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(err) === 'EPERM';
  }
}

function parseLockInfo(raw: string): LockInfo | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null) return null;
    const pid = 'pid' in parsed ? Number(parsed.pid) : NaN;
    const host = 'host' in parsed ? String(parsed.host) : '';
    const createdAt = 'createdAt' in parsed ? Number(parsed.createdAt) : 0;
    if (!Number.isInteger(pid) || pid <= 0) return null;
    return { pid, host, createdAt };
  } catch {
    return null;
  }
}

/**
 * Advisory lock file. A lock held by a live process on this host makes
 * `acquire` fail; a lock left by a dead process, or one that cannot be read,
 * is replaced.
 */
export class FileLock {
  readonly lockFile: string;
  private held = false;
  private readonly isProcessRunning: (pid: number) => boolean;

  constructor(targetPath: string, options: FileLockOptions = {}) {
    this.lockFile = `${targetPath}.lock`;
    this.isProcessRunning = options.isProcessRunning ?? defaultIsProcessRunning;
  }

  get isHeld(): boolean {
    return this.held;
  }

  acquire(): void {
    if (this.held) return;
    fs.mkdirSync(path.dirname(this.lockFile), { recursive: true });
    const payload = JSON.stringify({ pid: process.pid, host: os.hostname(), createdAt: Date.now() } satisfies LockInfo, null, 2);
    for (let attempt = 0; attempt < 2; attempt += 1) {
      try {
        fs.writeFileSync(this.lockFile, payload, { encoding: 'utf-8', flag: 'wx' });
        this.held = true;
        return;
      } catch (err) {
        if (errnoCode(err) !== 'EEXIST') throw err;
      }
      const existing = this.readExisting();
      if (existing && this.isLive(existing)) {
        throw new StoreLockedError(`store is locked by pid ${existing.pid} on ${existing.host}`, {
          lockFile: this.lockFile,
          pid: existing.pid,
          host: existing.host,
        });
      }
      fs.rmSync(this.lockFile, { force: true });
    }
    throw new StoreLockedError(`could not acquire ${this.lockFile}`, { lockFile: this.lockFile });
  }

  release(): void {
    if (!this.held) return;
    this.held = false;
    const existing = this.readExisting();
    if (existing && existing.pid !== process.pid) return;
    fs.rmSync(this.lockFile, { force: true });
  }

  private readExisting(): LockInfo | null {
    try {
      return parseLockInfo(fs.readFileSync(this.lockFile, 'utf-8'));
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return null;
      throw err;
    }
  }

  private isLive(info: LockInfo): boolean {
    // a pid from another host cannot be probed; treat it as live
    if (info.host && info.host !== os.hostname()) return true;
    if (info.pid === process.pid) return true;
    return this.isProcessRunning(info.pid);
  }
}

export async function withFileLock<T>(targetPath: string, fn: () => Promise<T>, options: FileLockOptions = {}): Promise<T> {
  const lock = new FileLock(targetPath, options);
  lock.acquire();
  try {
    return await fn();
  } finally {
    lock.release();
  }
}
