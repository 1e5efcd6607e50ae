/**
 * Advisory lock files.
 *
 * A lock is a file created with O_EXCL holding the owner's pid, hostname and
 * a random token. Acquisition never blocks. Locks left behind by a dead
 * process on this host are cleared and retried once. When the lock
 * directory cannot be used at all the caller gets an uncoordinated handle
 * and proceeds as if it had won.
 */

import { promises as fsp } from 'fs';
import os from 'os';
import path from 'path';
import { randomUUID } from 'crypto';
import { errnoCode, errorMessage } from '../lib/errors.js';

export interface LockOwner {
  pid: number;
  hostname: string;
  token: string;
  acquired_at: number;
}

export interface LockHandle {
  readonly path: string;
  /** false when lock files are unavailable and nothing is held */
  readonly coordinated: boolean;
  release(): Promise<void>;
}

export interface FileLockOptions {
  isProcessAlive?: (pid: number) => boolean;
  hostname?: string;
  pid?: number;
  /** Age after which an unreadable lock file is treated as abandoned */
  staleUnreadableMs?: number;
}

/** Lock paths this process holds right now */
const heldLocks = new Set<string>();

export function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) === 'EPERM';
  }
}

function parseOwner(text: string): LockOwner | null {
  try {
    const value: unknown = JSON.parse(text);
    if (typeof value !== 'object' || value === null) return null;
    const pid = Reflect.get(value, 'pid');
    const hostname = Reflect.get(value, 'hostname');
    const token = Reflect.get(value, 'token');
    const acquiredAt = Reflect.get(value, 'acquired_at');
    if (typeof pid !== 'number' || typeof hostname !== 'string' || typeof token !== 'string') return null;
    return { pid, hostname, token, acquired_at: typeof acquiredAt === 'number' ? acquiredAt : 0 };
  } catch {
    return null;
  }
}

export class FileLock {
  private readonly isProcessAlive: (pid: number) => boolean;
  private readonly hostname: string;
  private readonly pid: number;
  private readonly staleUnreadableMs: number;

  constructor(
    readonly lockPath: string,
    options: FileLockOptions = {}
  ) {
    this.isProcessAlive = options.isProcessAlive ?? processAlive;
    this.hostname = options.hostname ?? os.hostname();
    this.pid = options.pid ?? process.pid;
    this.staleUnreadableMs = options.staleUnreadableMs ?? 30_000;
  }

  /** Current owner as recorded in the lock file, if any */
  async owner(): Promise<LockOwner | null> {
    try {
      return parseOwner(await fsp.readFile(this.lockPath, 'utf8'));
    } catch {
      return null;
    }
  }

  /**
   * @returns a handle when this process now holds the lock (or locks are
   * unavailable), `null` when another live process holds it
   */
  async tryAcquire(): Promise<LockHandle | null> {
    try {
      await fsp.mkdir(path.dirname(this.lockPath), { recursive: true });
    } catch (err) {
      return this.uncoordinated(err);
    }

    for (let attempt = 0; attempt < 2; attempt++) {
      const owner: LockOwner = {
        pid: this.pid,
        hostname: this.hostname,
        token: randomUUID(),
        acquired_at: Date.now() / 1000,
      };
      try {
        const handle = await fsp.open(this.lockPath, 'wx');
        try {
          await handle.writeFile(JSON.stringify(owner), 'utf8');
        } finally {
          await handle.close();
        }
        return this.heldHandle(owner.token);
      } catch (err) {
        if (errnoCode(err) !== 'EEXIST') return this.uncoordinated(err);
      }

      if (attempt > 0 || !(await this.clearIfStale())) return null;
    }
    return null;
  }

  /** Remove the lock file when its owner is gone. Returns true if removed. */
  private async clearIfStale(): Promise<boolean> {
    let text: string;
    let mtimeMs: number;
    try {
      const [content, stat] = await Promise.all([fsp.readFile(this.lockPath, 'utf8'), fsp.stat(this.lockPath)]);
      text = content;
      mtimeMs = stat.mtimeMs;
    } catch (err) {
      // Released between our attempt and this read
      return errnoCode(err) === 'ENOENT';
    }

    const owner = parseOwner(text);
    let stale: boolean;
    if (!owner) {
      stale = Date.now() - mtimeMs > this.staleUnreadableMs;
    } else if (owner.hostname !== this.hostname) {
      stale = false;
    } else if (owner.pid === this.pid) {
      // Same pid but not held here: left by an earlier process that reused it
      stale = !heldLocks.has(this.key);
    } else {
      stale = !this.isProcessAlive(owner.pid);
    }
    if (!stale) return false;

    console.warn(`[lock] Clearing stale lock ${this.lockPath}${owner ? ` left by pid ${owner.pid}` : ''}`);
    return this.moveAside(text);
  }

  /**
   * Rename the lock file away and confirm it is the one judged stale. A
   * competing process may have cleared it and taken the lock in between;
   * in that case the live lock is linked back and nothing is cleared.
   */
  private async moveAside(staleText: string): Promise<boolean> {
    const aside = `${this.lockPath}.${randomUUID()}.stale`;
    try {
      await fsp.rename(this.lockPath, aside);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return true;
      console.warn(`[lock] Could not clear ${this.lockPath}:`, errorMessage(err));
      return false;
    }

    let movedText: string | null = null;
    try {
      movedText = await fsp.readFile(aside, 'utf8');
    } catch (err) {
      console.warn(`[lock] Could not read ${aside}:`, errorMessage(err));
    }

    const tookLiveLock = movedText !== staleText;
    if (tookLiveLock) {
      try {
        await fsp.link(aside, this.lockPath);
      } catch (err) {
        console.warn(`[lock] Could not restore ${this.lockPath}:`, errorMessage(err));
      }
    }
    try {
      await fsp.unlink(aside);
    } catch (err) {
      console.warn(`[lock] Could not remove ${aside}:`, errorMessage(err));
    }
    return !tookLiveLock;
  }

  private get key(): string {
    return path.resolve(this.lockPath);
  }

  private heldHandle(token: string): LockHandle {
    let released = false;
    heldLocks.add(this.key);
    return {
      path: this.lockPath,
      coordinated: true,
      release: async () => {
        if (released) return;
        released = true;
        heldLocks.delete(this.key);
        const current = await this.owner();
        if (current?.token !== token) return;
        try {
          await fsp.unlink(this.lockPath);
        } catch (err) {
          if (errnoCode(err) !== 'ENOENT') {
            console.warn(`[lock] Could not release ${this.lockPath}:`, errorMessage(err));
          }
        }
      },
    };
  }

  private uncoordinated(err: unknown): LockHandle {
    console.warn(`[lock] Lock files unavailable at ${this.lockPath}, continuing without coordination:`, errorMessage(err));
    return { path: this.lockPath, coordinated: false, release: async () => undefined };
  }
}
