import path from 'path';
import { FileLock } from './file-lock.js';
import type { FileLockOptions, LockHandle } from './file-lock.js';

export function slotLockName(index: number): string {
  return `sidecar-slot-${index}.lock`;
}

/**
 * N named locks used as a counting semaphore across processes.
 * Acquisition takes the first free slot and never waits.
 */
export class SlotPool {
  constructor(
    private readonly lockDir: string,
    readonly size: number,
    private readonly lockOptions: FileLockOptions = {}
  ) {}

  async tryAcquire(): Promise<LockHandle | null> {
    for (let i = 0; i < this.size; i++) {
      const handle = await new FileLock(path.join(this.lockDir, slotLockName(i)), this.lockOptions).tryAcquire();
      if (handle) return handle;
    }
    return null;
  }
}
