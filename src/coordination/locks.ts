import path from 'path';
import { FileLock } from './file-lock.js';
import type { FileLockOptions } from './file-lock.js';
import { SlotPool } from './slots.js';

export const MIGRATION_LOCK = 'sidecar-migration.lock';
export const WATCHER_LOCK = 'image-watcher.lock';

/** The fixed set of lock files shared by every process on this image directory */
export class CoordinationLocks {
  readonly migration: FileLock;
  readonly watcher: FileLock;

  constructor(
    readonly lockDir: string,
    private readonly options: FileLockOptions = {}
  ) {
    this.migration = new FileLock(path.join(lockDir, MIGRATION_LOCK), options);
    this.watcher = new FileLock(path.join(lockDir, WATCHER_LOCK), options);
  }

  slots(size: number): SlotPool {
    return new SlotPool(this.lockDir, size, this.options);
  }
}
