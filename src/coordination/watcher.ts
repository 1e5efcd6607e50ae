import { errorMessage } from '../lib/errors.js';
import type { FileLock, LockHandle } from './file-lock.js';

export type WatchTick = () => Promise<unknown>;

/**
 * Periodic rescan owned by whichever process holds the watcher lock.
 * The next pass is scheduled only after the previous one settles, so
 * passes never overlap.
 */
export class PeriodicWatcher {
  private handle: LockHandle | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopped = false;

  constructor(
    private readonly lock: FileLock,
    private readonly tick: WatchTick,
    private readonly intervalMs: () => number
  ) {}

  get active(): boolean {
    return this.running;
  }

  /** @returns true when this process became the watcher */
  async start(): Promise<boolean> {
    if (this.running) return true;
    this.handle = await this.lock.tryAcquire();
    if (!this.handle) {
      console.log('[watcher] Another process is watching the image directory');
      return false;
    }
    this.running = true;
    this.stopped = false;
    console.log(`[watcher] Watching every ${Math.round(this.intervalMs() / 1000)}s`);
    this.schedule();
    return true;
  }

  /** One pass; failures are logged and the loop carries on */
  async runOnce(): Promise<void> {
    try {
      await this.tick();
    } catch (err) {
      console.error('[watcher] Scan failed:', errorMessage(err));
    }
  }

  private schedule(): void {
    if (this.stopped) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce().then(() => this.schedule());
    }, this.intervalMs());
    this.timer.unref();
  }

  /** Stops scheduling and releases the lock; an in-flight pass is not awaited */
  async stop(): Promise<void> {
    this.stopped = true;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const handle = this.handle;
    this.handle = null;
    if (handle) await handle.release();
  }
}
