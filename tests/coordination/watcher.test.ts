import path from 'path';
import { FileLock } from '../../src/coordination/file-lock.js';
import { PeriodicWatcher } from '../../src/coordination/watcher.js';
import { fileExists, makeTempDir, removeDir } from '../helpers/gallery.js';

async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now();
  while (!condition()) {
    if (Date.now() - started > timeoutMs) throw new Error('Timed out waiting for condition');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe('PeriodicWatcher', () => {
  let dir: string;
  let lockPath: string;
  const options = (pid: number) => ({ pid, hostname: 'test-host', isProcessAlive: () => true });

  beforeEach(async () => {
    dir = await makeTempDir('watcher-');
    lockPath = path.join(dir, 'image-watcher.lock');
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(dir);
  });

  it('runs passes until stopped and then releases the lock', async () => {
    const tick = jest.fn(async () => undefined);
    const watcher = new PeriodicWatcher(new FileLock(lockPath, options(101)), tick, () => 10);

    expect(await watcher.start()).toBe(true);
    expect(watcher.active).toBe(true);
    await waitFor(() => tick.mock.calls.length >= 2);

    await watcher.stop();
    const calls = tick.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 40));

    expect(watcher.active).toBe(false);
    expect(tick.mock.calls.length).toBe(calls);
    expect(await fileExists(lockPath)).toBe(false);
  });

  it('stays idle while another process watches', async () => {
    const owner = new PeriodicWatcher(new FileLock(lockPath, options(101)), async () => undefined, () => 1000);
    const other = new PeriodicWatcher(new FileLock(lockPath, options(202)), async () => undefined, () => 1000);

    expect(await owner.start()).toBe(true);
    expect(await other.start()).toBe(false);
    expect(other.active).toBe(false);
    expect(console.log).toHaveBeenCalledWith('[watcher] Another process is watching the image directory');

    await owner.stop();
  });

  it('keeps going after a failed pass', async () => {
    const tick = jest
      .fn<Promise<unknown>, []>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValue(undefined);
    const watcher = new PeriodicWatcher(new FileLock(lockPath, options(101)), tick, () => 10);

    await watcher.start();
    await waitFor(() => tick.mock.calls.length >= 2);
    await watcher.stop();

    expect(console.error).toHaveBeenCalledWith('[watcher] Scan failed:', 'boom');
  });
});
