import { promises as fsp } from 'fs';
import path from 'path';
import { FileLock, processAlive } from '../../src/coordination/file-lock.js';
import type { FileLockOptions } from '../../src/coordination/file-lock.js';
import { fileExists, makeTempDir, removeDir } from '../helpers/gallery.js';

describe('FileLock', () => {
  let dir: string;
  let lockPath: string;

  const asProcess = (pid: number, extra: FileLockOptions = {}): FileLockOptions => ({
    pid,
    hostname: 'test-host',
    isProcessAlive: () => true,
    ...extra,
  });

  beforeEach(async () => {
    dir = await makeTempDir('locks-');
    lockPath = path.join(dir, 'locks', 'test.lock');
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(dir);
  });

  async function writeOwner(owner: unknown): Promise<void> {
    await fsp.mkdir(path.dirname(lockPath), { recursive: true });
    await fsp.writeFile(lockPath, typeof owner === 'string' ? owner : JSON.stringify(owner));
  }

  it('records the owner and excludes other live processes', async () => {
    const handle = await new FileLock(lockPath, asProcess(101)).tryAcquire();

    expect(handle).toMatchObject({ path: lockPath, coordinated: true });
    expect(await new FileLock(lockPath).owner()).toMatchObject({ pid: 101, hostname: 'test-host' });
    expect(await new FileLock(lockPath, asProcess(202)).tryAcquire()).toBeNull();
  });

  it('can be taken again once released', async () => {
    const first = await new FileLock(lockPath, asProcess(101)).tryAcquire();
    await first?.release();

    expect(await fileExists(lockPath)).toBe(false);
    expect(await new FileLock(lockPath, asProcess(202)).tryAcquire()).not.toBeNull();
  });

  it('is not re-entrant for the same process', async () => {
    const lock = new FileLock(lockPath, asProcess(101));
    expect(await lock.tryAcquire()).not.toBeNull();
    expect(await lock.tryAcquire()).toBeNull();
  });

  it('clears a lock left by a dead process on this host', async () => {
    await writeOwner({ pid: 999, hostname: 'test-host', token: 'old', acquired_at: 1 });

    const handle = await new FileLock(lockPath, asProcess(101, { isProcessAlive: () => false })).tryAcquire();

    expect(handle?.coordinated).toBe(true);
    expect((await new FileLock(lockPath).owner())?.pid).toBe(101);
    expect(console.warn).toHaveBeenCalledWith(`[lock] Clearing stale lock ${lockPath} left by pid 999`);
  });

  it('reclaims a lock left by an earlier process that had the same pid', async () => {
    await writeOwner({ pid: 101, hostname: 'test-host', token: 'previous-run', acquired_at: 1 });

    const handle = await new FileLock(lockPath, asProcess(101)).tryAcquire();

    expect(handle?.coordinated).toBe(true);
    const owner = await new FileLock(lockPath).owner();
    expect(owner?.pid).toBe(101);
    expect(owner?.token).not.toBe('previous-run');
  });

  it('lets only one of two processes clear the same stale lock', async () => {
    const deadOwner = (pid: number) => pid !== 999;
    for (let round = 0; round < 50; round++) {
      await writeOwner({ pid: 999, hostname: 'test-host', token: `dead-${round}`, acquired_at: 1 });

      const handles = await Promise.all([
        new FileLock(lockPath, asProcess(101, { isProcessAlive: deadOwner })).tryAcquire(),
        new FileLock(lockPath, asProcess(202, { isProcessAlive: deadOwner })).tryAcquire(),
      ]);

      const winners = handles.filter((handle) => handle !== null);
      expect(winners).toHaveLength(1);
      expect((await new FileLock(lockPath).owner())?.pid).not.toBe(999);
      await winners[0]?.release();
    }
    expect(await fsp.readdir(path.dirname(lockPath))).toEqual([]);
  });

  it('leaves a lock owned by another host alone', async () => {
    await writeOwner({ pid: 999, hostname: 'other-host', token: 'theirs', acquired_at: 1 });

    expect(await new FileLock(lockPath, asProcess(101, { isProcessAlive: () => false })).tryAcquire()).toBeNull();
    expect((await new FileLock(lockPath).owner())?.token).toBe('theirs');
  });

  it('treats an unreadable lock as abandoned only once it is old', async () => {
    await writeOwner('garbage');
    expect(await new FileLock(lockPath, asProcess(101)).tryAcquire()).toBeNull();

    const past = Date.now() / 1000 - 120;
    await fsp.utimes(lockPath, past, past);
    expect(await new FileLock(lockPath, asProcess(101)).tryAcquire()).not.toBeNull();
  });

  it('does not remove a lock that changed hands', async () => {
    const handle = await new FileLock(lockPath, asProcess(101)).tryAcquire();
    await writeOwner({ pid: 202, hostname: 'test-host', token: 'replacement', acquired_at: 2 });

    await handle?.release();
    await handle?.release();

    expect((await new FileLock(lockPath).owner())?.token).toBe('replacement');
  });

  it('hands out an uncoordinated handle when the lock directory is unusable', async () => {
    const blocker = path.join(dir, 'blocker');
    await fsp.writeFile(blocker, 'not a directory');

    const handle = await new FileLock(path.join(blocker, 'test.lock')).tryAcquire();

    expect(handle).toMatchObject({ coordinated: false });
    await expect(handle?.release()).resolves.toBeUndefined();
  });
});

describe('processAlive', () => {
  it('sees the current process', () => {
    expect(processAlive(process.pid)).toBe(true);
  });
});
