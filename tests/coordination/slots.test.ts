import path from 'path';
import { SlotPool, slotLockName } from '../../src/coordination/slots.js';
import { makeTempDir, removeDir } from '../helpers/gallery.js';

describe('SlotPool', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('slots-');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('hands out each slot once', async () => {
    const pool = new SlotPool(dir, 2, { pid: 101, hostname: 'test-host', isProcessAlive: () => true });

    const first = await pool.tryAcquire();
    const second = await pool.tryAcquire();

    expect(first?.path).toBe(path.join(dir, 'sidecar-slot-0.lock'));
    expect(second?.path).toBe(path.join(dir, 'sidecar-slot-1.lock'));
    expect(await pool.tryAcquire()).toBeNull();

    await first?.release();
    expect((await pool.tryAcquire())?.path).toBe(path.join(dir, slotLockName(0)));
  });
});
