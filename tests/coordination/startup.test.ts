import path from 'path';

jest.mock('exifr', () => ({
  __esModule: true,
  default: { parse: jest.fn(async () => undefined) },
}));

import { runStartup } from '../../src/coordination/startup.js';
import {
  completion,
  createTestGallery,
  fakeCompletions,
  fileExists,
  readSidecar,
  removeDir,
  writeImage,
} from '../helpers/gallery.js';
import type { TestGallery } from '../helpers/gallery.js';

const withKey = async () => ({ apiKey: 'test-key', origin: 'env' as const });

describe('runStartup', () => {
  let gallery: TestGallery | undefined;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    if (gallery) await removeDir(gallery.root);
    gallery = undefined;
  });

  it('migrates and enriches in the process that wins the election', async () => {
    const fake = fakeCompletions(async () => completion('{"title": "T", "description": "D"}'));
    gallery = await createTestGallery({ enrichment: { credentials: withKey, createClient: fake.factory } });
    const { ctx, imagesDir } = gallery;
    await writeImage(imagesDir, 'a.jpg');

    const result = await runStartup(ctx);

    expect(result.role).toBe('migrator');
    expect(result.migration).toEqual({ total: 1, changed: 1 });
    expect(result.migrationLock?.coordinated).toBe(true);
    expect(result.pending.map((item) => item.name)).toEqual(['a.jpg']);
    expect(fake.create).toHaveBeenCalledTimes(1);
    expect(await readSidecar(imagesDir, 'a.json')).toMatchObject({ title: 'T', description: 'D' });
    expect(await fileExists(path.join(ctx.locks.lockDir, 'sidecar-slot-0.lock'))).toBe(false);

    await result.migrationLock?.release();
  });

  it('creates sidecars but never enriches in other processes', async () => {
    const fake = fakeCompletions(async () => completion('{"title": "T", "description": "D"}'));
    gallery = await createTestGallery({ enrichment: { credentials: withKey, createClient: fake.factory } });
    const { ctx, imagesDir } = gallery;
    await writeImage(imagesDir, 'a.jpg');
    const held = await ctx.locks.migration.tryAcquire();

    const result = await runStartup(ctx);

    expect(result).toMatchObject({ role: 'follower', migrationLock: null });
    expect(result.migration).toBeUndefined();
    expect(fake.create).not.toHaveBeenCalled();
    expect(await readSidecar(imagesDir, 'a.json')).toMatchObject({ title: '', description: '' });

    await held?.release();
  });

  it('skips sidecar creation when every slot is taken', async () => {
    gallery = await createTestGallery({ settings: { aiEnv: { max_workers_create_sidecars: '1' } } });
    const { ctx, imagesDir } = gallery;
    await writeImage(imagesDir, 'a.jpg');
    const held = await ctx.locks.migration.tryAcquire();
    const slot = await ctx.locks.slots(1).tryAcquire();

    const result = await runStartup(ctx);

    expect(result.pending[0]).toMatchObject({ name: 'a.jpg', has_sidecar: false });
    expect(await fileExists(path.join(imagesDir, 'a.json'))).toBe(false);
    expect(console.log).toHaveBeenCalledWith('[startup] All sidecar slots busy; skipping sidecar creation this pass');

    await slot?.release();
    await held?.release();
  });

  it('does not create sidecars when startup creation is off', async () => {
    gallery = await createTestGallery({ settings: { aiEnv: { startup_sidecar_enabled: 'false' } } });
    const { ctx, imagesDir } = gallery;
    await writeImage(imagesDir, 'a.jpg');
    const held = await ctx.locks.migration.tryAcquire();

    await runStartup(ctx);

    expect(await fileExists(path.join(imagesDir, 'a.json'))).toBe(false);
    await held?.release();
  });
});
