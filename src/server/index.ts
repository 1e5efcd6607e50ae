/**
 * Gallery server entry.
 *
 * Directories that cannot be created are the one fatal startup condition;
 * everything after that degrades.
 */

import { promises as fsp } from 'fs';
import type { Server } from 'http';
import { cfg } from '../config.js';
import { createContext } from '../context.js';
import type { GalleryContext } from '../context.js';
import { runStartup } from '../coordination/startup.js';
import { PeriodicWatcher } from '../coordination/watcher.js';
import { errorMessage } from '../lib/errors.js';
import { createApp } from './app.js';

export async function ensureDirectories(dirs: string[]): Promise<void> {
  for (const dir of dirs) {
    await fsp.mkdir(dir, { recursive: true });
  }
}

export function createWatcher(ctx: GalleryContext): PeriodicWatcher {
  return new PeriodicWatcher(
    ctx.locks.watcher,
    () => ctx.reconciler.scan(true, true),
    () => ctx.settings.advanced.get().poll_interval_seconds * 1000
  );
}

async function main(): Promise<void> {
  await ensureDirectories([cfg.imagesDir, cfg.dataDir, cfg.lockDir]);

  const ctx = await createContext();
  const startup = await runStartup(ctx);
  console.log(`[server] Startup finished as ${startup.role}: ${startup.pending.length} images pending review`);

  const watcher = createWatcher(ctx);
  await watcher.start();

  const app = createApp(ctx);
  const server: Server = app.listen(cfg.port, () => {
    console.log(`[server] Listening on http://localhost:${cfg.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[server] ${signal} received, shutting down`);
    await watcher.stop();
    await startup.migrationLock?.release();
    server.close(() => process.exit(0));
    // Keep-alive sockets must not hold the process open.
    setTimeout(() => process.exit(0), 5000).unref();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((e) => {
        console.error('[server] Shutdown failed:', errorMessage(e));
        process.exit(1);
      });
    });
  }
}

if (require.main === module) {
  main().catch((e) => {
    console.error('[server] Fatal startup error:', e);
    process.exit(1);
  });
}
