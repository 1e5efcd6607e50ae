/**
 * Startup election.
 *
 * The process that wins the migration lock migrates every sidecar and runs
 * the first scan with enrichment; every other process scans without it.
 * Sidecar creation in the startup scan needs a free slot.
 */

import type { GalleryItem, MigrationSummary, Reconciler } from '../reconcile/reconciler.js';
import type { AppSettings } from '../settings/index.js';
import type { LockHandle } from './file-lock.js';
import type { CoordinationLocks } from './locks.js';

export type StartupRole = 'migrator' | 'follower';

export interface StartupDeps {
  reconciler: Reconciler;
  settings: AppSettings;
  locks: CoordinationLocks;
}

export interface StartupResult {
  role: StartupRole;
  migration?: MigrationSummary;
  pending: GalleryItem[];
  /** Held by the migrator until shutdown */
  migrationLock: LockHandle | null;
}

export async function runStartup({ reconciler, settings, locks }: StartupDeps): Promise<StartupResult> {
  const ai = settings.ai.get();
  const migrationLock = await locks.migration.tryAcquire();
  const role: StartupRole = migrationLock ? 'migrator' : 'follower';
  console.log(`[startup] Process ${process.pid} is the ${role}`);

  let migration: MigrationSummary | undefined;
  if (migrationLock) {
    migration = await reconciler.migrateAll();
  }

  let slot: LockHandle | null = null;
  if (ai.startup_sidecar_enabled) {
    slot = await locks.slots(ai.max_workers_create_sidecars).tryAcquire();
    if (!slot) console.log('[startup] All sidecar slots busy; skipping sidecar creation this pass');
  }

  const allowEnrichment = role === 'migrator' && ai.enabled && ai.startup_enrichment_enabled;
  try {
    const pending = await reconciler.scan(slot !== null, allowEnrichment);
    return { role, migration, pending, migrationLock };
  } finally {
    await slot?.release();
  }
}
