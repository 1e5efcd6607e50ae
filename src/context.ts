/**
 * Process context: every long-lived object the server, CLI and tests share,
 * built once and passed explicitly.
 */

import path from 'path';
import { cfg } from './config.js';
import { CoordinationLocks } from './coordination/locks.js';
import type { FileLockOptions } from './coordination/file-lock.js';
import { EnrichmentClient } from './enrichment/client.js';
import type { EnrichmentDeps } from './enrichment/client.js';
import { ImageScanner } from './inventory/scanner.js';
import { Reconciler } from './reconcile/reconciler.js';
import { ReviewService } from './reconcile/review.js';
import { AppSettings } from './settings/index.js';
import type { SettingsOptions } from './settings/index.js';
import { loadSidecarSchema } from './sidecar/schema.js';
import type { SidecarSchema } from './sidecar/schema.js';
import { MetadataStore, nowSeconds } from './sidecar/store.js';

export interface ContextOptions {
  imagesDir?: string;
  dataDir?: string;
  lockDir?: string;
  schemaPath?: string;
  schema?: SidecarSchema;
  publicImagePrefix?: string;
  settings?: SettingsOptions;
  enrichment?: EnrichmentDeps;
  locks?: FileLockOptions;
  clock?: () => number;
}

export interface GalleryContext {
  imagesDir: string;
  dataDir: string;
  publicImagePrefix: string;
  schema: SidecarSchema;
  settings: AppSettings;
  store: MetadataStore;
  scanner: ImageScanner;
  enrichment: EnrichmentClient;
  reconciler: Reconciler;
  review: ReviewService;
  locks: CoordinationLocks;
}

/** Loads the sidecar schema (throws if it is missing) and the persisted settings */
export async function createContext(options: ContextOptions = {}): Promise<GalleryContext> {
  const imagesDir = path.resolve(options.imagesDir ?? cfg.imagesDir);
  const dataDir = path.resolve(options.dataDir ?? cfg.dataDir);
  const lockDir = path.resolve(options.lockDir ?? (options.dataDir ? path.join(dataDir, 'locks') : cfg.lockDir));
  const clock = options.clock ?? nowSeconds;
  const publicImagePrefix = options.publicImagePrefix ?? cfg.publicImagePrefix;

  const schema = options.schema ?? loadSidecarSchema(path.resolve(options.schemaPath ?? cfg.schemaPath));
  const settings = new AppSettings(dataDir, options.settings);
  await settings.load();

  const store = new MetadataStore(imagesDir, schema, clock);
  const scanner = new ImageScanner(imagesDir, store, schema);
  const enrichment = new EnrichmentClient({ now: clock, ...options.enrichment });
  const reconciler = new Reconciler(store, scanner, enrichment, settings, schema, {
    publicPrefix: publicImagePrefix,
    clock,
  });
  const review = new ReviewService(store, scanner, reconciler, settings);
  const locks = new CoordinationLocks(lockDir, options.locks);

  return { imagesDir, dataDir, publicImagePrefix, schema, settings, store, scanner, enrichment, reconciler, review, locks };
}
