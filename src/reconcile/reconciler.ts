/**
 * Reconciliation Orchestrator
 *
 * One pass over the image directory: make sure every image has a sidecar,
 * fill blank fields through the enrichment client and split the inventory
 * into pending-review and reviewed lists. A failure on one image degrades
 * that entry to defaults; the pass always completes.
 */

import { canonicalJson } from '../lib/atomic-json.js';
import { errorMessage } from '../lib/errors.js';
import type { ImageScanner } from '../inventory/scanner.js';
import type { EnrichmentClient, EnrichmentOutcome } from '../enrichment/client.js';
import { applySchemaDefaults, repairSidecar, validateSidecar } from '../sidecar/schema.js';
import type { SidecarSchema } from '../sidecar/schema.js';
import { toSidecarRecord } from '../sidecar/record.js';
import { nowSeconds } from '../sidecar/store.js';
import type { MetadataStore } from '../sidecar/store.js';
import type { AppSettings } from '../settings/index.js';
import type { EnrichableField, SidecarRecord } from '../types/sidecar.js';
import { classifyImage, isInBackoff } from './state.js';
import type { ImageState, ImageStateKind } from './state.js';

export type GalleryItem = SidecarRecord & {
  name: string;
  url: string;
  has_sidecar: boolean;
  state: ImageStateKind;
};

export interface ScanOptions {
  allowSidecarCreation: boolean;
  allowEnrichment: boolean;
}

export interface InventoryResult {
  pending: GalleryItem[];
  gallery: GalleryItem[];
}

export interface MigrationSummary {
  total: number;
  changed: number;
}

export interface ReconcilerOptions {
  publicPrefix: string;
  clock?: () => number;
}

export class Reconciler {
  private readonly clock: () => number;

  constructor(
    private readonly store: MetadataStore,
    private readonly scanner: ImageScanner,
    private readonly enrichment: EnrichmentClient,
    private readonly settings: AppSettings,
    private readonly schema: SidecarSchema,
    private readonly options: ReconcilerOptions
  ) {
    this.clock = options.clock ?? nowSeconds;
  }

  publicUrl(image: string): string {
    return `${this.options.publicPrefix}/${encodeURIComponent(image)}`;
  }

  toItem(image: string, record: SidecarRecord, hasSidecar: boolean, state: ImageState): GalleryItem {
    return { ...record, name: image, url: this.publicUrl(image), has_sidecar: hasSidecar, state: state.kind };
  }

  /**
   * Call the enrichment client and persist its attempt record. The sidecar
   * is only written when the client changed something.
   */
  async enrichAndStore(image: string, record: SidecarRecord, missing: readonly EnrichableField[]): Promise<EnrichmentOutcome> {
    const outcome = await this.enrichment.enrich(
      { imageName: image, imagePath: this.store.imagePath(image), record, missing },
      this.settings.enrichmentSettings()
    );
    if (outcome.changed) {
      await this.store.write(image, outcome.record);
    }
    return outcome;
  }

  async reconcileImage(image: string, options: ScanOptions): Promise<GalleryItem> {
    const targets = this.settings.enrichmentTargets();
    try {
      let record = await this.scanner.loadMetadata(image);
      let hasSidecar = await this.store.exists(image);

      if (!hasSidecar && options.allowSidecarCreation) {
        await this.store.ensureExists(image, record);
        hasSidecar = await this.store.exists(image);
        if (hasSidecar) record = await this.scanner.loadMetadata(image);
      }

      let state = classifyImage(record, hasSidecar, targets);
      if (state.kind === 'NeedsEnrichment' && options.allowEnrichment && this.shouldEnrich(record)) {
        const outcome = await this.enrichAndStore(image, record, state.missing);
        record = outcome.record;
        state = classifyImage(record, hasSidecar, targets);
      }
      return this.toItem(image, record, hasSidecar, state);
    } catch (err) {
      console.error(`[reconcile] ${image} failed, using defaults:`, errorMessage(err));
      const fallback = toSidecarRecord(applySchemaDefaults({}, this.schema, { detectedAt: this.clock() }));
      return this.toItem(image, fallback, false, classifyImage(fallback, false, targets));
    }
  }

  private shouldEnrich(record: SidecarRecord): boolean {
    if (!this.settings.ai.get().enabled) return false;
    const retryAfter = this.settings.advanced.get().retry_failed_after_seconds;
    if (isInBackoff(record, retryAfter, this.clock())) {
      console.log(`[reconcile] Last enrichment attempt failed recently; waiting ${retryAfter}s before retrying`);
      return false;
    }
    return true;
  }

  async scanInventory(options: ScanOptions): Promise<InventoryResult> {
    const images = await this.scanner.listImages();
    const pending: GalleryItem[] = [];
    const gallery: GalleryItem[] = [];
    for (const image of images) {
      const item = await this.reconcileImage(image, options);
      (item.reviewed ? gallery : pending).push(item);
    }
    console.log(`[reconcile] Scanned ${images.size} images: ${pending.length} pending, ${gallery.length} reviewed`);
    return { pending, gallery };
  }

  async scan(allowSidecarCreation: boolean, allowEnrichment: boolean): Promise<GalleryItem[]> {
    const { pending } = await this.scanInventory({ allowSidecarCreation, allowEnrichment });
    return pending;
  }

  /**
   * Bring every sidecar into schema conformance, creating missing ones.
   * Records are only rewritten when defaults or repairs changed them.
   */
  async migrateAll(): Promise<MigrationSummary> {
    const images = await this.scanner.listImages();
    let changed = 0;

    for (const image of images) {
      try {
        let touched = false;
        if (!(await this.store.exists(image))) {
          touched = await this.store.ensureExists(image, await this.scanner.loadMetadata(image));
        }
        const raw = await this.store.readRaw(image);
        const before = canonicalJson(raw.data);
        const defaults = { detectedAt: await this.scanner.imageTimestamp(image) };

        let data = applySchemaDefaults(raw.data, this.schema, defaults);
        const report = validateSidecar(data, this.schema);
        if (!report.valid) {
          console.warn(`[reconcile] ${image} sidecar failed validation: ${report.errors.join('; ')}`);
          data = repairSidecar(data, this.schema, defaults);
        }

        if (raw.malformed || canonicalJson(data) !== before) {
          touched = (await this.store.write(image, data)) || touched;
        }
        if (touched) changed++;
      } catch (err) {
        console.error(`[reconcile] Migration of ${image} failed:`, errorMessage(err));
      }
    }

    console.log(`[reconcile] Migration checked ${images.size} sidecars, updated ${changed}`);
    return { total: images.size, changed };
  }
}
