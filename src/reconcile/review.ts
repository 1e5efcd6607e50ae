/**
 * Administrator operations: review saves, bulk accept, on-demand
 * regeneration, deletion and imports. These take untrusted names and
 * payloads, so unlike the scan they throw `GalleryError`.
 */

import { constants as fsConstants, promises as fsp } from 'fs';
import path from 'path';
import { GalleryError, GalleryErrorCode, errnoCode, errorMessage } from '../lib/errors.js';
import { hasImageExtension, isPlainFilename, sanitizeFilename, sidecarNameFor } from '../lib/mime.js';
import type { ImageScanner } from '../inventory/scanner.js';
import { orderFields } from '../enrichment/prompt.js';
import { normalizeTags } from '../sidecar/schema.js';
import type { MetadataStore } from '../sidecar/store.js';
import type { AppSettings } from '../settings/index.js';
import type { EnrichableField, EnrichmentStatus, MetadataEdits, SidecarRecord } from '../types/sidecar.js';
import type { GalleryItem, Reconciler } from './reconciler.js';
import { classifyImage, missingFields } from './state.js';

export interface ItemError {
  name: string;
  error: string;
}

export interface AcceptResult {
  accepted: string[];
  errors: ItemError[];
}

export interface RegenerateOptions {
  /** Re-ask for the requested fields even when they are filled */
  force?: boolean;
  fields?: EnrichableField[];
}

export interface RegenerateResult {
  results: Array<{ name: string; status: EnrichmentStatus | 'complete'; filled: EnrichableField[] }>;
  errors: ItemError[];
}

export interface UploadFile {
  name: string;
  /** base64, optionally as a data URL */
  data: string;
}

export interface ImportResult {
  saved: string[];
  skipped: Array<{ name: string; reason: string }>;
}

const TEXT_EDITS = ['title', 'description', 'caption', 'author', 'copyright'] as const;

function decodeUpload(data: string): Buffer {
  const comma = data.startsWith('data:') ? data.indexOf(',') : -1;
  return Buffer.from(comma >= 0 ? data.slice(comma + 1) : data, 'base64');
}

export class ReviewService {
  constructor(
    private readonly store: MetadataStore,
    private readonly scanner: ImageScanner,
    private readonly reconciler: Reconciler,
    private readonly settings: AppSettings
  ) {}

  /** Throws unless `name` is an image directly inside the image directory */
  async assertImage(name: string): Promise<void> {
    if (!isPlainFilename(name) || !hasImageExtension(name)) {
      throw new GalleryError(GalleryErrorCode.INVALID_NAME, `Invalid image name: ${name}`);
    }
    const stat = await fsp.stat(this.store.imagePath(name)).catch(() => null);
    if (!stat?.isFile()) {
      throw new GalleryError(GalleryErrorCode.NOT_FOUND, `Image not found: ${name}`);
    }
  }

  async getItem(name: string): Promise<GalleryItem> {
    await this.assertImage(name);
    return this.reconciler.reconcileImage(name, { allowSidecarCreation: false, allowEnrichment: false });
  }

  private async persist(name: string, record: SidecarRecord): Promise<void> {
    if (!(await this.store.write(name, record))) {
      throw new GalleryError(GalleryErrorCode.IO_FAILED, `Could not save metadata for ${name}`);
    }
  }

  /** Administrator save: applies the edits and marks the image reviewed */
  async saveMetadata(name: string, edits: MetadataEdits): Promise<GalleryItem> {
    await this.assertImage(name);
    const record = await this.scanner.loadMetadata(name);

    for (const field of TEXT_EDITS) {
      const value = edits[field];
      if (value !== undefined) record[field] = value.trim();
    }
    if (edits.tags !== undefined) record.tags = normalizeTags(edits.tags);
    record.reviewed = true;
    record.ai_generated = false;

    await this.persist(name, record);
    console.log(`[review] Saved metadata for ${name}`);
    return this.reconciler.toItem(name, record, true, classifyImage(record, true, this.settings.enrichmentTargets()));
  }

  /** Mark images reviewed keeping whatever text they have */
  async acceptImages(names: string[]): Promise<AcceptResult> {
    const result: AcceptResult = { accepted: [], errors: [] };
    for (const name of names) {
      try {
        await this.assertImage(name);
        const record = await this.scanner.loadMetadata(name);
        record.reviewed = true;
        await this.persist(name, record);
        result.accepted.push(name);
      } catch (err) {
        result.errors.push({ name, error: errorMessage(err) });
      }
    }
    console.log(`[review] Accepted ${result.accepted.length} images (${result.errors.length} errors)`);
    return result;
  }

  /**
   * Run enrichment now, ignoring backoff. Without `force` only blank
   * fields are requested.
   */
  async regenerate(names: string[], options: RegenerateOptions = {}): Promise<RegenerateResult> {
    if (!this.settings.ai.get().enabled) {
      throw new GalleryError(GalleryErrorCode.INVALID_PAYLOAD, 'AI enrichment is disabled');
    }
    const targets = options.fields?.length ? orderFields(options.fields) : this.settings.enrichmentTargets();
    const outcome: RegenerateResult = { results: [], errors: [] };

    for (const name of names) {
      try {
        await this.assertImage(name);
        const seed = await this.scanner.loadMetadata(name);
        await this.store.ensureExists(name, seed);
        const record = await this.scanner.loadMetadata(name);
        const missing = options.force ? targets : missingFields(record, targets);
        if (missing.length === 0) {
          outcome.results.push({ name, status: 'complete', filled: [] });
          continue;
        }
        const result = await this.reconciler.enrichAndStore(name, record, missing);
        outcome.results.push({ name, status: result.status, filled: result.filled });
      } catch (err) {
        outcome.errors.push({ name, error: errorMessage(err) });
      }
    }
    return outcome;
  }

  async deleteImage(name: string): Promise<void> {
    await this.assertImage(name);
    try {
      await fsp.unlink(this.store.imagePath(name));
      await this.store.remove(name);
    } catch (err) {
      throw new GalleryError(GalleryErrorCode.IO_FAILED, `Could not delete ${name}`, { cause: errorMessage(err) });
    }
    console.log(`[review] Deleted ${name}`);
  }

  /** Store uploaded images under sanitized names, never replacing a file */
  async importUploads(files: UploadFile[]): Promise<ImportResult> {
    const result: ImportResult = { saved: [], skipped: [] };
    for (const file of files) {
      const name = sanitizeFilename(path.basename(file.name));
      if (!hasImageExtension(name)) {
        result.skipped.push({ name: file.name, reason: 'unsupported file type' });
        continue;
      }
      const bytes = decodeUpload(file.data);
      if (bytes.length === 0) {
        result.skipped.push({ name: file.name, reason: 'empty upload' });
        continue;
      }
      try {
        await fsp.writeFile(this.store.imagePath(name), bytes, { flag: 'wx' });
      } catch (err) {
        const reason = errnoCode(err) === 'EEXIST' ? 'already exists' : errorMessage(err);
        result.skipped.push({ name: file.name, reason });
        continue;
      }
      await this.store.ensureExists(name, await this.scanner.loadMetadata(name));
      result.saved.push(name);
    }
    console.log(`[review] Uploaded ${result.saved.length} images, skipped ${result.skipped.length}`);
    return result;
  }

  /**
   * Copy images (and sidecars that come with them) from a local directory.
   * Names already present are skipped.
   */
  async importFromPath(sourceDir: string): Promise<ImportResult> {
    const source = path.resolve(sourceDir);
    const stat = await fsp.stat(source).catch(() => null);
    if (!stat?.isDirectory()) {
      throw new GalleryError(GalleryErrorCode.SOURCE_NOT_FOUND, `Not a directory: ${sourceDir}`);
    }
    if (source === path.resolve(this.store.imagesDir)) {
      throw new GalleryError(GalleryErrorCode.INVALID_PAYLOAD, 'Source is the image directory');
    }

    const result: ImportResult = { saved: [], skipped: [] };
    for (const name of await this.scanner.listImages(source)) {
      try {
        await fsp.copyFile(path.join(source, name), this.store.imagePath(name), fsConstants.COPYFILE_EXCL);
      } catch (err) {
        const reason = errnoCode(err) === 'EEXIST' ? 'already exists' : errorMessage(err);
        result.skipped.push({ name, reason });
        continue;
      }

      const sidecar = sidecarNameFor(name);
      try {
        await fsp.copyFile(path.join(source, sidecar), this.store.sidecarPath(name), fsConstants.COPYFILE_EXCL);
      } catch (err) {
        const code = errnoCode(err);
        if (code !== 'ENOENT' && code !== 'EEXIST') {
          console.warn(`[review] Could not copy sidecar ${sidecar}:`, errorMessage(err));
        }
      }
      await this.store.ensureExists(name, await this.scanner.loadMetadata(name));
      result.saved.push(name);
    }
    console.log(`[review] Imported ${result.saved.length} images from ${source}, skipped ${result.skipped.length}`);
    return result;
  }
}
