/**
 * A small JSON settings document with sanitize-on-load and
 * sanitize-on-update. Each process holds its own copy.
 */

import { promises as fsp } from 'fs';
import path from 'path';
import { readJsonFile, writeJsonAtomic } from '../lib/atomic-json.js';
import { GalleryError, GalleryErrorCode, errorMessage } from '../lib/errors.js';

export type Sanitizer<T> = (input: unknown) => T;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigStore<T extends object> {
  private current: T;

  constructor(
    readonly file: string,
    private readonly sanitize: Sanitizer<T>,
    private readonly label: string
  ) {
    this.current = sanitize({});
  }

  /** Read the persisted document; unreadable or missing means defaults */
  async load(): Promise<T> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.file);
    } catch (err) {
      console.warn(`[settings] ${this.label} config at ${this.file} is unreadable, using defaults:`, errorMessage(err));
    }
    this.current = this.sanitize(isRecord(raw) ? raw : {});
    return this.get();
  }

  reload(): Promise<T> {
    return this.load();
  }

  get(): T {
    return structuredClone(this.current);
  }

  async update(patch: unknown): Promise<T> {
    if (!isRecord(patch)) {
      throw new GalleryError(GalleryErrorCode.INVALID_PAYLOAD, `${this.label} config update must be an object`);
    }
    const next = this.sanitize({ ...this.current, ...patch });
    await this.persist(next);
    this.current = next;
    return this.get();
  }

  async reset(): Promise<T> {
    const next = this.sanitize({});
    await this.persist(next);
    this.current = next;
    return this.get();
  }

  private async persist(value: T): Promise<void> {
    try {
      await fsp.mkdir(path.dirname(this.file), { recursive: true });
      await writeJsonAtomic(this.file, value);
      console.log(`[settings] Saved ${this.label} config`);
    } catch (err) {
      console.error(`[settings] Failed to save ${this.label} config:`, err);
      throw new GalleryError(GalleryErrorCode.IO_FAILED, `Could not save ${this.label} config`, { cause: errorMessage(err) });
    }
  }
}
