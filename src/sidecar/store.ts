/**
 * Metadata Store
 *
 * One JSON sidecar per image, stored next to it as `<stem>.json`.
 * Writes are atomic (temp file + rename) and serialized within the process;
 * across processes the last rename wins.
 */

import { promises as fsp } from 'fs';
import path from 'path';
import { writeJsonAtomic } from '../lib/atomic-json.js';
import { errnoCode } from '../lib/errors.js';
import { sidecarNameFor } from '../lib/mime.js';
import { Mutex } from '../lib/mutex.js';
import { isJsonObject } from '../types/sidecar.js';
import type { JsonObject, JsonValue, SidecarRecord } from '../types/sidecar.js';
import { applySchemaDefaults, DETECTED_AT_KEY } from './schema.js';
import type { SidecarSchema } from './schema.js';
import { toJsonObject } from './record.js';

export interface RawSidecar {
  data: JsonObject;
  /** A sidecar file exists on disk */
  present: boolean;
  /** The file exists but is not a JSON object */
  malformed: boolean;
}

type WritableRecord = SidecarRecord | JsonObject;

export function nowSeconds(): number {
  return Date.now() / 1000;
}

export class MetadataStore {
  private readonly writeLock = new Mutex();

  constructor(
    readonly imagesDir: string,
    private readonly schema: SidecarSchema,
    private readonly clock: () => number = nowSeconds
  ) {}

  imagePath(image: string): string {
    return path.join(this.imagesDir, image);
  }

  sidecarPath(image: string): string {
    return path.join(this.imagesDir, sidecarNameFor(image));
  }

  async exists(image: string): Promise<boolean> {
    try {
      const stat = await fsp.stat(this.sidecarPath(image));
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async readRaw(image: string): Promise<RawSidecar> {
    const file = this.sidecarPath(image);
    let text: string;
    try {
      text = await fsp.readFile(file, 'utf8');
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        console.error(`[store] Failed to read ${file}:`, err);
      }
      return { data: {}, present: errnoCode(err) !== 'ENOENT', malformed: false };
    }

    try {
      const parsed: unknown = JSON.parse(text);
      if (isJsonObject(parsed)) return { data: parsed, present: true, malformed: false };
      console.warn(`[store] ${file} does not hold a JSON object, treating as empty`);
    } catch (err) {
      console.warn(`[store] ${file} is not valid JSON, treating as empty:`, err instanceof Error ? err.message : err);
    }
    return { data: {}, present: true, malformed: true };
  }

  /**
   * Parsed sidecar, or an empty record when missing or unreadable.
   * Callers backfill defaults.
   */
  async read(image: string): Promise<JsonObject> {
    const raw = await this.readRaw(image);
    return raw.data;
  }

  /**
   * Create the sidecar from schema defaults overlaid with the seed's known
   * fields. Never touches an existing file.
   *
   * @returns true when this call created the file
   */
  async ensureExists(image: string, seed: WritableRecord): Promise<boolean> {
    if (await this.exists(image)) return false;

    const now = this.clock();
    const record = applySchemaDefaults({}, this.schema, { detectedAt: now });
    const known = toJsonObject(seed);
    for (const key of Object.keys(this.schema.properties)) {
      const value: JsonValue | undefined = known[key];
      if (key !== DETECTED_AT_KEY && value !== undefined) record[key] = value;
    }
    record[DETECTED_AT_KEY] = now;

    const file = this.sidecarPath(image);
    return this.writeLock.runExclusive(async () => {
      try {
        await writeJsonAtomic(file, record, { exclusive: true });
        console.log(`[store] Created sidecar ${path.basename(file)}`);
        return true;
      } catch (err) {
        if (errnoCode(err) === 'EEXIST') return false;
        console.error(`[store] Failed to create ${file}:`, err);
        return false;
      }
    });
  }

  /**
   * Replace the sidecar atomically after reapplying schema defaults.
   *
   * @returns false when the write failed (already logged)
   */
  async write(image: string, record: WritableRecord): Promise<boolean> {
    const data = applySchemaDefaults(toJsonObject(record), this.schema, { detectedAt: this.clock() });
    const file = this.sidecarPath(image);
    return this.writeLock.runExclusive(async () => {
      try {
        await writeJsonAtomic(file, data);
        return true;
      } catch (err) {
        console.error(`[store] Failed to write ${file}:`, err);
        return false;
      }
    });
  }

  async remove(image: string): Promise<void> {
    const file = this.sidecarPath(image);
    await this.writeLock.runExclusive(async () => {
      try {
        await fsp.unlink(file);
      } catch (err) {
        if (errnoCode(err) !== 'ENOENT') throw err;
      }
    });
  }
}
