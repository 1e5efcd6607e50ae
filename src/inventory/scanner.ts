/**
 * Image Inventory Scanner
 *
 * Lists gallery images, reads embedded descriptive tags as fallback
 * metadata and merges them with the stored sidecar.
 */

import { promises as fsp } from 'fs';
import path from 'path';
import exifr from 'exifr';
import { hasImageExtension } from '../lib/mime.js';
import { applySchemaDefaults } from '../sidecar/schema.js';
import type { SidecarSchema } from '../sidecar/schema.js';
import { toSidecarRecord } from '../sidecar/record.js';
import type { MetadataStore } from '../sidecar/store.js';
import { nowSeconds } from '../sidecar/store.js';
import type { JsonObject, SidecarRecord } from '../types/sidecar.js';

export interface FallbackHints {
  title?: string;
  description?: string;
}

type HintField = keyof FallbackHints;

const HINT_FIELDS: readonly HintField[] = ['title', 'description'];

/** EXIF/TIFF tags read for each hint, in order of preference */
const HINT_TAGS: Record<HintField, readonly string[]> = {
  title: ['XPTitle', 'DocumentName'],
  description: ['ImageDescription', 'XPComment', 'UserComment', 'XPSubject'],
};

const USER_COMMENT_PREFIXES: Record<string, string> = {
  'ASCII\0\0\0': 'latin1',
  'UNICODE\0': 'utf16le',
  'JIS\0\0\0\0\0': 'latin1',
  '\0\0\0\0\0\0\0\0': 'utf8',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bytesOf(value: unknown): Buffer | null {
  if (value instanceof Uint8Array) return Buffer.from(value);
  if (Array.isArray(value) && value.every((n) => typeof n === 'number')) return Buffer.from(value);
  return null;
}

/**
 * Decode a tag value to text. Windows XP* tags are UCS-2 byte arrays and
 * UserComment carries an 8-byte charset header.
 */
export function decodeTagText(tag: string, value: unknown): string {
  if (typeof value === 'string') return value.replace(/\0+$/g, '').trim();

  const bytes = bytesOf(value);
  if (!bytes) return '';

  if (tag.startsWith('XP')) {
    return bytes.toString('utf16le').replace(/\0+$/g, '').trim();
  }
  if (tag === 'UserComment' && bytes.length >= 8) {
    const header = bytes.subarray(0, 8).toString('latin1');
    const encoding = USER_COMMENT_PREFIXES[header];
    if (encoding === 'utf16le') return bytes.subarray(8).toString('utf16le').replace(/\0+$/g, '').trim();
    if (encoding === 'latin1') return bytes.subarray(8).toString('latin1').replace(/\0+$/g, '').trim();
    return bytes.subarray(8).toString('utf8').replace(/\0+$/g, '').trim();
  }
  return bytes.toString('utf8').replace(/\0+$/g, '').trim();
}

export class ImageScanner {
  constructor(
    private readonly imagesDir: string,
    private readonly store: MetadataStore,
    private readonly schema: SidecarSchema
  ) {}

  /**
   * Regular files with an allowed extension. Listing failures yield an
   * empty set.
   */
  async listImages(directory: string = this.imagesDir): Promise<Set<string>> {
    try {
      const entries = await fsp.readdir(directory, { withFileTypes: true });
      const names: string[] = [];
      for (const entry of entries) {
        if (!hasImageExtension(entry.name)) {
          continue;
        }
        if (entry.isFile()) {
          names.push(entry.name);
        } else if (entry.isSymbolicLink()) {
          const stat = await fsp.stat(path.join(directory, entry.name)).catch(() => null);
          if (stat?.isFile()) names.push(entry.name);
        }
      }
      names.sort();
      return new Set(names);
    } catch (err) {
      console.error(`[scanner] Error reading image directory ${directory}:`, err);
      return new Set();
    }
  }

  async extractFallbackHints(image: string): Promise<FallbackHints> {
    const hints: FallbackHints = {};
    try {
      const parsed: unknown = await exifr.parse(path.join(this.imagesDir, image), {
        tiff: true,
        exif: true,
        xmp: false,
        iptc: false,
        translateValues: false,
      });
      if (!isRecord(parsed)) return hints;

      for (const field of HINT_FIELDS) {
        for (const tag of HINT_TAGS[field]) {
          const text = decodeTagText(tag, parsed[tag]);
          if (text) {
            hints[field] = text;
            break;
          }
        }
      }
    } catch (err) {
      console.debug(`[scanner] No embedded metadata for ${image}:`, err instanceof Error ? err.message : err);
    }
    return hints;
  }

  /** Image modification time in seconds, or now when it cannot be read */
  async imageTimestamp(image: string): Promise<number> {
    try {
      const stat = await fsp.stat(path.join(this.imagesDir, image));
      return stat.mtimeMs / 1000;
    } catch {
      return nowSeconds();
    }
  }

  /**
   * Stored sidecar merged with embedded hints and schema defaults.
   *
   * A title/description key present in the sidecar (even empty) wins over
   * the embedded hint. A missing `detected_at` falls back to the image's
   * modification time so repeated loads agree.
   */
  async loadMetadata(image: string): Promise<SidecarRecord> {
    const stored = await this.store.read(image);
    const merged: JsonObject = { ...stored };

    if (HINT_FIELDS.some((field) => !(field in stored))) {
      const hints = await this.extractFallbackHints(image);
      for (const field of HINT_FIELDS) {
        const hint = hints[field];
        if (!(field in stored) && hint) merged[field] = hint;
      }
    }

    const detectedAt = await this.imageTimestamp(image);
    return toSidecarRecord(applySchemaDefaults(merged, this.schema, { detectedAt }));
  }
}
