/**
 * Atomic JSON file writes.
 *
 * The document is written to a uniquely named temp file in the destination
 * directory, flushed, then moved into place. Readers see either the old
 * file or the new one, never a partial write.
 */

import { promises as fsp } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { errnoCode } from './errors.js';

export interface AtomicWriteOptions {
  /** Fail with EEXIST instead of replacing an existing file */
  exclusive?: boolean;
}

export function serializeJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

function tempPathFor(target: string): string {
  const dir = path.dirname(target);
  const base = path.basename(target);
  return path.join(dir, `.${base}.${process.pid}.${randomUUID()}.tmp`);
}

async function removeQuietly(file: string): Promise<void> {
  try {
    await fsp.unlink(file);
  } catch (err) {
    if (errnoCode(err) !== 'ENOENT') {
      console.warn(`[atomic-json] Could not remove temp file ${file}:`, err);
    }
  }
}

export async function writeJsonAtomic(target: string, data: unknown, options: AtomicWriteOptions = {}): Promise<void> {
  const tmp = tempPathFor(target);
  const body = serializeJson(data);

  try {
    const handle = await fsp.open(tmp, 'wx');
    try {
      await handle.writeFile(body, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    if (options.exclusive) {
      // link() refuses to replace an existing destination
      await fsp.link(tmp, target);
      await removeQuietly(tmp);
    } else {
      await fsp.rename(tmp, target);
    }
  } catch (err) {
    await removeQuietly(tmp);
    throw err;
  }
}

/**
 * Parse a JSON file. Missing file yields `undefined`; a parse error throws.
 */
export async function readJsonFile(file: string): Promise<unknown> {
  let text: string;
  try {
    text = await fsp.readFile(file, 'utf8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return undefined;
    throw err;
  }
  return JSON.parse(text);
}

/** Deterministic serialization with sorted keys, for change detection */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v === 'object' && v !== null && !Array.isArray(v)) {
      const sorted: Record<string, unknown> = {};
      for (const key of Object.keys(v).sort()) {
        sorted[key] = Reflect.get(v, key);
      }
      return sorted;
    }
    return v;
  });
}
