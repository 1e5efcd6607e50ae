/**
 * Image filename utilities: extension allow-list, sidecar naming and
 * sanitizing of names that arrive from uploads.
 */

import path from 'path';

/** Extensions served by the gallery (lowercase, no dot) */
export const ALLOWED_IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'gif', 'webp', 'svg', 'bmp', 'tiff'] as const;

export type AllowedImageExtension = typeof ALLOWED_IMAGE_EXTENSIONS[number];

export const SIDECAR_EXTENSION = '.json';

function isAllowedExtension(ext: string): ext is AllowedImageExtension {
  return ALLOWED_IMAGE_EXTENSIONS.some((allowed) => allowed === ext);
}

/** Case-insensitive; only the last extension counts */
export function hasImageExtension(filename: string): boolean {
  const dot = filename.lastIndexOf('.');
  if (dot < 0) return false;
  return isAllowedExtension(filename.slice(dot + 1).toLowerCase());
}

/**
 * Sidecar filename for an image: same stem, `.json` extension
 */
export function sidecarNameFor(imageName: string): string {
  const ext = path.extname(imageName);
  const stem = ext ? imageName.slice(0, -ext.length) : imageName;
  return `${stem}${SIDECAR_EXTENSION}`;
}

/**
 * A name that refers to a file directly inside the image directory
 */
export function isPlainFilename(name: string): boolean {
  if (!name || name === '.' || name === '..') return false;
  if (name.includes('/') || name.includes('\\') || name.includes('\0')) return false;
  return path.basename(name) === name;
}

const MAX_STEM_LENGTH = 100;

/**
 * Storage-safe version of an uploaded name: traversal removed, anything
 * outside `[A-Za-z0-9._-]` replaced by `_`, stem capped at 100 characters.
 */
export function sanitizeFilename(filename: string): string {
  const cleaned = filename
    .trim()
    .replace(/\.\./g, '')
    .replace(/[^a-zA-Z0-9._-]/g, '_')
    .replace(/__+/g, '_')
    .replace(/^_+|_+$/g, '');
  if (!cleaned) return 'unnamed';

  const dot = cleaned.lastIndexOf('.');
  if (dot < 0) return cleaned.slice(0, MAX_STEM_LENGTH);
  const stem = cleaned.slice(0, dot) || 'unnamed';
  return `${stem.slice(0, MAX_STEM_LENGTH)}${cleaned.slice(dot)}`;
}
