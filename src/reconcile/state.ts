import type { EnrichableField, SidecarRecord } from '../types/sidecar.js';

/** Where an image stands in the reconciliation pass */
export type ImageState =
  | { kind: 'Undiscovered' }
  | { kind: 'NeedsEnrichment'; missing: EnrichableField[] }
  | { kind: 'PendingReview' }
  | { kind: 'Reviewed' };

export type ImageStateKind = ImageState['kind'];

function isBlank(record: SidecarRecord, field: EnrichableField): boolean {
  if (field === 'tags') return (record.tags ?? []).length === 0;
  const value = record[field];
  return typeof value !== 'string' || value.trim() === '';
}

export function missingFields(record: SidecarRecord, targets: readonly EnrichableField[]): EnrichableField[] {
  return targets.filter((field) => isBlank(record, field));
}

/**
 * Reviewed images are never enriched, whatever they lack. An image with no
 * sidecar on disk is `Undiscovered` until one is created.
 */
export function classifyImage(
  record: SidecarRecord,
  hasSidecar: boolean,
  targets: readonly EnrichableField[]
): ImageState {
  if (!hasSidecar) return { kind: 'Undiscovered' };
  if (record.reviewed) return { kind: 'Reviewed' };
  const missing = missingFields(record, targets);
  if (missing.length > 0) return { kind: 'NeedsEnrichment', missing };
  return { kind: 'PendingReview' };
}

const FAILED = new Set(['error_image_encoding', 'error_http', 'error_parse', 'no_json']);

/** A recent failed attempt that a scan should not repeat yet */
export function isInBackoff(record: SidecarRecord, retryAfterSeconds: number, now: number): boolean {
  if (retryAfterSeconds <= 0) return false;
  const { status, attempted_at: attemptedAt } = record.ai_details;
  if (!FAILED.has(status)) return false;
  return now - attemptedAt < retryAfterSeconds;
}
