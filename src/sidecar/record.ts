/**
 * Typed projection of sidecar JSON.
 *
 * Keys the projection does not know about are carried along untouched so a
 * schema that grows new fields keeps them through a read/write cycle.
 */

import { isJsonObject } from '../types/sidecar.js';
import type { AiDetails, EnrichmentStatus, JsonObject, JsonValue, SidecarRecord } from '../types/sidecar.js';
import { normalizeTags } from './schema.js';

const STATUSES: readonly EnrichmentStatus[] = [
  'success',
  'skipped_no_api_key',
  'error_image_encoding',
  'error_http',
  'error_parse',
  'no_json',
];

export function isEnrichmentStatus(value: unknown): value is EnrichmentStatus {
  return STATUSES.some((status) => status === value);
}

function asString(value: JsonValue | undefined): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function asNumber(value: JsonValue | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function emptyAiDetails(): AiDetails {
  return {
    provider: '',
    model: '',
    prompt: '',
    response_id: '',
    finish_reason: '',
    created: 0,
    attempted_at: 0,
    status: '',
    http_status: 0,
    error: '',
    error_body: '',
    raw_response: {},
  };
}

export function toAiDetails(value: JsonValue | undefined): AiDetails {
  if (!isJsonObject(value)) return emptyAiDetails();
  return {
    provider: asString(value.provider),
    model: asString(value.model),
    prompt: asString(value.prompt),
    response_id: asString(value.response_id),
    finish_reason: asString(value.finish_reason),
    created: asNumber(value.created),
    attempted_at: asNumber(value.attempted_at),
    status: isEnrichmentStatus(value.status) ? value.status : '',
    http_status: asNumber(value.http_status),
    error: asString(value.error),
    error_body: asString(value.error_body),
    raw_response: isJsonObject(value.raw_response) ? value.raw_response : {},
  };
}

export function toSidecarRecord(data: JsonObject): SidecarRecord {
  const record: SidecarRecord = {
    title: asString(data.title),
    description: asString(data.description),
    reviewed: data.reviewed === true,
    ai_generated: data.ai_generated === true,
    ai_details: toAiDetails(data.ai_details),
    detected_at: asNumber(data.detected_at),
  };
  for (const [key, value] of Object.entries(data)) {
    if (!(key in record)) record[key] = value;
  }
  if ('caption' in data) record.caption = asString(data.caption);
  if ('author' in data) record.author = asString(data.author);
  if ('copyright' in data) record.copyright = asString(data.copyright);
  if ('tags' in data) record.tags = normalizeTags(data.tags);
  return record;
}

export function toJsonObject(record: { [key: string]: JsonValue | undefined }): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** Plain JSON copy of an arbitrary parsed value */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map((item: unknown) => toJsonValue(item) ?? null);
  if (typeof value === 'object') {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted !== undefined) out[key] = converted;
    }
    return out;
  }
  return undefined;
}
