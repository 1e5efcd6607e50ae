/**
 * Sidecar Types
 *
 * Static view of the JSON document stored next to every gallery image.
 * The field set itself is owned by schema/image-sidecar.schema.json; these
 * types describe the fields the pipeline reads and writes directly.
 */

/* ------------------------------------------------------------------ */
/*  JSON                                                               */
/* ------------------------------------------------------------------ */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/* ------------------------------------------------------------------ */
/*  Enrichment attempt                                                 */
/* ------------------------------------------------------------------ */

export type EnrichmentStatus =
  | 'success'
  | 'skipped_no_api_key'
  | 'error_image_encoding'
  | 'error_http'
  | 'error_parse'
  | 'no_json';

/** Text fields the enrichment client may be asked to fill */
export type EnrichableField = 'title' | 'description' | 'caption' | 'author' | 'tags';

export const ENRICHABLE_FIELDS: readonly EnrichableField[] = ['title', 'description', 'caption', 'author', 'tags'];

/** Replaced wholesale on every enrichment attempt */
export type AiDetails = {
  provider: string;
  model: string;
  prompt: string;
  response_id: string;
  finish_reason: string;
  /** Provider-side creation time (seconds) */
  created: number;
  /** Local attempt time (seconds) */
  attempted_at: number;
  status: EnrichmentStatus | '';
  http_status: number;
  error: string;
  error_body: string;
  raw_response: JsonObject;
};

/* ------------------------------------------------------------------ */
/*  Sidecar record                                                     */
/* ------------------------------------------------------------------ */

export type SidecarRecord = {
  [key: string]: JsonValue | undefined;
  title: string;
  description: string;
  caption?: string;
  author?: string;
  copyright?: string;
  tags?: string[];
  reviewed: boolean;
  ai_generated: boolean;
  ai_details: AiDetails;
  /** Seconds since epoch, set once */
  detected_at: number;
};

/** Fields an administrator may edit from the review screen */
export interface MetadataEdits {
  title?: string;
  description?: string;
  caption?: string;
  author?: string;
  copyright?: string;
  tags?: string[] | string;
}
