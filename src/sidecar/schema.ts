/**
 * Sidecar schema loading, default application and repair.
 *
 * The JSON Schema document is the only place the sidecar field set is
 * defined. Defaults, coercions and the closed field set are all derived
 * from it at runtime.
 */

import { readFileSync } from 'fs';
import Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { isJsonObject } from '../types/sidecar.js';
import type { JsonObject, JsonValue } from '../types/sidecar.js';

export const DETECTED_AT_KEY = 'detected_at';

export interface PropertySpec {
  type?: string;
  default?: JsonValue;
  properties?: Record<string, PropertySpec>;
  /** `items.type` for array properties */
  itemsType?: string;
}

export interface SidecarSchema {
  document: JsonObject;
  properties: Record<string, PropertySpec>;
  required: string[];
  validator: ValidateFunction;
}

export interface DefaultsOptions {
  /** Value used when `detected_at` is missing or not a positive number */
  detectedAt: number;
}

export interface ValidationReport {
  valid: boolean;
  errors: string[];
}

const TRUE_WORDS = new Set(['true', '1', 'yes', 'y', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'n', 'off', '']);
const MAX_REPAIR_PASSES = 5;

/* ------------------------------------------------------------------ */
/*  Loading                                                            */
/* ------------------------------------------------------------------ */

function parsePropertySpec(value: JsonValue | undefined): PropertySpec {
  if (!isJsonObject(value)) return {};
  const spec: PropertySpec = {};
  if (typeof value.type === 'string') spec.type = value.type;
  if ('default' in value) spec.default = value.default;
  if (isJsonObject(value.properties)) spec.properties = parseProperties(value.properties);
  if (isJsonObject(value.items) && typeof value.items.type === 'string') spec.itemsType = value.items.type;
  return spec;
}

function parseProperties(value: JsonObject): Record<string, PropertySpec> {
  const out: Record<string, PropertySpec> = {};
  for (const [key, spec] of Object.entries(value)) {
    out[key] = parsePropertySpec(spec);
  }
  return out;
}

export function buildSidecarSchema(document: JsonObject): SidecarSchema {
  if (!isJsonObject(document.properties)) {
    throw new Error('Sidecar schema has no "properties" object');
  }
  const required = Array.isArray(document.required)
    ? document.required.filter((key): key is string => typeof key === 'string')
    : [];

  const ajv = new Ajv({ allErrors: true });
  return {
    document,
    properties: parseProperties(document.properties),
    required,
    validator: ajv.compile(document),
  };
}

export function loadSidecarSchema(file: string): SidecarSchema {
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
  if (!isJsonObject(parsed)) {
    throw new Error(`Sidecar schema ${file} is not a JSON object`);
  }
  const schema = buildSidecarSchema(parsed);
  console.log(`[schema] Loaded ${Object.keys(schema.properties).length} sidecar fields from ${file}`);
  return schema;
}

/* ------------------------------------------------------------------ */
/*  Defaults and coercion                                              */
/* ------------------------------------------------------------------ */

export function defaultFor(spec: PropertySpec): JsonValue {
  if (spec.default !== undefined) {
    const value = structuredClone(spec.default);
    if (isJsonObject(value) && spec.properties) return applyPropertyDefaults(value, spec.properties);
    return value;
  }
  switch (spec.type) {
    case 'string':
      return '';
    case 'boolean':
      return false;
    case 'number':
    case 'integer':
      return 0;
    case 'array':
      return [];
    case 'object':
      return spec.properties ? applyPropertyDefaults({}, spec.properties) : {};
    default:
      return null;
  }
}

/**
 * Canonical tag list from either comma-separated text or a list
 */
export function normalizeTags(value: JsonValue | undefined): string[] {
  let items: string[] = [];
  if (typeof value === 'string') {
    items = value.split(',');
  } else if (Array.isArray(value)) {
    items = value
      .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
      .map(String);
  }
  return items.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
}

function coerceValue(value: JsonValue, spec: PropertySpec): JsonValue {
  switch (spec.type) {
    case 'string':
      if (value === null) return '';
      if (typeof value === 'number' || typeof value === 'boolean') return String(value);
      return value;
    case 'boolean':
      if (typeof value === 'number') return value !== 0;
      if (typeof value === 'string') {
        const lowered = value.trim().toLowerCase();
        if (TRUE_WORDS.has(lowered)) return true;
        if (FALSE_WORDS.has(lowered)) return false;
      }
      return value;
    case 'number':
    case 'integer':
      if (typeof value === 'string') {
        const parsed = Number.parseFloat(value);
        return Number.isFinite(parsed) ? parsed : defaultFor(spec);
      }
      return value;
    case 'array':
      return spec.itemsType === 'string' ? normalizeTags(value) : value;
    case 'object':
      if (!isJsonObject(value)) return defaultFor(spec);
      return spec.properties ? applyPropertyDefaults(value, spec.properties) : value;
    default:
      return value;
  }
}

function applyPropertyDefaults(data: JsonObject, properties: Record<string, PropertySpec>): JsonObject {
  const out: JsonObject = { ...data };
  for (const [key, spec] of Object.entries(properties)) {
    const current = out[key];
    out[key] = current === undefined ? defaultFor(spec) : coerceValue(current, spec);
  }
  return out;
}

/**
 * Fill every schema property that is missing and coerce stringly-typed
 * values. Keys the schema does not know are left for validation to report.
 */
export function applySchemaDefaults(data: JsonObject, schema: SidecarSchema, options: DefaultsOptions): JsonObject {
  const out = applyPropertyDefaults(data, schema.properties);
  if (DETECTED_AT_KEY in schema.properties) {
    const detected = out[DETECTED_AT_KEY];
    if (typeof detected !== 'number' || !Number.isFinite(detected) || detected <= 0) {
      out[DETECTED_AT_KEY] = options.detectedAt;
    }
  }
  return out;
}

/* ------------------------------------------------------------------ */
/*  Validation and repair                                              */
/* ------------------------------------------------------------------ */

function formatError(err: ErrorObject): string {
  return `${err.instancePath || '/'} ${err.message ?? err.keyword}`;
}

function conforms(data: JsonObject, schema: SidecarSchema): boolean {
  return schema.validator(data) === true;
}

export function validateSidecar(data: JsonObject, schema: SidecarSchema): ValidationReport {
  if (conforms(data, schema)) return { valid: true, errors: [] };
  return { valid: false, errors: (schema.validator.errors ?? []).map(formatError) };
}

function decodePointerSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

function resolvePath(root: JsonObject, segments: string[]): JsonValue | undefined {
  let node: JsonValue | undefined = root;
  for (const segment of segments) {
    if (!isJsonObject(node)) return undefined;
    node = node[segment];
  }
  return node;
}

function fixErrors(data: JsonObject, errors: ErrorObject[], schema: SidecarSchema): JsonObject {
  const out = structuredClone(data);
  for (const err of errors) {
    const segments = err.instancePath.split('/').slice(1).map(decodePointerSegment);

    if (err.keyword === 'additionalProperties') {
      const extra: unknown = err.params.additionalProperty;
      const target = resolvePath(out, segments);
      if (typeof extra === 'string' && isJsonObject(target)) delete target[extra];
      continue;
    }
    if (segments.length === 0) continue;

    const [top, nested] = segments;
    const spec = schema.properties[top];
    if (!spec) {
      delete out[top];
      continue;
    }
    const inner = out[top];
    const nestedSpec = nested !== undefined ? spec.properties?.[nested] : undefined;
    if (nestedSpec && isJsonObject(inner)) {
      inner[nested] = defaultFor(nestedSpec);
    } else {
      out[top] = defaultFor(spec);
    }
  }
  return out;
}

/**
 * Bring a record into schema conformance: drop unknown keys and reset
 * mistyped values to their defaults. Never fails; a record that cannot be
 * repaired field by field is rebuilt from defaults keeping `detected_at`.
 */
export function repairSidecar(data: JsonObject, schema: SidecarSchema, options: DefaultsOptions): JsonObject {
  let current = applySchemaDefaults(data, schema, options);
  for (let pass = 0; pass < MAX_REPAIR_PASSES; pass++) {
    if (conforms(current, schema)) return current;
    current = applySchemaDefaults(fixErrors(current, schema.validator.errors ?? [], schema), schema, options);
  }
  if (conforms(current, schema)) return current;

  const detected = current[DETECTED_AT_KEY];
  const rebuilt = applySchemaDefaults({}, schema, options);
  if (typeof detected === 'number' && detected > 0) rebuilt[DETECTED_AT_KEY] = detected;
  return rebuilt;
}
