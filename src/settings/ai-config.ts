import { z } from 'zod';
import { cfg } from '../config.js';
import { ENRICHABLE_FIELDS } from '../types/sidecar.js';
import type { EnrichableField } from '../types/sidecar.js';
import { clamped, flag, text } from './coerce.js';

export interface AiConfig {
  enabled: boolean;
  startup_enrichment_enabled: boolean;
  startup_sidecar_enabled: boolean;
  max_workers_create_sidecars: number;
  model: string;
  temperature: number;
  max_output_tokens: number;
  fields: EnrichableField[];
}

export type AiConfigEnv = typeof cfg.ai;

const BUILTIN: AiConfig = {
  enabled: true,
  startup_enrichment_enabled: true,
  startup_sidecar_enabled: true,
  max_workers_create_sidecars: 2,
  model: 'auto',
  temperature: 0.6,
  max_output_tokens: 600,
  fields: ['title', 'description'],
};

function isEnrichableField(value: string): value is EnrichableField {
  return ENRICHABLE_FIELDS.some((field) => field === value);
}

/** Comma-separated text or a list; unknown names dropped, canonical order */
export function parseFields(value: string | unknown[]): EnrichableField[] {
  const items: unknown[] = typeof value === 'string' ? value.split(',') : value;
  const names = items
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim().toLowerCase())
    .filter(isEnrichableField);
  return ENRICHABLE_FIELDS.filter((field) => names.includes(field));
}

function fieldList(fallback: EnrichableField[]) {
  return z
    .union([z.string(), z.array(z.unknown())])
    .transform((value) => {
      const fields = parseFields(value);
      return fields.length > 0 ? fields : [...fallback];
    })
    .catch(() => [...fallback]);
}

function schemaWith(fallback: AiConfig) {
  return z.object({
    enabled: flag(fallback.enabled),
    startup_enrichment_enabled: flag(fallback.startup_enrichment_enabled),
    startup_sidecar_enabled: flag(fallback.startup_sidecar_enabled),
    max_workers_create_sidecars: clamped(fallback.max_workers_create_sidecars, 1, 16, true),
    model: text(fallback.model),
    temperature: clamped(fallback.temperature, 0, 2),
    max_output_tokens: clamped(fallback.max_output_tokens, 16, 4000, true),
    fields: fieldList(fallback.fields),
  });
}

/**
 * Sanitizer for the persisted AI configuration. Defaults come from the
 * environment, themselves sanitized against the built-in values.
 */
export function aiConfigSchema(env: Partial<AiConfigEnv> = cfg.ai) {
  return schemaWith(schemaWith(BUILTIN).parse(env));
}
