/**
 * Enrichment prompt text.
 *
 * Pure: the same image name, known fields and missing list always give the
 * same prompt.
 */

import { ENRICHABLE_FIELDS } from '../types/sidecar.js';
import type { EnrichableField, SidecarRecord } from '../types/sidecar.js';

type ContextField = EnrichableField | 'copyright';

const CONTEXT_FIELDS: readonly ContextField[] = [...ENRICHABLE_FIELDS, 'copyright'];

const FIELD_GUIDANCE: Record<EnrichableField, string> = {
  title: 'a short evocative title, at most 8 words, no quotes',
  description: '2-3 sentences describing subject, medium, composition and mood',
  caption: 'a one-line caption suitable for display under the artwork',
  author: 'the artist name only if it is legible in the image, otherwise an empty string',
  tags: 'a list of 3-8 lowercase keywords',
};

function knownValue(record: SidecarRecord, field: ContextField): string {
  if (field === 'tags') return (record.tags ?? []).join(', ');
  const value = record[field];
  return typeof value === 'string' ? value.trim() : '';
}

/** Missing fields in canonical order, duplicates removed */
export function orderFields(fields: readonly EnrichableField[]): EnrichableField[] {
  return ENRICHABLE_FIELDS.filter((field) => fields.includes(field));
}

export function buildPrompt(imageName: string, record: SidecarRecord, missing: readonly EnrichableField[]): string {
  const wanted = orderFields(missing);
  const lines: string[] = [
    'You are cataloguing artwork for a personal online gallery.',
    `Image file name: ${imageName}`,
  ];

  const known = CONTEXT_FIELDS.filter((field) => !wanted.some((w) => w === field))
    .map((field) => [field, knownValue(record, field)] as const)
    .filter(([, value]) => value.length > 0);
  if (known.length > 0) {
    lines.push('', 'Known details (keep consistent with these):');
    for (const [field, value] of known) lines.push(`- ${field}: ${value}`);
  }

  lines.push('', 'Fill in the following fields:');
  for (const field of wanted) lines.push(`- ${field}: ${FIELD_GUIDANCE[field]}`);

  lines.push(
    '',
    `Respond with a single JSON object containing exactly these keys: ${wanted.join(', ')}.`,
    'Do not include any other text.'
  );
  return lines.join('\n');
}
