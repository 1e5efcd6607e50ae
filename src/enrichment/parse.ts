/**
 * Lenient JSON extraction from a completion body.
 */

import { isJsonObject } from '../types/sidecar.js';
import type { JsonObject } from '../types/sidecar.js';
import { toJsonValue } from '../sidecar/record.js';

export type ParsedCompletion =
  | { kind: 'object'; data: JsonObject }
  | { kind: 'not_object'; data: unknown }
  | { kind: 'invalid'; error: string };

export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```[a-z0-9_-]*[ \t]*\r?\n?/i, '')
    .replace(/\r?\n?```$/, '')
    .trim();
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * First balanced `{...}` span that parses as an object. Braces inside
 * string literals are ignored.
 */
export function findJsonObject(text: string): JsonObject | null {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    let depth = 0;
    let inString = false;
    let escaped = false;
    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === '{') depth++;
      else if (ch === '}') {
        depth--;
        if (depth === 0) {
          const parsed = tryParse(text.slice(start, i + 1));
          if (parsed.ok) {
            const value = toJsonValue(parsed.value);
            if (isJsonObject(value)) return value;
          }
          break;
        }
      }
    }
  }
  return null;
}

export function parseCompletionJson(text: string): ParsedCompletion {
  const cleaned = stripCodeFences(text);
  const direct = tryParse(cleaned);
  if (direct.ok) {
    const value = toJsonValue(direct.value);
    if (isJsonObject(value)) return { kind: 'object', data: value };
  }

  const embedded = findJsonObject(cleaned);
  if (embedded) return { kind: 'object', data: embedded };

  if (direct.ok) return { kind: 'not_object', data: direct.value };
  return { kind: 'invalid', error: cleaned ? `No JSON object in response: ${direct.error}` : 'Empty response' };
}
