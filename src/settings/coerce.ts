import { z } from 'zod';

const TRUE_WORDS = new Set(['true', '1', 'yes', 'y', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'n', 'off']);

export function toBoolean(value: boolean | number | string): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  const lowered = value.trim().toLowerCase();
  if (TRUE_WORDS.has(lowered)) return true;
  if (FALSE_WORDS.has(lowered)) return false;
  return undefined;
}

/** Boolean from a flag-like value; anything else gives `fallback` */
export function flag(fallback: boolean) {
  return z
    .union([z.boolean(), z.number(), z.string()])
    .transform((value) => toBoolean(value) ?? fallback)
    .catch(fallback);
}

function blankToUndefined(value: unknown): unknown {
  if (value === null || typeof value === 'boolean') return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

/** Number clamped into [min, max]; blank or unparseable input gives `fallback` */
export function clamped(fallback: number, min: number, max: number, integer = false) {
  return z
    .preprocess(blankToUndefined, z.coerce.number().finite())
    .catch(fallback)
    .transform((n) => Math.min(max, Math.max(min, integer ? Math.round(n) : n)));
}

export function text(fallback: string) {
  return z
    .string()
    .transform((value) => value.trim() || fallback)
    .catch(fallback);
}
