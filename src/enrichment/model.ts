import { cfg } from '../config.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';

/**
 * `auto` (or blank) defers to OPENAI_MODEL, then the built-in default.
 */
export function resolveModel(configured: string, envModel: string = cfg.openai.model): string {
  const explicit = configured.trim();
  if (explicit && explicit.toLowerCase() !== 'auto') return explicit;
  const fromEnv = envModel.trim();
  return fromEnv || DEFAULT_MODEL;
}

// Reasoning families reject a non-default temperature.
const NO_TEMPERATURE = /^(o\d|gpt-5)/i;

export function supportsTemperature(model: string): boolean {
  return !NO_TEMPERATURE.test(model.trim());
}
