import { z } from 'zod';
import { cfg } from '../config.js';
import { clamped } from './coerce.js';

export interface AdvancedConfig {
  request_timeout_seconds: number;
  poll_interval_seconds: number;
  image_max_edge: number;
  /** 0 retries failed enrichment on every pass */
  retry_failed_after_seconds: number;
}

export type AdvancedConfigEnv = typeof cfg.advanced;

const BUILTIN: AdvancedConfig = {
  request_timeout_seconds: 60,
  poll_interval_seconds: 5,
  image_max_edge: 1024,
  retry_failed_after_seconds: 0,
};

function schemaWith(fallback: AdvancedConfig) {
  return z.object({
    request_timeout_seconds: clamped(fallback.request_timeout_seconds, 5, 600),
    poll_interval_seconds: clamped(fallback.poll_interval_seconds, 1, 3600),
    image_max_edge: clamped(fallback.image_max_edge, 256, 4096, true),
    retry_failed_after_seconds: clamped(fallback.retry_failed_after_seconds, 0, 86400),
  });
}

export function advancedConfigSchema(env: Partial<AdvancedConfigEnv> = cfg.advanced) {
  return schemaWith(schemaWith(BUILTIN).parse(env));
}
