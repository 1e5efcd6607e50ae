import 'dotenv/config';
import path from 'path';

const dataDir = process.env.DATA_DIR || '.data';

export const cfg = {
  port: Number(process.env.PORT || 8000),

  imagesDir: process.env.IMAGES_DIR || path.join('static', 'images'),
  dataDir,
  lockDir: process.env.LOCK_DIR || path.join(dataDir, 'locks'),
  schemaPath: process.env.SIDECAR_SCHEMA_PATH || path.join('schema', 'image-sidecar.schema.json'),
  publicImagePrefix: '/static/images',

  openai: {
    apiKeyFile: process.env.OPENAI_API_KEY_FILE || path.join(dataDir, 'openai_api_key.txt'),
    model: process.env.OPENAI_MODEL || '',
  },

  // Raw environment defaults; sanitized by the settings stores.
  ai: {
    enabled: process.env.AI_ENABLED ?? 'true',
    startup_enrichment_enabled: process.env.AI_STARTUP_ENRICHMENT ?? 'true',
    startup_sidecar_enabled: process.env.SIDECAR_STARTUP_CREATE ?? 'true',
    max_workers_create_sidecars: process.env.SIDECAR_MAX_WORKERS ?? '2',
    model: process.env.AI_MODEL || 'auto',
    temperature: process.env.AI_TEMPERATURE ?? '0.6',
    max_output_tokens: process.env.AI_MAX_OUTPUT_TOKENS ?? '600',
    fields: process.env.AI_FIELDS || 'title,description',
  },

  advanced: {
    request_timeout_seconds: process.env.AI_REQUEST_TIMEOUT ?? '60',
    poll_interval_seconds: process.env.WATCH_INTERVAL ?? '5',
    image_max_edge: process.env.AI_IMAGE_MAX_EDGE ?? '1024',
    retry_failed_after_seconds: process.env.AI_RETRY_AFTER ?? '0',
  },
};
