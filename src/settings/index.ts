import path from 'path';
import type { EnrichmentSettings } from '../enrichment/client.js';
import type { EnrichableField } from '../types/sidecar.js';
import { advancedConfigSchema } from './advanced-config.js';
import type { AdvancedConfig, AdvancedConfigEnv } from './advanced-config.js';
import { aiConfigSchema } from './ai-config.js';
import type { AiConfig, AiConfigEnv } from './ai-config.js';
import { ConfigStore } from './config-store.js';

export type { AiConfig } from './ai-config.js';
export type { AdvancedConfig } from './advanced-config.js';

export interface SettingsSnapshot {
  ai: AiConfig;
  advanced: AdvancedConfig;
}

export interface SettingsOptions {
  aiEnv?: Partial<AiConfigEnv>;
  advancedEnv?: Partial<AdvancedConfigEnv>;
}

export const AI_CONFIG_FILE = 'ai_config.json';
export const ADVANCED_CONFIG_FILE = 'advanced_config.json';

export class AppSettings {
  readonly ai: ConfigStore<AiConfig>;
  readonly advanced: ConfigStore<AdvancedConfig>;

  constructor(dataDir: string, options: SettingsOptions = {}) {
    const aiSchema = aiConfigSchema(options.aiEnv);
    const advancedSchema = advancedConfigSchema(options.advancedEnv);
    this.ai = new ConfigStore<AiConfig>(path.join(dataDir, AI_CONFIG_FILE), (input) => aiSchema.parse(input), 'AI');
    this.advanced = new ConfigStore<AdvancedConfig>(
      path.join(dataDir, ADVANCED_CONFIG_FILE),
      (input) => advancedSchema.parse(input),
      'advanced'
    );
  }

  async load(): Promise<SettingsSnapshot> {
    const [ai, advanced] = await Promise.all([this.ai.load(), this.advanced.load()]);
    return { ai, advanced };
  }

  snapshot(): SettingsSnapshot {
    return { ai: this.ai.get(), advanced: this.advanced.get() };
  }

  async update(patch: { ai?: unknown; advanced?: unknown }): Promise<SettingsSnapshot> {
    if (patch.ai !== undefined) await this.ai.update(patch.ai);
    if (patch.advanced !== undefined) await this.advanced.update(patch.advanced);
    return this.snapshot();
  }

  async reset(): Promise<SettingsSnapshot> {
    await this.ai.reset();
    await this.advanced.reset();
    return this.snapshot();
  }

  enrichmentTargets(): EnrichableField[] {
    return this.ai.get().fields;
  }

  enrichmentSettings(): EnrichmentSettings {
    const ai = this.ai.get();
    const advanced = this.advanced.get();
    return {
      model: ai.model,
      temperature: ai.temperature,
      maxOutputTokens: ai.max_output_tokens,
      timeoutSeconds: advanced.request_timeout_seconds,
      imageMaxEdge: advanced.image_max_edge,
    };
  }
}
