/**
 * Provider credential lookup.
 *
 * Precedence: OPENAI_API_KEY, then the legacy OPENAI_KEY, then the first
 * non-empty line of a local key file.
 */

import { promises as fsp } from 'fs';
import { cfg } from '../config.js';
import { errnoCode } from '../lib/errors.js';

export interface CredentialSource {
  apiKey?: string;
  legacyApiKey?: string;
  apiKeyFile?: string;
}

export type CredentialOrigin = 'env' | 'legacy_env' | 'file';

export interface ResolvedCredential {
  apiKey: string;
  origin: CredentialOrigin;
}

/** Reads the environment at call time so a key added later is picked up */
export function envCredentialSource(env: NodeJS.ProcessEnv = process.env): CredentialSource {
  return {
    apiKey: env.OPENAI_API_KEY,
    legacyApiKey: env.OPENAI_KEY,
    apiKeyFile: env.OPENAI_API_KEY_FILE || cfg.openai.apiKeyFile,
  };
}

async function readKeyFile(file: string): Promise<string> {
  try {
    const text = await fsp.readFile(file, 'utf8');
    const line = text.split(/\r?\n/).map((l) => l.trim()).find((l) => l.length > 0 && !l.startsWith('#'));
    return line ?? '';
  } catch (err) {
    if (errnoCode(err) !== 'ENOENT') {
      console.warn(`[credentials] Could not read key file ${file}:`, err);
    }
    return '';
  }
}

export async function resolveApiKey(source: CredentialSource = envCredentialSource()): Promise<ResolvedCredential | null> {
  const primary = source.apiKey?.trim();
  if (primary) return { apiKey: primary, origin: 'env' };

  const legacy = source.legacyApiKey?.trim();
  if (legacy) return { apiKey: legacy, origin: 'legacy_env' };

  if (source.apiKeyFile) {
    const fromFile = await readKeyFile(source.apiKeyFile);
    if (fromFile) return { apiKey: fromFile, origin: 'file' };
  }
  return null;
}
