/**
 * Enrichment Client
 *
 * Fills blank text fields of a sidecar from a vision-capable chat
 * completion. Every attempt, whatever its outcome, replaces `ai_details`
 * on the returned record; nothing here throws to the caller.
 */

import type OpenAI from 'openai';
import { createOpenAIClient } from '../lib/openai.js';
import type { CompletionsClientFactory } from '../lib/openai.js';
import { errorMessage } from '../lib/errors.js';
import { normalizeTags } from '../sidecar/schema.js';
import { emptyAiDetails, toJsonValue } from '../sidecar/record.js';
import { nowSeconds } from '../sidecar/store.js';
import { isJsonObject } from '../types/sidecar.js';
import type { AiDetails, EnrichableField, EnrichmentStatus, JsonObject, SidecarRecord } from '../types/sidecar.js';
import { envCredentialSource, resolveApiKey } from './credentials.js';
import type { CredentialSource, ResolvedCredential } from './credentials.js';
import { prepareImagePayload } from './image-payload.js';
import type { ImagePayload } from './image-payload.js';
import { resolveModel, supportsTemperature } from './model.js';
import { buildPrompt, orderFields } from './prompt.js';
import { parseCompletionJson } from './parse.js';

export const PROVIDER = 'openai';

export interface EnrichmentSettings {
  model: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutSeconds: number;
  imageMaxEdge: number;
}

export interface EnrichmentRequest {
  imageName: string;
  imagePath: string;
  record: SidecarRecord;
  missing: readonly EnrichableField[];
}

export interface EnrichmentOutcome {
  status: EnrichmentStatus;
  record: SidecarRecord;
  filled: EnrichableField[];
  /** false when the record was returned untouched */
  changed: boolean;
  error?: string;
}

export interface EnrichmentDeps {
  createClient?: CompletionsClientFactory;
  credentials?: () => Promise<ResolvedCredential | null>;
  prepareImage?: (imagePath: string, maxEdge: number) => Promise<ImagePayload>;
  now?: () => number;
}

type Attempt = Omit<AiDetails, 'provider' | 'model' | 'prompt' | 'attempted_at'>;

function responseSchema(fields: readonly EnrichableField[]): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  for (const field of fields) {
    properties[field] = field === 'tags' ? { type: 'array', items: { type: 'string' } } : { type: 'string' };
  }
  return { type: 'object', properties, required: [...fields], additionalProperties: false };
}

function httpStatusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 0;
}

function errorBodyOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'error' in err && err.error !== undefined) {
    try {
      return JSON.stringify(err.error) ?? '';
    } catch {
      return String(err.error);
    }
  }
  return '';
}

function rawResponseOf(completion: OpenAI.Chat.ChatCompletion): JsonObject {
  const value = toJsonValue(completion);
  return isJsonObject(value) ? value : {};
}

export class EnrichmentClient {
  private readonly createClient: CompletionsClientFactory;
  private readonly credentials: () => Promise<ResolvedCredential | null>;
  private readonly prepareImage: (imagePath: string, maxEdge: number) => Promise<ImagePayload>;
  private readonly now: () => number;
  private warnedNoKey = false;

  constructor(deps: EnrichmentDeps = {}, source?: CredentialSource) {
    this.createClient = deps.createClient ?? createOpenAIClient;
    this.credentials = deps.credentials ?? (() => resolveApiKey(source ?? envCredentialSource()));
    this.prepareImage = deps.prepareImage ?? prepareImagePayload;
    this.now = deps.now ?? nowSeconds;
  }

  async enrich(request: EnrichmentRequest, settings: EnrichmentSettings): Promise<EnrichmentOutcome> {
    const { imageName, imagePath, record } = request;
    const missing = orderFields(request.missing);
    const model = resolveModel(settings.model);
    const prompt = buildPrompt(imageName, record, missing);

    const finish = (attempt: Attempt, filled: EnrichableField[] = [], data: Partial<SidecarRecord> = {}): EnrichmentOutcome => {
      const next: SidecarRecord = {
        ...record,
        ...data,
        ai_details: { ...attempt, provider: PROVIDER, model, prompt, attempted_at: this.now() },
      };
      if (filled.length > 0) next.ai_generated = true;
      return {
        status: attempt.status || 'success',
        record: next,
        filled,
        changed: true,
        error: attempt.error || undefined,
      };
    };
    const failure = (status: EnrichmentStatus, error: string, extra: Partial<Attempt> = {}): EnrichmentOutcome =>
      finish({ ...emptyAiDetails(), ...extra, status, error });

    const credential = await this.credentials();
    if (!credential) {
      if (!this.warnedNoKey) {
        console.log('[enrichment] No API key configured; enrichment skipped');
        this.warnedNoKey = true;
      }
      // Already recorded: leave the sidecar alone so polling does not rewrite it.
      if (record.ai_details.status === 'skipped_no_api_key') {
        return { status: 'skipped_no_api_key', record, filled: [], changed: false };
      }
      return failure('skipped_no_api_key', 'No API key configured');
    }

    let payload: ImagePayload;
    try {
      payload = await this.prepareImage(imagePath, settings.imageMaxEdge);
    } catch (err) {
      console.warn(`[enrichment] Could not prepare ${imageName}:`, errorMessage(err));
      return failure('error_image_encoding', errorMessage(err));
    }

    const body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: prompt },
            { type: 'image_url', image_url: { url: payload.dataUrl } },
          ],
        },
      ],
      response_format: {
        type: 'json_schema',
        json_schema: { name: 'artwork_metadata', strict: true, schema: responseSchema(missing) },
      },
      max_completion_tokens: settings.maxOutputTokens,
    };
    if (supportsTemperature(model)) body.temperature = settings.temperature;

    const timeoutMs = settings.timeoutSeconds * 1000;
    let completion: OpenAI.Chat.ChatCompletion;
    try {
      const client = this.createClient(credential.apiKey, timeoutMs);
      completion = await client.chat.completions.create(body, { timeout: timeoutMs });
    } catch (err) {
      const status = httpStatusOf(err);
      console.warn(`[enrichment] Request for ${imageName} failed${status ? ` (HTTP ${status})` : ''}:`, errorMessage(err));
      return failure('error_http', errorMessage(err), { http_status: status, error_body: errorBodyOf(err) });
    }

    const choice = completion.choices[0];
    const common = {
      response_id: completion.id,
      finish_reason: choice?.finish_reason ?? '',
      created: completion.created,
      http_status: 200,
      raw_response: rawResponseOf(completion),
    };

    const parsed = parseCompletionJson(choice?.message?.content ?? '');
    if (parsed.kind === 'invalid') {
      console.warn(`[enrichment] Unparseable response for ${imageName}: ${parsed.error}`);
      return failure('error_parse', parsed.error, common);
    }
    if (parsed.kind === 'not_object') {
      console.warn(`[enrichment] Response for ${imageName} is JSON but not an object`);
      return failure('no_json', 'Response JSON is not an object', common);
    }

    const data: Partial<SidecarRecord> = {};
    const filled: EnrichableField[] = [];
    for (const field of missing) {
      const value = parsed.data[field];
      if (field === 'tags') {
        const tags = normalizeTags(value);
        if (tags.length > 0) {
          data.tags = tags;
          filled.push(field);
        }
      } else if (typeof value === 'string' && value.trim()) {
        data[field] = value.trim();
        filled.push(field);
      }
    }

    console.log(`[enrichment] ${imageName}: filled ${filled.length ? filled.join(', ') : 'nothing'} (${model})`);
    return finish({ ...emptyAiDetails(), ...common, status: 'success', error: '' }, filled, data);
  }
}
