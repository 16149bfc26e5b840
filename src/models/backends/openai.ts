/**
 * OpenAIModelBackend: chat completions + embeddings through the OpenAI SDK.
 * Timeouts and the retry budget are enforced by the SDK client itself.
 */

import OpenAI, { APIConnectionTimeoutError, APIUserAbortError } from 'openai';
import BaseModelBackend from '../base/backend';
import { ModelBackendError } from '@/utils/errors';
import type { EmbedOptions, Embedding, GenerateOptions } from '../types';

export interface OpenAIBackendConfig {
  apiKey: string;
  chatModel: string; // e.g. 'gpt-4o-mini', 'gpt-4.1-mini'
  embeddingModel: string; // e.g. 'text-embedding-3-small'
  timeoutMs: number;
  maxRetries: number;
  baseURL?: string;
  maxTokens?: number;
}

const SYSTEM_TEXT = 'You are a helpful assistant for discovering cultural events.';
const SYSTEM_JSON = 'You are a JSON-only classifier/extractor.';

class OpenAIModelBackend extends BaseModelBackend<OpenAIBackendConfig> {
  private readonly client: OpenAI;

  constructor(name: string, config: OpenAIBackendConfig, client?: OpenAI) {
    super(name, config);
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        timeout: config.timeoutMs,
        maxRetries: config.maxRetries,
      });
  }

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    return this.complete(SYSTEM_TEXT, prompt, false, {
      ...options,
      temperature: options?.temperature ?? 0.7,
    });
  }

  protected async generateJsonText(prompt: string, options?: GenerateOptions): Promise<string> {
    return this.complete(SYSTEM_JSON, prompt, true, options);
  }

  async embed(text: string, options?: EmbedOptions): Promise<Embedding> {
    try {
      const res = await this.client.embeddings.create(
        { model: this.config.embeddingModel, input: text },
        { signal: options?.signal },
      );
      const vector = res.data[0]?.embedding;
      if (!vector || vector.length === 0) {
        throw new ModelBackendError('malformed_response', 'Empty embedding returned', this.name);
      }
      return vector;
    } catch (err) {
      throw this.wrapError(err);
    }
  }

  private async complete(
    system: string,
    prompt: string,
    json: boolean,
    options?: GenerateOptions,
  ): Promise<string> {
    try {
      const res = await this.client.chat.completions.create(
        {
          model: this.config.chatModel,
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: prompt },
          ],
          temperature: options?.temperature,
          max_tokens: options?.maxTokens ?? this.config.maxTokens ?? 800,
          ...(json ? { response_format: { type: 'json_object' as const } } : {}),
        },
        { signal: options?.signal },
      );
      return res.choices[0]?.message?.content ?? '';
    } catch (err) {
      throw this.wrapError(err);
    }
  }

  private wrapError(err: unknown): ModelBackendError {
    if (err instanceof ModelBackendError) return err;
    if (err instanceof APIUserAbortError) {
      return new ModelBackendError('cancelled', 'Request aborted', this.name, { cause: err });
    }
    if (err instanceof APIConnectionTimeoutError) {
      return new ModelBackendError('timeout', `Request timed out after ${this.config.timeoutMs}ms`, this.name, {
        cause: err,
      });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new ModelBackendError('backend_unavailable', message, this.name, { cause: err });
  }
}

export default OpenAIModelBackend;
