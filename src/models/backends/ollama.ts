/**
 * OllamaModelBackend: a local Ollama server reached over its HTTP API.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import BaseModelBackend from '../base/backend';
import { ModelBackendError } from '@/utils/errors';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import type { EmbedOptions, Embedding, GenerateOptions } from '../types';

export interface OllamaBackendConfig {
  baseUrl: string;
  chatModel: string; // e.g. 'llama3.2'
  embeddingModel: string; // e.g. 'mxbai-embed-large'
  timeoutMs: number;
  maxRetries: number;
  contextSize?: number;
}

const GenerateReply = z.object({ response: z.string() });
const EmbeddingReply = z.object({ embedding: z.array(z.number()).min(1) });

class OllamaModelBackend extends BaseModelBackend<OllamaBackendConfig> {
  private readonly http: AxiosInstance;

  constructor(name: string, config: OllamaBackendConfig, http?: AxiosInstance) {
    super(name, config);
    this.http =
      http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    return this.request(prompt, false, { ...options, temperature: options?.temperature ?? 0.7 });
  }

  protected async generateJsonText(prompt: string, options?: GenerateOptions): Promise<string> {
    return this.request(prompt, true, options);
  }

  async embed(text: string, options?: EmbedOptions): Promise<Embedding> {
    const data = await this.post(
      '/api/embeddings',
      { model: this.config.embeddingModel, prompt: text },
      options?.signal,
    );
    const parsed = EmbeddingReply.safeParse(data);
    if (!parsed.success) {
      throw new ModelBackendError('malformed_response', 'Unexpected embeddings payload', this.name);
    }
    return parsed.data.embedding;
  }

  private async request(prompt: string, json: boolean, options?: GenerateOptions): Promise<string> {
    const data = await this.post(
      '/api/generate',
      {
        model: this.config.chatModel,
        prompt,
        stream: false,
        ...(json ? { format: 'json' } : {}),
        options: {
          temperature: options?.temperature,
          num_ctx: this.config.contextSize ?? 2048,
          ...(options?.maxTokens ? { num_predict: options.maxTokens } : {}),
        },
      },
      options?.signal,
    );
    const parsed = GenerateReply.safeParse(data);
    if (!parsed.success) {
      throw new ModelBackendError('malformed_response', 'Unexpected generate payload', this.name);
    }
    return parsed.data.response;
  }

  private async post(path: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    try {
      return await retryWithBackoff(
        async () => {
          const res = await this.http.post<unknown>(path, body, { signal });
          return res.data;
        },
        {
          maxRetries: this.config.maxRetries,
          shouldRetry: (err) => !axios.isCancel(err),
          signal,
        },
      );
    } catch (err) {
      throw this.wrapError(err);
    }
  }

  private wrapError(err: unknown): ModelBackendError {
    if (err instanceof ModelBackendError) return err;
    if (axios.isCancel(err)) {
      return new ModelBackendError('cancelled', 'Request aborted', this.name, { cause: err });
    }
    if (axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT')) {
      return new ModelBackendError('timeout', `Request timed out after ${this.config.timeoutMs}ms`, this.name, {
        cause: err,
      });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new ModelBackendError('backend_unavailable', `Ollama at ${this.config.baseUrl}: ${message}`, this.name, {
      cause: err,
    });
  }
}

export default OllamaModelBackend;
