/**
 * ModelBackend: the three-call surface every pipeline stage talks to.
 * Concrete backends are chosen by configuration at construction time.
 */

import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { safeParseJson } from '@/services/safe-parse-json';
import { ModelBackendError } from '@/utils/errors';
import type { EmbedOptions, Embedding, GenerateOptions } from '../types';

export interface ModelBackend {
  readonly name: string;

  generate(prompt: string, options?: GenerateOptions): Promise<string>;

  /**
   * Generate JSON and validate it against `schema`. Markdown fences around the
   * JSON are tolerated; anything that still fails to parse or validate raises
   * a `malformed_response` ModelBackendError.
   */
  generateStructured<T extends z.ZodTypeAny>(
    prompt: string,
    schema: T,
    options?: GenerateOptions,
  ): Promise<z.infer<T>>;

  embed(text: string, options?: EmbedOptions): Promise<Embedding>;
}

/**
 * Shared structured-generation logic. Subclasses only provide raw text calls
 * (plain and JSON-mode) and embeddings.
 */
abstract class BaseModelBackend<CONFIG> implements ModelBackend {
  constructor(
    readonly name: string,
    protected readonly config: CONFIG,
  ) {}

  abstract generate(prompt: string, options?: GenerateOptions): Promise<string>;

  abstract embed(text: string, options?: EmbedOptions): Promise<Embedding>;

  /** Same as generate, with the provider's JSON output mode switched on. */
  protected abstract generateJsonText(prompt: string, options?: GenerateOptions): Promise<string>;

  async generateStructured<T extends z.ZodTypeAny>(
    prompt: string,
    schema: T,
    options?: GenerateOptions,
  ): Promise<z.infer<T>> {
    const jsonSchema = zodToJsonSchema(schema, { $refStrategy: 'none' });
    const fullPrompt = [
      prompt.trim(),
      '',
      'Respond ONLY with a JSON object matching this JSON schema (no markdown, no prose):',
      JSON.stringify(jsonSchema),
    ].join('\n');

    const raw = await this.generateJsonText(fullPrompt, {
      ...options,
      temperature: options?.temperature ?? 0.3,
    });

    const parsed = safeParseJson(raw, `${this.name}:structured`);
    if (parsed === null) {
      throw new ModelBackendError('malformed_response', 'Response is not valid JSON', this.name);
    }

    const validated = schema.safeParse(parsed);
    if (!validated.success) {
      throw new ModelBackendError(
        'malformed_response',
        `Response does not match schema: ${validated.error.issues.map((i) => i.message).join('; ')}`,
        this.name,
      );
    }
    return validated.data;
  }
}

export default BaseModelBackend;
