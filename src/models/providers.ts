// Builds the two configured backends: `fast` (intent, query embedding) and
// `reasoning` (filters, rerank judge, answers).
import type { ModelConfig } from '@/config/app.config';
import type { ModelBackend } from './base/backend';
import OpenAIModelBackend from './backends/openai';
import OllamaModelBackend from './backends/ollama';

export interface ModelBackends {
  fast: ModelBackend;
  reasoning: ModelBackend;
}

function createBackend(name: string, chatModel: string, config: ModelConfig): ModelBackend {
  if (config.provider === 'ollama') {
    return new OllamaModelBackend(name, {
      baseUrl: config.ollamaBaseUrl,
      chatModel,
      embeddingModel: config.embeddingModel,
      timeoutMs: config.timeoutMs,
      maxRetries: config.maxRetries,
    });
  }

  if (!config.openaiApiKey) {
    throw new Error('Missing OPENAI_API_KEY. Set it in .env or pass it when starting the server.');
  }
  return new OpenAIModelBackend(name, {
    apiKey: config.openaiApiKey,
    chatModel,
    embeddingModel: config.embeddingModel,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
  });
}

export function createModelBackends(config: ModelConfig): ModelBackends {
  return {
    fast: createBackend('fast', config.fastModel, config),
    reasoning: createBackend('reasoning', config.reasoningModel, config),
  };
}
