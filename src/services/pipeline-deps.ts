// Wires the assistant's stages from configuration. One instance per process.
import type { AppConfig } from '@/config/app.config';
import { createModelBackends, type ModelBackends } from '@/models/providers';
import type { CatalogStore } from '@/services/catalog/catalog-store';
import { createFalkorCatalogStore } from '@/services/catalog/falkor-catalog';
import { AnswerSynthesizer } from './answer-synthesizer';
import { CandidateRetriever } from './candidate-retriever';
import { EventAssistant } from './event-assistant';
import { FilterExtractor } from './filter-extraction';
import { IntentClassifier } from './intent-classifier';
import { Reranker } from './rerank';

export interface PipelineDeps {
  store: CatalogStore;
  backends: ModelBackends;
  assistant: EventAssistant;
}

let cachedDeps: PipelineDeps | null = null;

/** Assemble the assistant over the given collaborators. */
export function buildEventAssistant(config: AppConfig, store: CatalogStore, backends: ModelBackends): EventAssistant {
  const { fast, reasoning } = backends;
  return new EventAssistant(
    {
      store,
      intentClassifier: new IntentClassifier(fast),
      filterExtractor: new FilterExtractor(reasoning),
      retriever: new CandidateRetriever(store, fast, config.retrieval),
      reranker: new Reranker(reasoning, config.rerank),
      synthesizer: new AnswerSynthesizer(reasoning, {
        contextSize: config.answerContextSize,
        historyTurns: config.session.historyLimit,
      }),
    },
    { maxResults: config.maxResults, collectionLimit: config.collectionLimit },
  );
}

export function getPipelineDeps(config: AppConfig): PipelineDeps {
  if (cachedDeps) return cachedDeps;

  const store = createFalkorCatalogStore({
    url: config.catalog.url,
    graphName: config.catalog.graphName,
    timeoutMs: config.catalog.timeoutMs,
    embeddingProperty: config.retrieval.vectorIndexProperty,
  });
  const backends = createModelBackends(config.models);

  cachedDeps = { store, backends, assistant: buildEventAssistant(config, store, backends) };
  return cachedDeps;
}
