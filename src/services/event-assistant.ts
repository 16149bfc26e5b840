// src/services/event-assistant.ts
// Query orchestration: intent -> (curated collection | filters -> retrieval -> rerank
// -> aggregation) -> answer. Every stage reports a Result; the degraded value for a
// failed stage is chosen here and nowhere else.

import type { ConversationSession } from '@/memory/sessionMemory';
import type { CatalogStore, CollectionEntry } from '@/services/catalog/catalog-store';
import { clamp01 } from '@/services/retrieval-vector-utils';
import { isCuratedIntent, type CuratedIntent, type QueryAnswer, type ResultGroup } from '@/types/core';
import type { Result } from '@/types/result';
import { QueryCancelledError, throwIfAborted } from '@/utils/errors';
import { errMessage, logger } from '@/utils/logger';
import { FALLBACK_ANSWER, NO_MATCH_MESSAGE, type AnswerSynthesizer } from './answer-synthesizer';
import type { CandidateRetriever } from './candidate-retriever';
import type { FilterExtractor } from './filter-extraction';
import type { IntentClassifier } from './intent-classifier';
import type { Reranker } from './rerank';
import { aggregateResults, type Aggregatable } from './result-aggregator';

export interface EventAssistantDeps {
  store: CatalogStore;
  intentClassifier: IntentClassifier;
  filterExtractor: FilterExtractor;
  retriever: CandidateRetriever;
  reranker: Reranker;
  synthesizer: AnswerSynthesizer;
}

export interface EventAssistantOptions {
  maxResults: number;
  collectionLimit: number;
}

export interface AnswerQueryOptions {
  signal?: AbortSignal;
}

/** Rank 1 scores 1.0, each further rank 0.1 less, floored at 0. */
export function curatedScore(rank: number): number {
  return clamp01(1 - 0.1 * (rank - 1));
}

function toCuratedCandidate(entry: CollectionEntry): Aggregatable {
  return {
    score: curatedScore(entry.rank),
    summary: entry.summary,
    details: entry.details,
    ...(entry.reason ? { reason: entry.reason } : {}),
  };
}

export class EventAssistant {
  constructor(
    private readonly deps: EventAssistantDeps,
    private readonly options: EventAssistantOptions,
  ) {}

  /**
   * Never rejects for backend failures; rejects with QueryCancelledError when
   * `signal` aborts, discarding partial work.
   */
  async answerQuery(query: string, session: ConversationSession, opts: AnswerQueryOptions = {}): Promise<QueryAnswer> {
    return session.runExclusive(() => this.run(query.trim(), session, opts.signal));
  }

  /** Members of a curated collection, best rank first. Unknown tags and store failures give []. */
  async getCuratedCollection(tag: string): Promise<ResultGroup[]> {
    if (!isCuratedIntent(tag)) return [];
    return this.fetchCollection(tag);
  }

  private async run(query: string, session: ConversationSession, signal?: AbortSignal): Promise<QueryAnswer> {
    if (!query) {
      return { intent: 'search', filters: {}, answer: NO_MATCH_MESSAGE, results: [] };
    }
    throwIfAborted(signal);
    const startedAt = Date.now();

    const intent = this.settle(await this.deps.intentClassifier.classify(query, signal), 'search', signal);

    if (isCuratedIntent(intent)) {
      const curated = await this.fetchCollection(intent);
      throwIfAborted(signal);
      if (curated.length) {
        const answer = this.settle(
          await this.deps.synthesizer.synthesize(query, curated, session, signal),
          FALLBACK_ANSWER,
          signal,
        );
        logger.info('assistant:curated', { intent, results: curated.length, ms: Date.now() - startedAt });
        return { intent, filters: {}, answer, results: curated };
      }
      logger.info('assistant:empty_collection', { intent });
    }

    const filters = this.settle(await this.deps.filterExtractor.extract(query, signal), {}, signal);
    const candidates = this.settle(await this.deps.retriever.retrieve(query, filters, signal), [], signal);
    const reranked = this.settle(await this.deps.reranker.rerank(query, candidates, signal), candidates, signal);
    const results = aggregateResults(reranked, this.options.maxResults);
    const answer = this.settle(
      await this.deps.synthesizer.synthesize(query, results, session, signal),
      FALLBACK_ANSWER,
      signal,
    );

    logger.info('assistant:search', {
      filters,
      candidates: candidates.length,
      reranked: reranked.length,
      results: results.length,
      ms: Date.now() - startedAt,
    });
    return { intent: 'search', filters, answer, results };
  }

  private async fetchCollection(tag: CuratedIntent): Promise<ResultGroup[]> {
    try {
      const entries = await this.deps.store.getCollection(tag, this.options.collectionLimit);
      return aggregateResults(entries.map(toCuratedCandidate), this.options.maxResults);
    } catch (err) {
      logger.warn('assistant:degraded', { stage: 'collection', kind: 'store_unavailable', message: errMessage(err) });
      return [];
    }
  }

  /** Unwrap a stage result, substituting `fallback` on failure. Cancellation always propagates. */
  private settle<T>(res: Result<T>, fallback: T, signal?: AbortSignal): T {
    if (!res.ok && res.error.kind === 'cancelled') throw new QueryCancelledError();
    throwIfAborted(signal);
    if (res.ok) return res.value;
    logger.warn('assistant:degraded', { stage: res.error.stage, kind: res.error.kind, message: res.error.message });
    return fallback;
  }
}
