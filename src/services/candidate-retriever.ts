// Hybrid candidate retrieval: exact filters narrow the eligible set, vector similarity
// ranks inside it. When the vector index yields nothing the summaries are scanned in memory.
import type { RetrievalConfig } from '@/config/app.config';
import type { ModelBackend } from '@/models/base/backend';
import type { Embedding } from '@/models/types';
import type { CatalogStore, EventPredicate, VectorHit } from '@/services/catalog/catalog-store';
import { buildEventPredicate, matchesPredicate } from '@/services/catalog/event-predicate';
import { clamp01, cosineSimilarity } from '@/services/retrieval-vector-utils';
import type { CandidateSummary, Filters, ScoredCandidate } from '@/types/core';
import { fail, ok, type Result } from '@/types/result';
import { QueryCancelledError, toRetrievalError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export interface ScoredSummary {
  summary: CandidateSummary;
  score: number;
}

/** null means "no filter was set", which is not the same as an empty eligible set. */
type EligibleSet = Set<string> | null;

function isEligible(eventUuid: string, eligible: EligibleSet): boolean {
  return eligible === null || eligible.has(eventUuid);
}

/** Keep the best-scoring entry per event, highest score first. */
function rankUnique(items: ScoredSummary[]): ScoredSummary[] {
  const best = new Map<string, ScoredSummary>();
  for (const item of items) {
    const existing = best.get(item.summary.eventUuid);
    if (!existing || item.score > existing.score) best.set(item.summary.eventUuid, item);
  }
  return [...best.values()].sort((a, b) => b.score - a.score);
}

export function intersectHits(hits: VectorHit[], eligible: EligibleSet): ScoredSummary[] {
  return hits
    .filter((hit) => isEligible(hit.summary.eventUuid, eligible))
    .map((hit) => ({ summary: hit.summary, score: clamp01(hit.score) }));
}

/** Brute-force cosine scan; keeps summaries strictly above `floor`. */
export function scanSummaries(
  summaries: CandidateSummary[],
  vector: Embedding,
  floor: number,
  eligible: EligibleSet,
): ScoredSummary[] {
  const out: ScoredSummary[] = [];
  for (const summary of summaries) {
    if (!summary.embedding || !isEligible(summary.eventUuid, eligible)) continue;
    const similarity = cosineSimilarity(vector, summary.embedding);
    if (similarity > floor) out.push({ summary, score: clamp01(similarity) });
  }
  return out;
}

export class CandidateRetriever {
  constructor(
    private readonly store: CatalogStore,
    private readonly embedder: ModelBackend,
    private readonly options: RetrievalConfig,
  ) {}

  async retrieve(query: string, filters: Filters, signal?: AbortSignal): Promise<Result<ScoredCandidate[]>> {
    const predicate = buildEventPredicate(filters);

    // Independent round-trips; issued together.
    const [eligibleRes, vectorRes] = await Promise.all([
      this.eligibleSet(predicate),
      this.embedQuery(query, signal),
    ]);
    if (signal?.aborted) return this.cancelled();
    if (!eligibleRes.ok) return eligibleRes;
    const eligible = eligibleRes.value;
    if (eligible !== null && eligible.size === 0) {
      logger.info('retrieval:no_eligible_events', { predicate });
      return ok([]);
    }
    if (!vectorRes.ok) return vectorRes;
    const vector = vectorRes.value;

    try {
      let ranked = rankUnique(await this.primary(vector, eligible));
      if (ranked.length === 0) {
        logger.info('retrieval:fallback_scan', { eligible: eligible?.size ?? 'all' });
        ranked = rankUnique(await this.fallback(vector, eligible));
      }
      if (signal?.aborted) return this.cancelled();

      const top = ranked.slice(0, this.options.maxCandidates);
      const candidates = await this.attachDetails(top, predicate);
      if (signal?.aborted) return this.cancelled();

      logger.debug('retrieval:candidates', { count: candidates.length, filtered: predicate.length > 0 });
      return ok(candidates);
    } catch (err) {
      return fail(toRetrievalError('retrieval', err));
    }
  }

  private async eligibleSet(predicate: EventPredicate): Promise<Result<EligibleSet>> {
    if (predicate.length === 0) return ok(null);
    try {
      return ok(new Set(await this.store.findEventIds(predicate)));
    } catch (err) {
      return fail(toRetrievalError('retrieval', err));
    }
  }

  private async embedQuery(query: string, signal?: AbortSignal): Promise<Result<Embedding>> {
    try {
      return ok(await this.embedder.embed(query, { signal }));
    } catch (err) {
      return fail(toRetrievalError('retrieval', err));
    }
  }

  private async primary(vector: Embedding, eligible: EligibleSet): Promise<ScoredSummary[]> {
    const { vectorIndexLabel, vectorIndexProperty, vectorTopK } = this.options;
    const hits = await this.store.vectorQuery(vectorIndexLabel, vectorIndexProperty, vectorTopK, vector);
    return intersectHits(hits, eligible);
  }

  private async fallback(vector: Embedding, eligible: EligibleSet): Promise<ScoredSummary[]> {
    const summaries = await this.store.getAllSummaries(this.options.fallbackScanLimit);
    return scanSummaries(summaries, vector, this.options.similarityFloor, eligible);
  }

  /**
   * Fetch details in fixed-size batches, preserving rank order. Candidates whose
   * event is gone or whose details no longer satisfy the filters are dropped.
   */
  private async attachDetails(ranked: ScoredSummary[], predicate: EventPredicate): Promise<ScoredCandidate[]> {
    const BATCH_SIZE = Math.max(1, this.options.detailFetchConcurrency);
    const out: ScoredCandidate[] = [];

    for (let i = 0; i < ranked.length; i += BATCH_SIZE) {
      const batch = ranked.slice(i, i + BATCH_SIZE);
      const details = await Promise.all(batch.map((c) => this.store.getEventDetails(c.summary.eventUuid)));
      batch.forEach((c, j) => {
        const d = details[j];
        if (!d) {
          logger.debug('retrieval:missing_details', { eventUuid: c.summary.eventUuid });
          return;
        }
        if (!matchesPredicate(d, predicate)) {
          logger.warn('retrieval:filter_mismatch', { eventUuid: c.summary.eventUuid });
          return;
        }
        out.push({ score: c.score, summary: c.summary, details: d });
      });
    }
    return out;
  }

  private cancelled(): Result<never> {
    return fail(toRetrievalError('retrieval', new QueryCancelledError()));
  }
}
