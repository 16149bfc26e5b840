// src/services/rerank.ts

import { z } from 'zod';
import type { RerankConfig } from '@/config/app.config';
import type { ModelBackend } from '@/models/base/backend';
import type { ScoredCandidate } from '@/types/core';
import { fail, ok, type Result } from '@/types/result';
import { toRetrievalError } from '@/utils/errors';
import { logger } from '@/utils/logger';

const SUMMARY_PREVIEW_CHARS = 300;

// JSON mode wants an object; a bare array is still accepted.
export const JudgeSchema = z.preprocess(
  (value) => (Array.isArray(value) ? { results: value } : value),
  z.object({
    results: z.array(z.object({ id: z.number(), score: z.number() })),
  }),
);

export type JudgeVerdict = z.infer<typeof JudgeSchema>;

function buildPrompt(query: string, candidates: ScoredCandidate[]): string {
  const payload = candidates.map((c, index) => ({
    index,
    title: c.details.title,
    summary: c.summary.sentimentSummary.slice(0, SUMMARY_PREVIEW_CHARS),
  }));

  return `You are judging event search results for topical relevance.

User query: "${query}"

For each event, assign a relevance score between 0 and 1. An event that is only loosely related
(similar mood, wrong topic) must score low. Drop events scoring below 0.4 and sort the rest by score, highest first.

Return { "results": [ { "id": <index>, "score": <number> }, ... ] }

Events:
${JSON.stringify(payload, null, 2)}`;
}

/**
 * Apply the judge's verdict: ids must be valid indices and scores must reach the
 * threshold; the first verdict for an index wins. Sorted by judge score, ties in
 * original order.
 */
export function applyVerdict(
  candidates: ScoredCandidate[],
  verdict: JudgeVerdict,
  threshold: number,
): ScoredCandidate[] {
  const accepted = new Map<number, number>();
  for (const { id, score } of verdict.results) {
    if (!Number.isInteger(id) || id < 0 || id >= candidates.length) continue;
    if (!Number.isFinite(score) || score < threshold || accepted.has(id)) continue;
    accepted.set(id, Math.min(1, score));
  }

  return [...accepted.entries()]
    .sort(([ia, sa], [ib, sb]) => sb - sa || ia - ib)
    .map(([id, score]) => ({ ...candidates[id], score }));
}

/**
 * LLM judge on top of retrieval scores. It filters out semantically close but
 * topically wrong candidates.
 */
export class Reranker {
  constructor(
    private readonly backend: ModelBackend,
    private readonly options: RerankConfig,
  ) {}

  async rerank(query: string, candidates: ScoredCandidate[], signal?: AbortSignal): Promise<Result<ScoredCandidate[]>> {
    if (!candidates.length) return ok([]);

    let verdict: JudgeVerdict;
    try {
      verdict = await this.backend.generateStructured(buildPrompt(query, candidates), JudgeSchema, {
        temperature: 0,
        signal,
      });
    } catch (err) {
      return fail(toRetrievalError('rerank', err));
    }

    const reranked = applyVerdict(candidates, verdict, this.options.threshold);
    if (reranked.length === 0) {
      logger.warn('rerank:judge_rejected_all', {
        candidates: candidates.length,
        keeping: Math.min(this.options.fallbackCount, candidates.length),
      });
      return ok(candidates.slice(0, this.options.fallbackCount));
    }

    logger.debug('rerank:done', { in: candidates.length, out: reranked.length });
    return ok(reranked);
  }
}
