// src/services/intent-classifier.ts
// Route a query either to a curated collection or to full hybrid search.
import { z } from 'zod';
import type { ModelBackend } from '@/models/base/backend';
import { INTENTS, type Intent } from '@/types/core';
import { fail, ok, type Result } from '@/types/result';
import { toRetrievalError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { foldedTokens } from '@/utils/text';

export const IntentSchema = z.object({
  intent: z.enum(INTENTS),
  confidence: z.number().min(0).max(1).optional(),
  reasoning: z.string().optional(),
});

// Specific subjects or places that a curated bucket cannot honor.
const SPECIFIC_SUBJECT_KEYWORDS = [
  'istanbul',
  'ankara',
  'tl',
  'concert',
  'jazz',
  'workshop',
  'atolye',
  'sinema',
  'tiyatro',
] as const;

/** True when the query names a city, a price in TL or a concrete genre/format. */
export function mentionsSpecificSubject(query: string): boolean {
  if (/\d\s*(tl|₺)/i.test(query)) return true;
  const tokens = foldedTokens(query);
  return SPECIFIC_SUBJECT_KEYWORDS.some((kw) =>
    tokens.some((t) => t === kw || (kw.length > 3 && t.startsWith(kw))),
  );
}

function buildPrompt(query: string): string {
  return `You are an intent classifier for an event-discovery assistant.

Curated categories:
- best-value: the user only asks for something cheap, free or good value.
- date-night: the user only asks for something romantic or for a couple.
- this-weekend: the user only asks what is on this weekend (friday, saturday, sunday).
- hidden-gems: the user only asks for something hidden, secret, niche or underground.
- search: EVERYTHING ELSE.

Rules:
- A query naming a specific genre, artist, venue, city or topic (jazz, kids, workshops, atölye, stand-up...) is "search",
  even if it also mentions price, romance or the weekend.
- General questions and vibes ("something dark", "what's fun") are "search".
- If in doubt, answer "search".

Query: "${query}"`;
}

export class IntentClassifier {
  constructor(private readonly backend: ModelBackend) {}

  async classify(query: string, signal?: AbortSignal): Promise<Result<Intent>> {
    try {
      const res = await this.backend.generateStructured(buildPrompt(query), IntentSchema, {
        temperature: 0.1,
        signal,
      });

      if (res.intent !== 'search' && mentionsSpecificSubject(query)) {
        logger.debug('intent:forced_search', { query, suggested: res.intent });
        return ok('search');
      }

      logger.debug('intent:classified', { intent: res.intent, confidence: res.confidence });
      return ok(res.intent);
    } catch (err) {
      return fail(toRetrievalError('intent', err));
    }
  }
}
