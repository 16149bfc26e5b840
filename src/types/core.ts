// Shared domain types for the retrieval pipeline.

export const CURATED_INTENTS = ['best-value', 'date-night', 'hidden-gems', 'this-weekend'] as const;

export const INTENTS = [...CURATED_INTENTS, 'search'] as const;

export type CuratedIntent = (typeof CURATED_INTENTS)[number];
export type Intent = (typeof INTENTS)[number];

export function isCuratedIntent(value: string): value is CuratedIntent {
  return CURATED_INTENTS.some((intent) => intent === value);
}

/** Dates are calendar days, `YYYY-MM-DD`. */
export interface DateRange {
  start?: string;
  end?: string;
}

/** Hard constraints pulled out of the query. An absent field does not constrain. */
export interface Filters {
  maxPrice?: number;
  city?: string;
  category?: string;
  genre?: string;
  duration?: string;
  dateRange?: DateRange;
}

/** Lightweight projection of a stored AI summary. */
export interface CandidateSummary {
  eventUuid: string;
  sentimentSummary: string;
  embedding?: number[];
}

export interface EventDetails {
  uuid: string;
  title: string;
  venue: string;
  date: string | null;
  price: number | null;
  city: string | null;
  genre: string | null;
  duration: string | null;
  category: string | null;
}

export interface ScoredCandidate {
  /** In [0, 1]. */
  score: number;
  summary: CandidateSummary;
  details: EventDetails;
}

/** One logical event across all of its scheduled occurrences. */
export interface ResultGroup extends ScoredCandidate {
  details: EventDetails & { dates: string[] };
  /** Curator's note, set on curated-collection results. */
  reason?: string;
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  text: string;
}

export interface QueryAnswer {
  intent: Intent;
  filters: Filters;
  answer: string;
  results: ResultGroup[];
}
