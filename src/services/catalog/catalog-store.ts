// CatalogStore: the event graph as seen by the retrieval engine.
import type { CandidateSummary, EventDetails } from '@/types/core';

export type TextField = 'city' | 'category' | 'genre' | 'duration';

/** One conjunct of an eligibility predicate. */
export type PredicateClause =
  | { field: 'price'; op: 'lte'; value: number }
  | { field: TextField; op: 'contains'; value: string }
  | { field: 'date'; op: 'gte' | 'lte'; value: string };

/** AND of all clauses; an empty predicate matches every event. */
export type EventPredicate = PredicateClause[];

export interface VectorHit {
  summary: CandidateSummary;
  /** Similarity in [0, 1], higher is closer. */
  score: number;
}

export interface CollectionEntry {
  rank: number;
  reason: string | null;
  summary: CandidateSummary;
  details: EventDetails;
}

export interface CatalogStore {
  /** Ids of events satisfying every clause. Throws CatalogStoreError on failure. */
  findEventIds(predicate: EventPredicate): Promise<string[]>;

  /**
   * Approximate nearest neighbours over a vector index. A missing index or any
   * failure yields [] so the caller can fall back to a scan.
   */
  vectorQuery(label: string, property: string, k: number, vector: number[]): Promise<VectorHit[]>;

  /** Bulk read of summaries carrying an embedding, for the in-memory fallback scan. */
  getAllSummaries(limit: number): Promise<CandidateSummary[]>;

  getEventDetails(uuid: string): Promise<EventDetails | null>;

  /** Members of a curated collection ordered by rank ascending. */
  getCollection(tag: string, limit: number): Promise<CollectionEntry[]>;

  close(): Promise<void>;
}
