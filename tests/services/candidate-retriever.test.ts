import { describe, expect, it } from 'vitest';
import type { RetrievalConfig } from '@/config/app.config';
import type { EventPredicate } from '@/services/catalog/catalog-store';
import { CandidateRetriever, scanSummaries } from '@/services/candidate-retriever';
import type { ScoredCandidate } from '@/types/core';
import { InMemoryCatalogStore, ScriptedBackend, event, summary } from '../helpers/fakes';

const CONFIG: RetrievalConfig = {
  vectorIndexLabel: 'AISummary',
  vectorIndexProperty: 'embedding_v4',
  vectorTopK: 20,
  fallbackScanLimit: 5000,
  similarityFloor: 0.3,
  maxCandidates: 20,
  detailFetchConcurrency: 2,
};

const QUERY_VECTOR = [1, 0, 0];

function fixture() {
  return {
    events: [
      event('a', { price: 300, genre: 'Jazz' }),
      event('b', { price: 800, genre: 'Jazz' }),
      event('c', { price: 100, city: 'Ankara' }),
      event('d', { price: 450, genre: 'Jazz' }),
      event('e', { price: 100 }),
    ],
    summaries: [
      summary('a', [1, 0, 0]), // 1.0
      summary('b', [0.8, 0.6, 0]), // 0.8
      summary('c', [0.5, 0.5, 0]), // ~0.707
      summary('d', [0.6, 0.8, 0]), // 0.6
      summary('e', [0, 0, 1]), // 0.0
    ],
  };
}

function setup(opts: { vectorIndex?: boolean; config?: Partial<RetrievalConfig>; store?: InMemoryCatalogStore } = {}) {
  const store = opts.store ?? new InMemoryCatalogStore({ ...fixture(), vectorIndex: opts.vectorIndex });
  const embedder = new ScriptedBackend('fast', { embed: () => QUERY_VECTOR });
  const retriever = new CandidateRetriever(store, embedder, { ...CONFIG, ...opts.config });
  return { store, embedder, retriever };
}

function ids(candidates: ScoredCandidate[]): string[] {
  return candidates.map((c) => c.details.uuid);
}

async function retrieveOk(retriever: CandidateRetriever, ...args: Parameters<CandidateRetriever['retrieve']>) {
  const res = await retriever.retrieve(...args);
  if (!res.ok) throw new Error(`retrieve failed: ${res.error.kind}`);
  return res.value;
}

describe('CandidateRetriever', () => {
  it('ranks vector hits without touching the eligibility query when no filter is set', async () => {
    const { store, retriever, embedder } = setup();
    const out = await retrieveOk(retriever, 'jazz night', {});

    expect(ids(out)).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(out[0].score).toBeCloseTo(1);
    expect(out[1].score).toBeCloseTo(0.8);
    expect(store.predicates).toEqual([]);
    expect(store.vectorQueries).toEqual([{ label: 'AISummary', property: 'embedding_v4', k: 20, vector: QUERY_VECTOR }]);
    expect(store.scans).toEqual([]);
    expect(embedder.embedded).toEqual(['jazz night']);
  });

  it('never returns an event that violates a set filter', async () => {
    const { retriever } = setup();
    const out = await retrieveOk(retriever, 'jazz', { maxPrice: 500, city: 'istanbul' });

    expect(ids(out)).toEqual(['a', 'd', 'e']);
    for (const c of out) {
      expect(c.details.price).toBeLessThanOrEqual(500);
      expect(c.details.city).toBe('Istanbul');
    }
  });

  it('short-circuits to no results when the filters match nothing', async () => {
    const { store, retriever } = setup();
    const out = await retrieveOk(retriever, 'jazz', { maxPrice: 50 });

    expect(out).toEqual([]);
    expect(store.vectorQueries).toEqual([]);
    expect(store.scans).toEqual([]);
  });

  it('falls back to an in-memory scan with the similarity floor when the index is missing', async () => {
    const { store, retriever } = setup({ vectorIndex: false });
    const out = await retrieveOk(retriever, 'jazz', {});

    expect(ids(out)).toEqual(['a', 'b', 'c', 'd']);
    expect(store.scans).toEqual([5000]);
  });

  it('applies the same eligible set on the fallback path', async () => {
    const { retriever } = setup({ vectorIndex: false });
    const out = await retrieveOk(retriever, 'jazz', { maxPrice: 500 });

    expect(ids(out)).toEqual(['a', 'c', 'd']);
  });

  it('falls back when every vector hit is ineligible', async () => {
    const { store, retriever } = setup({ config: { vectorTopK: 1 } });
    const out = await retrieveOk(retriever, 'concerts', { city: 'Ankara' });

    expect(ids(out)).toEqual(['c']);
    expect(out[0].score).toBeCloseTo(Math.SQRT1_2);
    expect(store.scans).toEqual([5000]);
  });

  it('truncates to the candidate limit', async () => {
    const { retriever } = setup({ config: { maxCandidates: 2 } });
    expect(ids(await retrieveOk(retriever, 'jazz', {}))).toEqual(['a', 'b']);
  });

  it('drops candidates whose event details are missing', async () => {
    const data = fixture();
    const store = new InMemoryCatalogStore({
      events: data.events,
      summaries: [summary('ghost', [1, 0, 0]), ...data.summaries],
    });
    const { retriever } = setup({ store });

    expect(ids(await retrieveOk(retriever, 'jazz', {}))).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('re-checks details against the filters when the eligible set is stale', async () => {
    class StaleStore extends InMemoryCatalogStore {
      override async findEventIds(predicate: EventPredicate): Promise<string[]> {
        this.predicates.push(predicate);
        return this.events.map((e) => e.uuid);
      }
    }
    const { retriever } = setup({ store: new StaleStore(fixture()) });

    expect(ids(await retrieveOk(retriever, 'jazz', { maxPrice: 500 }))).toEqual(['a', 'c', 'd', 'e']);
  });

  it('fails when the query cannot be embedded', async () => {
    const store = new InMemoryCatalogStore(fixture());
    const retriever = new CandidateRetriever(store, new ScriptedBackend('fast'), CONFIG);

    const res = await retriever.retrieve('jazz', {});
    expect(res).toMatchObject({ ok: false, error: { stage: 'retrieval', kind: 'backend_unavailable' } });
  });

  it('fails with store_unavailable when the eligibility query fails', async () => {
    const { store, retriever } = setup();
    store.failing = true;

    const res = await retriever.retrieve('jazz', { maxPrice: 500 });
    expect(res).toMatchObject({ ok: false, error: { stage: 'retrieval', kind: 'store_unavailable' } });
  });

  it('reports cancellation when the signal aborts', async () => {
    const { retriever } = setup();
    const controller = new AbortController();
    controller.abort();

    const res = await retriever.retrieve('jazz', {}, controller.signal);
    expect(res).toMatchObject({ ok: false, error: { kind: 'cancelled' } });
  });
});

describe('scanSummaries', () => {
  it('keeps only summaries strictly above the floor', () => {
    const out = scanSummaries(
      [summary('x', [1, 0]), summary('y', [0, 1]), summary('z'), summary('w', [1, 1])],
      [1, 0],
      0.3,
      null,
    );
    expect(out.map((s) => s.summary.eventUuid)).toEqual(['x', 'w']);
  });

  it('honours the eligible set', () => {
    const out = scanSummaries([summary('x', [1, 0]), summary('w', [1, 1])], [1, 0], 0.3, new Set(['w']));
    expect(out.map((s) => s.summary.eventUuid)).toEqual(['w']);
  });
});
