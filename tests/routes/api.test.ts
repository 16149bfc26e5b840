import request from 'supertest';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '@/app';
import { InMemorySessionStore } from '@/memory/InMemorySessionStore';
import type { ConversationSession } from '@/memory/sessionMemory';
import { buildEventAssistant } from '@/services/pipeline-deps';
import { TEST_CONFIG } from '../helpers/config';
import { InMemoryCatalogStore, ScriptedBackend, event, summary } from '../helpers/fakes';

class BrokenSessionStore extends InMemorySessionStore {
  async getOrCreate(): Promise<ConversationSession> {
    throw new Error('session backend down');
  }
}

let sessions: InMemorySessionStore;

function buildApp(store: InMemorySessionStore = new InMemorySessionStore()) {
  sessions = store;
  const catalog = new InMemoryCatalogStore({
    events: [event('e1', { title: 'Rooftop Jazz' }), event('e2', { title: 'Candle Quartet' })],
    summaries: [summary('e1', [1, 0]), summary('e2', [0, 1])],
    collections: { 'date-night': [{ uuid: 'e2', rank: 1, reason: 'Candlelit' }] },
  });
  const fast = new ScriptedBackend('fast', {
    json: (prompt) => JSON.stringify({ intent: prompt.includes('Query: "something romantic"') ? 'date-night' : 'search' }),
    embed: () => [1, 0],
  });
  const reasoning = new ScriptedBackend('reasoning', {
    json: (prompt) => (prompt.includes('query parser') ? '{}' : JSON.stringify({ results: [{ id: 0, score: 0.9 }] })),
    text: () => 'Try the Candle Quartet.',
  });
  const assistant = buildEventAssistant(TEST_CONFIG, catalog, { fast, reasoning });
  return createApp({ assistant, sessions, config: TEST_CONFIG });
}

afterEach(() => {
  sessions.destroy();
});

describe('GET /health', () => {
  it('reports ok and echoes the correlation id', async () => {
    const res = await request(buildApp()).get('/health').set('x-correlation-id', 'req-1');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', sessions: 'ok' });
    expect(res.headers['x-correlation-id']).toBe('req-1');
  });
});

describe('POST /api/query', () => {
  it('answers and opens a session', async () => {
    const res = await request(buildApp()).post('/api/query').send({ query: 'something romantic' });

    expect(res.status).toBe(200);
    expect(res.body.intent).toBe('date-night');
    expect(res.body.answer).toBe('Try the Candle Quartet.');
    expect(res.body.results).toHaveLength(1);
    expect(res.body.results[0].reason).toBe('Candlelit');
    expect(typeof res.body.sessionId).toBe('string');
    expect(sessions.size).toBe(1);
  });

  it('continues an existing session', async () => {
    const app = buildApp();
    const first = await request(app).post('/api/query').send({ query: 'jazz tonight', sessionId: 'chat-1' });
    const second = await request(app).post('/api/query').send({ query: 'and tomorrow?', sessionId: 'chat-1' });

    expect(first.body.sessionId).toBe('chat-1');
    expect(second.body.sessionId).toBe('chat-1');
    expect(first.body.results[0].details.title).toBe('Rooftop Jazz');
    const session = await sessions.get('chat-1');
    expect(session?.recent().map((t) => t.text)).toEqual([
      'jazz tonight',
      'Try the Candle Quartet.',
      'and tomorrow?',
      'Try the Candle Quartet.',
    ]);
  });

  it('serializes concurrent first requests for the same new session', async () => {
    const app = buildApp();

    const [a, b] = await Promise.all([
      request(app).post('/api/query').send({ query: 'jazz tonight', sessionId: 'chat-2' }),
      request(app).post('/api/query').send({ query: 'jazz tomorrow', sessionId: 'chat-2' }),
    ]);

    expect([a.status, b.status]).toEqual([200, 200]);
    expect(sessions.size).toBe(1);
    const session = await sessions.get('chat-2');
    expect(session?.size).toBe(4);
  });

  it('marks the session active once the answer is ready', async () => {
    const app = buildApp();
    const refresh = vi.spyOn(sessions, 'refreshTTL');

    await request(app).post('/api/query').send({ query: 'jazz', sessionId: 'chat-3' });

    expect(refresh).toHaveBeenCalledWith('chat-3');
  });

  it('rejects a missing query', async () => {
    const res = await request(buildApp()).post('/api/query').send({ sessionId: 'x' });

    expect(res.status).toBe(400);
    expect(res.body.success).toBe(false);
    expect(res.body.code).toBe('invalid_request');
    expect(res.body.message).toMatch(/^query: /);
  });

  it('rejects a blank query', async () => {
    const res = await request(buildApp()).post('/api/query').send({ query: '   ' });
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('query: query is required');
  });

  it('rejects malformed JSON', async () => {
    const res = await request(buildApp())
      .post('/api/query')
      .set('Content-Type', 'application/json')
      .send('{"query": ');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, message: 'Invalid request body', code: 'bad_request' });
  });

  it('hides internal failures behind a 500', async () => {
    const res = await request(buildApp(new BrokenSessionStore()))
      .post('/api/query')
      .send({ query: 'jazz', sessionId: 'chat-1' });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ success: false, message: 'Internal Server Error', code: 'internal_error' });
  });
});

describe('GET /api/collections/:tag', () => {
  it('lists a curated collection', async () => {
    const res = await request(buildApp()).get('/api/collections/date-night');

    expect(res.status).toBe(200);
    expect(res.body.tag).toBe('date-night');
    expect(res.body.results.map((r: { details: { uuid: string } }) => r.details.uuid)).toEqual(['e2']);
    expect(res.body.results[0].score).toBe(1);
  });

  it('returns 404 for an unknown tag', async () => {
    const res = await request(buildApp()).get('/api/collections/late-night');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, message: 'Unknown collection: late-night', code: 'not_found' });
  });
});

describe('GET /api/sessions/:id', () => {
  it('returns the conversation history', async () => {
    const app = buildApp();
    await request(app).post('/api/query').send({ query: 'jazz', sessionId: 'chat-4' });

    const res = await request(app).get('/api/sessions/chat-4');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      sessionId: 'chat-4',
      history: [
        { role: 'user', text: 'jazz' },
        { role: 'assistant', text: 'Try the Candle Quartet.' },
      ],
    });
  });

  it('returns 404 for an unknown session', async () => {
    const res = await request(buildApp()).get('/api/sessions/nobody');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, message: 'Unknown session: nobody', code: 'not_found' });
  });
});

describe('DELETE /api/sessions/:id', () => {
  it('deletes idempotently', async () => {
    const app = buildApp();
    await request(app).post('/api/query').send({ query: 'jazz', sessionId: 'chat-9' });

    const first = await request(app).delete('/api/sessions/chat-9');
    const second = await request(app).delete('/api/sessions/chat-9');

    expect(first.status).toBe(204);
    expect(second.status).toBe(204);
    await expect(sessions.get('chat-9')).resolves.toBeNull();
  });
});

describe('unknown routes', () => {
  it('returns a JSON 404', async () => {
    const res = await request(buildApp()).get('/api/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, message: 'Route GET /api/nope not found', code: 'not_found' });
  });
});
