import { describe, expect, it } from 'vitest';
import { ConversationSession, DEFAULT_HISTORY_LIMIT } from '@/memory/sessionMemory';

describe('ConversationSession history', () => {
  it('defaults to six turns', () => {
    expect(new ConversationSession('s').capacity).toBe(DEFAULT_HISTORY_LIMIT);
    expect(DEFAULT_HISTORY_LIMIT).toBe(6);
  });

  it('evicts the oldest turns beyond capacity', () => {
    const session = new ConversationSession('s', 4);
    session.appendExchange('q1', 'a1');
    session.appendExchange('q2', 'a2');
    session.appendExchange('q3', 'a3');

    expect(session.size).toBe(4);
    expect(session.recent()).toEqual([
      { role: 'user', text: 'q2' },
      { role: 'assistant', text: 'a2' },
      { role: 'user', text: 'q3' },
      { role: 'assistant', text: 'a3' },
    ]);
  });

  it('returns the last n turns, or none for n <= 0', () => {
    const session = new ConversationSession('s');
    session.appendExchange('q1', 'a1');
    session.appendExchange('q2', 'a2');

    expect(session.recent(2).map((t) => t.text)).toEqual(['q2', 'a2']);
    expect(session.recent(0)).toEqual([]);
  });

  it('hands out copies', () => {
    const session = new ConversationSession('s');
    session.appendExchange('q1', 'a1');
    const [first] = session.recent();
    first.text = 'changed';
    expect(session.recent()[0].text).toBe('q1');
  });

  it('clears', () => {
    const session = new ConversationSession('s');
    session.appendExchange('q1', 'a1');
    session.clear();
    expect(session.size).toBe(0);
  });

  it.each([0, -1, 2.5])('rejects capacity %s', (capacity) => {
    expect(() => new ConversationSession('s', capacity)).toThrow(RangeError);
  });
});

describe('ConversationSession.runExclusive', () => {
  it('runs tasks one after another in call order', async () => {
    const session = new ConversationSession('s');
    const log: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = session.runExclusive(async () => {
      log.push('first:start');
      await gate;
      log.push('first:end');
      return 1;
    });
    const second = session.runExclusive(async () => {
      log.push('second');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(log).toEqual(['first:start']);

    release();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
  });

  it('keeps the queue moving after a task fails', async () => {
    const session = new ConversationSession('s');
    const failed = session.runExclusive(async () => {
      throw new Error('boom');
    });
    const next = session.runExclusive(async () => 'ran');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ran');
  });
});
