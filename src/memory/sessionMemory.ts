// src/memory/sessionMemory.ts

import type { ConversationTurn } from '@/types/core';

export const DEFAULT_HISTORY_LIMIT = 6;

/**
 * Conversation state for one caller. History is a bounded buffer: once it holds
 * `capacity` turns, each append evicts the oldest. Queries against the same
 * session run one at a time through `runExclusive`.
 */
export class ConversationSession {
  private turns: ConversationTurn[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly id: string,
    readonly capacity: number = DEFAULT_HISTORY_LIMIT,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Session capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.turns.length;
  }

  /** Copies of the last `limit` turns, oldest first. */
  recent(limit: number = this.capacity): ConversationTurn[] {
    if (limit <= 0) return [];
    return this.turns.slice(-limit).map((t) => ({ ...t }));
  }

  /** Record one user/assistant exchange. */
  appendExchange(userText: string, assistantText: string): void {
    this.turns.push({ role: 'user', text: userText }, { role: 'assistant', text: assistantText });
    if (this.turns.length > this.capacity) {
      this.turns = this.turns.slice(this.turns.length - this.capacity);
    }
  }

  clear(): void {
    this.turns = [];
  }

  /** Run `task` after every task queued before it on this session has settled. */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The caller observes failures through `run`; the queue only needs to advance.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
