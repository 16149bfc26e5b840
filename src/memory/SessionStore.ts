// src/memory/SessionStore.ts

import type { ConversationSession } from './sessionMemory';

/**
 * Storage for conversation sessions, keyed by session id.
 */
export interface SessionStore {
  /** The session, or null if unknown or expired. Refreshes its TTL. */
  get(sessionId: string): Promise<ConversationSession | null>;

  /** The live session for `sessionId`, creating and storing it if absent. */
  getOrCreate(sessionId: string, create: (id: string) => ConversationSession): Promise<ConversationSession>;

  delete(sessionId: string): Promise<boolean>;

  /** Mark the session active, e.g. after a long-running query. */
  refreshTTL(sessionId: string): Promise<void>;

  isAvailable(): boolean;

  /** Stop background work. */
  destroy(): void;
}
