import { logger } from '@/utils/logger';
import type { SessionStore } from './SessionStore';
import type { ConversationSession } from './sessionMemory';

interface SessionEntry {
  session: ConversationSession;
  timestamp: number;
}

const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

export interface InMemorySessionStoreOptions {
  ttlMinutes?: number;
  maxSessions?: number;
  /** Clock, in ms. */
  now?: () => number;
}

export class InMemorySessionStore implements SessionStore {
  private readonly memory = new Map<string, SessionEntry>();
  private readonly ttl: number;
  private readonly maxSessions: number;
  private readonly now: () => number;
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.ttl = (options.ttlMinutes ?? 30) * 60 * 1000;
    this.maxSessions = options.maxSessions ?? 1000;
    this.now = options.now ?? Date.now;
    this.startCleanupInterval();
  }

  private lookup(sessionId: string): ConversationSession | null {
    const entry = this.memory.get(sessionId);
    if (!entry) return null;

    const now = this.now();
    if (now - entry.timestamp > this.ttl) {
      this.memory.delete(sessionId);
      return null;
    }

    entry.timestamp = now;
    return entry.session;
  }

  private insert(sessionId: string, session: ConversationSession): void {
    if (!this.memory.has(sessionId)) this.cleanupExpiredSessions();
    this.memory.set(sessionId, { session, timestamp: this.now() });
  }

  get size(): number {
    return this.memory.size;
  }

  private startCleanupInterval(): void {
    this.cleanupInterval = setInterval(() => this.cleanupExpiredSessions(), CLEANUP_INTERVAL_MS);
    // Never keep the process alive just for cleanup.
    this.cleanupInterval.unref();
  }

  /** Drop expired sessions; at capacity, also drop the oldest 20%. */
  cleanupExpiredSessions(): number {
    const now = this.now();
    let cleaned = 0;

    for (const [id, entry] of this.memory) {
      if (now - entry.timestamp > this.ttl) {
        this.memory.delete(id);
        cleaned++;
      }
    }

    if (this.memory.size >= this.maxSessions) {
      const oldest = [...this.memory.entries()]
        .sort(([, a], [, b]) => a.timestamp - b.timestamp)
        .slice(0, Math.max(1, Math.floor(this.memory.size * 0.2)));
      for (const [id] of oldest) {
        this.memory.delete(id);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.info('sessions:cleanup', { cleaned, remaining: this.memory.size });
    }
    return cleaned;
  }

  async get(sessionId: string): Promise<ConversationSession | null> {
    return this.lookup(sessionId);
  }

  /** Lookup and insert happen in one synchronous step, so concurrent callers share one session. */
  async getOrCreate(sessionId: string, create: (id: string) => ConversationSession): Promise<ConversationSession> {
    const existing = this.lookup(sessionId);
    if (existing) return existing;
    const session = create(sessionId);
    this.insert(sessionId, session);
    return session;
  }

  /** Drops the session and its history; requests still holding it see an empty history. */
  async delete(sessionId: string): Promise<boolean> {
    const entry = this.memory.get(sessionId);
    if (!entry) return false;
    entry.session.clear();
    this.memory.delete(sessionId);
    logger.debug('sessions:deleted', { sessionId });
    return true;
  }

  async refreshTTL(sessionId: string): Promise<void> {
    const entry = this.memory.get(sessionId);
    if (entry) entry.timestamp = this.now();
  }

  isAvailable(): boolean {
    return true;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.memory.clear();
  }
}
