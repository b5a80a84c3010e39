import { randomUUID } from 'node:crypto';
import { ChatSession } from './chat.js';
import type { StakeholderId } from './stakeholders.js';

/**
 * In-memory chat sessions, owned by the app instance that created the store.
 * Idle sessions past the TTL are dropped lazily on the next access.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ChatSession>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
    private readonly newId: () => string = randomUUID,
  ) {}

  create(stakeholder: StakeholderId): ChatSession {
    this.prune();
    const session = new ChatSession(this.newId(), stakeholder, this.now);
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): ChatSession | undefined {
    this.prune();
    const session = this.sessions.get(id);
    session?.touch();
    return session;
  }

  get size() {
    return this.sessions.size;
  }

  private prune() {
    const cutoff = this.now() - this.ttlMs;
    for (const [id, s] of this.sessions) {
      // never evict mid-reply
      if (s.lastActiveAt < cutoff && s.state === 'Idle') this.sessions.delete(id);
    }
  }
}
