import type { SessionSnapshot } from './snapshot.js';

/**
 * Keyed collection of every player's saved session. Implementations treat a
 * missing or unreadable store as empty; `loadSessionFor` never throws for that.
 */
export interface SessionStore {
  loadSessionFor(loginId: string): Promise<SessionSnapshot | undefined>;
  saveSessionFor(loginId: string, snapshot: SessionSnapshot): Promise<void>;
  deleteSessionFor(loginId: string): Promise<void>;
}

export class InMemorySessionStore implements SessionStore {
  #records = new Map<string, SessionSnapshot>();

  constructor(initial: Record<string, SessionSnapshot> = {}) {
    for (const [loginId, snapshot] of Object.entries(initial)) {
      this.#records.set(loginId, structuredClone(snapshot));
    }
  }

  async loadSessionFor(loginId: string): Promise<SessionSnapshot | undefined> {
    const snapshot = this.#records.get(loginId);
    return snapshot ? structuredClone(snapshot) : undefined;
  }

  async saveSessionFor(loginId: string, snapshot: SessionSnapshot): Promise<void> {
    this.#records.set(loginId, structuredClone(snapshot));
  }

  async deleteSessionFor(loginId: string): Promise<void> {
    this.#records.delete(loginId);
  }

  get logins(): string[] {
    return Array.from(this.#records.keys());
  }
}
