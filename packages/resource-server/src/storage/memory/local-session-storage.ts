import { generateSessionId, hashToken, type HeldTokenPair } from '@campus-sso/shared';
import type { LocalSession } from '../../types/session.js';
import type { ILocalSessionStorage } from '../interfaces/local-session-storage.js';
import { SESSION_ID_LENGTH, type SiteName } from '../../config/sites.js';

/**
 * In-memory site session storage implementation
 */
export class MemoryLocalSessionStorage implements ILocalSessionStorage {
  private sessions = new Map<string, LocalSession>(); // hash -> session

  constructor(private readonly site: SiteName) {}

  async create(tokens: HeldTokenPair): Promise<{ session: LocalSession; value: string }> {
    const value = generateSessionId(SESSION_ID_LENGTH);
    const session: LocalSession = {
      sessionHash: hashToken(value),
      site: this.site,
      tokens,
      createdAt: new Date(),
      expiresAt: tokens.refreshExpiresAt,
    };

    this.sessions.set(session.sessionHash, session);
    return { session, value };
  }

  async findByValue(sessionId: string): Promise<LocalSession | null> {
    return this.sessions.get(hashToken(sessionId)) ?? null;
  }

  async replaceTokens(sessionId: string, tokens: HeldTokenPair): Promise<LocalSession | null> {
    const sessionHash = hashToken(sessionId);
    const current = this.sessions.get(sessionHash);
    if (!current) {
      return null;
    }

    const updated: LocalSession = { ...current, tokens, expiresAt: tokens.refreshExpiresAt };
    this.sessions.set(sessionHash, updated);
    return updated;
  }

  async delete(sessionId: string): Promise<LocalSession | null> {
    const sessionHash = hashToken(sessionId);
    const session = this.sessions.get(sessionHash);
    if (!session) return null;

    this.sessions.delete(sessionHash);
    return session;
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [sessionHash, session] of this.sessions) {
      if (session.expiresAt <= now) {
        this.sessions.delete(sessionHash);
        deleted++;
      }
    }

    return deleted;
  }
}
