import { generateId, generateSessionId, hashToken } from '@campus-sso/shared';
import type { SsoSession, CreateSsoSessionInput } from '../../types/session.js';
import type { ISsoSessionStorage } from '../interfaces/session-storage.js';
import { SESSION_ID_LENGTH } from '../../config/constants.js';

/**
 * In-memory SSO session storage implementation
 */
export class MemorySsoSessionStorage implements ISsoSessionStorage {
  private sessions = new Map<string, SsoSession>(); // hash -> session
  private subjectIndex = new Map<string, string>(); // subject -> hash

  async create(
    input: CreateSsoSessionInput
  ): Promise<{ session: SsoSession; value: string; replaced: boolean }> {
    const value = generateSessionId(SESSION_ID_LENGTH);
    const sessionHash = hashToken(value);

    const session: SsoSession = {
      status: 'active',
      id: generateId(),
      sessionHash,
      subject: input.subject,
      certFingerprint: input.certFingerprint,
      issuedAt: new Date(),
      expiresAt: input.expiresAt,
    };

    // One session per subject
    const previousHash = this.subjectIndex.get(input.subject);
    const replaced = previousHash !== undefined && this.sessions.delete(previousHash);

    this.sessions.set(sessionHash, session);
    this.subjectIndex.set(input.subject, sessionHash);

    return { session, value, replaced };
  }

  async findByValue(sessionId: string): Promise<SsoSession | null> {
    return this.sessions.get(hashToken(sessionId)) ?? null;
  }

  async delete(sessionId: string): Promise<boolean> {
    const sessionHash = hashToken(sessionId);
    const session = this.sessions.get(sessionHash);
    if (!session) return false;

    this.sessions.delete(sessionHash);
    if (this.subjectIndex.get(session.subject) === sessionHash) {
      this.subjectIndex.delete(session.subject);
    }
    return true;
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [sessionHash, session] of this.sessions) {
      if (session.expiresAt <= now) {
        this.sessions.delete(sessionHash);
        if (this.subjectIndex.get(session.subject) === sessionHash) {
          this.subjectIndex.delete(session.subject);
        }
        deleted++;
      }
    }

    return deleted;
  }
}
