import type { HeldTokenPair } from '@campus-sso/shared';
import type { LocalSession } from '../../types/session.js';

/**
 * Storage interface for site sessions
 */
export interface ILocalSessionStorage {
  /**
   * Store a token pair under a new session id
   * Returns the session record and the plaintext id for the cookie
   */
  create(tokens: HeldTokenPair): Promise<{ session: LocalSession; value: string }>;

  /**
   * Find a session by plaintext id
   */
  findByValue(sessionId: string): Promise<LocalSession | null>;

  /**
   * Replace the held pair after a refresh; null when the session is gone
   */
  replaceTokens(sessionId: string, tokens: HeldTokenPair): Promise<LocalSession | null>;

  /**
   * Delete a session, returning what it held
   */
  delete(sessionId: string): Promise<LocalSession | null>;

  deleteExpired(now: Date): Promise<number>;
}
