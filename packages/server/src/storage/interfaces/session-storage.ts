import type { SsoSession, CreateSsoSessionInput } from '../../types/session.js';

/**
 * Storage interface for SSO sessions
 */
export interface ISsoSessionStorage {
  /**
   * Create a session for a subject, replacing any session the subject already has
   * Returns the session record and the plaintext session id
   */
  create(input: CreateSsoSessionInput): Promise<{ session: SsoSession; value: string; replaced: boolean }>;

  /**
   * Find a session by plaintext id
   */
  findByValue(sessionId: string): Promise<SsoSession | null>;

  /**
   * Delete a session by plaintext id; false when there was none
   */
  delete(sessionId: string): Promise<boolean>;

  /**
   * Delete expired sessions (cleanup)
   */
  deleteExpired(now: Date): Promise<number>;
}
