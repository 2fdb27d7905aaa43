import type { User, CreateUserInput } from '../../types/user.js';

/**
 * Credential store: users, password hashes and bound certificate fingerprints
 */
export interface IUserStorage {
  /**
   * Create a user, hashing the password
   * Throws `user_exists` when the username is taken
   */
  create(input: CreateUserInput): Promise<User>;

  findByUsername(username: string): Promise<User | null>;

  findBySubject(subject: string): Promise<User | null>;

  /**
   * Check a password; returns the user on success, null otherwise
   */
  verifyPassword(username: string, password: string): Promise<User | null>;

  updatePassword(subject: string, password: string): Promise<User | null>;

  /**
   * Bind (or with null, unbind) a certificate fingerprint
   */
  bindFingerprint(subject: string, certFingerprint: string | null): Promise<User | null>;
}
