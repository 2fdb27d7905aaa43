import type { AuthorizationCode, CodeConsumption, CreateAuthorizationCodeInput } from '../../types/token.js';

/**
 * Storage interface for authorization code management
 */
export interface IAuthorizationCodeStorage {
  /**
   * Create a new authorization code
   * Returns the code record and the plaintext code value
   */
  create(input: CreateAuthorizationCodeInput): Promise<{ code: AuthorizationCode; value: string }>;

  /**
   * Find an authorization code by plaintext value
   */
  findByValue(codeValue: string): Promise<AuthorizationCode | null>;

  /**
   * Consume an authorization code
   * This MUST be atomic: at most one call ever sees `consumed` for a code
   */
  consume(codeValue: string, now: Date): Promise<CodeConsumption>;

  /**
   * Delete expired authorization codes (cleanup)
   */
  deleteExpired(now: Date): Promise<number>;
}
