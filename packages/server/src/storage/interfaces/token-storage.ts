import type {
  AccessTokenRecord,
  CreateAccessTokenInput,
  RefreshToken,
  CreateRefreshTokenInput,
  RefreshRotation,
} from '../../types/token.js';

/**
 * Storage interface for access token records
 * The JWT is self-describing; the record tracks revocation
 */
export interface IAccessTokenStorage {
  create(input: CreateAccessTokenInput): Promise<AccessTokenRecord>;

  findByJti(jti: string): Promise<AccessTokenRecord | null>;

  /**
   * Revoke one access token; false when unknown or already revoked
   */
  revoke(jti: string): Promise<boolean>;

  /**
   * Revoke all access tokens in a family
   */
  revokeFamily(familyId: string): Promise<number>;

  deleteExpired(now: Date): Promise<number>;
}

/**
 * Storage interface for refresh token management
 */
export interface IRefreshTokenStorage {
  /**
   * Create a new refresh token
   * Returns the token record and the plaintext token value
   */
  create(input: CreateRefreshTokenInput): Promise<{ token: RefreshToken; value: string }>;

  /**
   * Find a refresh token by plaintext value
   */
  findByValue(tokenValue: string): Promise<RefreshToken | null>;

  /**
   * Move an active token to `rotated`
   * This MUST be atomic: at most one call ever sees `rotated` for a token
   */
  rotate(tokenValue: string, now: Date): Promise<RefreshRotation>;

  /**
   * Record the token that replaced a rotated one
   */
  linkSuccessor(id: string, successorId: string): Promise<void>;

  /**
   * Revoke all tokens in a family (for replay detection and logout)
   */
  revokeFamily(familyId: string): Promise<number>;

  deleteExpired(now: Date): Promise<number>;
}
