import type { Role } from '@campus-sso/shared';

/**
 * Authorization code record
 */
interface AuthorizationCodeBase {
  id: string;
  codeHash: string;
  clientId: string;
  redirectUri: string;
  subject: string;
  scope: string;
  certFingerprint?: string;
  issuedAt: Date;
  expiresAt: Date;
}

export type PendingAuthorizationCode = AuthorizationCodeBase & { status: 'pending' };
export type ConsumedAuthorizationCode = AuthorizationCodeBase & { status: 'consumed'; consumedAt: Date };
export type AuthorizationCode = PendingAuthorizationCode | ConsumedAuthorizationCode;

export interface CreateAuthorizationCodeInput {
  clientId: string;
  redirectUri: string;
  subject: string;
  scope: string;
  certFingerprint?: string;
  expiresAt: Date;
}

/**
 * Outcome of an atomic code consumption
 */
export type CodeConsumption =
  | { outcome: 'consumed'; code: ConsumedAuthorizationCode }
  | { outcome: 'already_consumed'; code: ConsumedAuthorizationCode }
  | { outcome: 'expired'; code: AuthorizationCode }
  | { outcome: 'unknown' };

/**
 * Access token record, keyed by the JWT `jti`
 */
interface AccessTokenBase {
  jti: string;
  familyId: string;
  clientId: string;
  subject: string;
  scope: string;
  certFingerprint?: string;
  issuedAt: Date;
  expiresAt: Date;
}

export type AccessTokenRecord =
  | (AccessTokenBase & { status: 'active' })
  | (AccessTokenBase & { status: 'revoked'; revokedAt: Date });

export type CreateAccessTokenInput = Omit<AccessTokenBase, 'issuedAt'>;

/**
 * Refresh token record (opaque value, stored hashed)
 */
interface RefreshTokenBase {
  id: string;
  tokenHash: string;
  familyId: string;
  parentTokenId?: string;
  clientId: string;
  subject: string;
  scope: string;
  certFingerprint?: string;
  issuedAt: Date;
  expiresAt: Date;
}

export type RefreshToken =
  | (RefreshTokenBase & { status: 'active' })
  | (RefreshTokenBase & { status: 'rotated'; rotatedAt: Date; successorId?: string })
  | (RefreshTokenBase & { status: 'revoked'; revokedAt: Date });

export interface CreateRefreshTokenInput {
  familyId: string;
  parentTokenId?: string;
  clientId: string;
  subject: string;
  scope: string;
  certFingerprint?: string;
  expiresAt: Date;
}

/**
 * Outcome of an atomic refresh token rotation
 */
export type RefreshRotation =
  | { outcome: 'rotated'; token: RefreshToken }
  | { outcome: 'replayed'; token: RefreshToken }
  | { outcome: 'revoked'; token: RefreshToken }
  | { outcome: 'expired'; token: RefreshToken }
  | { outcome: 'unknown' };

/**
 * Access token JWT claims
 */
export interface AccessTokenPayload {
  iss: string;
  sub: string;
  aud: string;
  exp: number;
  iat: number;
  jti: string;
  client_id: string;
  scope: string;
  fam: string;
  cnf?: {
    'x5t#S256': string;
  };
}

/**
 * Freshly issued access/refresh pair
 */
export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  subject: string;
  clientId: string;
  scope: string;
  familyId: string;
  certFingerprint?: string;
  accessExpiresAt: Date;
  refreshExpiresAt: Date;
}

/**
 * Result of a successful access token validation
 */
export interface ValidatedToken {
  subject: string;
  role: Role;
  scope: string;
  clientId: string;
  expiresIn: number;
}

/**
 * What a redeemed authorization code grants
 */
export interface CodeGrant {
  subject: string;
  clientId: string;
  scope: string;
  certFingerprint?: string;
}
