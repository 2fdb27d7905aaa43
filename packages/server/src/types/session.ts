import type { Role } from '@campus-sso/shared';

/**
 * Browser login at the identity provider
 *
 * Only the SHA-256 hash of the session id is kept.
 */
export interface SsoSession {
  status: 'active';
  id: string;
  sessionHash: string;
  subject: string;
  certFingerprint?: string;
  issuedAt: Date;
  expiresAt: Date;
}

export interface CreateSsoSessionInput {
  subject: string;
  certFingerprint?: string;
  expiresAt: Date;
}

export interface EstablishedSession {
  sessionId: string;
  subject: string;
  expiresAt: Date;
}

export interface SessionIdentity {
  subject: string;
  role: Role;
  certFingerprint?: string;
}
