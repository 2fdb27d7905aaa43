import { randomBytes } from 'node:crypto';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a secure authorization code
 */
export function generateAuthorizationCode(length: number = 32): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a secure refresh token
 */
export function generateRefreshToken(length: number = 32): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate an unguessable session id (SSO session or local site session)
 */
export function generateSessionId(length: number = 32): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate an opaque `state` value for an authorization request
 */
export function generateState(length: number = 24): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a unique ID for stored records
 */
export function generateId(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a token family ID for refresh token rotation tracking
 */
export function generateFamilyId(): string {
  return generateRandomBase64Url(16);
}
