/**
 * Token types
 */
export type TokenType = 'Bearer';

/**
 * Token Response
 *
 * RFC 6749 Section 5.1 plus the subject and refresh lifetime, which the
 * resource servers need to size their local sessions.
 */
export interface TokenResponse {
  access_token: string;
  token_type: TokenType;
  expires_in: number;
  refresh_token: string;
  refresh_expires_in: number;
  subject: string;
  scope: string;
}

/**
 * Validation Response
 */
export interface ValidateResponse {
  active: true;
  subject: string;
  role: string;
  scope: string;
  client_id: string;
  expires_in: number;
}

/**
 * Login Response (POST /auth/login without return_to)
 */
export interface LoginResponse {
  subject: string;
  expires_in: number;
}

/**
 * SSO Session Response (GET /auth/session)
 */
export interface SessionResponse {
  subject: string;
  role: string;
}

/**
 * Registration Response (POST /auth/register)
 */
export interface RegisterResponse {
  username: string;
  role: string;
  cert_fingerprint: string | null;
}

/**
 * Certificate Binding Response (PUT and DELETE /auth/certificate)
 */
export interface CertificateResponse {
  username: string;
  cert_fingerprint: string | null;
}
