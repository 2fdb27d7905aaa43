/**
 * Identity provider constants
 */

// Grant types
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;

// Response types
export const RESPONSE_TYPE_CODE = 'code' as const;

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;

// Client authentication methods
export const CLIENT_AUTH_BASIC = 'client_secret_basic' as const;
export const CLIENT_AUTH_POST = 'client_secret_post' as const;

// Access tokens are HMAC-signed with the IdP secret
export const ACCESS_TOKEN_ALGORITHM = 'HS256' as const;
export const ACCESS_TOKEN_TYP = 'at+jwt' as const;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 300; // 5 minutes
export const DEFAULT_REFRESH_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_AUTHORIZATION_CODE_TTL = 120; // 2 minutes
export const DEFAULT_SSO_SESSION_TTL = 28800; // 8 hours

// Token/code lengths
export const AUTHORIZATION_CODE_LENGTH = 32; // bytes
export const REFRESH_TOKEN_LENGTH = 32; // bytes
export const SESSION_ID_LENGTH = 32; // bytes

// Rate limiting defaults
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60000; // 1 minute
export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 100;

// Expired record sweep
export const DEFAULT_SWEEP_INTERVAL_MS = 60000;

// SSO session transport
export const SSO_SESSION_COOKIE = 'sso_session';
export const HEADER_SESSION_TOKEN = 'X-Session-Token';

// Registration constraints
export const USERNAME_PATTERN = /^[A-Za-z0-9_.-]{3,64}$/;
export const MIN_PASSWORD_LENGTH = 8;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_CONTENT_TYPE = 'Content-Type';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Content types
export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
