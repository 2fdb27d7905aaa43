/**
 * Protocol error codes
 *
 * The SSO-specific codes name each failure of the login, code and token
 * lifecycle. The RFC 6749 codes cover malformed requests.
 */

// Session Manager
export const ERROR_INVALID_CREDENTIALS = 'invalid_credentials' as const;
export const ERROR_CERTIFICATE_MISMATCH = 'certificate_mismatch' as const;
export const ERROR_NO_SESSION = 'no_session' as const;
export const ERROR_USER_EXISTS = 'user_exists' as const;

// Authorization Code Issuer
export const ERROR_UNKNOWN_CLIENT = 'unknown_client' as const;
export const ERROR_REDIRECT_MISMATCH = 'redirect_mismatch' as const;
export const ERROR_INVALID_CODE = 'invalid_code' as const;
export const ERROR_CLIENT_AUTH_FAILED = 'client_auth_failed' as const;

// Token Service
export const ERROR_TOKEN_EXPIRED = 'token_expired' as const;
export const ERROR_TOKEN_UNKNOWN = 'token_unknown' as const;
export const ERROR_REFRESH_EXPIRED = 'refresh_expired' as const;
export const ERROR_REFRESH_UNKNOWN = 'refresh_unknown' as const;
export const ERROR_REFRESH_REPLAYED = 'refresh_replayed' as const;

// Resource servers
export const ERROR_UNAUTHENTICATED = 'unauthenticated' as const;
export const ERROR_INSUFFICIENT_SCOPE = 'insufficient_scope' as const;
export const ERROR_ACCESS_DENIED = 'access_denied' as const;

// RFC 6749 Section 4.1.2.1, 5.2
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_INVALID_SCOPE = 'invalid_scope' as const;
export const ERROR_UNSUPPORTED_GRANT_TYPE = 'unsupported_grant_type' as const;
export const ERROR_UNSUPPORTED_RESPONSE_TYPE = 'unsupported_response_type' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;
export const ERROR_TEMPORARILY_UNAVAILABLE = 'temporarily_unavailable' as const;

/**
 * All protocol error codes
 */
export type OAuthErrorCode =
  | typeof ERROR_INVALID_CREDENTIALS
  | typeof ERROR_CERTIFICATE_MISMATCH
  | typeof ERROR_NO_SESSION
  | typeof ERROR_USER_EXISTS
  | typeof ERROR_UNKNOWN_CLIENT
  | typeof ERROR_REDIRECT_MISMATCH
  | typeof ERROR_INVALID_CODE
  | typeof ERROR_CLIENT_AUTH_FAILED
  | typeof ERROR_TOKEN_EXPIRED
  | typeof ERROR_TOKEN_UNKNOWN
  | typeof ERROR_REFRESH_EXPIRED
  | typeof ERROR_REFRESH_UNKNOWN
  | typeof ERROR_REFRESH_REPLAYED
  | typeof ERROR_UNAUTHENTICATED
  | typeof ERROR_INSUFFICIENT_SCOPE
  | typeof ERROR_ACCESS_DENIED
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_INVALID_SCOPE
  | typeof ERROR_UNSUPPORTED_GRANT_TYPE
  | typeof ERROR_UNSUPPORTED_RESPONSE_TYPE
  | typeof ERROR_SERVER_ERROR
  | typeof ERROR_TEMPORARILY_UNAVAILABLE;

/**
 * HTTP status codes for protocol errors
 */
export const ERROR_STATUS_CODES: Record<OAuthErrorCode, 400 | 401 | 403 | 409 | 500 | 503> = {
  [ERROR_INVALID_CREDENTIALS]: 401,
  [ERROR_CERTIFICATE_MISMATCH]: 401,
  [ERROR_NO_SESSION]: 401,
  [ERROR_USER_EXISTS]: 409,
  [ERROR_UNKNOWN_CLIENT]: 400,
  [ERROR_REDIRECT_MISMATCH]: 400,
  [ERROR_INVALID_CODE]: 400,
  [ERROR_CLIENT_AUTH_FAILED]: 401,
  [ERROR_TOKEN_EXPIRED]: 401,
  [ERROR_TOKEN_UNKNOWN]: 401,
  [ERROR_REFRESH_EXPIRED]: 400,
  [ERROR_REFRESH_UNKNOWN]: 400,
  [ERROR_REFRESH_REPLAYED]: 400,
  [ERROR_UNAUTHENTICATED]: 401,
  [ERROR_INSUFFICIENT_SCOPE]: 403,
  [ERROR_ACCESS_DENIED]: 403,
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_INVALID_SCOPE]: 400,
  [ERROR_UNSUPPORTED_GRANT_TYPE]: 400,
  [ERROR_UNSUPPORTED_RESPONSE_TYPE]: 400,
  [ERROR_SERVER_ERROR]: 500,
  [ERROR_TEMPORARILY_UNAVAILABLE]: 503,
};

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<OAuthErrorCode, string> = {
  [ERROR_INVALID_CREDENTIALS]: 'The username or password is incorrect.',
  [ERROR_CERTIFICATE_MISMATCH]: 'The client certificate does not match the one bound to this credential.',
  [ERROR_NO_SESSION]: 'No active sign-in session.',
  [ERROR_USER_EXISTS]: 'A user with this username already exists.',
  [ERROR_UNKNOWN_CLIENT]: 'The client is not registered with this identity provider.',
  [ERROR_REDIRECT_MISMATCH]: 'The redirect_uri does not match the registered redirect URI.',
  [ERROR_INVALID_CODE]: 'The authorization code is invalid, expired, or already used.',
  [ERROR_CLIENT_AUTH_FAILED]: 'Client authentication failed.',
  [ERROR_TOKEN_EXPIRED]: 'The access token has expired.',
  [ERROR_TOKEN_UNKNOWN]: 'The access token is unknown, revoked, or malformed.',
  [ERROR_REFRESH_EXPIRED]: 'The refresh token has expired.',
  [ERROR_REFRESH_UNKNOWN]: 'The refresh token is unknown or revoked.',
  [ERROR_REFRESH_REPLAYED]: 'The refresh token is no longer valid.',
  [ERROR_UNAUTHENTICATED]: 'Please log in again.',
  [ERROR_INSUFFICIENT_SCOPE]: 'The request requires higher privileges than provided by the session.',
  [ERROR_ACCESS_DENIED]: 'Access to this resource is not allowed for your role.',
  [ERROR_INVALID_REQUEST]:
    'The request is missing a required parameter, includes an invalid parameter value, or is otherwise malformed.',
  [ERROR_INVALID_SCOPE]: 'The requested scope is invalid, unknown, or malformed.',
  [ERROR_UNSUPPORTED_GRANT_TYPE]:
    'The authorization grant type is not supported by the authorization server.',
  [ERROR_UNSUPPORTED_RESPONSE_TYPE]:
    'The authorization server does not support obtaining an authorization code using this method.',
  [ERROR_SERVER_ERROR]:
    'The authorization server encountered an unexpected condition that prevented it from fulfilling the request.',
  [ERROR_TEMPORARILY_UNAVAILABLE]:
    'The server is currently unable to handle the request due to a temporary overloading or maintenance.',
};

const ERROR_CODES = new Set<string>(Object.keys(ERROR_STATUS_CODES));

/**
 * Narrow an untrusted `error` field (e.g. from a back-channel response)
 */
export function isOAuthErrorCode(value: unknown): value is OAuthErrorCode {
  return typeof value === 'string' && ERROR_CODES.has(value);
}
