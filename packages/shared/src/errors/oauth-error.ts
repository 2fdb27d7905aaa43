import {
  type OAuthErrorCode,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_CREDENTIALS,
  ERROR_CERTIFICATE_MISMATCH,
  ERROR_NO_SESSION,
  ERROR_USER_EXISTS,
  ERROR_UNKNOWN_CLIENT,
  ERROR_REDIRECT_MISMATCH,
  ERROR_INVALID_CODE,
  ERROR_CLIENT_AUTH_FAILED,
  ERROR_TOKEN_EXPIRED,
  ERROR_TOKEN_UNKNOWN,
  ERROR_REFRESH_EXPIRED,
  ERROR_REFRESH_UNKNOWN,
  ERROR_REFRESH_REPLAYED,
  ERROR_UNAUTHENTICATED,
  ERROR_INSUFFICIENT_SCOPE,
  ERROR_ACCESS_DENIED,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_SCOPE,
  ERROR_UNSUPPORTED_GRANT_TYPE,
  ERROR_UNSUPPORTED_RESPONSE_TYPE,
  ERROR_SERVER_ERROR,
  ERROR_TEMPORARILY_UNAVAILABLE,
} from './error-codes.js';

/**
 * Error response body
 * RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
  state?: string;
}

/**
 * Protocol error
 *
 * Every failure of the SSO engine is one of these; the HTTP layers render
 * them with `toJSON()` and the back-channel client rebuilds them from the
 * response body.
 */
export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode: 400 | 401 | 403 | 409 | 500 | 503;
  public readonly description: string;
  public readonly state?: string;

  constructor(
    code: OAuthErrorCode,
    description?: string,
    options?: {
      state?: string;
      cause?: unknown;
    }
  ) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'OAuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.state) {
      this.state = options.state;
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): OAuthErrorResponse {
    const response: OAuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.state) {
      response.state = this.state;
    }

    return response;
  }

  /**
   * Convert to URL query string for redirect errors
   */
  toQueryString(): string {
    const params = new URLSearchParams();
    params.set('error', this.code);

    if (this.description) {
      params.set('error_description', this.description);
    }

    if (this.state) {
      params.set('state', this.state);
    }

    return params.toString();
  }

  is(code: OAuthErrorCode): boolean {
    return this.code === code;
  }

  // Factory methods for common errors

  static invalidCredentials(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_CREDENTIALS, description);
  }

  static certificateMismatch(description?: string): OAuthError {
    return new OAuthError(ERROR_CERTIFICATE_MISMATCH, description);
  }

  static noSession(description?: string): OAuthError {
    return new OAuthError(ERROR_NO_SESSION, description);
  }

  static userExists(description?: string): OAuthError {
    return new OAuthError(ERROR_USER_EXISTS, description);
  }

  static unknownClient(description?: string): OAuthError {
    return new OAuthError(ERROR_UNKNOWN_CLIENT, description);
  }

  static redirectMismatch(description?: string): OAuthError {
    return new OAuthError(ERROR_REDIRECT_MISMATCH, description);
  }

  static invalidCode(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_CODE, description);
  }

  static clientAuthFailed(description?: string): OAuthError {
    return new OAuthError(ERROR_CLIENT_AUTH_FAILED, description);
  }

  static tokenExpired(description?: string): OAuthError {
    return new OAuthError(ERROR_TOKEN_EXPIRED, description);
  }

  static tokenUnknown(description?: string): OAuthError {
    return new OAuthError(ERROR_TOKEN_UNKNOWN, description);
  }

  static refreshExpired(description?: string): OAuthError {
    return new OAuthError(ERROR_REFRESH_EXPIRED, description);
  }

  static refreshUnknown(description?: string): OAuthError {
    return new OAuthError(ERROR_REFRESH_UNKNOWN, description);
  }

  static refreshReplayed(description?: string): OAuthError {
    return new OAuthError(ERROR_REFRESH_REPLAYED, description);
  }

  static unauthenticated(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_UNAUTHENTICATED, description, { cause });
  }

  static insufficientScope(description?: string): OAuthError {
    return new OAuthError(ERROR_INSUFFICIENT_SCOPE, description);
  }

  static accessDenied(description?: string): OAuthError {
    return new OAuthError(ERROR_ACCESS_DENIED, description);
  }

  static invalidRequest(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST, description, { state });
  }

  static invalidScope(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_SCOPE, description, { state });
  }

  static unsupportedGrantType(description?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_GRANT_TYPE, description);
  }

  static unsupportedResponseType(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_RESPONSE_TYPE, description, { state });
  }

  static serverError(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_SERVER_ERROR, description, { cause });
  }

  static temporarilyUnavailable(description?: string): OAuthError {
    return new OAuthError(ERROR_TEMPORARILY_UNAVAILABLE, description);
  }
}
