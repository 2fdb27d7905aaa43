import { describe, it, expect } from 'vitest';
import { OAuthError, isOAuthErrorCode } from '../errors/index.js';

describe('OAuthError', () => {
  it('should carry the status for its code', () => {
    expect(OAuthError.tokenExpired().statusCode).toBe(401);
    expect(OAuthError.userExists().statusCode).toBe(409);
    expect(OAuthError.insufficientScope().statusCode).toBe(403);
    expect(OAuthError.temporarilyUnavailable().statusCode).toBe(503);
  });

  it('should render the body with the default description', () => {
    expect(OAuthError.noSession().toJSON()).toEqual({
      error: 'no_session',
      error_description: 'No active sign-in session.',
    });
  });

  it('should include the state when given', () => {
    expect(OAuthError.invalidScope('Bad scope', 'state-123').toJSON()).toEqual({
      error: 'invalid_scope',
      error_description: 'Bad scope',
      state: 'state-123',
    });
  });

  it('should render a query string for redirects', () => {
    expect(OAuthError.invalidScope('Bad scope', 'xyz').toQueryString()).toBe(
      'error=invalid_scope&error_description=Bad+scope&state=xyz'
    );
  });

  it('should keep the cause', () => {
    const cause = new Error('connection refused');

    expect(OAuthError.unauthenticated(undefined, cause).cause).toBe(cause);
  });
});

describe('isOAuthErrorCode', () => {
  it('should narrow known codes only', () => {
    expect(isOAuthErrorCode('token_expired')).toBe(true);
    expect(isOAuthErrorCode('teapot')).toBe(false);
    expect(isOAuthErrorCode(42)).toBe(false);
  });
});
