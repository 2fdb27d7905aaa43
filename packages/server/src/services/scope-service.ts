import { OAuthError } from '@campus-sso/shared';
import type { ClientRegistration } from '../types/client.js';

/**
 * Service for OAuth scope validation and manipulation
 */
export class ScopeService {
  /**
   * Parse a space-delimited scope string into an array
   */
  parseScopes(scopeString: string | undefined): string[] {
    if (!scopeString) {
      return [];
    }
    return scopeString
      .split(' ')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }

  /**
   * Convert scope array to space-delimited string
   */
  formatScopes(scopes: string[]): string {
    return [...new Set(scopes)].join(' ');
  }

  /**
   * Validate requested scopes against the client registration
   *
   * @returns The client's default scopes when none were requested
   */
  validateScopes(requestedScopes: string[], client: ClientRegistration, state?: string): string[] {
    if (requestedScopes.length === 0) {
      return client.defaultScopes;
    }

    const invalidScopes = requestedScopes.filter((scope) => !client.allowedScopes.includes(scope));

    if (invalidScopes.length > 0) {
      throw OAuthError.invalidScope(`Invalid or unauthorized scopes: ${invalidScopes.join(', ')}`, state);
    }

    return requestedScopes;
  }
}

// Singleton instance
export const scopeService = new ScopeService();
