import {
  OAuthError,
  createLogger,
  describeError,
  type AuthenticatedIdentity,
  type HeldTokenPair,
  type Logger,
} from '@campus-sso/shared';
import type { ILocalSessionStorage } from '../storage/interfaces/index.js';
import type { IdentityProviderClient } from '../client/identity-provider-client.js';

export interface ValidationClientOptions {
  sessions: ILocalSessionStorage;
  idp: IdentityProviderClient;
  logger?: Logger;
}

/**
 * Resolves a site session to the identity behind it
 *
 * An expired access token is refreshed once and validated again. Concurrent
 * requests on one session share a single refresh, so the rotation never
 * races itself into a replay.
 */
export class ValidationClient {
  private readonly logger: Logger;
  private readonly inflight = new Map<string, Promise<HeldTokenPair>>(); // session id -> refresh

  constructor(private readonly options: ValidationClientOptions) {
    this.logger = options.logger ?? createLogger('validation-client');
  }

  async authenticate(sessionId: string | undefined, certFingerprint?: string): Promise<AuthenticatedIdentity> {
    const { sessions, idp } = this.options;

    if (!sessionId) {
      throw OAuthError.unauthenticated('No site session');
    }

    const session = await sessions.findByValue(sessionId);
    if (!session || session.expiresAt <= new Date()) {
      throw OAuthError.unauthenticated('Site session not found or expired');
    }

    try {
      return await idp.validate(session.tokens.accessToken, certFingerprint);
    } catch (error) {
      if (!(error instanceof OAuthError && error.is('token_expired'))) {
        return this.fail(sessionId, error);
      }
    }

    try {
      const tokens = await this.refreshOnce(sessionId, session.tokens);
      return await idp.validate(tokens.accessToken, certFingerprint);
    } catch (error) {
      return this.fail(sessionId, error);
    }
  }

  private refreshOnce(sessionId: string, stale: HeldTokenPair): Promise<HeldTokenPair> {
    const pending = this.inflight.get(sessionId);
    if (pending) {
      return pending;
    }

    const refresh = this.performRefresh(sessionId, stale).finally(() => {
      this.inflight.delete(sessionId);
    });
    this.inflight.set(sessionId, refresh);
    return refresh;
  }

  private async performRefresh(sessionId: string, stale: HeldTokenPair): Promise<HeldTokenPair> {
    const { sessions, idp } = this.options;

    // Another request may have rotated the pair since this one read it
    const current = await sessions.findByValue(sessionId);
    if (current && current.tokens.refreshToken !== stale.refreshToken) {
      return current.tokens;
    }

    const tokens = await idp.refresh(stale.refreshToken);

    const updated = await sessions.replaceTokens(sessionId, tokens);
    if (!updated) {
      // Logged out while the refresh was in flight
      try {
        await idp.revoke(tokens.refreshToken);
      } catch (error) {
        this.logger.warn('Orphaned refresh token revocation failed', { error: describeError(error) });
      }
      throw OAuthError.unauthenticated('Site session ended during refresh');
    }

    this.logger.debug('Token pair refreshed', { subject: tokens.subject });
    return tokens;
  }

  private async fail(sessionId: string, error: unknown): Promise<never> {
    await this.options.sessions.delete(sessionId);

    if (error instanceof OAuthError) {
      this.logger.info('Site session rejected', { error: error.code, description: error.description });
      throw error.is('unauthenticated') ? error : OAuthError.unauthenticated(error.description, error);
    }

    this.logger.error('Site session check failed', { error: describeError(error) });
    throw OAuthError.unauthenticated('Session check failed', error);
  }
}
