import {
  OAuthError,
  constantTimeCompare,
  createLogger,
  describeError,
  safeReturnTo,
  type Logger,
} from '@campus-sso/shared';
import type { IResourceStorage } from '../storage/interfaces/index.js';
import type { IdentityProviderClient } from '../client/identity-provider-client.js';
import type { LocalSession } from '../types/session.js';

export interface SessionBridgeOptions {
  storage: IResourceStorage;
  idp: IdentityProviderClient;
  /** Authorize endpoint as browsers reach it */
  authorizeEndpoint: string;
  redirectUri: string;
  scope: string;
  /** Seconds a login may wait for its callback */
  loginStateTtl: number;
  logger?: Logger;
}

export interface BeginLoginResult {
  state: string;
  authorizeUrl: string;
  expiresAt: Date;
}

export interface CompleteLoginResult {
  /** Plaintext id for the site cookie */
  sessionId: string;
  session: LocalSession;
  returnTo: string;
}

/**
 * Turns an authorization code into a site session
 *
 * A browser moves anonymous → code-pending (`beginLogin`) → exchanging →
 * established or failed (`completeLogin`). Tokens never leave this process.
 */
export class SessionBridge {
  private readonly logger: Logger;

  constructor(private readonly options: SessionBridgeOptions) {
    this.logger = options.logger ?? createLogger('session-bridge');
  }

  async beginLogin(returnTo?: string | null): Promise<BeginLoginResult> {
    const { storage, idp, authorizeEndpoint, redirectUri, scope, loginStateTtl } = this.options;

    const login = await storage.loginStates.create({
      returnTo: safeReturnTo(returnTo) ?? '/',
      expiresAt: new Date(Date.now() + loginStateTtl * 1000),
    });

    const url = new URL(authorizeEndpoint);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', idp.clientId);
    url.searchParams.set('redirect_uri', redirectUri);
    url.searchParams.set('scope', scope);
    url.searchParams.set('state', login.state);

    return { state: login.state, authorizeUrl: url.toString(), expiresAt: login.expiresAt };
  }

  /**
   * Finish a login from the authorization callback
   *
   * @param browserState - the state cookie set by `/session/login`
   */
  async completeLogin(
    code: string | undefined,
    state: string | undefined,
    browserState: string | undefined
  ): Promise<CompleteLoginResult> {
    const { storage, idp, redirectUri } = this.options;

    if (!state) {
      throw OAuthError.unauthenticated('Missing state');
    }
    if (!browserState || !constantTimeCompare(state, browserState)) {
      throw OAuthError.unauthenticated('State does not belong to this browser');
    }

    const start = await storage.loginStates.beginExchange(state, new Date());
    if (start.outcome !== 'exchanging') {
      this.logger.info('Callback rejected', { outcome: start.outcome });
      throw OAuthError.unauthenticated('Login is not pending');
    }

    try {
      if (!code) {
        throw OAuthError.unauthenticated('Authorization was not granted');
      }

      const tokens = await idp.exchangeCode(code, redirectUri);
      const { session, value } = await storage.sessions.create(tokens);

      this.logger.info('Site session established', { subject: tokens.subject });
      return { sessionId: value, session, returnTo: start.login.returnTo };
    } catch (error) {
      if (error instanceof OAuthError) {
        this.logger.info('Code exchange failed', { error: error.code });
        throw error.is('unauthenticated') ? error : OAuthError.unauthenticated('Code exchange failed', error);
      }
      throw error;
    } finally {
      await storage.loginStates.delete(state);
    }
  }

  /**
   * End a site session and revoke its token family at the identity provider
   *
   * Idempotent. The session is gone even when revocation fails.
   */
  async logout(sessionId: string | undefined): Promise<void> {
    if (!sessionId) {
      return;
    }

    const session = await this.options.storage.sessions.delete(sessionId);
    if (!session) {
      return;
    }

    try {
      await this.options.idp.revoke(session.tokens.refreshToken);
      this.logger.info('Site session ended', { subject: session.tokens.subject });
    } catch (error) {
      this.logger.warn('Refresh token revocation failed', {
        subject: session.tokens.subject,
        error: describeError(error),
      });
    }
  }
}
