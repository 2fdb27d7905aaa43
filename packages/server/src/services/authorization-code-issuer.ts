import { OAuthError, createLogger, type Logger } from '@campus-sso/shared';
import type { IAuthorizationCodeStorage, IClientRegistry } from '../storage/interfaces/index.js';
import type { ClientRegistration } from '../types/client.js';
import type { CodeGrant } from '../types/token.js';
import type { SessionManager } from './session-manager.js';
import { scopeService } from './scope-service.js';

export interface AuthorizationCodeIssuerOptions {
  sessionManager: SessionManager;
  clients: IClientRegistry;
  codes: IAuthorizationCodeStorage;
  /** Code lifetime in seconds */
  codeTtl: number;
  logger?: Logger;
}

export interface IssuedCode {
  code: string;
  subject: string;
  scope: string;
  expiresAt: Date;
}

/**
 * Issues and redeems single-use authorization codes
 */
export class AuthorizationCodeIssuer {
  private readonly sessionManager: SessionManager;
  private readonly clients: IClientRegistry;
  private readonly codes: IAuthorizationCodeStorage;
  private readonly codeTtl: number;
  private readonly logger: Logger;

  constructor(options: AuthorizationCodeIssuerOptions) {
    this.sessionManager = options.sessionManager;
    this.clients = options.clients;
    this.codes = options.codes;
    this.codeTtl = options.codeTtl;
    this.logger = options.logger ?? createLogger('authorization-code-issuer');
  }

  /**
   * Look up a client and check the redirect URI (exact match)
   */
  async resolveClient(clientId: string, redirectUri: string): Promise<ClientRegistration> {
    const client = await this.clients.findByClientId(clientId);
    if (!client) {
      throw OAuthError.unknownClient();
    }

    if (client.redirectUri !== redirectUri) {
      throw OAuthError.redirectMismatch();
    }

    return client;
  }

  /**
   * Issue a code for the subject behind an SSO session
   */
  async issue(
    sessionId: string | undefined,
    clientId: string,
    redirectUri: string,
    scope?: string,
    state?: string
  ): Promise<IssuedCode> {
    const identity = await this.sessionManager.currentSubject(sessionId);
    const client = await this.resolveClient(clientId, redirectUri);
    const scopes = scopeService.validateScopes(scopeService.parseScopes(scope), client, state);

    const expiresAt = new Date(Date.now() + this.codeTtl * 1000);
    const { value } = await this.codes.create({
      clientId: client.clientId,
      redirectUri,
      subject: identity.subject,
      scope: scopeService.formatScopes(scopes),
      certFingerprint: identity.certFingerprint,
      expiresAt,
    });

    this.logger.info('Authorization code issued', { subject: identity.subject, clientId: client.clientId });

    return { code: value, subject: identity.subject, scope: scopeService.formatScopes(scopes), expiresAt };
  }

  /**
   * Redeem a code on the back channel
   *
   * The code is consumed before anything else is checked, so a failed
   * redemption still burns it.
   */
  async redeem(code: string, clientId: string, clientSecret: string, redirectUri: string): Promise<CodeGrant> {
    const consumption = await this.codes.consume(code, new Date());

    switch (consumption.outcome) {
      case 'unknown':
        throw OAuthError.invalidCode();
      case 'expired':
        throw OAuthError.invalidCode('Authorization code has expired');
      case 'already_consumed':
        this.logger.warn('Authorization code replayed', {
          subject: consumption.code.subject,
          clientId: consumption.code.clientId,
        });
        throw OAuthError.invalidCode('Authorization code has already been used');
      case 'consumed':
        break;
    }

    const record = consumption.code;

    if (record.clientId !== clientId) {
      throw OAuthError.invalidCode('Authorization code was issued to a different client');
    }

    const client = await this.clients.verifySecret(clientId, clientSecret);
    if (!client) {
      throw OAuthError.clientAuthFailed();
    }

    if (record.redirectUri !== redirectUri) {
      throw OAuthError.redirectMismatch();
    }

    return {
      subject: record.subject,
      clientId: record.clientId,
      scope: record.scope,
      certFingerprint: record.certFingerprint,
    };
  }
}
