import type { Logger } from '@campus-sso/shared';
import type { IStorage, IClientRegistry } from '../storage/interfaces/index.js';
import { SessionManager } from './session-manager.js';
import { AuthorizationCodeIssuer } from './authorization-code-issuer.js';
import { TokenService } from './token-service.js';

export { SessionManager, type SessionManagerOptions } from './session-manager.js';
export { AuthorizationCodeIssuer, type AuthorizationCodeIssuerOptions, type IssuedCode } from './authorization-code-issuer.js';
export { TokenService, type TokenServiceOptions, type IssueTokensInput } from './token-service.js';
export { ScopeService, scopeService } from './scope-service.js';

export interface ProtocolServicesOptions {
  storage: IStorage;
  clients: IClientRegistry;
  signingSecret: string;
  issuer: string;
  accessTokenTtl: number;
  refreshTokenTtl: number;
  authorizationCodeTtl: number;
  ssoSessionTtl: number;
  logger: Logger;
}

export interface ProtocolServices {
  sessionManager: SessionManager;
  codeIssuer: AuthorizationCodeIssuer;
  tokenService: TokenService;
}

/**
 * Wire the protocol services over one storage instance
 */
export function createProtocolServices(options: ProtocolServicesOptions): ProtocolServices {
  const { storage, clients, logger } = options;

  const sessionManager = new SessionManager({
    users: storage.users,
    sessions: storage.ssoSessions,
    sessionTtl: options.ssoSessionTtl,
    logger: logger.child('session'),
  });

  const codeIssuer = new AuthorizationCodeIssuer({
    sessionManager,
    clients,
    codes: storage.authorizationCodes,
    codeTtl: options.authorizationCodeTtl,
    logger: logger.child('code'),
  });

  const tokenService = new TokenService({
    accessTokens: storage.accessTokens,
    refreshTokens: storage.refreshTokens,
    users: storage.users,
    signingSecret: options.signingSecret,
    issuer: options.issuer,
    accessTokenTtl: options.accessTokenTtl,
    refreshTokenTtl: options.refreshTokenTtl,
    logger: logger.child('token'),
  });

  return { sessionManager, codeIssuer, tokenService };
}
