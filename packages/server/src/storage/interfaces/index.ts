export * from './user-storage.js';
export * from './session-storage.js';
export * from './authorization-code-storage.js';
export * from './token-storage.js';
export * from './client-registry.js';

import type { IUserStorage } from './user-storage.js';
import type { ISsoSessionStorage } from './session-storage.js';
import type { IAuthorizationCodeStorage } from './authorization-code-storage.js';
import type { IAccessTokenStorage, IRefreshTokenStorage } from './token-storage.js';

/**
 * Complete mutable storage for the identity provider
 */
export interface IStorage {
  users: IUserStorage;
  ssoSessions: ISsoSessionStorage;
  authorizationCodes: IAuthorizationCodeStorage;
  accessTokens: IAccessTokenStorage;
  refreshTokens: IRefreshTokenStorage;
}
