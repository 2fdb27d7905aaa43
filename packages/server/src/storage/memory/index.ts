import type { IStorage } from '../interfaces/index.js';
import { MemoryUserStorage } from './user-storage.js';
import { MemorySsoSessionStorage } from './session-storage.js';
import { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
import { MemoryAccessTokenStorage, MemoryRefreshTokenStorage } from './token-storage.js';

export { MemoryUserStorage } from './user-storage.js';
export { MemorySsoSessionStorage } from './session-storage.js';
export { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
export { MemoryAccessTokenStorage, MemoryRefreshTokenStorage } from './token-storage.js';
export { MemoryClientRegistry } from './client-registry.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): IStorage {
  return {
    users: new MemoryUserStorage(),
    ssoSessions: new MemorySsoSessionStorage(),
    authorizationCodes: new MemoryAuthorizationCodeStorage(),
    accessTokens: new MemoryAccessTokenStorage(),
    refreshTokens: new MemoryRefreshTokenStorage(),
  };
}
