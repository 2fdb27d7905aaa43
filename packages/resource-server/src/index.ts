// Programmatic API; `server.ts` is the process entry point
export { createResourceServer, type ResourceServerOptions, type ResourceServer } from './app.js';
export { IdentityProviderClient, type IdentityProviderClientOptions, type FetchLike } from './client/identity-provider-client.js';
export { SessionBridge, type SessionBridgeOptions, type BeginLoginResult, type CompleteLoginResult } from './bridge/session-bridge.js';
export { ValidationClient, type ValidationClientOptions } from './bridge/validation-client.js';
export {
  createSessionAuth,
  loginUrlFor,
  type SessionAuth,
  type SessionAuthOptions,
  type UnauthenticatedResponse,
} from './middleware/session-auth.js';
export { createSessionRoutes, stateCookieName, type MeResponse } from './routes/session.js';
export { createMemoryStorage, MemoryLocalSessionStorage, MemoryLoginStateStorage } from './storage/memory/index.js';
export { sweepExpired, startSweeper } from './storage/sweeper.js';
export type * from './storage/interfaces/index.js';
export type * from './types/index.js';
export { loadConfig, getConfig, resetConfig, type ResourceServerConfig } from './config/index.js';
export * from './config/sites.js';
