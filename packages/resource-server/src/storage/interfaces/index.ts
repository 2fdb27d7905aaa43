export * from './local-session-storage.js';
export * from './login-state-storage.js';

import type { ILocalSessionStorage } from './local-session-storage.js';
import type { ILoginStateStorage } from './login-state-storage.js';

/**
 * Complete storage for one resource server
 */
export interface IResourceStorage {
  sessions: ILocalSessionStorage;
  loginStates: ILoginStateStorage;
}
