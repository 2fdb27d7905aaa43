import type { IResourceStorage } from '../interfaces/index.js';
import type { SiteName } from '../../config/sites.js';
import { MemoryLocalSessionStorage } from './local-session-storage.js';
import { MemoryLoginStateStorage } from './login-state-storage.js';

export { MemoryLocalSessionStorage } from './local-session-storage.js';
export { MemoryLoginStateStorage } from './login-state-storage.js';

/**
 * Create in-memory storage for one site
 */
export function createMemoryStorage(site: SiteName): IResourceStorage {
  return {
    sessions: new MemoryLocalSessionStorage(site),
    loginStates: new MemoryLoginStateStorage(),
  };
}
