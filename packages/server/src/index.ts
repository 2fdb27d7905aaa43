// Programmatic API; `server.ts` is the process entry point
export { createIdentityProvider, type IdentityProviderOptions, type IdentityProvider } from './app.js';
export { createMemoryStorage, MemoryClientRegistry } from './storage/memory/index.js';
export { sweepExpired, startSweeper } from './storage/sweeper.js';
export * from './services/index.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export { loadConfig, getConfig, resetConfig, readSecret, constants, type Config } from './config/index.js';
export { parseSeed, loadSeedFile, resolveClientInputs, applySeedUsers, DEFAULT_SEED_FILE, type SeedFile } from './config/seed.js';
