// Re-export all shared types
export * from './types/oauth.js';
export * from './types/token.js';
export * from './types/user.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './logging/logger.js';

// Crypto helpers
export * from './crypto/index.js';

// Configuration helpers
export * from './config/env.js';

// Middleware
export * from './middleware/client-certificate.js';
export * from './middleware/http.js';

// HTTP helpers
export * from './http/return-to.js';
