// User types
export * from './user.js';

// Session types
export * from './session.js';

// Token types
export * from './token.js';

// Client types
export * from './client.js';

// Hono context types
export * from './hono.js';
