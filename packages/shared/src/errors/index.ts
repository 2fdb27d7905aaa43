export * from './error-codes.js';
export * from './oauth-error.js';
