export type * from './session.js';
export type * from './hono.js';
