export { createSessionRoutes, type SessionRouteOptions } from './session.js';
export { createAccountRoutes, type AccountRouteOptions } from './account.js';
export { createRegisterRoutes, type RegisterRouteOptions } from './register.js';
export { createAuthorizeRoutes, type AuthorizeRouteOptions } from './authorize.js';
export { createTokenRoutes, type TokenRouteOptions } from './token.js';
export { createValidateRoutes, type ValidateRouteOptions } from './validate.js';
export { createRevokeRoutes, type RevokeRouteOptions } from './revoke.js';
