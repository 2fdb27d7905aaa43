import type { HttpBindings } from '@hono/node-server';
import type { AuthenticatedIdentity, ClientCertificateVariables } from '@campus-sso/shared';

/**
 * Hono context variables for resource server routes
 */
export interface ResourceVariables extends ClientCertificateVariables {
  /** Set by `sessionAuth()` */
  identity?: AuthenticatedIdentity;
}

export interface ResourceEnv {
  Bindings: HttpBindings;
  Variables: ResourceVariables;
}
