import type { HttpBindings } from '@hono/node-server';
import type { ClientCertificateVariables } from '@campus-sso/shared';
import type { AuthenticatedClient } from './client.js';

/**
 * Hono context variables for identity provider routes
 */
export interface IdpVariables extends ClientCertificateVariables {
  client?: AuthenticatedClient;
}

export interface IdpEnv {
  Bindings: HttpBindings;
  Variables: IdpVariables;
}
