import type { ClientRegistration } from '../../types/client.js';

/**
 * Read-only registry of resource servers allowed to use the identity provider
 */
export interface IClientRegistry {
  findByClientId(clientId: string): Promise<ClientRegistration | null>;

  /**
   * Returns the client when the secret matches, null for an unknown client or wrong secret
   */
  verifySecret(clientId: string, clientSecret: string): Promise<ClientRegistration | null>;
}
