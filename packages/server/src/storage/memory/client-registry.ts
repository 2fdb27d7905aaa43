import { hashSecret, verifySecret } from '@campus-sso/shared';
import type { ClientRegistration, ClientRegistrationInput } from '../../types/client.js';
import type { IClientRegistry } from '../interfaces/client-registry.js';

/**
 * In-memory client registry, fixed at start-up
 */
export class MemoryClientRegistry implements IClientRegistry {
  private readonly clients: ReadonlyMap<string, ClientRegistration>;

  constructor(registrations: ClientRegistration[]) {
    this.clients = new Map(registrations.map((client) => [client.clientId, client]));
  }

  /**
   * Build a registry from plaintext secrets, hashing each one
   */
  static async create(inputs: ClientRegistrationInput[]): Promise<MemoryClientRegistry> {
    const registrations = await Promise.all(
      inputs.map(async (input): Promise<ClientRegistration> => ({
        clientId: input.clientId,
        name: input.name,
        secretHash: await hashSecret(input.clientSecret),
        redirectUri: input.redirectUri,
        allowedScopes: [...input.allowedScopes],
        defaultScopes: [...(input.defaultScopes ?? input.allowedScopes)],
      }))
    );
    return new MemoryClientRegistry(registrations);
  }

  async findByClientId(clientId: string): Promise<ClientRegistration | null> {
    return this.clients.get(clientId) ?? null;
  }

  async verifySecret(clientId: string, clientSecret: string): Promise<ClientRegistration | null> {
    const client = this.clients.get(clientId);
    if (!client) return null;

    const valid = await verifySecret(clientSecret, client.secretHash);
    return valid ? client : null;
  }
}
