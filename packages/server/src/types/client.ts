/**
 * Registered resource server (OAuth client)
 */
export interface ClientRegistration {
  clientId: string;
  name: string;
  secretHash: string;
  redirectUri: string;
  allowedScopes: string[];
  defaultScopes: string[];
}

export interface ClientRegistrationInput {
  clientId: string;
  name: string;
  clientSecret: string;
  redirectUri: string;
  allowedScopes: string[];
  defaultScopes?: string[];
}

/**
 * Client authentication methods
 */
export type ClientAuthMethod = 'client_secret_basic' | 'client_secret_post';

/**
 * Authenticated client context
 */
export interface AuthenticatedClient {
  client: ClientRegistration;
  authMethod: ClientAuthMethod;
}

/**
 * Credentials presented on the back channel
 */
export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
  authMethod: ClientAuthMethod;
}
