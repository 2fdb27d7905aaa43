import { z } from 'zod';
import { OAuthError, type TokenResponse } from '@campus-sso/shared';
import type { ClientCredentials } from '../../types/client.js';
import type { IClientRegistry } from '../../storage/interfaces/index.js';
import type { TokenService } from '../../services/token-service.js';

export interface RefreshTokenHandlerOptions {
  clients: IClientRegistry;
  tokenService: TokenService;
}

const refreshTokenGrantSchema = z.object({
  refresh_token: z.string().min(1),
});

/**
 * Handle refresh token grant
 *
 * RFC 6749 Section 6, with rotation and replay detection:
 * - Each refresh token can only be used once
 * - A new refresh token is issued with each refresh
 * - If a rotated token is used again, the entire token family is revoked
 */
export function createRefreshTokenHandler(options: RefreshTokenHandlerOptions) {
  const { clients, tokenService } = options;

  return async (params: Record<string, string>, credentials: ClientCredentials): Promise<TokenResponse> => {
    const { refresh_token } = refreshTokenGrantSchema.parse(params);

    const client = await clients.verifySecret(credentials.clientId, credentials.clientSecret);
    if (!client) {
      throw OAuthError.clientAuthFailed();
    }

    const pair = await tokenService.refresh(refresh_token, client.clientId);

    return tokenService.toTokenResponse(pair);
  };
}
