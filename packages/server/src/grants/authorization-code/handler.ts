import { z } from 'zod';
import type { TokenResponse } from '@campus-sso/shared';
import type { ClientCredentials } from '../../types/client.js';
import type { AuthorizationCodeIssuer } from '../../services/authorization-code-issuer.js';
import type { TokenService } from '../../services/token-service.js';

export interface AuthorizationCodeHandlerOptions {
  codeIssuer: AuthorizationCodeIssuer;
  tokenService: TokenService;
}

const authorizationCodeGrantSchema = z.object({
  code: z.string().min(1),
  redirect_uri: z.string().min(1),
});

/**
 * Handle authorization code token exchange
 *
 * RFC 6749 Section 4.1.3. The client secret is checked by the issuer after
 * the code has been consumed.
 */
export function createAuthorizationCodeHandler(options: AuthorizationCodeHandlerOptions) {
  const { codeIssuer, tokenService } = options;

  return async (params: Record<string, string>, credentials: ClientCredentials): Promise<TokenResponse> => {
    const { code, redirect_uri } = authorizationCodeGrantSchema.parse(params);

    const grant = await codeIssuer.redeem(code, credentials.clientId, credentials.clientSecret, redirect_uri);
    const pair = await tokenService.issueTokens(grant);

    return tokenService.toTokenResponse(pair);
  };
}
