import { z } from 'zod';
import { Agent, type Dispatcher } from 'undici';
import {
  OAuthError,
  ROLES,
  createLogger,
  describeError,
  isOAuthErrorCode,
  type AuthenticatedIdentity,
  type HeldTokenPair,
  type Logger,
} from '@campus-sso/shared';

/**
 * The subset of `fetch` the client needs; tests pass the identity provider's
 * `app.request` here
 */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface IdentityProviderClientOptions {
  /** Back-channel base URL of the identity provider */
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  timeoutMs: number;
  /** PEM of the CA that issued the identity provider's certificate */
  caCert?: string | Buffer;
  fetch?: FetchLike;
  logger?: Logger;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.literal('Bearer'),
  expires_in: z.number().int().nonnegative(),
  refresh_token: z.string().min(1),
  refresh_expires_in: z.number().int().nonnegative(),
  subject: z.string().min(1),
  scope: z.string(),
});

const validateResponseSchema = z.object({
  active: z.literal(true),
  subject: z.string().min(1),
  role: z.enum(ROLES),
  scope: z.string(),
  client_id: z.string(),
  expires_in: z.number(),
});

const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * Back-channel client for the identity provider's token, validate and
 * revoke endpoints
 *
 * Fails closed: a timeout, a transport error or a body that does not parse
 * becomes `unauthenticated`. Error bodies from the identity provider are
 * rebuilt as the same `OAuthError` code.
 */
export class IdentityProviderClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(private readonly options: IdentityProviderClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.dispatcher = options.caCert ? new Agent({ connect: { ca: options.caCert } }) : undefined;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createLogger('idp-client');
  }

  get clientId(): string {
    return this.options.clientId;
  }

  /**
   * Redeem an authorization code for a token pair
   */
  async exchangeCode(code: string, redirectUri: string): Promise<HeldTokenPair> {
    const body = await this.post(
      '/auth/token',
      { grant_type: 'authorization_code', code, redirect_uri: redirectUri },
      true
    );
    return this.toTokenPair(body);
  }

  /**
   * Rotate a refresh token
   */
  async refresh(refreshToken: string): Promise<HeldTokenPair> {
    const body = await this.post('/auth/token', { grant_type: 'refresh_token', refresh_token: refreshToken }, true);
    return this.toTokenPair(body);
  }

  /**
   * Validate an access token, forwarding the browser's certificate fingerprint
   *
   * This client's id is sent as the expected audience.
   */
  async validate(accessToken: string, certFingerprint?: string): Promise<AuthenticatedIdentity> {
    const params: Record<string, string> = { access_token: accessToken, client_id: this.options.clientId };
    if (certFingerprint) {
      params['client_cert_fingerprint'] = certFingerprint;
    }

    const parsed = validateResponseSchema.safeParse(await this.post('/auth/validate', params, false));
    if (!parsed.success) {
      throw OAuthError.unauthenticated('Malformed validation response', parsed.error);
    }

    return { subject: parsed.data.subject, role: parsed.data.role, scope: parsed.data.scope };
  }

  /**
   * Revoke a token; the identity provider answers `{}` whether or not it knew it
   */
  async revoke(token: string): Promise<void> {
    await this.post('/auth/revoke', { token }, true);
  }

  private toTokenPair(body: unknown): HeldTokenPair {
    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw OAuthError.unauthenticated('Malformed token response', parsed.error);
    }

    const now = Date.now();
    return {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token,
      subject: parsed.data.subject,
      clientId: this.options.clientId,
      scope: parsed.data.scope,
      accessExpiresAt: new Date(now + parsed.data.expires_in * 1000),
      refreshExpiresAt: new Date(now + parsed.data.refresh_expires_in * 1000),
    };
  }

  private async post(path: string, params: Record<string, string>, authenticate: boolean): Promise<unknown> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    };
    if (authenticate) {
      const { clientId, clientSecret } = this.options;
      const credentials = Buffer.from(`${encodeURIComponent(clientId)}:${encodeURIComponent(clientSecret)}`).toString(
        'base64'
      );
      headers['Authorization'] = `Basic ${credentials}`;
    }

    // Node's fetch takes undici's `dispatcher`; the agent trusts only the configured CA
    const init: RequestInit & { dispatcher?: Dispatcher } = {
      method: 'POST',
      headers,
      body: new URLSearchParams(params).toString(),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    };
    if (this.dispatcher) {
      init.dispatcher = this.dispatcher;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    } catch (error) {
      this.logger.warn('Identity provider unreachable', { path, error: describeError(error) });
      throw OAuthError.unauthenticated('Identity provider unreachable', error);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      this.logger.warn('Identity provider sent a non-JSON body', { path, status: response.status });
      throw OAuthError.unauthenticated('Identity provider sent an unreadable response', error);
    }

    if (!response.ok) {
      throw this.toError(body, response.status);
    }

    return body;
  }

  private toError(body: unknown, status: number): OAuthError {
    const parsed = errorResponseSchema.safeParse(body);
    if (parsed.success && isOAuthErrorCode(parsed.data.error)) {
      return new OAuthError(parsed.data.error, parsed.data.error_description);
    }

    this.logger.warn('Identity provider sent an unknown error', { status });
    return OAuthError.unauthenticated(`Identity provider answered with status ${status}`);
  }
}
