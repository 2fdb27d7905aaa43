import { createIdentityProvider, type IdentityProvider, type IdentityProviderOptions } from '../app.js';
import { createMemoryStorage, MemoryClientRegistry } from '../storage/memory/index.js';
import type { IStorage } from '../storage/interfaces/index.js';
import type { ClientRegistrationInput } from '../types/client.js';

/**
 * Test fixtures and helpers
 */

export const TEST_SIGNING_SECRET = 'test-secret';
export const TEST_ISSUER = 'https://auth.localhost:5000';

export const BOUND_FINGERPRINT = 'ab'.repeat(32);
export const OTHER_FINGERPRINT = 'cd'.repeat(32);

export interface TestClient {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export const ACADEMIC: TestClient = {
  clientId: 'academic-api',
  clientSecret: 'academic-secret',
  redirectUri: 'https://academic.localhost:5001/session/callback',
};

export const CLOUD: TestClient = {
  clientId: 'cloud-api',
  clientSecret: 'cloud-secret',
  redirectUri: 'https://cloud.localhost:5002/session/callback',
};

const CLIENT_INPUTS: ClientRegistrationInput[] = [
  {
    ...ACADEMIC,
    name: 'Academic Portal',
    allowedScopes: ['profile', 'courses.read', 'courses.write', 'grades.read', 'grades.write'],
    defaultScopes: ['profile', 'courses.read', 'grades.read'],
  },
  {
    ...CLOUD,
    name: 'Cloud Drive',
    allowedScopes: ['profile', 'files.read', 'files.write', 'files.share'],
    defaultScopes: ['profile', 'files.read', 'files.write'],
  },
];

// Create Basic auth header
export function basicAuth(clientId: string, clientSecret: string): string {
  const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
  return `Basic ${credentials}`;
}

/**
 * Value of a cookie set by a response, or undefined
 */
export function readSetCookie(res: Response, name: string): string | undefined {
  for (const header of res.headers.getSetCookie()) {
    const pair = header.split(';')[0] ?? '';
    const separator = pair.indexOf('=');
    if (separator > 0 && pair.slice(0, separator) === name) {
      return pair.slice(separator + 1);
    }
  }
  return undefined;
}

// Type helpers for test responses
export interface TokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
  refresh_token: string;
  refresh_expires_in: number;
  subject: string;
  scope: string;
}

export interface ErrorResponse {
  error: string;
  error_description?: string;
  state?: string;
}

export interface ValidateResponse {
  active: boolean;
  subject: string;
  role: string;
  scope: string;
  client_id: string;
  expires_in: number;
}

// Shared test context
export interface TestContext extends IdentityProvider {
  storage: IStorage;
  clients: MemoryClientRegistry;
}

/**
 * Identity provider over fresh memory storage, with two clients and three users:
 * student01, teacher01 and bound01 (bound to BOUND_FINGERPRINT)
 */
export async function setupTestContext(overrides: Partial<IdentityProviderOptions> = {}): Promise<TestContext> {
  const storage = createMemoryStorage();
  const clients = await MemoryClientRegistry.create(CLIENT_INPUTS);

  await Promise.all([
    storage.users.create({ username: 'student01', password: 'student-password', role: 'student' }),
    storage.users.create({ username: 'teacher01', password: 'teacher-password', role: 'teacher' }),
    storage.users.create({
      username: 'bound01',
      password: 'bound-password',
      role: 'student',
      certFingerprint: BOUND_FINGERPRINT,
    }),
  ]);

  const provider = createIdentityProvider({
    storage,
    clients,
    signingSecret: TEST_SIGNING_SECRET,
    issuer: TEST_ISSUER,
    enableLogging: false,
    // High limit for tests
    rateLimit: { windowMs: 60000, maxRequests: 1000 },
    ...overrides,
  });

  return { ...provider, storage, clients };
}

/**
 * Log in over HTTP and return the SSO session id from the cookie
 */
export async function login(
  ctx: TestContext,
  username: string,
  password: string,
  headers: Record<string, string> = {}
): Promise<string> {
  const res = await ctx.app.request('/auth/login', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify({ username, password }),
  });
  const sessionId = readSetCookie(res, 'sso_session');
  if (res.status !== 200 || !sessionId) {
    throw new Error(`Login failed with status ${res.status}`);
  }
  return sessionId;
}

/**
 * Run the authorize endpoint with a session and return the response
 */
export function authorize(
  ctx: TestContext,
  sessionId: string | undefined,
  client: TestClient,
  params: Record<string, string> = {}
): Promise<Response> {
  const query = new URLSearchParams({
    response_type: 'code',
    client_id: client.clientId,
    redirect_uri: client.redirectUri,
    ...params,
  });
  const headers: Record<string, string> = sessionId ? { Cookie: `sso_session=${sessionId}` } : {};
  return Promise.resolve(ctx.app.request(`/auth/authorize?${query.toString()}`, { headers }));
}

/**
 * Authorize and pull the code out of the redirect
 */
export async function obtainCode(
  ctx: TestContext,
  sessionId: string,
  client: TestClient,
  params: Record<string, string> = {}
): Promise<string> {
  const res = await authorize(ctx, sessionId, client, params);
  const location = res.headers.get('Location');
  const code = location ? new URL(location).searchParams.get('code') : null;
  if (!code) {
    throw new Error(`Authorize did not return a code (status ${res.status})`);
  }
  return code;
}

/**
 * Redeem a code at the token endpoint
 */
export function exchangeCode(
  ctx: TestContext,
  code: string,
  client: TestClient,
  redirectUri: string = client.redirectUri
): Promise<Response> {
  return Promise.resolve(
    ctx.app.request('/auth/token', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Authorization: basicAuth(client.clientId, client.clientSecret),
      },
      body: new URLSearchParams({ grant_type: 'authorization_code', code, redirect_uri: redirectUri }),
    })
  );
}

/**
 * Refresh at the token endpoint
 */
export function refreshTokens(ctx: TestContext, refreshToken: string, client: TestClient): Promise<Response> {
  return Promise.resolve(
    ctx.app.request('/auth/token', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Authorization: basicAuth(client.clientId, client.clientSecret),
      },
      body: new URLSearchParams({ grant_type: 'refresh_token', refresh_token: refreshToken }),
    })
  );
}

/**
 * Call the validate endpoint
 */
export function validateToken(
  ctx: TestContext,
  body: Record<string, string>,
  headers: Record<string, string> = {}
): Promise<Response> {
  return Promise.resolve(
    ctx.app.request('/auth/validate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    })
  );
}

/**
 * Full browser flow: login, authorize, redeem
 */
export async function obtainTokens(
  ctx: TestContext,
  username: string,
  password: string,
  client: TestClient,
  headers: Record<string, string> = {}
): Promise<TokenResponse> {
  const sessionId = await login(ctx, username, password, headers);
  const code = await obtainCode(ctx, sessionId, client);
  const res = await exchangeCode(ctx, code, client);
  if (res.status !== 200) {
    throw new Error(`Code exchange failed with status ${res.status}`);
  }
  return (await res.json()) as TokenResponse;
}
