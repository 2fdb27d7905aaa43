import { describe, it, expect, beforeAll } from 'vitest';
import {
  setupTestContext,
  login,
  obtainCode,
  obtainTokens,
  exchangeCode,
  validateToken,
  basicAuth,
  ACADEMIC,
  CLOUD,
  BOUND_FINGERPRINT,
  OTHER_FINGERPRINT,
  type TestContext,
  type TokenResponse,
  type ErrorResponse,
  type ValidateResponse,
} from '../test-setup.js';

describe('Validation endpoint', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await setupTestContext();
  });

  it('should return the identity for a fresh token', async () => {
    const tokens = await obtainTokens(ctx, 'teacher01', 'teacher-password', ACADEMIC);

    const res = await validateToken(ctx, { access_token: tokens.access_token });

    expect(res.status).toBe(200);
    expect(res.headers.get('Cache-Control')).toBe('no-store');
    const body = (await res.json()) as ValidateResponse;
    expect(body).toEqual({
      active: true,
      subject: 'teacher01',
      role: 'teacher',
      scope: 'profile courses.read grades.read',
      client_id: 'academic-api',
      expires_in: body.expires_in,
    });
    expect(body.expires_in).toBeGreaterThan(295);
    expect(body.expires_in).toBeLessThanOrEqual(300);
  });

  it('should accept the token as a bearer header', async () => {
    const tokens = await obtainTokens(ctx, 'student01', 'student-password', ACADEMIC);

    const res = await ctx.app.request('/auth/validate', {
      method: 'POST',
      headers: { Authorization: `Bearer ${tokens.access_token}` },
    });

    expect(res.status).toBe(200);
    expect(((await res.json()) as ValidateResponse).subject).toBe('student01');
  });

  it('should require a token', async () => {
    const res = await validateToken(ctx, {});

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorResponse).error).toBe('invalid_request');
  });

  it('should answer 401 token_unknown for garbage', async () => {
    const res = await validateToken(ctx, { access_token: 'not-a-jwt' });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: 'token_unknown',
      error_description: 'The access token is unknown, revoked, or malformed.',
    });
  });

  it('should reject a token presented for another client', async () => {
    const tokens = await obtainTokens(ctx, 'student01', 'student-password', ACADEMIC);

    const res = await validateToken(ctx, { access_token: tokens.access_token, client_id: CLOUD.clientId });

    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorResponse).error).toBe('token_unknown');
  });

  describe('certificate-bound tokens', () => {
    let tokens: TokenResponse;

    beforeAll(async () => {
      tokens = await obtainTokens(ctx, 'bound01', 'bound-password', CLOUD, {
        'X-Client-Cert-Fingerprint': BOUND_FINGERPRINT,
      });
    });

    it('should accept the bound fingerprint in the body', async () => {
      const res = await validateToken(ctx, {
        access_token: tokens.access_token,
        client_cert_fingerprint: BOUND_FINGERPRINT,
      });

      expect(res.status).toBe(200);
      expect(((await res.json()) as ValidateResponse).subject).toBe('bound01');
    });

    it('should accept the bound fingerprint from a forwarded header', async () => {
      const res = await validateToken(
        ctx,
        { access_token: tokens.access_token },
        { 'X-Client-Cert-Fingerprint': BOUND_FINGERPRINT }
      );

      expect(res.status).toBe(200);
    });

    it('should reject a missing fingerprint', async () => {
      const res = await validateToken(ctx, { access_token: tokens.access_token });

      expect(res.status).toBe(401);
      expect(((await res.json()) as ErrorResponse).error).toBe('certificate_mismatch');
    });

    it('should reject another fingerprint', async () => {
      const res = await validateToken(ctx, {
        access_token: tokens.access_token,
        client_cert_fingerprint: OTHER_FINGERPRINT,
      });

      expect(res.status).toBe(401);
      expect(((await res.json()) as ErrorResponse).error).toBe('certificate_mismatch');
    });

    it('should ignore forwarded headers when proxies are not trusted', async () => {
      const strict = await setupTestContext({ trustProxyCertHeaders: false });
      const sessionId = await login(strict, 'bound01', 'bound-password');
      const code = await obtainCode(strict, sessionId, CLOUD);
      const strictTokens = (await (await exchangeCode(strict, code, CLOUD)).json()) as TokenResponse;

      const res = await validateToken(
        strict,
        { access_token: strictTokens.access_token },
        { 'X-Client-Cert-Fingerprint': BOUND_FINGERPRINT }
      );

      expect(res.status).toBe(401);
      expect(((await res.json()) as ErrorResponse).error).toBe('certificate_mismatch');
    });
  });
});

describe('Revocation endpoint', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await setupTestContext();
  });

  function revoke(token: string, client = ACADEMIC): Promise<Response> {
    return Promise.resolve(
      ctx.app.request('/auth/revoke', {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: basicAuth(client.clientId, client.clientSecret),
        },
        body: new URLSearchParams({ token }),
      })
    );
  }

  it('should revoke a refresh token together with its access tokens', async () => {
    const tokens = await obtainTokens(ctx, 'student01', 'student-password', ACADEMIC);

    const res = await revoke(tokens.refresh_token);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({});

    const validated = await validateToken(ctx, { access_token: tokens.access_token });
    expect(validated.status).toBe(401);
    expect(((await validated.json()) as ErrorResponse).error).toBe('token_unknown');
  });

  it('should answer {} for an unknown token', async () => {
    const res = await revoke('not-a-token');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({});
  });

  it('should not revoke a token owned by another client', async () => {
    const tokens = await obtainTokens(ctx, 'student01', 'student-password', ACADEMIC);

    const res = await revoke(tokens.refresh_token, CLOUD);
    expect(res.status).toBe(200);

    const validated = await validateToken(ctx, { access_token: tokens.access_token });
    expect(validated.status).toBe(200);
  });

  it('should require client authentication', async () => {
    const res = await ctx.app.request('/auth/revoke', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ token: 'abc' }),
    });

    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorResponse).error).toBe('client_auth_failed');
  });
});

describe('Single sign-on across both sites', () => {
  it('should issue codes for both clients from one login', async () => {
    const ctx = await setupTestContext();
    const sessionId = await login(ctx, 'student01', 'student-password');

    const academicCode = await obtainCode(ctx, sessionId, ACADEMIC);
    const cloudCode = await obtainCode(ctx, sessionId, CLOUD);

    const academic = (await (await exchangeCode(ctx, academicCode, ACADEMIC)).json()) as TokenResponse;
    const cloud = (await (await exchangeCode(ctx, cloudCode, CLOUD)).json()) as TokenResponse;

    const academicIdentity = (await (
      await validateToken(ctx, { access_token: academic.access_token, client_id: ACADEMIC.clientId })
    ).json()) as ValidateResponse;
    const cloudIdentity = (await (
      await validateToken(ctx, { access_token: cloud.access_token, client_id: CLOUD.clientId })
    ).json()) as ValidateResponse;

    expect(academicIdentity.subject).toBe('student01');
    expect(academicIdentity.role).toBe('student');
    expect(cloudIdentity.subject).toBe('student01');
    expect(cloudIdentity.scope).toBe('profile files.read files.write');
  });
});
