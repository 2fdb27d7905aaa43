import { describe, it, expect, beforeAll } from 'vitest';
import {
  setupTestContext,
  login,
  authorize,
  ACADEMIC,
  CLOUD,
  type TestContext,
  type ErrorResponse,
} from '../test-setup.js';

describe('Authorization endpoint', () => {
  let ctx: TestContext;
  let sessionId: string;

  beforeAll(async () => {
    ctx = await setupTestContext();
    sessionId = await login(ctx, 'student01', 'student-password');
  });

  it('should redirect back with a code and the state', async () => {
    const res = await authorize(ctx, sessionId, ACADEMIC, { state: 'state-123' });

    expect(res.status).toBe(302);
    const location = new URL(res.headers.get('Location') ?? '');
    expect(location.origin + location.pathname).toBe(ACADEMIC.redirectUri);
    expect(location.searchParams.get('code')).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(location.searchParams.get('state')).toBe('state-123');
  });

  it('should default response_type to code', async () => {
    const res = await ctx.app.request(
      `/auth/authorize?${new URLSearchParams({ client_id: CLOUD.clientId, redirect_uri: CLOUD.redirectUri })}`,
      { headers: { Cookie: `sso_session=${sessionId}` } }
    );

    expect(res.status).toBe(302);
    expect(new URL(res.headers.get('Location') ?? '').searchParams.get('code')).not.toBeNull();
  });

  it('should accept the session in the X-Session-Token header', async () => {
    const query = new URLSearchParams({ client_id: ACADEMIC.clientId, redirect_uri: ACADEMIC.redirectUri });
    const res = await ctx.app.request(`/auth/authorize?${query}`, { headers: { 'X-Session-Token': sessionId } });

    expect(res.status).toBe(302);
    expect(new URL(res.headers.get('Location') ?? '').searchParams.get('code')).not.toBeNull();
  });

  it('should send a browser without a session to the login page', async () => {
    const res = await authorize(ctx, undefined, ACADEMIC, { state: 'state-123' });

    expect(res.status).toBe(302);
    const location = new URL(res.headers.get('Location') ?? '', 'https://auth.localhost:5000');
    expect(location.pathname).toBe('/login');

    const returnTo = location.searchParams.get('return_to') ?? '';
    const back = new URL(returnTo, 'https://auth.localhost:5000');
    expect(back.pathname).toBe('/auth/authorize');
    expect(back.searchParams.get('client_id')).toBe('academic-api');
    expect(back.searchParams.get('redirect_uri')).toBe(ACADEMIC.redirectUri);
    expect(back.searchParams.get('state')).toBe('state-123');
  });

  it('should answer an unknown client directly', async () => {
    const res = await authorize(ctx, sessionId, { ...ACADEMIC, clientId: 'no-such-client' });

    expect(res.status).toBe(400);
    expect(res.headers.get('Location')).toBeNull();
    const body = (await res.json()) as ErrorResponse;
    expect(body.error).toBe('unknown_client');
  });

  it('should never redirect to an unregistered URI', async () => {
    const res = await authorize(ctx, sessionId, { ...ACADEMIC, redirectUri: 'https://evil.example/callback' });

    expect(res.status).toBe(400);
    expect(res.headers.get('Location')).toBeNull();
    const body = (await res.json()) as ErrorResponse;
    expect(body.error).toBe('redirect_mismatch');
  });

  it('should check the client before the session', async () => {
    const res = await authorize(ctx, undefined, { ...ACADEMIC, redirectUri: 'https://evil.example/callback' });

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorResponse;
    expect(body.error).toBe('redirect_mismatch');
  });

  it('should redirect an invalid scope back to the client', async () => {
    const res = await authorize(ctx, sessionId, ACADEMIC, { scope: 'files.read', state: 'state-123' });

    expect(res.status).toBe(302);
    const location = new URL(res.headers.get('Location') ?? '');
    expect(location.origin + location.pathname).toBe(ACADEMIC.redirectUri);
    expect(location.searchParams.get('error')).toBe('invalid_scope');
    expect(location.searchParams.get('state')).toBe('state-123');
    expect(location.searchParams.get('code')).toBeNull();
  });

  it('should redirect an unsupported response_type back to the client', async () => {
    const res = await authorize(ctx, sessionId, ACADEMIC, { response_type: 'token' });

    expect(res.status).toBe(302);
    const location = new URL(res.headers.get('Location') ?? '');
    expect(location.searchParams.get('error')).toBe('unsupported_response_type');
  });

  it('should require client_id and redirect_uri', async () => {
    const res = await ctx.app.request('/auth/authorize?response_type=code', {
      headers: { Cookie: `sso_session=${sessionId}` },
    });

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorResponse;
    expect(body.error).toBe('invalid_request');
  });
});
