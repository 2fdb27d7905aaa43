import { describe, it, expect, beforeEach } from 'vitest';
import type { CertificateResponse } from '@campus-sso/shared';
import {
  setupTestContext,
  login,
  BOUND_FINGERPRINT,
  OTHER_FINGERPRINT,
  type TestContext,
  type ErrorResponse,
} from '../test-setup.js';

describe('Password and certificate rotation', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await setupTestContext();
  });

  function changePassword(sessionId: string | undefined, body: Record<string, string>): Promise<Response> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (sessionId) {
      headers['Cookie'] = `sso_session=${sessionId}`;
    }
    return Promise.resolve(ctx.app.request('/auth/password', { method: 'POST', headers, body: JSON.stringify(body) }));
  }

  function certificate(method: 'PUT' | 'DELETE', sessionId: string, fingerprint?: string): Promise<Response> {
    const headers: Record<string, string> = { Cookie: `sso_session=${sessionId}` };
    if (fingerprint) {
      headers['X-Client-Cert-Fingerprint'] = fingerprint;
    }
    return Promise.resolve(ctx.app.request('/auth/certificate', { method, headers }));
  }

  async function loginStatus(username: string, password: string, headers: Record<string, string> = {}) {
    const res = await ctx.app.request('/auth/login', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify({ username, password }),
    });
    return res.status;
  }

  describe('POST /auth/password', () => {
    it('should replace the password', async () => {
      const sessionId = await login(ctx, 'student01', 'student-password');

      const res = await changePassword(sessionId, {
        current_password: 'student-password',
        new_password: 'rotated-password',
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({});
      expect(await loginStatus('student01', 'student-password')).toBe(401);
      expect(await loginStatus('student01', 'rotated-password')).toBe(200);
    });

    it('should refuse a wrong current password', async () => {
      const sessionId = await login(ctx, 'student01', 'student-password');

      const res = await changePassword(sessionId, { current_password: 'guess', new_password: 'rotated-password' });

      expect(res.status).toBe(401);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('invalid_credentials');
      expect(await loginStatus('student01', 'student-password')).toBe(200);
    });

    it('should require a signed-in browser', async () => {
      const res = await changePassword(undefined, {
        current_password: 'student-password',
        new_password: 'rotated-password',
      });

      expect(res.status).toBe(401);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('no_session');
    });

    it('should refuse a short new password', async () => {
      const sessionId = await login(ctx, 'student01', 'student-password');

      const res = await changePassword(sessionId, { current_password: 'student-password', new_password: 'short' });

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('invalid_request');
    });
  });

  describe('/auth/certificate', () => {
    it('should bind the certificate presented with the request', async () => {
      const sessionId = await login(ctx, 'teacher01', 'teacher-password');

      const res = await certificate('PUT', sessionId, BOUND_FINGERPRINT);

      expect(res.status).toBe(200);
      const body = (await res.json()) as CertificateResponse;
      expect(body).toEqual({ username: 'teacher01', cert_fingerprint: BOUND_FINGERPRINT });
      expect(
        await loginStatus('teacher01', 'teacher-password', { 'X-Client-Cert-Fingerprint': OTHER_FINGERPRINT })
      ).toBe(401);
    });

    it('should refuse to bind without a certificate', async () => {
      const sessionId = await login(ctx, 'teacher01', 'teacher-password');

      const res = await certificate('PUT', sessionId);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: 'No client certificate presented',
      });
    });

    it('should keep a binding that the session did not prove', async () => {
      const sessionId = await login(ctx, 'bound01', 'bound-password');

      const res = await certificate('DELETE', sessionId);

      expect(res.status).toBe(401);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('certificate_mismatch');
      const user = await ctx.storage.users.findBySubject('bound01');
      expect(user?.certFingerprint).toBe(BOUND_FINGERPRINT);
    });

    it('should remove a binding when signed in with the bound certificate', async () => {
      const sessionId = await login(ctx, 'bound01', 'bound-password', {
        'X-Client-Cert-Fingerprint': BOUND_FINGERPRINT,
      });

      const res = await certificate('DELETE', sessionId, BOUND_FINGERPRINT);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ username: 'bound01', cert_fingerprint: null });
    });
  });
});
