import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Logger } from '@campus-sso/shared';
import { createMemoryStorage } from '../../storage/memory/index.js';
import { sweepExpired, startSweeper } from '../../storage/sweeper.js';
import type { IStorage } from '../../storage/interfaces/index.js';

const NOW = new Date('2026-03-02T08:00:00.000Z');
const LATER = new Date('2026-03-02T09:00:00.000Z');
const EARLIER = new Date('2026-03-02T07:00:00.000Z');

const refreshInput = {
  familyId: 'family-1',
  clientId: 'academic-api',
  subject: 'student01',
  scope: 'profile',
  expiresAt: LATER,
};

describe('Memory storage', () => {
  let storage: IStorage;

  beforeEach(() => {
    storage = createMemoryStorage();
  });

  describe('users', () => {
    it('should hash passwords and verify them', async () => {
      const user = await storage.users.create({ username: 'student01', password: 'student-password', role: 'student' });

      expect(user.passwordHash).toMatch(/^\$scrypt\$/);
      expect(user.passwordHash).not.toContain('student-password');
      expect((await storage.users.verifyPassword('student01', 'student-password'))?.subject).toBe('student01');
      expect(await storage.users.verifyPassword('student01', 'wrong-password')).toBeNull();
      expect(await storage.users.verifyPassword('nobody', 'student-password')).toBeNull();
    });

    it('should reject a second user with the same username', async () => {
      await storage.users.create({ username: 'student01', password: 'student-password', role: 'student' });

      await expect(
        storage.users.create({ username: 'student01', password: 'other-password', role: 'teacher' })
      ).rejects.toMatchObject({ code: 'user_exists' });
    });

    it('should let only one of two concurrent registrations win', async () => {
      const results = await Promise.allSettled([
        storage.users.create({ username: 'racer', password: 'racer-password', role: 'student' }),
        storage.users.create({ username: 'racer', password: 'racer-password', role: 'teacher' }),
      ]);

      expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    });

    it('should normalize and clear bound fingerprints', async () => {
      await storage.users.create({ username: 'student01', password: 'student-password', role: 'student' });

      const bound = await storage.users.bindFingerprint('student01', 'AB'.repeat(32));
      expect(bound?.certFingerprint).toBe('ab'.repeat(32));

      const cleared = await storage.users.bindFingerprint('student01', null);
      expect(cleared?.certFingerprint).toBeUndefined();
    });

    it('should change a password', async () => {
      await storage.users.create({ username: 'student01', password: 'student-password', role: 'student' });

      await storage.users.updatePassword('student01', 'new-password');

      expect(await storage.users.verifyPassword('student01', 'student-password')).toBeNull();
      expect((await storage.users.verifyPassword('student01', 'new-password'))?.subject).toBe('student01');
    });
  });

  describe('SSO sessions', () => {
    it('should store only the hash of the session id', async () => {
      const { session, value } = await storage.ssoSessions.create({ subject: 'student01', expiresAt: LATER });

      expect(session.sessionHash).not.toBe(value);
      expect((await storage.ssoSessions.findByValue(value))?.id).toBe(session.id);
    });

    it('should report a replaced session', async () => {
      const first = await storage.ssoSessions.create({ subject: 'student01', expiresAt: LATER });
      const second = await storage.ssoSessions.create({ subject: 'student01', expiresAt: LATER });

      expect(first.replaced).toBe(false);
      expect(second.replaced).toBe(true);
      expect(await storage.ssoSessions.findByValue(first.value)).toBeNull();
    });
  });

  describe('refresh tokens', () => {
    it('should rotate once, then report replay', async () => {
      const { value } = await storage.refreshTokens.create(refreshInput);

      expect((await storage.refreshTokens.rotate(value, NOW)).outcome).toBe('rotated');
      expect((await storage.refreshTokens.rotate(value, NOW)).outcome).toBe('replayed');
    });

    it('should report expiry without rotating', async () => {
      const { value } = await storage.refreshTokens.create({ ...refreshInput, expiresAt: EARLIER });

      expect((await storage.refreshTokens.rotate(value, NOW)).outcome).toBe('expired');
      expect((await storage.refreshTokens.findByValue(value))?.status).toBe('active');
    });

    it('should create tokens in a revoked family already revoked', async () => {
      await storage.refreshTokens.revokeFamily('family-1');

      const accessInput = {
        jti: 'jti-1',
        familyId: 'family-1',
        clientId: 'academic-api',
        subject: 'student01',
        scope: 'profile',
        expiresAt: LATER,
      };

      const { token } = await storage.refreshTokens.create(refreshInput);
      const record = await storage.accessTokens.create(accessInput);

      expect(token.status).toBe('revoked');
      expect(record.status).toBe('active');

      await storage.accessTokens.revokeFamily('family-1');
      const late = await storage.accessTokens.create({ ...accessInput, jti: 'jti-2' });
      expect(late.status).toBe('revoked');
    });

    it('should count revoked members of a family once', async () => {
      await storage.refreshTokens.create(refreshInput);
      await storage.refreshTokens.create(refreshInput);

      expect(await storage.refreshTokens.revokeFamily('family-1')).toBe(2);
      expect(await storage.refreshTokens.revokeFamily('family-1')).toBe(0);
    });
  });

  describe('sweeper', () => {
    it('should delete only expired records', async () => {
      await storage.ssoSessions.create({ subject: 'student01', expiresAt: EARLIER });
      const live = await storage.ssoSessions.create({ subject: 'teacher01', expiresAt: LATER });
      await storage.authorizationCodes.create({
        clientId: 'academic-api',
        redirectUri: 'https://academic.localhost:5001/session/callback',
        subject: 'student01',
        scope: 'profile',
        expiresAt: EARLIER,
      });
      await storage.refreshTokens.create({ ...refreshInput, expiresAt: EARLIER });

      expect(await sweepExpired(storage, NOW)).toBe(3);
      expect(await storage.ssoSessions.findByValue(live.value)).not.toBeNull();
      expect(await sweepExpired(storage, NOW)).toBe(0);
    });

    it('should sweep on its interval until stopped', async () => {
      vi.useFakeTimers();
      const logger: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        child: () => logger,
      };

      try {
        await storage.ssoSessions.create({ subject: 'student01', expiresAt: new Date(Date.now() - 1000) });

        const stop = startSweeper(storage, 1000, logger);
        await vi.advanceTimersByTimeAsync(1000);
        await vi.waitFor(() => {
          expect(logger.debug).toHaveBeenCalledWith('Expired records deleted', { deleted: 1 });
        });

        stop();
        await storage.ssoSessions.create({ subject: 'teacher01', expiresAt: new Date(Date.now() - 1000) });
        await vi.advanceTimersByTimeAsync(5000);
        expect(logger.debug).toHaveBeenCalledTimes(1);
      } finally {
        vi.useRealTimers();
      }
    });
  });
});
