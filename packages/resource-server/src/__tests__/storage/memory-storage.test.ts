import { describe, it, expect, beforeEach } from 'vitest';
import type { HeldTokenPair } from '@campus-sso/shared';
import { createMemoryStorage } from '../../storage/memory/index.js';
import { sweepExpired } from '../../storage/sweeper.js';
import type { IResourceStorage } from '../../storage/interfaces/index.js';

const NOW = new Date('2026-03-02T08:00:00.000Z');
const LATER = new Date('2026-03-02T09:00:00.000Z');
const EARLIER = new Date('2026-03-02T07:00:00.000Z');

function tokens(overrides: Partial<HeldTokenPair> = {}): HeldTokenPair {
  return {
    accessToken: 'access-1',
    refreshToken: 'refresh-1',
    subject: 'student01',
    clientId: 'academic-api',
    scope: 'profile',
    accessExpiresAt: NOW,
    refreshExpiresAt: LATER,
    ...overrides,
  };
}

describe('Resource server memory storage', () => {
  let storage: IResourceStorage;

  beforeEach(() => {
    storage = createMemoryStorage('academic');
  });

  describe('site sessions', () => {
    it('should store only the hash of the session id', async () => {
      const { session, value } = await storage.sessions.create(tokens());

      expect(session.sessionHash).not.toBe(value);
      expect(session.site).toBe('academic');
      expect(session.expiresAt).toEqual(LATER);
      expect((await storage.sessions.findByValue(value))?.tokens.accessToken).toBe('access-1');
    });

    it('should replace the held pair and extend the session', async () => {
      const { value } = await storage.sessions.create(tokens());
      const later = new Date('2026-03-02T10:00:00.000Z');

      const updated = await storage.sessions.replaceTokens(
        value,
        tokens({ accessToken: 'access-2', refreshToken: 'refresh-2', refreshExpiresAt: later })
      );

      expect(updated?.tokens.refreshToken).toBe('refresh-2');
      expect(updated?.expiresAt).toEqual(later);
      expect(await storage.sessions.replaceTokens('missing', tokens())).toBeNull();
    });

    it('should return what a deleted session held, once', async () => {
      const { value } = await storage.sessions.create(tokens());

      expect((await storage.sessions.delete(value))?.tokens.refreshToken).toBe('refresh-1');
      expect(await storage.sessions.delete(value)).toBeNull();
    });
  });

  describe('pending logins', () => {
    it('should start the exchange once', async () => {
      const login = await storage.loginStates.create({ returnTo: '/courses', expiresAt: LATER });

      const first = await storage.loginStates.beginExchange(login.state, NOW);
      const second = await storage.loginStates.beginExchange(login.state, NOW);

      expect(first.outcome).toBe('exchanging');
      expect(first.outcome === 'exchanging' ? first.login.returnTo : null).toBe('/courses');
      expect(second.outcome).toBe('already_exchanging');
    });

    it('should report unknown and expired states', async () => {
      const login = await storage.loginStates.create({ returnTo: '/', expiresAt: EARLIER });

      expect((await storage.loginStates.beginExchange('made-up', NOW)).outcome).toBe('unknown');
      expect((await storage.loginStates.beginExchange(login.state, NOW)).outcome).toBe('expired');
      expect((await storage.loginStates.beginExchange(login.state, NOW)).outcome).toBe('unknown');
    });
  });

  it('should sweep only expired records', async () => {
    await storage.sessions.create(tokens({ refreshExpiresAt: EARLIER }));
    const live = await storage.sessions.create(tokens());
    await storage.loginStates.create({ returnTo: '/', expiresAt: EARLIER });
    await storage.loginStates.create({ returnTo: '/', expiresAt: LATER });

    expect(await sweepExpired(storage, NOW)).toBe(2);
    expect(await storage.sessions.findByValue(live.value)).not.toBeNull();
    expect(await sweepExpired(storage, NOW)).toBe(0);
  });
});
