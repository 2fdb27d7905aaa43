import { generateState } from '@campus-sso/shared';
import type { PendingLogin, CreatePendingLoginInput, ExchangeStart } from '../../types/session.js';
import type { ILoginStateStorage } from '../interfaces/login-state-storage.js';
import { STATE_LENGTH } from '../../config/sites.js';

/**
 * In-memory pending login storage implementation
 */
export class MemoryLoginStateStorage implements ILoginStateStorage {
  private logins = new Map<string, PendingLogin>(); // state -> login

  async create(input: CreatePendingLoginInput): Promise<PendingLogin> {
    const login: PendingLogin = {
      status: 'code-pending',
      state: generateState(STATE_LENGTH),
      returnTo: input.returnTo,
      createdAt: new Date(),
      expiresAt: input.expiresAt,
    };

    this.logins.set(login.state, login);
    return login;
  }

  async beginExchange(state: string, now: Date): Promise<ExchangeStart> {
    // Check-and-set with no await in between
    const login = this.logins.get(state);
    if (!login) {
      return { outcome: 'unknown' };
    }
    if (login.expiresAt <= now) {
      this.logins.delete(state);
      return { outcome: 'expired' };
    }
    if (login.status === 'exchanging') {
      return { outcome: 'already_exchanging' };
    }

    const exchanging = { ...login, status: 'exchanging' as const, exchangeStartedAt: now };
    this.logins.set(state, exchanging);
    return { outcome: 'exchanging', login: exchanging };
  }

  async delete(state: string): Promise<boolean> {
    return this.logins.delete(state);
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [state, login] of this.logins) {
      if (login.expiresAt <= now) {
        this.logins.delete(state);
        deleted++;
      }
    }

    return deleted;
  }
}
