import type { PendingLogin, CreatePendingLoginInput, ExchangeStart } from '../../types/session.js';

/**
 * Storage interface for authorization requests awaiting their callback
 */
export interface ILoginStateStorage {
  /**
   * Create a pending login under a fresh `state`
   */
  create(input: CreatePendingLoginInput): Promise<PendingLogin>;

  /**
   * Move a pending login to `exchanging`
   * Must be atomic: only one callback may start the exchange.
   */
  beginExchange(state: string, now: Date): Promise<ExchangeStart>;

  delete(state: string): Promise<boolean>;

  deleteExpired(now: Date): Promise<number>;
}
