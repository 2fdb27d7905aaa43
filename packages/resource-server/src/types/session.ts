import type { HeldTokenPair } from '@campus-sso/shared';
import type { SiteName } from '../config/sites.js';

/**
 * Site session: the browser holds only the id, the token pair stays here
 *
 * Only the SHA-256 hash of the id is kept.
 */
export interface LocalSession {
  sessionHash: string;
  site: SiteName;
  tokens: HeldTokenPair;
  createdAt: Date;
  /** Bounded by the refresh token expiry */
  expiresAt: Date;
}

/**
 * Authorization request in flight, keyed by its `state`
 */
interface PendingLoginBase {
  state: string;
  returnTo: string;
  createdAt: Date;
  expiresAt: Date;
}

export type PendingLogin =
  | (PendingLoginBase & { status: 'code-pending' })
  | (PendingLoginBase & { status: 'exchanging'; exchangeStartedAt: Date });

export interface CreatePendingLoginInput {
  returnTo: string;
  expiresAt: Date;
}

/**
 * Outcome of the atomic code-pending → exchanging transition
 */
export type ExchangeStart =
  | { outcome: 'exchanging'; login: PendingLogin & { status: 'exchanging' } }
  | { outcome: 'already_exchanging' }
  | { outcome: 'expired' }
  | { outcome: 'unknown' };
