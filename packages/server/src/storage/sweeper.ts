import { describeError, type Logger } from '@campus-sso/shared';
import type { IStorage } from './interfaces/index.js';

/**
 * Delete expired records from every store
 */
export async function sweepExpired(storage: IStorage, now: Date = new Date()): Promise<number> {
  const counts = await Promise.all([
    storage.ssoSessions.deleteExpired(now),
    storage.authorizationCodes.deleteExpired(now),
    storage.accessTokens.deleteExpired(now),
    storage.refreshTokens.deleteExpired(now),
  ]);
  return counts.reduce((total, count) => total + count, 0);
}

/**
 * Sweep on an interval; returns a function that stops it
 */
export function startSweeper(storage: IStorage, intervalMs: number, logger: Logger): () => void {
  const timer = setInterval(() => {
    sweepExpired(storage)
      .then((deleted) => {
        if (deleted > 0) {
          logger.debug('Expired records deleted', { deleted });
        }
      })
      .catch((error: unknown) => {
        logger.error('Sweep failed', { error: describeError(error) });
      });
  }, intervalMs);

  // Prevent the interval from keeping the process alive
  timer.unref();

  return () => clearInterval(timer);
}
