import { describeError, type Logger } from '@campus-sso/shared';
import type { IResourceStorage } from './interfaces/index.js';

export async function sweepExpired(storage: IResourceStorage, now: Date = new Date()): Promise<number> {
  const [sessions, logins] = await Promise.all([
    storage.sessions.deleteExpired(now),
    storage.loginStates.deleteExpired(now),
  ]);
  return sessions + logins;
}

/**
 * Sweep on an unref'd interval; returns a function that stops it
 */
export function startSweeper(storage: IResourceStorage, intervalMs: number, logger: Logger): () => void {
  const timer = setInterval(() => {
    sweepExpired(storage)
      .then((deleted) => {
        if (deleted > 0) {
          logger.debug('Expired site records deleted', { deleted });
        }
      })
      .catch((error: unknown) => {
        logger.error('Sweep failed', { error: describeError(error) });
      });
  }, intervalMs);

  timer.unref();

  return () => clearInterval(timer);
}
