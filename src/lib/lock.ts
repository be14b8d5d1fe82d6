import { logger } from '../logger';

export class SyncInProgressError extends Error {
  constructor() {
    super('A sync cycle is already running');
    this.name = 'SyncInProgressError';
  }
}

/**
 * Lets one sync cycle run at a time within the process. Shared by the poll
 * loop and the HTTP routes.
 */
export class CycleLock {
  private current?: Promise<unknown>;

  get isLocked(): boolean {
    return this.current !== undefined;
  }

  /**
   * Runs `fn` while holding the lock. Rejects with `SyncInProgressError`
   * when another cycle holds it.
   */
  run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.current) {
      logger.warn({ operation }, 'Sync already in progress');
      return Promise.reject(new SyncInProgressError());
    }

    logger.debug({ operation }, 'Lock acquired');
    const pending = fn().finally(() => {
      this.current = undefined;
      logger.debug({ operation }, 'Lock released');
    });
    this.current = pending;
    return pending;
  }
}
