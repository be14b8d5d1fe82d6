import { EventEmitter } from 'events';
import { logger } from '../logger';

export interface PollSchedulerOptions {
  /** Seconds between the end of one cycle and the start of the next; 0 runs once. */
  intervalSeconds: number;
}

/**
 * Runs a cycle repeatedly, one at a time. Emits `cycle` with each result and
 * `cycleFailed` with the error of a failed cycle while polling.
 */
export class PollScheduler<T> extends EventEmitter {
  private running = false;
  private timer?: NodeJS.Timeout;
  private wake?: () => void;

  constructor(
    private readonly cycle: () => Promise<T>,
    private readonly options: PollSchedulerOptions
  ) {
    super();
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Resolves once `stop()` is called, or after the single cycle when the
   * interval is 0. A single cycle's error is rethrown.
   */
  async start(): Promise<void> {
    if (this.running) {
      logger.warn('Scheduler already running');
      return;
    }

    this.running = true;
    const { intervalSeconds } = this.options;
    logger.info({ intervalSeconds }, 'Poll scheduler started');

    try {
      if (intervalSeconds <= 0) {
        this.emit('cycle', await this.cycle());
        return;
      }

      while (this.running) {
        try {
          this.emit('cycle', await this.cycle());
        } catch (err) {
          logger.error({ err }, 'Sync cycle failed');
          this.emit('cycleFailed', err);
        }

        if (!this.running) {
          break;
        }
        logger.debug({ intervalSeconds }, 'Sleeping until next cycle');
        await this.sleep(intervalSeconds * 1000);
      }
    } finally {
      this.running = false;
      logger.info('Poll scheduler stopped');
    }
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.wake?.();
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = () => {
        this.wake = undefined;
        resolve();
      };
      this.timer = setTimeout(() => {
        this.timer = undefined;
        this.wake?.();
      }, ms);
    });
  }
}
