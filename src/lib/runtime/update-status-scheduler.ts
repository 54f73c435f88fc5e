import type { Logger } from '../logging/logger.js';
import type { LocalLifecycleRuntime } from './lifecycle-runtime.js';

export type UpdateStatusSchedulerOptions = {
  runtime: Pick<LocalLifecycleRuntime, 'emit' | 'busy'>;
  intervalSeconds: number;
  logger: Logger;
};

/**
 * Emits `update_status` on a fixed interval. A tick that finds the runtime still
 * busy is skipped rather than queued.
 */
export class UpdateStatusScheduler {
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private lastTickAt: string | null = null;

  constructor(private readonly options: UpdateStatusSchedulerOptions) {}

  get isRunning(): boolean {
    return this.intervalId !== null;
  }

  get lastTick(): string | null {
    return this.lastTickAt;
  }

  start(): void {
    if (this.intervalId) {
      this.options.logger.warn('Scheduler already running');
      return;
    }

    this.options.logger.info('Starting update-status scheduler', {
      data: { intervalSeconds: this.options.intervalSeconds },
    });
    this.intervalId = setInterval(() => {
      void this.tick();
    }, this.options.intervalSeconds * 1000);
  }

  stop(): void {
    if (!this.intervalId) {
      return;
    }
    clearInterval(this.intervalId);
    this.intervalId = null;
    this.options.logger.info('Stopped update-status scheduler');
  }

  /** Runs one update-status pass unless one is already in flight */
  async tick(): Promise<boolean> {
    const { runtime, logger } = this.options;
    if (runtime.busy) {
      logger.info('Skipping update-status, a trigger is still running');
      return false;
    }

    this.lastTickAt = new Date().toISOString();
    const result = await runtime.emit('update_status');
    if (result.ok) {
      logger.debug('update-status finished', { data: { status: result.value } });
    } else {
      logger.error(`update-status failed: ${result.error.message}`, { error: result.error });
    }
    return true;
  }
}
