import type { AppError } from '../errors/base.js';
import { getErrorMessage } from '../errors/base.js';
import { OperatorErrors } from '../errors/operator-errors.js';
import type { LeadershipProbe } from '../leadership/probe.js';
import type { Logger } from '../logging/logger.js';
import type { UnitStatus } from '../state-machines/unit-status/types.js';
import type { Result } from '../utils/result.js';
import { err } from '../utils/result.js';
import { StatusCell } from './status-cell.js';

export const LIFECYCLE_TRIGGERS = ['install', 'remove', 'update_status'] as const;

export type LifecycleTrigger = (typeof LIFECYCLE_TRIGGERS)[number];

export type TriggerResult = Result<UnitStatus, AppError>;

export type TriggerHandler = () => Promise<TriggerResult>;

export type LocalLifecycleRuntimeOptions = {
  leadership: LeadershipProbe;
  logger: Logger;
  status?: StatusCell;
};

/**
 * In-process host for lifecycle handlers.
 *
 * Triggers are delivered one at a time: an `emit` starts only after every
 * earlier `emit` has settled.
 */
export class LocalLifecycleRuntime implements LeadershipProbe {
  readonly status: StatusCell;
  private readonly handlers = new Map<LifecycleTrigger, TriggerHandler>();
  private readonly leadership: LeadershipProbe;
  private readonly logger: Logger;
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  constructor(options: LocalLifecycleRuntimeOptions) {
    this.leadership = options.leadership;
    this.logger = options.logger;
    this.status = options.status ?? new StatusCell();
  }

  observe(trigger: LifecycleTrigger, handler: TriggerHandler): void {
    this.handlers.set(trigger, handler);
  }

  isLeader(): Promise<boolean> {
    return this.leadership.isLeader();
  }

  release(): void {
    this.leadership.release();
  }

  /** True while a trigger is running or queued */
  get busy(): boolean {
    return this.pending > 0;
  }

  emit(trigger: LifecycleTrigger): Promise<TriggerResult> {
    this.pending++;
    const run = this.tail.then(() => this.dispatch(trigger));
    this.tail = run;
    return run;
  }

  private async dispatch(trigger: LifecycleTrigger): Promise<TriggerResult> {
    try {
      const handler = this.handlers.get(trigger);
      if (!handler) {
        this.logger.warn(`No handler for trigger ${trigger}`);
        return err(OperatorErrors.NO_HANDLER(trigger));
      }

      this.logger.debug(`Dispatching ${trigger}`);
      try {
        return await handler();
      } catch (error) {
        this.logger.error(`Handler for ${trigger} threw`, { error });
        return err(OperatorErrors.HANDLER_FAILED(trigger, getErrorMessage(error)));
      }
    } finally {
      this.pending--;
    }
  }
}
