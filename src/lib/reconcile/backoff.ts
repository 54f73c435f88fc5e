import { setTimeout as delay } from 'node:timers/promises';
import type { K8sError } from '../errors/k8s-errors.js';
import { K8sErrors } from '../errors/k8s-errors.js';
import type { Logger } from '../logging/logger.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';
import type { ReconciliationOutcome } from './validator.js';

export interface BackoffOptions {
  /** Give up once this much wall-clock time has passed since the first attempt */
  maxDurationMs: number;
  initialIntervalMs: number;
  multiplier: number;
  maxIntervalMs: number;
}

export const DEFAULT_BACKOFF_OPTIONS: BackoffOptions = {
  maxDurationMs: 150_000,
  initialIntervalMs: 100,
  multiplier: 2,
  maxIntervalMs: 15_000,
};

/**
 * The readiness deadline passed. Carries the last attempt's discrepancies.
 */
export type DeadlineExceeded = K8sError & {
  discrepancies: string[];
  attempts: number;
  elapsedMs: number;
};

export type InstallCheckOptions = Partial<BackoffOptions> & {
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export const sleep = (ms: number): Promise<void> => delay(ms);

/**
 * Wait before retry number `attempt` (1-based): initial * multiplier^(attempt-1),
 * never below the initial interval nor above the cap.
 */
export function backoffInterval(attempt: number, options: BackoffOptions): number {
  const exponential = options.initialIntervalMs * options.multiplier ** (attempt - 1);
  return Math.min(Math.max(exponential, options.initialIntervalMs), options.maxIntervalMs);
}

/**
 * Run `check` until it reports every resource ready or the deadline passes.
 *
 * The deadline is only evaluated after a failed attempt, so the loop returns at most
 * one backoff interval after `maxDurationMs`. On expiry the error carries the
 * discrepancies from the last attempt.
 */
export async function installCheck(
  check: () => Promise<ReconciliationOutcome>,
  options: InstallCheckOptions
): Promise<Result<ReconciliationOutcome, DeadlineExceeded>> {
  const opts: BackoffOptions = {
    maxDurationMs: options.maxDurationMs ?? DEFAULT_BACKOFF_OPTIONS.maxDurationMs,
    initialIntervalMs: options.initialIntervalMs ?? DEFAULT_BACKOFF_OPTIONS.initialIntervalMs,
    multiplier: options.multiplier ?? DEFAULT_BACKOFF_OPTIONS.multiplier,
    maxIntervalMs: options.maxIntervalMs ?? DEFAULT_BACKOFF_OPTIONS.maxIntervalMs,
  };
  const wait = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const { logger } = options;

  logger.info(
    `Checking status of deployment in Kubernetes (retrying for maximum ${opts.maxDurationMs / 1000}s)`
  );

  const startedAt = now();
  for (let attempt = 1; ; attempt++) {
    logger.info(`Trying attempt ${attempt}`);
    const outcome = await check();
    if (outcome.allOk) {
      return ok(outcome);
    }

    const elapsedMs = now() - startedAt;
    if (elapsedMs >= opts.maxDurationMs) {
      logger.warn('Resources did not become ready before the deadline', {
        data: { attempts: attempt, elapsedMs, discrepancies: outcome.discrepancies },
      });
      return err({
        ...K8sErrors.RESOURCES_NOT_READY(outcome.discrepancies, attempt, elapsedMs),
        discrepancies: outcome.discrepancies,
        attempts: attempt,
        elapsedMs,
      });
    }

    const interval = backoffInterval(attempt, opts);
    logger.debug('Resources not ready, backing off', {
      data: { attempt, intervalMs: interval, pending: outcome.discrepancies.length },
    });
    await wait(interval);
  }
}
