import type { OperatorParts } from '../lib/bootstrap/operator.js';
import type { Logger } from '../lib/logging/logger.js';
import type { LifecycleTrigger } from '../lib/runtime/lifecycle-runtime.js';
import type { Command } from './args.js';

const TRIGGERS: Record<Exclude<Command, 'run'>, LifecycleTrigger> = {
  install: 'install',
  'update-status': 'update_status',
  remove: 'remove',
};

export type RunOptions = {
  /** Resolves when the long-running `run` command should stop */
  untilStopped: () => Promise<void>;
};

/**
 * Execute one CLI command against an assembled operator. Returns the exit code.
 */
export async function runCommand(
  command: Command,
  operator: OperatorParts,
  logger: Logger,
  options: RunOptions
): Promise<number> {
  try {
    return await execute(command, operator, logger, options);
  } finally {
    operator.runtime.release();
  }
}

async function execute(
  command: Command,
  { runtime, scheduler }: OperatorParts,
  logger: Logger,
  options: RunOptions
): Promise<number> {
  if (command !== 'run') {
    const result = await runtime.emit(TRIGGERS[command]);
    if (!result.ok) {
      logger.error(`${command} failed: ${result.error.message}`, { error: result.error });
      return 1;
    }
    logger.info(`${command} finished`, { data: { status: result.value } });
    return result.value.name === 'blocked' ? 2 : 0;
  }

  const installed = await runtime.emit('install');
  if (!installed.ok) {
    logger.error(`install failed: ${installed.error.message}`, { error: installed.error });
    return 1;
  }

  scheduler.start();
  await options.untilStopped();
  scheduler.stop();
  return 0;
}
