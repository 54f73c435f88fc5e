#!/usr/bin/env node

import { USAGE, parseCliArgs } from './cli/args.js';
import { runCommand } from './cli/run.js';
import { connectCluster, createOperator } from './lib/bootstrap/operator.js';
import { loadOperatorConfig } from './lib/config/config-service.js';
import { createLogger } from './lib/logging/logger.js';
import { VERSION } from './version.js';

const parsed = parseCliArgs(process.argv.slice(2));

switch (parsed.kind) {
  case 'help':
    console.log(USAGE);
    break;
  case 'version':
    console.log(VERSION);
    break;
  case 'invalid':
    console.error(parsed.message);
    console.log(USAGE);
    process.exitCode = 1;
    break;
  case 'command':
    process.exitCode = await main(parsed.command, parsed.kubeconfigPath, parsed.context);
    break;
}

async function main(
  command: Parameters<typeof runCommand>[0],
  kubeconfigPath: string | undefined,
  context: string | undefined
): Promise<number> {
  const config = loadOperatorConfig(process.env);
  if (!config.ok) {
    console.error(config.error.message);
    return 1;
  }

  const logger = createLogger('metacontroller-operator', { level: config.value.logLevel });
  const access = connectCluster(config.value, { kubeconfigPath, context }, logger);
  if (!access.ok) {
    logger.error(access.error.message, { error: access.error });
    return 1;
  }

  const operator = createOperator(config.value, access.value, logger);
  operator.runtime.status.subscribe((status) => {
    logger.info(`Status ${status.name}${status.message ? `: ${status.message}` : ''}`);
  });

  return runCommand(command, operator, logger, {
    untilStopped: () =>
      new Promise((resolve) => {
        const stop = (signal: NodeJS.Signals) => {
          logger.info(`Received ${signal}, shutting down`);
          resolve();
        };
        process.once('SIGINT', stop);
        process.once('SIGTERM', stop);
      }),
  });
}
