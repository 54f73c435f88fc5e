import { describe, expect, it, vi } from 'vitest';
import { createOperator } from '../../lib/bootstrap/operator.js';
import type { OperatorConfig } from '../../lib/config/types.js';
import { staticLeadership } from '../../lib/leadership/probe.js';
import { FakeCluster, createTestLogger } from '../../services/__tests__/test-utils.js';
import { runCommand } from '../run.js';

const config: OperatorConfig = {
  appName: 'metacontroller-operator',
  namespace: 'kubeflow',
  image: 'mc:test',
  manifestsDir: undefined,
  maxCheckSeconds: 150,
  updateStatusIntervalSeconds: 300,
  logLevel: 'info',
  leaderElection: {
    enabled: false,
    leaseName: 'metacontroller-operator-leader',
    leaseDurationSeconds: 30,
    renewIntervalSeconds: 10,
    identity: 'metacontroller-operator',
  },
};

const assemble = (leader = true) => {
  const cluster = new FakeCluster({ autoReady: true });
  const { logger } = createTestLogger();
  const operator = createOperator(
    config,
    { client: cluster, leadership: staticLeadership(leader) },
    logger
  );
  return { cluster, logger, operator };
};

const immediately = { untilStopped: async () => {} };

describe('runCommand', () => {
  it('installs and exits 0 once active', async () => {
    const { cluster, logger, operator } = assemble();

    const code = await runCommand('install', operator, logger, immediately);

    expect(code).toBe(0);
    expect(operator.runtime.status.get()).toEqual({ name: 'active', message: '' });
    expect(cluster.callsOf('create')).toHaveLength(9);
  });

  it('maps update-status onto the update_status trigger', async () => {
    const { cluster, logger, operator } = assemble();
    await runCommand('install', operator, logger, immediately);
    cluster.calls.length = 0;

    const code = await runCommand('update-status', operator, logger, immediately);

    expect(code).toBe(0);
    expect(cluster.callsOf('create')).toHaveLength(0);
  });

  it('exits 1 for remove', async () => {
    const { logger, operator } = assemble();

    await expect(runCommand('remove', operator, logger, immediately)).resolves.toBe(1);
  });

  it('exits 0 while waiting for leadership', async () => {
    const { logger, operator } = assemble(false);

    await expect(runCommand('install', operator, logger, immediately)).resolves.toBe(0);
    expect(operator.runtime.status.get()?.name).toBe('waiting');
  });

  it('installs, then runs the scheduler until stopped', async () => {
    const { logger, operator } = assemble();
    const start = vi.spyOn(operator.scheduler, 'start');
    let runningWhileWaiting = false;

    const code = await runCommand('run', operator, logger, {
      untilStopped: async () => {
        runningWhileWaiting = operator.scheduler.isRunning;
      },
    });

    expect(code).toBe(0);
    expect(start).toHaveBeenCalledTimes(1);
    expect(runningWhileWaiting).toBe(true);
    expect(operator.scheduler.isRunning).toBe(false);
  });

  it('releases leadership when a command ends', async () => {
    const { logger, operator } = assemble();
    const release = vi.spyOn(operator.runtime, 'release');

    await runCommand('remove', operator, logger, immediately);

    expect(release).toHaveBeenCalledTimes(1);
  });
});
