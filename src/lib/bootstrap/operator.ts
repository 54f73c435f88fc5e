import type { OperatorConfig } from '../config/types.js';
import type { AppError } from '../errors/base.js';
import type { ClusterClient } from '../kubernetes/cluster-client.js';
import { KubernetesClusterClient } from '../kubernetes/cluster-client.js';
import { loadKubeConfig } from '../kubernetes/kubeconfig.js';
import { LeaseLeadership } from '../leadership/lease.js';
import type { LeadershipProbe } from '../leadership/probe.js';
import { staticLeadership } from '../leadership/probe.js';
import type { Logger } from '../logging/logger.js';
import { ManifestRenderer } from '../manifests/renderer.js';
import { LocalLifecycleRuntime } from '../runtime/lifecycle-runtime.js';
import { UpdateStatusScheduler } from '../runtime/update-status-scheduler.js';
import type { Result } from '../utils/result.js';
import { ok } from '../utils/result.js';
import { OperatorService } from '../../services/operator.service.js';

export type OperatorParts = {
  runtime: LocalLifecycleRuntime;
  service: OperatorService;
  scheduler: UpdateStatusScheduler;
};

export type ClusterAccess = {
  client: ClusterClient;
  leadership: LeadershipProbe;
};

export type ClusterAccessOptions = {
  kubeconfigPath?: string;
  context?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Connect to the cluster described by the kubeconfig and pick the leadership probe.
 */
export const connectCluster = (
  config: OperatorConfig,
  options: ClusterAccessOptions,
  logger: Logger
): Result<ClusterAccess, AppError> => {
  const kc = loadKubeConfig(options);
  if (!kc.ok) {
    return kc;
  }

  const { leaderElection } = config;
  const leadership = leaderElection.enabled
    ? LeaseLeadership.fromKubeConfig(kc.value, {
        leaseName: leaderElection.leaseName,
        namespace: config.namespace,
        identity: leaderElection.identity,
        leaseDurationSeconds: leaderElection.leaseDurationSeconds,
        renewIntervalSeconds: leaderElection.renewIntervalSeconds,
        logger: logger.child('leadership'),
      })
    : staticLeadership(true);

  logger.info('Connected to cluster', {
    data: { context: kc.value.getCurrentContext(), leaderElection: leaderElection.enabled },
  });
  return ok({
    client: KubernetesClusterClient.fromKubeConfig(kc.value, config.appName),
    leadership,
  });
};

/**
 * Assemble the runtime, the operator service and the update-status scheduler.
 */
export const createOperator = (
  config: OperatorConfig,
  access: ClusterAccess,
  logger: Logger
): OperatorParts => {
  const runtime = new LocalLifecycleRuntime({
    leadership: access.leadership,
    logger: logger.child('runtime'),
  });
  const renderer = new ManifestRenderer({
    context: { appName: config.appName, namespace: config.namespace, image: config.image },
    manifestsDir: config.manifestsDir,
  });
  const service = new OperatorService({
    client: access.client,
    renderer,
    leadership: runtime,
    status: runtime.status,
    logger: logger.child('operator'),
    backoff: { maxDurationMs: config.maxCheckSeconds * 1000 },
  });
  service.register(runtime);

  const scheduler = new UpdateStatusScheduler({
    runtime,
    intervalSeconds: config.updateStatusIntervalSeconds,
    logger: logger.child('scheduler'),
  });

  return { runtime, service, scheduler };
};
