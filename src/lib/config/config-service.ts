import { ConfigErrors } from '../errors/config-errors.js';
import type { ConfigError } from '../errors/config-errors.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';
import { operatorConfigSchema, operatorEnvSchema } from './schemas.js';
import type { OperatorConfig } from './types.js';

export type OperatorConfigResult = Result<OperatorConfig, ConfigError>;

const formatIssues = (issues: { path: (string | number)[]; message: string }[]): string[] =>
  issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

/** Drops empty strings so that `FOO=` behaves like an unset variable */
const presentOnly = (env: NodeJS.ProcessEnv): Record<string, string> =>
  Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => Boolean(entry[1]))
  );

/**
 * Load the operator configuration from environment variables.
 *
 * @example
 * const config = loadOperatorConfig({ OPERATOR_NAMESPACE: 'kubeflow' });
 * if (config.ok) console.log(config.value.leaderElection.leaseName); // metacontroller-operator-leader
 */
export const loadOperatorConfig = (env: NodeJS.ProcessEnv = process.env): OperatorConfigResult => {
  const raw = operatorEnvSchema.safeParse(presentOnly(env));
  if (!raw.success) {
    return err(ConfigErrors.INVALID(formatIssues(raw.error.issues)));
  }

  const vars = raw.data;
  const parsed = operatorConfigSchema.safeParse({
    appName: vars.OPERATOR_APP_NAME,
    namespace: vars.OPERATOR_NAMESPACE,
    image: vars.METACONTROLLER_IMAGE,
    manifestsDir: vars.OPERATOR_MANIFESTS_DIR,
    maxCheckSeconds: vars.OPERATOR_MAX_CHECK_SECONDS,
    updateStatusIntervalSeconds: vars.OPERATOR_UPDATE_STATUS_INTERVAL_SECONDS,
    leaderElection: {
      enabled: vars.OPERATOR_LEADER_ELECTION,
      leaseName: vars.OPERATOR_LEASE_NAME,
      leaseDurationSeconds: vars.OPERATOR_LEASE_DURATION_SECONDS,
      renewIntervalSeconds: vars.OPERATOR_LEASE_RENEW_SECONDS,
      identity: vars.HOSTNAME,
    },
    logLevel: vars.LOG_LEVEL,
  });
  if (!parsed.success) {
    return err(ConfigErrors.INVALID(formatIssues(parsed.error.issues)));
  }

  const config = parsed.data;
  const { leaderElection } = config;
  return ok({
    ...config,
    leaderElection: {
      enabled: leaderElection.enabled,
      leaseDurationSeconds: leaderElection.leaseDurationSeconds,
      renewIntervalSeconds: leaderElection.renewIntervalSeconds,
      leaseName: leaderElection.leaseName ?? `${config.appName}-leader`,
      identity: leaderElection.identity ?? config.appName,
    },
  });
};
