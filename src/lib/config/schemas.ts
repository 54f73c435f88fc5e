import { z } from 'zod';

const envBoolean = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const leaderElectionSchema = z
  .object({
    enabled: z.boolean().default(false),
    leaseName: z.string().min(1).optional(),
    leaseDurationSeconds: z.number().int().min(1).max(3600).default(30),
    renewIntervalSeconds: z.number().int().min(1).default(10),
    identity: z.string().min(1).optional(),
  })
  .refine((value) => value.renewIntervalSeconds < value.leaseDurationSeconds, {
    message: 'must be shorter than leaseDurationSeconds',
    path: ['renewIntervalSeconds'],
  });

export const operatorConfigSchema = z.object({
  appName: z
    .string()
    .min(1)
    .regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/, 'must be a DNS-1123 label')
    .default('metacontroller-operator'),
  namespace: z.string().min(1),
  image: z.string().min(1).default('metacontroller/metacontroller:v0.3.0'),
  manifestsDir: z.string().min(1).optional(),
  maxCheckSeconds: z.number().positive().default(150),
  updateStatusIntervalSeconds: z.number().int().min(1).default(300),
  leaderElection: leaderElectionSchema,
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Raw environment variables, coerced before the structured schema applies defaults.
 */
export const operatorEnvSchema = z.object({
  OPERATOR_APP_NAME: z.string().optional(),
  OPERATOR_NAMESPACE: z.string().optional(),
  METACONTROLLER_IMAGE: z.string().optional(),
  OPERATOR_MANIFESTS_DIR: z.string().optional(),
  OPERATOR_MAX_CHECK_SECONDS: z.coerce.number().optional(),
  OPERATOR_UPDATE_STATUS_INTERVAL_SECONDS: z.coerce.number().optional(),
  OPERATOR_LEADER_ELECTION: envBoolean.optional(),
  OPERATOR_LEASE_NAME: z.string().optional(),
  OPERATOR_LEASE_DURATION_SECONDS: z.coerce.number().optional(),
  OPERATOR_LEASE_RENEW_SECONDS: z.coerce.number().optional(),
  HOSTNAME: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
});
