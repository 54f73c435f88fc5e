import type { z } from 'zod';
import type { operatorConfigSchema } from './schemas.js';

type ParsedOperatorConfig = z.infer<typeof operatorConfigSchema>;

export type LeaderElectionConfig = {
  enabled: boolean;
  leaseName: string;
  leaseDurationSeconds: number;
  renewIntervalSeconds: number;
  identity: string;
};

/**
 * Operator configuration with every default resolved.
 */
export type OperatorConfig = Omit<ParsedOperatorConfig, 'leaderElection'> & {
  leaderElection: LeaderElectionConfig;
};
