/**
 * Answers "am I the leader" once per lifecycle trigger.
 */
export interface LeadershipProbe {
  isLeader(): Promise<boolean>;
  /** Stop holding leadership in the background; called once at shutdown */
  release(): void;
}

/** Fixed answer, for single-replica deployments and tests */
export const staticLeadership = (leader: boolean): LeadershipProbe => ({
  isLeader: async () => leader,
  release: () => {},
});
