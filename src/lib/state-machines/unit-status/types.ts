export type UnitStatusName = 'waiting' | 'maintenance' | 'active' | 'blocked';

/** The externally visible status of the operator unit */
export type UnitStatus = {
  name: UnitStatusName;
  message: string;
};

export type UnitStatusState =
  | 'unset'
  | 'waiting'
  | 'installing'
  | 'reinstalling'
  | 'blocked'
  | 'active';

/** Every state but the initial one has a visible status */
export type VisibleState = Exclude<UnitStatusState, 'unset'>;

export type BlockedReason = 'no-trust' | 'resources-not-ready';

export type UnitStatusContext = {
  status: UnitStatusState;
  blockedReason?: BlockedReason;
  /** Problems reported by the last failed readiness check */
  discrepancies: string[];
};

export type UnitStatusEvent =
  | { type: 'LEADERSHIP_DENIED' }
  | { type: 'INSTALL' }
  | { type: 'RBAC_FORBIDDEN' }
  | { type: 'RESOURCES_READY' }
  | { type: 'RESOURCES_NOT_READY'; discrepancies: string[] }
  | { type: 'CHECK_PASSED' }
  | { type: 'DRIFT_DETECTED'; discrepancies: string[] };

export const STATUS_MESSAGES = {
  waitingForLeadership: 'Waiting for leadership',
  installing: 'Instantiating Kubernetes objects',
  reinstalling: 'Missing kubernetes resources detected - reinstalling',
  noTrust: 'Cannot create required RBAC.  Charm may not have `--trust`',
  resourcesNotReady: 'Some Kubernetes resources did not start correctly during install',
} as const;
