import type { AppError } from '../../errors/base.js';
import { createError } from '../../errors/base.js';
import type { Result } from '../../utils/result.js';
import { err, ok } from '../../utils/result.js';
import { canCheck, canInstall, isApplying, isWaiting } from './guards.js';
import type {
  BlockedReason,
  UnitStatus,
  UnitStatusContext,
  UnitStatusEvent,
  UnitStatusState,
  VisibleState,
} from './types.js';
import { STATUS_MESSAGES } from './types.js';

export type UnitStatusSnapshot = {
  state: VisibleState;
  context: UnitStatusContext;
  status: UnitStatus;
};

export type UnitStatusMachine = {
  state: UnitStatusState;
  context: UnitStatusContext;
  /** Visible status; null until the first transition */
  status: UnitStatus | null;
  send: (event: UnitStatusEvent) => Result<UnitStatusSnapshot, AppError>;
};

export const toUnitStatus = (state: VisibleState, blockedReason?: BlockedReason): UnitStatus => {
  switch (state) {
    case 'waiting':
      return { name: 'waiting', message: STATUS_MESSAGES.waitingForLeadership };
    case 'installing':
      return { name: 'maintenance', message: STATUS_MESSAGES.installing };
    case 'reinstalling':
      return { name: 'maintenance', message: STATUS_MESSAGES.reinstalling };
    case 'blocked':
      return {
        name: 'blocked',
        message:
          blockedReason === 'no-trust' ? STATUS_MESSAGES.noTrust : STATUS_MESSAGES.resourcesNotReady,
      };
    case 'active':
      return { name: 'active', message: '' };
  }
};

const enter = (
  ctx: UnitStatusContext,
  state: VisibleState,
  changes: Pick<Partial<UnitStatusContext>, 'blockedReason' | 'discrepancies'> = {}
): Result<UnitStatusSnapshot, AppError> => {
  const context: UnitStatusContext = {
    ...ctx,
    blockedReason: changes.blockedReason,
    discrepancies: changes.discrepancies ?? [],
    status: state,
  };
  return ok({ state, context, status: toUnitStatus(state, context.blockedReason) });
};

const invalidTransition = (ctx: UnitStatusContext, event: UnitStatusEvent) =>
  err(
    createError('UNIT_STATUS_INVALID_TRANSITION', 'Invalid unit status transition', 400, {
      state: ctx.status,
      event: event.type,
    })
  );

const transition = (
  ctx: UnitStatusContext,
  event: UnitStatusEvent
): Result<UnitStatusSnapshot, AppError> => {
  // Losing leadership parks the unit for the rest of the process
  if (event.type === 'LEADERSHIP_DENIED') {
    return enter(ctx, 'waiting');
  }
  if (isWaiting(ctx)) {
    return invalidTransition(ctx, event);
  }

  switch (event.type) {
    case 'INSTALL':
      if (canInstall(ctx)) {
        return enter(ctx, 'installing');
      }
      break;
    case 'RBAC_FORBIDDEN':
      if (isApplying(ctx)) {
        return enter(ctx, 'blocked', { blockedReason: 'no-trust' });
      }
      break;
    case 'RESOURCES_READY':
      if (isApplying(ctx)) {
        return enter(ctx, 'active');
      }
      break;
    case 'RESOURCES_NOT_READY':
      if (isApplying(ctx)) {
        return enter(ctx, 'blocked', {
          blockedReason: 'resources-not-ready',
          discrepancies: event.discrepancies,
        });
      }
      break;
    case 'CHECK_PASSED':
      if (canCheck(ctx)) {
        return enter(ctx, 'active');
      }
      break;
    case 'DRIFT_DETECTED':
      if (canCheck(ctx)) {
        return enter(ctx, 'reinstalling', { discrepancies: event.discrepancies });
      }
      break;
  }

  return invalidTransition(ctx, event);
};

/**
 * Unit status machine. An event the current state does not accept leaves the
 * machine untouched and returns UNIT_STATUS_INVALID_TRANSITION.
 */
export const createUnitStatusMachine = (
  initial: Partial<UnitStatusContext> = {}
): UnitStatusMachine => {
  const machine: UnitStatusMachine = {
    state: initial.status ?? 'unset',
    context: {
      status: 'unset',
      discrepancies: [],
      ...initial,
    },
    status: null,
    send: (event) => {
      const next = transition(machine.context, event);
      if (next.ok) {
        machine.state = next.value.state;
        machine.context = next.value.context;
        machine.status = next.value.status;
      }
      return next;
    },
  };
  if (machine.context.status !== 'unset') {
    machine.status = toUnitStatus(machine.context.status, machine.context.blockedReason);
  }

  return machine;
};
