import type { UnitStatusContext } from './types.js';

// Triggers run one at a time, so a trigger that still finds `installing`
// follows an install attempt that aborted on an error.

/** States from which an install may begin */
export const canInstall = (ctx: UnitStatusContext) =>
  ['unset', 'installing', 'active', 'blocked', 'reinstalling'].includes(ctx.status);

/** An install or reinstall is in progress and awaits its outcome */
export const isApplying = (ctx: UnitStatusContext) => ctx.status === 'installing';

/** States in which a periodic check may report */
export const canCheck = (ctx: UnitStatusContext) =>
  ['unset', 'installing', 'active', 'blocked'].includes(ctx.status);

export const isWaiting = (ctx: UnitStatusContext) => ctx.status === 'waiting';
