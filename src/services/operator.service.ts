import type { AppError } from '../lib/errors/base.js';
import { OperatorErrors } from '../lib/errors/operator-errors.js';
import type { ClusterClient } from '../lib/kubernetes/cluster-client.js';
import type { ResourceSpec } from '../lib/kubernetes/types.js';
import type { LeadershipProbe } from '../lib/leadership/probe.js';
import type { Logger } from '../lib/logging/logger.js';
import type { ManifestRenderer, ResourceGroup } from '../lib/manifests/renderer.js';
import type { ConflictPolicy } from '../lib/reconcile/applier.js';
import { applyResources } from '../lib/reconcile/applier.js';
import type { InstallCheckOptions } from '../lib/reconcile/backoff.js';
import { installCheck } from '../lib/reconcile/backoff.js';
import { validateResources } from '../lib/reconcile/validator.js';
import type { LocalLifecycleRuntime } from '../lib/runtime/lifecycle-runtime.js';
import type { StatusCell } from '../lib/runtime/status-cell.js';
import type { UnitStatusMachine } from '../lib/state-machines/unit-status/machine.js';
import { createUnitStatusMachine } from '../lib/state-machines/unit-status/machine.js';
import type { UnitStatus, UnitStatusEvent } from '../lib/state-machines/unit-status/types.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok } from '../lib/utils/result.js';

export type OperatorServiceResult = Promise<Result<UnitStatus, AppError>>;

export type OperatorServiceDeps = {
  client: ClusterClient;
  renderer: Pick<ManifestRenderer, 'render' | 'renderAll'>;
  leadership: Pick<LeadershipProbe, 'isLeader'>;
  status: StatusCell;
  logger: Logger;
  /** Readiness deadline and backoff; the logger is always this service's */
  backoff?: Omit<InstallCheckOptions, 'logger'>;
  conflictPolicy?: ConflictPolicy;
  machine?: UnitStatusMachine;
};

/** Groups applied on install, in order */
const INSTALL_ORDER: ResourceGroup[] = ['rbac', 'crds', 'controller'];

/**
 * Drives the unit status machine from lifecycle triggers.
 *
 * Every handler first asks for leadership. A non-leader parks in `waiting` and
 * ignores every later trigger for the rest of the process.
 */
export class OperatorService {
  private readonly machine: UnitStatusMachine;
  private readonly logger: Logger;
  private readonly conflictPolicy: ConflictPolicy;

  constructor(private readonly deps: OperatorServiceDeps) {
    this.machine = deps.machine ?? createUnitStatusMachine();
    this.logger = deps.logger;
    this.conflictPolicy = deps.conflictPolicy ?? 'patch';
  }

  get state() {
    return this.machine.state;
  }

  /** Wire the handlers into a runtime */
  register(runtime: Pick<LocalLifecycleRuntime, 'observe'>): void {
    runtime.observe('install', () => this.install());
    runtime.observe('update_status', () => this.updateStatus());
    runtime.observe('remove', () => this.remove());
  }

  async install(): OperatorServiceResult {
    const parked = await this.checkLeadership();
    if (parked) {
      return parked;
    }
    return this.runInstall();
  }

  async updateStatus(): OperatorServiceResult {
    const parked = await this.checkLeadership();
    if (parked) {
      return parked;
    }

    this.logger.info('Comparing current state to desired state');
    const expected = await this.deps.renderer.renderAll();
    if (!expected.ok) {
      return expected;
    }

    const outcome = await validateResources(this.deps.client, expected.value, this.logger);
    if (outcome.allOk) {
      this.logger.info('Resources are ok');
      return this.transition({ type: 'CHECK_PASSED' });
    }

    this.logger.info('Resources are missing. Triggering install to reconcile resources', {
      data: { discrepancies: outcome.discrepancies.length },
    });
    const reinstalling = this.transition({
      type: 'DRIFT_DETECTED',
      discrepancies: outcome.discrepancies,
    });
    if (!reinstalling.ok) {
      return reinstalling;
    }
    return this.runInstall();
  }

  async remove(): OperatorServiceResult {
    const parked = await this.checkLeadership();
    if (parked) {
      return parked;
    }
    this.logger.warn('Remove requested, deployed resources are left in place');
    return err(OperatorErrors.REMOVE_NOT_SUPPORTED);
  }

  private async runInstall(): OperatorServiceResult {
    this.logger.info('Installing by instantiating Kubernetes objects');
    const installing = this.transition({ type: 'INSTALL' });
    if (!installing.ok) {
      return installing;
    }

    for (const group of INSTALL_ORDER) {
      const applied = await this.applyGroup(group);
      if (applied.ok) {
        continue;
      }
      if (group === 'rbac' && applied.error.code === 'K8S_FORBIDDEN') {
        this.logger.error(
          'Forbidden (403) when creating required RBAC. The operator likely lacks permission to ' +
            'create cluster-scoped roles and must be granted trust',
          { error: applied.error }
        );
        return this.transition({ type: 'RBAC_FORBIDDEN' });
      }
      return applied;
    }

    const expected = await this.deps.renderer.renderAll();
    if (!expected.ok) {
      return expected;
    }

    this.logger.info('Waiting for installed Kubernetes objects to be operational');
    const checked = await installCheck(
      () => validateResources(this.deps.client, expected.value, this.logger),
      { ...this.deps.backoff, logger: this.logger }
    );
    if (!checked.ok) {
      return this.transition({
        type: 'RESOURCES_NOT_READY',
        discrepancies: checked.error.discrepancies,
      });
    }

    this.logger.info('Install successful');
    return this.transition({ type: 'RESOURCES_READY' });
  }

  private async applyGroup(group: ResourceGroup): Promise<Result<ResourceSpec[], AppError>> {
    this.logger.info(`Applying manifests for ${group}`);
    const rendered = await this.deps.renderer.render(group);
    if (!rendered.ok) {
      return rendered;
    }
    const applied = await applyResources(
      this.deps.client,
      rendered.value,
      this.conflictPolicy,
      this.logger
    );
    return applied.ok ? ok(rendered.value) : applied;
  }

  /** Returns the status to report when this trigger must not act, else null */
  private async checkLeadership(): Promise<Result<UnitStatus, AppError> | null> {
    if (this.machine.state === 'waiting' && this.machine.status) {
      this.logger.debug('Waiting for leadership, ignoring trigger');
      return ok(this.machine.status);
    }
    if (await this.deps.leadership.isLeader()) {
      return null;
    }
    return this.transition({ type: 'LEADERSHIP_DENIED' });
  }

  private transition(event: UnitStatusEvent): Result<UnitStatus, AppError> {
    const next = this.machine.send(event);
    if (!next.ok) {
      this.logger.error(`Rejected status event ${event.type}`, { error: next.error });
      return next;
    }
    const { state, status, context } = next.value;
    this.deps.status.set(status);
    this.logger.info(`Unit status: ${status.name}`, {
      data: {
        state,
        message: status.message,
        ...(context.discrepancies.length > 0 && { discrepancies: context.discrepancies }),
      },
    });
    return ok(status);
  }
}
