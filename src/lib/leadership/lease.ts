import type { KubeConfig, V1Lease } from '@kubernetes/client-node';
import { CoordinationV1Api } from '@kubernetes/client-node';
import { getErrorMessage } from '../errors/base.js';
import { getStatusCode } from '../kubernetes/cluster-client.js';
import type { Logger } from '../logging/logger.js';
import type { LeadershipProbe } from './probe.js';

export type LeaseApi = Pick<
  CoordinationV1Api,
  'readNamespacedLease' | 'createNamespacedLease' | 'replaceNamespacedLease'
>;

export type LeaseLeadershipOptions = {
  api: LeaseApi;
  leaseName: string;
  namespace: string;
  identity: string;
  leaseDurationSeconds: number;
  /** How often a held lease is renewed; must be shorter than the lease duration */
  renewIntervalSeconds: number;
  logger: Logger;
  now?: () => Date;
};

const EXPIRY_SAFETY_MARGIN_MS = 2_000;

const toMillis = (value: Date | string | undefined): number | null => {
  if (!value) return null;
  const ms = value instanceof Date ? value.getTime() : Date.parse(value);
  return Number.isFinite(ms) ? ms : null;
};

export const isLeaseExpired = (lease: V1Lease, nowMs: number, leaseDurationSeconds: number) => {
  const renewMs = toMillis(lease.spec?.renewTime);
  if (renewMs === null) return true;
  const duration = lease.spec?.leaseDurationSeconds ?? leaseDurationSeconds;
  return nowMs - renewMs > duration * 1000 + EXPIRY_SAFETY_MARGIN_MS;
};

/**
 * Leadership through a coordination.k8s.io/v1 Lease.
 *
 * Each call makes one acquire-or-renew attempt: creates the Lease when missing,
 * renews it when this identity holds it, takes it over when the holder let it expire.
 * Any API failure, including losing a concurrent update (409), answers "not leader".
 *
 * Once acquired, the Lease is renewed every `renewIntervalSeconds` until it is lost
 * or `release()` is called, so it cannot expire while a long install is running.
 */
export class LeaseLeadership implements LeadershipProbe {
  private readonly now: () => Date;
  private inflight: Promise<boolean> | null = null;
  private renewTimer: NodeJS.Timeout | null = null;
  private held = false;

  constructor(private readonly options: LeaseLeadershipOptions) {
    this.now = options.now ?? (() => new Date());
  }

  static fromKubeConfig(
    kc: KubeConfig,
    options: Omit<LeaseLeadershipOptions, 'api'>
  ): LeaseLeadership {
    return new LeaseLeadership({ ...options, api: kc.makeApiClient(CoordinationV1Api) });
  }

  /** Concurrent callers share one attempt; two would race on the resourceVersion */
  isLeader(): Promise<boolean> {
    if (!this.inflight) {
      this.inflight = this.acquireOrRenew().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  release(): void {
    this.stopRenewing();
    this.held = false;
  }

  private async acquireOrRenew(): Promise<boolean> {
    const leader = await this.attempt();
    if (leader) {
      this.held = true;
      this.startRenewing();
    } else {
      if (this.held) {
        this.options.logger.warn('Lost leader lease', {
          data: { leaseName: this.options.leaseName, identity: this.options.identity },
        });
      }
      this.held = false;
      this.stopRenewing();
    }
    return leader;
  }

  private startRenewing(): void {
    if (this.renewTimer) return;
    this.renewTimer = setInterval(() => {
      void this.isLeader();
    }, this.options.renewIntervalSeconds * 1000);
    this.renewTimer.unref();
  }

  private stopRenewing(): void {
    if (this.renewTimer) {
      clearInterval(this.renewTimer);
      this.renewTimer = null;
    }
  }

  private async attempt(): Promise<boolean> {
    const { api, leaseName, namespace, identity, logger } = this.options;
    const now = this.now();

    try {
      let lease: V1Lease;
      try {
        lease = await api.readNamespacedLease({ name: leaseName, namespace });
      } catch (error) {
        if (getStatusCode(error) !== 404) {
          throw error;
        }
        await api.createNamespacedLease({ namespace, body: this.buildLease(now) });
        logger.info('Created leader lease', { data: { leaseName, namespace, identity } });
        return true;
      }

      const holder = lease.spec?.holderIdentity?.trim() ?? '';
      const expired = isLeaseExpired(lease, now.getTime(), this.options.leaseDurationSeconds);
      if (holder && holder !== identity && !expired) {
        logger.debug('Lease held by another instance', { data: { holder, leaseName } });
        return false;
      }

      await api.replaceNamespacedLease({
        name: leaseName,
        namespace,
        body: this.renewLease(lease, holder, now),
      });
      if (holder !== identity) {
        logger.info('Acquired leader lease', { data: { leaseName, previousHolder: holder || null } });
      }
      return true;
    } catch (error) {
      logger.warn('Leader lease acquire/renew failed', {
        data: { leaseName, namespace, statusCode: getStatusCode(error) },
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  private buildLease(now: Date): V1Lease {
    return {
      apiVersion: 'coordination.k8s.io/v1',
      kind: 'Lease',
      metadata: { name: this.options.leaseName, namespace: this.options.namespace },
      spec: {
        holderIdentity: this.options.identity,
        leaseDurationSeconds: this.options.leaseDurationSeconds,
        acquireTime: now,
        renewTime: now,
        leaseTransitions: 0,
      },
    };
  }

  private renewLease(current: V1Lease, previousHolder: string, now: Date): V1Lease {
    const transitions = current.spec?.leaseTransitions ?? 0;
    const takeover = previousHolder !== this.options.identity;
    return {
      ...current,
      spec: {
        ...current.spec,
        holderIdentity: this.options.identity,
        leaseDurationSeconds: this.options.leaseDurationSeconds,
        renewTime: now,
        acquireTime: takeover ? now : (current.spec?.acquireTime ?? now),
        leaseTransitions: takeover && previousHolder ? transitions + 1 : transitions,
      },
    };
  }
}
