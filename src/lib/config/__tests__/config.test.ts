import { describe, expect, it } from 'vitest';
import { loadOperatorConfig } from '../config-service.js';

describe('operator config', () => {
  it('applies defaults when only the namespace is set', () => {
    const result = loadOperatorConfig({ OPERATOR_NAMESPACE: 'kubeflow' });

    expect(result).toEqual({
      ok: true,
      value: {
        appName: 'metacontroller-operator',
        namespace: 'kubeflow',
        image: 'metacontroller/metacontroller:v0.3.0',
        manifestsDir: undefined,
        maxCheckSeconds: 150,
        updateStatusIntervalSeconds: 300,
        logLevel: 'info',
        leaderElection: {
          enabled: false,
          leaseName: 'metacontroller-operator-leader',
          leaseDurationSeconds: 30,
          renewIntervalSeconds: 10,
          identity: 'metacontroller-operator',
        },
      },
    });
  });

  it('reads overrides from the environment', () => {
    const result = loadOperatorConfig({
      OPERATOR_APP_NAME: 'mc',
      OPERATOR_NAMESPACE: 'ops',
      METACONTROLLER_IMAGE: 'registry.local/metacontroller:v2',
      OPERATOR_MAX_CHECK_SECONDS: '0.5',
      OPERATOR_UPDATE_STATUS_INTERVAL_SECONDS: '60',
      OPERATOR_LEADER_ELECTION: 'true',
      OPERATOR_LEASE_DURATION_SECONDS: '15',
      OPERATOR_LEASE_RENEW_SECONDS: '5',
      HOSTNAME: 'mc-0',
      LOG_LEVEL: 'debug',
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.appName).toBe('mc');
    expect(result.value.image).toBe('registry.local/metacontroller:v2');
    expect(result.value.maxCheckSeconds).toBe(0.5);
    expect(result.value.updateStatusIntervalSeconds).toBe(60);
    expect(result.value.logLevel).toBe('debug');
    expect(result.value.leaderElection).toEqual({
      enabled: true,
      leaseName: 'mc-leader',
      leaseDurationSeconds: 15,
      renewIntervalSeconds: 5,
      identity: 'mc-0',
    });
  });

  it('treats empty variables as unset', () => {
    const result = loadOperatorConfig({ OPERATOR_NAMESPACE: 'kubeflow', OPERATOR_APP_NAME: '' });

    expect(result.ok && result.value.appName).toBe('metacontroller-operator');
  });

  it('requires a namespace', () => {
    const result = loadOperatorConfig({});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('CONFIG_INVALID');
    expect(result.error.details).toEqual({ issues: ['namespace: Required'] });
  });

  it('rejects values that fail validation', () => {
    const result = loadOperatorConfig({
      OPERATOR_NAMESPACE: 'kubeflow',
      OPERATOR_LEADER_ELECTION: 'maybe',
      OPERATOR_MAX_CHECK_SECONDS: '-1',
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.details?.issues).toEqual([
      "OPERATOR_LEADER_ELECTION: Invalid enum value. Expected 'true' | 'false' | '1' | '0' | 'yes' | 'no', received 'maybe'",
    ]);
  });

  it('rejects a lease renewal interval that is not shorter than the lease', () => {
    const result = loadOperatorConfig({
      OPERATOR_NAMESPACE: 'kubeflow',
      OPERATOR_LEASE_DURATION_SECONDS: '10',
      OPERATOR_LEASE_RENEW_SECONDS: '10',
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.details?.issues).toEqual([
      'leaderElection.renewIntervalSeconds: must be shorter than leaseDurationSeconds',
    ]);
  });

  it('rejects an app name that is not a DNS label', () => {
    const result = loadOperatorConfig({ OPERATOR_NAMESPACE: 'kubeflow', OPERATOR_APP_NAME: 'My_App' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      'Invalid operator configuration: appName: must be a DNS-1123 label'
    );
  });
});
