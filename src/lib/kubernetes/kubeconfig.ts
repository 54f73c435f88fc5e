import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { KubeConfig } from '@kubernetes/client-node';
import type { AppError } from '../errors/base.js';
import { createError, getErrorMessage } from '../errors/base.js';
import { K8sErrors } from '../errors/k8s-errors.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';

export interface KubeConfigOptions {
  /** Explicit path to kubeconfig file */
  kubeconfigPath?: string;
  /** Context to use (defaults to current-context) */
  context?: string;
  /** Environment to read KUBECONFIG from */
  env?: NodeJS.ProcessEnv;
}

type LoadAttempt = 'loaded' | 'skipped';

/**
 * Load KubeConfig using 4-tier discovery:
 * 1. Explicit path parameter
 * 2. KUBECONFIG env var (colon-separated, first existing entry)
 * 3. ~/.kube/config
 * 4. In-cluster service account (when KUBERNETES_SERVICE_HOST is set)
 */
export function loadKubeConfig(options: KubeConfigOptions = {}): Result<KubeConfig, AppError> {
  const kc = new KubeConfig();
  const env = options.env ?? process.env;
  const fromEnv = env.KUBECONFIG?.split(':').find((p) => p && existsSync(p));
  const defaultPath = join(homedir(), '.kube', 'config');

  const candidates: Array<{ label: string; path?: string; required: boolean }> = [
    { label: 'explicit path', path: options.kubeconfigPath, required: true },
    { label: 'KUBECONFIG', path: fromEnv, required: false },
    { label: '~/.kube/config', path: defaultPath, required: false },
  ];

  let loaded = false;
  for (const candidate of candidates) {
    const attempt = tryLoadFromFile(kc, candidate.path, candidate.required);
    if (!attempt.ok) {
      return attempt;
    }
    if (attempt.value === 'loaded') {
      loaded = true;
      break;
    }
  }

  if (!loaded && !tryLoadFromCluster(kc, env)) {
    return err(K8sErrors.KUBECONFIG_NOT_FOUND([...candidates.map((c) => c.label), 'in-cluster']));
  }

  if (options.context) {
    const contextResult = resolveContext(kc, options.context);
    if (!contextResult.ok) {
      return contextResult;
    }
  }

  return ok(kc);
}

/**
 * Resolve and set the active context
 */
export function resolveContext(kc: KubeConfig, context: string): Result<string, AppError> {
  const found = kc.getContexts().find((c) => c.name === context);
  if (!found) {
    return err(K8sErrors.CONTEXT_NOT_FOUND(context));
  }
  kc.setCurrentContext(context);
  return ok(context);
}

function tryLoadFromFile(
  kc: KubeConfig,
  path: string | undefined,
  requireExists: boolean
): Result<LoadAttempt, AppError> {
  if (!path) return ok('skipped');

  if (!existsSync(path)) {
    return requireExists ? err(K8sErrors.KUBECONFIG_NOT_FOUND([path])) : ok('skipped');
  }

  try {
    kc.loadFromFile(path);
    return ok('loaded');
  } catch (error) {
    return err(
      createError('K8S_KUBECONFIG_INVALID', `Invalid kubeconfig: ${getErrorMessage(error)}`, 400, {
        path,
      })
    );
  }
}

function tryLoadFromCluster(kc: KubeConfig, env: NodeJS.ProcessEnv): boolean {
  // loadFromCluster does not fail outside a pod, it builds an unusable server URL
  if (!env.KUBERNETES_SERVICE_HOST) {
    return false;
  }
  try {
    kc.loadFromCluster();
    return true;
  } catch {
    return false;
  }
}
