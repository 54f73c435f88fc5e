import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
}));

const mockLoadFromFile = vi.fn();
const mockLoadFromCluster = vi.fn();
const mockGetContexts = vi.fn();
const mockSetCurrentContext = vi.fn();

vi.mock('@kubernetes/client-node', () => ({
  KubeConfig: class MockKubeConfig {
    loadFromFile = mockLoadFromFile;
    loadFromCluster = mockLoadFromCluster;
    getContexts = mockGetContexts;
    setCurrentContext = mockSetCurrentContext;
  },
}));

import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { loadKubeConfig } from '../kubeconfig.js';

const mockExistsSync = vi.mocked(existsSync);
const defaultPath = join(homedir(), '.kube', 'config');

describe('loadKubeConfig', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    mockGetContexts.mockReturnValue([]);
  });

  describe('explicit path', () => {
    it('loads from the explicit path', () => {
      mockExistsSync.mockReturnValue(true);

      const result = loadKubeConfig({ kubeconfigPath: '/custom/kubeconfig', env: {} });

      expect(result.ok).toBe(true);
      expect(mockLoadFromFile).toHaveBeenCalledWith('/custom/kubeconfig');
      expect(mockLoadFromFile).toHaveBeenCalledTimes(1);
    });

    it('fails when the explicit path does not exist', () => {
      mockExistsSync.mockReturnValue(false);

      const result = loadKubeConfig({ kubeconfigPath: '/missing/config', env: {} });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('K8S_KUBECONFIG_NOT_FOUND');
        expect(result.error.message).toBe('No kubeconfig found. Tried: /missing/config');
      }
    });

    it('reports an unparseable file', () => {
      mockExistsSync.mockReturnValue(true);
      mockLoadFromFile.mockImplementation(() => {
        throw new Error('invalid YAML');
      });

      const result = loadKubeConfig({ kubeconfigPath: '/bad/config', env: {} });

      expect(!result.ok && result.error).toEqual({
        code: 'K8S_KUBECONFIG_INVALID',
        message: 'Invalid kubeconfig: invalid YAML',
        status: 400,
        details: { path: '/bad/config' },
      });
    });
  });

  describe('KUBECONFIG', () => {
    it('uses the first existing entry', () => {
      mockExistsSync.mockImplementation((path) => path === '/b/config');

      const result = loadKubeConfig({ env: { KUBECONFIG: '/a/config:/b/config' } });

      expect(result.ok).toBe(true);
      expect(mockLoadFromFile).toHaveBeenCalledWith('/b/config');
    });
  });

  describe('default path', () => {
    it('falls back to ~/.kube/config', () => {
      mockExistsSync.mockImplementation((path) => path === defaultPath);

      const result = loadKubeConfig({ env: {} });

      expect(result.ok).toBe(true);
      expect(mockLoadFromFile).toHaveBeenCalledWith(defaultPath);
    });
  });

  describe('in-cluster', () => {
    it('loads the service account when running in a pod', () => {
      mockExistsSync.mockReturnValue(false);

      const result = loadKubeConfig({ env: { KUBERNETES_SERVICE_HOST: '10.0.0.1' } });

      expect(result.ok).toBe(true);
      expect(mockLoadFromCluster).toHaveBeenCalled();
    });

    it('lists every source tried when nothing is available', () => {
      mockExistsSync.mockReturnValue(false);

      const result = loadKubeConfig({ env: {} });

      expect(mockLoadFromCluster).not.toHaveBeenCalled();
      expect(!result.ok && result.error.details).toEqual({
        tried: ['explicit path', 'KUBECONFIG', '~/.kube/config', 'in-cluster'],
      });
    });
  });

  describe('context', () => {
    it('switches to a known context', () => {
      mockExistsSync.mockReturnValue(true);
      mockGetContexts.mockReturnValue([{ name: 'dev' }, { name: 'prod' }]);

      const result = loadKubeConfig({ kubeconfigPath: '/k', context: 'prod', env: {} });

      expect(result.ok).toBe(true);
      expect(mockSetCurrentContext).toHaveBeenCalledWith('prod');
    });

    it('rejects an unknown context', () => {
      mockExistsSync.mockReturnValue(true);
      mockGetContexts.mockReturnValue([{ name: 'dev' }]);

      const result = loadKubeConfig({ kubeconfigPath: '/k', context: 'prod', env: {} });

      expect(!result.ok && result.error.code).toBe('K8S_CONTEXT_NOT_FOUND');
      expect(mockSetCurrentContext).not.toHaveBeenCalled();
    });
  });
});
