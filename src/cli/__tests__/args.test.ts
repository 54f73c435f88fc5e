import { describe, expect, it } from 'vitest';
import { parseCliArgs } from '../args.js';

describe('parseCliArgs', () => {
  it('parses a command with its options', () => {
    expect(parseCliArgs(['install', '--kubeconfig', '/tmp/kc', '--context', 'dev'])).toEqual({
      kind: 'command',
      command: 'install',
      kubeconfigPath: '/tmp/kc',
      context: 'dev',
    });
  });

  it('accepts options before the command', () => {
    expect(parseCliArgs(['--context', 'dev', 'update-status'])).toEqual({
      kind: 'command',
      command: 'update-status',
      kubeconfigPath: undefined,
      context: 'dev',
    });
  });

  it('recognises help and version', () => {
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['run', '--version'])).toEqual({ kind: 'version' });
  });

  it('rejects a missing or unknown command', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'invalid', message: 'Missing command' });
    expect(parseCliArgs(['deploy'])).toEqual({ kind: 'invalid', message: 'Unknown command: deploy' });
  });

  it('rejects an option without a value', () => {
    expect(parseCliArgs(['install', '--kubeconfig'])).toEqual({
      kind: 'invalid',
      message: '--kubeconfig requires a value',
    });
  });
});
