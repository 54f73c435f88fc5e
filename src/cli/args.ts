export const COMMANDS = ['install', 'update-status', 'remove', 'run'] as const;

export type Command = (typeof COMMANDS)[number];

export type CliArgs =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'invalid'; message: string }
  | { kind: 'command'; command: Command; kubeconfigPath?: string; context?: string };

const isCommand = (value: string): value is Command =>
  COMMANDS.some((command) => command === value);

/**
 * Parse `<command> [--kubeconfig path] [--context name]`.
 */
export function parseCliArgs(args: string[]): CliArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      if (next && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = true;
      }
    } else {
      positional.push(arg);
    }
  }

  const command = positional[0];
  if (flags.help || command === 'help') {
    return { kind: 'help' };
  }
  if (flags.version || command === 'version') {
    return { kind: 'version' };
  }
  if (!command) {
    return { kind: 'invalid', message: 'Missing command' };
  }
  if (!isCommand(command)) {
    return { kind: 'invalid', message: `Unknown command: ${command}` };
  }

  for (const key of ['kubeconfig', 'context']) {
    if (flags[key] === true) {
      return { kind: 'invalid', message: `--${key} requires a value` };
    }
  }

  return {
    kind: 'command',
    command,
    kubeconfigPath: typeof flags.kubeconfig === 'string' ? flags.kubeconfig : undefined,
    context: typeof flags.context === 'string' ? flags.context : undefined,
  };
}

export const USAGE = `
  Usage: metacontroller-operator <command> [options]

  Commands:
    install         Apply the manifests and wait for them to become ready
    update-status   Check the deployed resources once, reinstalling on drift
    remove          Not supported; reports an error
    run             Install, then check status on an interval until interrupted

  Options:
    --kubeconfig <path>  Kubeconfig file (default: KUBECONFIG, ~/.kube/config, in-cluster)
    --context <name>     Kubeconfig context to use
    --help               Show this help
    --version            Print version and exit

  Environment:
    OPERATOR_NAMESPACE (required), OPERATOR_APP_NAME, METACONTROLLER_IMAGE,
    OPERATOR_MANIFESTS_DIR, OPERATOR_MAX_CHECK_SECONDS,
    OPERATOR_UPDATE_STATUS_INTERVAL_SECONDS, OPERATOR_LEADER_ELECTION,
    OPERATOR_LEASE_NAME, OPERATOR_LEASE_DURATION_SECONDS, LOG_LEVEL
`;
