/**
 * Shared test fixtures: resource specs, a recording command executor and a
 * capturing logger.
 */

import { ConfigurationStore } from '../../src/config/store.js';
import type { ContainerSpec, ResolvedSettings, ResourceSpec, VmSpec } from '../../src/config/types.js';
import {
  HostCommandError,
  renderCommand,
  type CommandExecutor,
  type CommandResult,
  type HostCommand,
  type RunOptions,
} from '../../src/hypervisor/index.js';
import { Logger } from '../../src/lib/logger.js';

export function containerSpec(overrides: Partial<ContainerSpec> = {}): ContainerSpec {
  return {
    id: 101,
    kind: 'container',
    name: 'web',
    hardware: { cores: 2, memoryMb: 1024, diskSizeGb: 8, storagePool: 'local-lvm' },
    network: { interfaceName: 'eth0', bridge: 'vmbr0', address: 'dhcp' },
    features: [],
    dependencies: [],
    isTemplate: false,
    templateSnapshot: 'template',
    lifecycleSnapshots: false,
    healthChecks: [],
    unprivileged: true,
    volumes: [],
    osTemplate: 'local:vztmpl/debian.tar.zst',
    ...overrides,
  };
}

export function vmSpec(overrides: Partial<VmSpec> = {}): VmSpec {
  return {
    id: 201,
    kind: 'vm',
    name: 'db',
    hardware: { cores: 2, memoryMb: 2048, diskSizeGb: 16, storagePool: 'local-lvm' },
    network: { interfaceName: 'eth0', bridge: 'vmbr0', address: 'dhcp' },
    features: [],
    dependencies: [],
    isTemplate: false,
    templateSnapshot: 'template',
    lifecycleSnapshots: false,
    healthChecks: [],
    volumes: [],
    image: '/images/debian.qcow2',
    ...overrides,
  };
}

export const TEST_SETTINGS: ResolvedSettings = {
  stateDir: '/tmp/guestsmith-state',
  featureDir: '/opt/features',
  healthCheckDir: '/opt/checks',
  lxcConfigDir: '/etc/pve/lxc',
  commandTimeoutMs: 1000,
  featureTimeoutMs: 1000,
  guestAgent: { attempts: 3, intervalMs: 0 },
};

/**
 * Build a store straight from resolved specs.
 */
export function storeOf(resources: ResourceSpec[], settings: Partial<ResolvedSettings> = {}): ConfigurationStore {
  return new ConfigurationStore({
    resources: [...resources].sort((a, b) => a.id - b.id),
    settings: { ...TEST_SETTINGS, ...settings },
    configPath: '/tmp/host.yaml',
    configHash: '00000000',
  });
}

/**
 * Reply to a command: stdout text, a failure to throw, or undefined for
 * empty success.
 */
export type Responder = (command: HostCommand) => string | HostCommandError | undefined;

/**
 * Executor that records every command and answers from a responder.
 */
export class RecordingExecutor implements CommandExecutor {
  readonly commands: HostCommand[] = [];
  readonly runOptions: RunOptions[] = [];

  constructor(private readonly respond: Responder = () => undefined) {}

  async run(command: HostCommand, options: RunOptions = {}): Promise<CommandResult> {
    this.commands.push(command);
    this.runOptions.push(options);
    const reply = this.respond(command);
    if (reply instanceof HostCommandError) {
      throw reply;
    }
    return { stdout: reply ?? '', stderr: '', exitCode: 0 };
  }

  /**
   * Commands rendered as shell lines.
   */
  lines(): string[] {
    return this.commands.map(renderCommand);
  }
}

/**
 * Failure shaped like the hypervisor CLI's answer for a missing guest.
 */
export function missing(command: HostCommand): HostCommandError {
  const stderr = `Configuration file 'nodes/pve/${command.args[1] ?? ''}.conf' does not exist\n`;
  return new HostCommandError(`${renderCommand(command)}: failed`, 'NOT_FOUND', 2, stderr, '', command);
}

/**
 * Generic failure with the given stderr.
 */
export function failure(command: HostCommand, stderr: string, stdout = ''): HostCommandError {
  return new HostCommandError(
    `${renderCommand(command)}: ${stderr.trim()}`,
    'EXECUTION_FAILED',
    1,
    stderr,
    stdout,
    command
  );
}

/**
 * Logger that keeps every line, debug included.
 */
export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger({ level: 'debug', write: (line) => lines.push(line) }), lines };
}
