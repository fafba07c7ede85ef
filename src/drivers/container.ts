/**
 * Container Driver
 *
 * Drives LXC containers through `pct`. Unprivileged containers get their
 * identity map written by the host on first start; the driver exposes the
 * check and the corrective start/stop cycle as the identityMap capability.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ContainerSpec } from '../config/types.js';
import { DriverError } from '../core/errors.js';
import type { Logger } from '../lib/logger.js';
import {
  buildPctClone,
  buildPctConfig,
  buildPctCreate,
  buildPctDestroy,
  buildPctExec,
  buildPctListSnapshot,
  buildPctMount,
  buildPctSet,
  buildPctSnapshot,
  buildPctStart,
  buildPctStatus,
  buildPctStop,
  buildPctTemplate,
  parseConfig,
  parseIdmapEntries,
  parseNetDevice,
  parseSnapshotList,
  type CommandExecutor,
  type CommandResult,
  type GuestConfig,
  type HostCommand,
} from '../hypervisor/index.js';
import { compareSetting, readStatus, runStep } from './shared.js';
import type { IdentityMapCapability, ObservedResource, ResourceDriver } from './types.js';

/**
 * Options for constructing a ContainerDriver
 */
export interface ContainerDriverOptions {
  /** Directory holding <id>.conf files written by the host */
  lxcConfigDir: string;
  logger: Logger;
  /** Timeout for a single pct command */
  commandTimeoutMs?: number;
}

const SEAL_SCRIPT = [
  'if command -v cloud-init >/dev/null 2>&1; then cloud-init clean --logs; fi',
  'truncate -s 0 /etc/machine-id',
  'rm -f /var/lib/dbus/machine-id',
].join('; ');

/**
 * Compute drift between `pct config` output and the spec.
 */
export function containerDrift(config: GuestConfig, spec: ContainerSpec): string[] {
  const drift: string[] = [];
  compareSetting(drift, 'hostname', config['hostname'], spec.name);
  compareSetting(drift, 'cores', config['cores'], String(spec.hardware.cores));
  compareSetting(drift, 'memory', config['memory'], String(spec.hardware.memoryMb));

  const net = parseNetDevice(config['net0'] ?? '');
  compareSetting(drift, 'net0.name', net.name, spec.network.interfaceName);
  compareSetting(drift, 'net0.bridge', net.bridge, spec.network.bridge);
  compareSetting(drift, 'net0.ip', net.ip, spec.network.address);
  compareSetting(drift, 'net0.gw', net.gw, spec.network.gateway);
  if (spec.network.macAddress) {
    compareSetting(drift, 'net0.hwaddr', net.hwaddr, spec.network.macAddress);
  }
  if (spec.network.nameservers) {
    compareSetting(drift, 'nameserver', config['nameserver'], spec.network.nameservers);
  }
  return drift;
}

/**
 * List declared bind mounts that are not attached as configured.
 */
export function missingMounts(config: GuestConfig, spec: ContainerSpec): number[] {
  const missing: number[] = [];
  spec.volumes.forEach((volume, index) => {
    const value = config[`mp${index}`];
    if (!value) {
      missing.push(index);
      return;
    }
    const [source, ...options] = value.split(',');
    const mountPoint = options.find((o) => o.startsWith('mp='))?.slice(3);
    const readOnly = options.includes('ro=1');
    if (source !== volume.hostPath || mountPoint !== volume.mountPoint || readOnly !== volume.readOnly) {
      missing.push(index);
    }
  });
  return missing;
}

/**
 * `pct`-backed driver for LXC containers.
 */
export class ContainerDriver implements ResourceDriver<ContainerSpec> {
  readonly kind = 'container' as const;
  readonly identityMap: IdentityMapCapability<ContainerSpec>;

  private readonly lxcConfigDir: string;
  private readonly logger: Logger;
  private readonly commandTimeoutMs: number | undefined;

  constructor(
    private readonly executor: CommandExecutor,
    options: ContainerDriverOptions
  ) {
    this.lxcConfigDir = options.lxcConfigDir;
    this.logger = options.logger;
    this.commandTimeoutMs = options.commandTimeoutMs;
    this.identityMap = {
      verify: (spec) => this.verifyIdentityMap(spec),
      cycle: (spec) => this.cycleIdentityMap(spec),
    };
  }

  async inspect(spec: ContainerSpec): Promise<ObservedResource | null> {
    const status = await readStatus(this.executor, spec.id, buildPctStatus(spec.id));
    if (status === null) {
      return null;
    }

    const config = await this.readConfig(spec.id);
    return {
      status: status === 'running' ? 'running' : 'stopped',
      template: config['template'] === '1',
      drift: containerDrift(config, spec),
      volumesMissing: missingMounts(config, spec).map((index) => {
        const volume = spec.volumes[index];
        return `mp${index} ${volume ? volume.mountPoint : ''}`.trim();
      }),
      // pct create and pct clone are single commands
      incomplete: [],
    };
  }

  async define(spec: ContainerSpec): Promise<void> {
    if (spec.cloneFrom) {
      this.logger.info(`Cloning container ${spec.id} from ${spec.cloneFrom.id}`);
      await this.run('clone', spec.id, buildPctClone(spec, spec.cloneFrom.id, spec.cloneFrom.snapshot));
      return;
    }

    if (!spec.osTemplate) {
      throw new DriverError(
        `Container ${spec.id} has neither os_template nor clone_from`,
        'create',
        spec.id
      );
    }
    this.logger.info(`Creating container ${spec.id} from ${spec.osTemplate}`);
    await this.run('create', spec.id, buildPctCreate(spec, spec.osTemplate));
  }

  async configure(spec: ContainerSpec): Promise<void> {
    this.logger.info(`Applying configuration to container ${spec.id}`);
    await this.run('configure', spec.id, buildPctSet(spec));
  }

  async applyVolumes(spec: ContainerSpec): Promise<void> {
    const config = await this.readConfig(spec.id);
    for (const index of missingMounts(config, spec)) {
      const volume = spec.volumes[index];
      if (!volume) continue;
      this.logger.info(`Mounting ${volume.hostPath} at ${volume.mountPoint} in container ${spec.id}`);
      await this.run('mount', spec.id, buildPctMount(spec.id, index, volume));
    }
  }

  async start(spec: ContainerSpec): Promise<void> {
    const status = await readStatus(this.executor, spec.id, buildPctStatus(spec.id));
    if (status === 'running') {
      return;
    }
    await this.run('start', spec.id, buildPctStart(spec.id));
  }

  // pct exec reaches a container as soon as it runs
  async isReady(): Promise<boolean> {
    return true;
  }

  async stop(spec: ContainerSpec): Promise<void> {
    const status = await readStatus(this.executor, spec.id, buildPctStatus(spec.id));
    if (status === 'stopped' || status === null) {
      return;
    }
    await this.run('stop', spec.id, buildPctStop(spec.id));
  }

  async destroy(spec: ContainerSpec): Promise<void> {
    const status = await readStatus(this.executor, spec.id, buildPctStatus(spec.id));
    if (status === null) {
      this.logger.debug(`Container ${spec.id} does not exist; nothing to destroy`);
      return;
    }
    if (status !== 'stopped') {
      await this.run('stop', spec.id, buildPctStop(spec.id));
    }
    this.logger.info(`Destroying container ${spec.id}`);
    await this.run('destroy', spec.id, buildPctDestroy(spec.id));
  }

  async listSnapshots(spec: ContainerSpec): Promise<string[]> {
    const result = await this.run('listsnapshot', spec.id, buildPctListSnapshot(spec.id));
    return parseSnapshotList(result.stdout);
  }

  async snapshot(spec: ContainerSpec, name: string): Promise<void> {
    this.logger.info(`Snapshot '${name}' of container ${spec.id}`);
    await this.run('snapshot', spec.id, buildPctSnapshot(spec.id, name));
  }

  async sealIdentity(spec: ContainerSpec): Promise<void> {
    await this.run('seal', spec.id, buildPctExec(spec.id, ['sh', '-c', SEAL_SCRIPT]));
  }

  async convertToTemplate(spec: ContainerSpec): Promise<void> {
    this.logger.info(`Converting container ${spec.id} to a template`);
    await this.run('template', spec.id, buildPctTemplate(spec.id));
  }

  private async verifyIdentityMap(spec: ContainerSpec): Promise<boolean> {
    // Privileged containers share the host's ids
    if (!spec.unprivileged) {
      return true;
    }

    const confPath = join(this.lxcConfigDir, `${spec.id}.conf`);
    let content: string;
    try {
      content = await readFile(confPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw error;
    }

    const entries = parseIdmapEntries(content);
    this.logger.debug(`Container ${spec.id}: ${entries.length} lxc.idmap entries in ${confPath}`);
    return entries.length > 0;
  }

  private async cycleIdentityMap(spec: ContainerSpec): Promise<void> {
    this.logger.info(`Start/stop cycle for container ${spec.id} to write its identity map`);
    await this.start(spec);
    await this.stop(spec);
  }

  private async readConfig(id: number): Promise<GuestConfig> {
    const result = await this.run('config', id, buildPctConfig(id));
    return parseConfig(result.stdout);
  }

  private run(operation: string, id: number, command: HostCommand): Promise<CommandResult> {
    return runStep(this.executor, operation, id, command, this.commandTimeoutMs);
  }
}
