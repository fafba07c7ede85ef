/**
 * VM Driver
 *
 * Drives QEMU/KVM virtual machines through `qm`. After start the driver
 * waits for the guest agent, since every later step talks to the guest
 * through it.
 */

import type { VmSpec } from '../config/types.js';
import { DriverError } from '../core/errors.js';
import type { Logger } from '../lib/logger.js';
import { formatAttempts, pollUntil, type RetryPolicy, type Sleep } from '../lib/retry.js';
import {
  buildQmAddDisk,
  buildQmAgentPing,
  buildQmAttachBootDisk,
  buildQmClone,
  buildQmConfig,
  buildQmCreate,
  buildQmDestroy,
  buildQmGuestExec,
  buildQmImportDisk,
  buildQmListSnapshot,
  buildQmResize,
  buildQmSet,
  buildQmShutdown,
  buildQmSnapshot,
  buildQmStart,
  buildQmStatus,
  buildQmTemplate,
  formatIpConfig,
  HostCommandError,
  parseConfig,
  parseNetDevice,
  parseSnapshotList,
  type CommandExecutor,
  type CommandResult,
  type GuestConfig,
  type HostCommand,
} from '../hypervisor/index.js';
import { compareSetting, readStatus, runStep } from './shared.js';
import type { ObservedResource, ResourceDriver } from './types.js';

/**
 * Options for constructing a VmDriver
 */
export interface VmDriverOptions {
  logger: Logger;
  /** Wait for the guest agent after start */
  guestAgent: RetryPolicy;
  /** Seconds a clean shutdown may take before the VM is forced off (default: 180) */
  shutdownTimeoutS?: number;
  /** Timeout for a single qm command */
  commandTimeoutMs?: number;
  sleep?: Sleep;
}

/**
 * Guest commands run before templating. `cloud-init clean` goes last because
 * it can stop the guest agent.
 */
const SEAL_STEPS: string[][] = [
  ['/bin/sh', '-c', 'rm -rf /var/lib/cloud/instance'],
  ['/bin/sh', '-c', 'rm -f /etc/machine-id && touch /etc/machine-id'],
  ['/bin/sh', '-c', 'cloud-init clean --logs'],
];

/**
 * Compute drift between `qm config` output and the spec.
 */
export function vmDrift(config: GuestConfig, spec: VmSpec): string[] {
  const drift: string[] = [];
  compareSetting(drift, 'name', config['name'], spec.name);
  compareSetting(drift, 'cores', config['cores'], String(spec.hardware.cores));
  compareSetting(drift, 'memory', config['memory'], String(spec.hardware.memoryMb));

  const net = parseNetDevice(config['net0'] ?? '');
  compareSetting(drift, 'net0.bridge', net.bridge, spec.network.bridge);
  if (spec.network.macAddress) {
    compareSetting(drift, 'net0.macaddr', net.hwaddr, spec.network.macAddress);
  }
  compareSetting(drift, 'ipconfig0', config['ipconfig0'], formatIpConfig(spec.network));
  compareSetting(drift, 'agent', config['agent']?.split(',')[0], '1');
  if (spec.network.nameservers) {
    compareSetting(drift, 'nameserver', config['nameserver'], spec.network.nameservers);
  }
  return drift;
}

/**
 * List data-disk slots (scsi1..) that are not allocated.
 */
export function missingDisks(config: GuestConfig, spec: VmSpec): number[] {
  const missing: number[] = [];
  spec.volumes.forEach((_, index) => {
    const slot = index + 1;
    if (!config[`scsi${slot}`]) {
      missing.push(slot);
    }
  });
  return missing;
}

/**
 * Steps that follow `qm create` when defining a VM from an image, in order
 */
const DEFINITION_STEPS = ['importdisk', 'attach', 'resize'] as const;

const GB_PER_UNIT: Record<string, number> = { K: 1 / (1024 * 1024), M: 1 / 1024, G: 1, T: 1024 };

function diskSizeGb(disk: string): number | undefined {
  const match = /(?:^|,)size=(\d+(?:\.\d+)?)([KMGT])/.exec(disk);
  if (!match) return undefined;
  return Number(match[1]) * (GB_PER_UNIT[match[2] ?? 'G'] ?? 1);
}

/**
 * Definition steps an existing image-based VM still needs.
 *
 * The imported disk shows up as `unusedN` until it is attached as `scsi0`;
 * the resize is pending while `scsi0` is smaller than the declared size.
 * Clones are a single command and never partly defined.
 */
export function pendingDefinition(config: GuestConfig, spec: VmSpec): string[] {
  if (spec.cloneFrom || !spec.image) {
    return [];
  }

  const bootDisk = config['scsi0'];
  if (!bootDisk) {
    const imported = Object.keys(config).some((key) => /^unused\d+$/.test(key));
    return imported ? ['attach', 'resize'] : [...DEFINITION_STEPS];
  }

  const sizeGb = diskSizeGb(bootDisk);
  return sizeGb !== undefined && sizeGb < spec.hardware.diskSizeGb ? ['resize'] : [];
}

/**
 * `qm`-backed driver for virtual machines.
 */
export class VmDriver implements ResourceDriver<VmSpec> {
  readonly kind = 'vm' as const;

  private readonly logger: Logger;
  private readonly guestAgent: RetryPolicy;
  private readonly shutdownTimeoutS: number;
  private readonly commandTimeoutMs: number | undefined;
  private readonly sleep: Sleep | undefined;

  constructor(
    private readonly executor: CommandExecutor,
    options: VmDriverOptions
  ) {
    this.logger = options.logger;
    this.guestAgent = options.guestAgent;
    this.shutdownTimeoutS = options.shutdownTimeoutS ?? 180;
    this.commandTimeoutMs = options.commandTimeoutMs;
    this.sleep = options.sleep;
  }

  async inspect(spec: VmSpec): Promise<ObservedResource | null> {
    const status = await readStatus(this.executor, spec.id, buildQmStatus(spec.id));
    if (status === null) {
      return null;
    }

    const config = await this.readConfig(spec.id);
    return {
      status: status === 'running' ? 'running' : 'stopped',
      template: config['template'] === '1',
      drift: vmDrift(config, spec),
      volumesMissing: missingDisks(config, spec).map((slot) => `scsi${slot}`),
      incomplete: pendingDefinition(config, spec),
    };
  }

  async define(spec: VmSpec, observed?: ObservedResource | null): Promise<void> {
    if (!observed && spec.cloneFrom) {
      this.logger.info(`Cloning VM ${spec.id} from ${spec.cloneFrom.id}`);
      await this.run('clone', spec.id, buildQmClone(spec, spec.cloneFrom.id, spec.cloneFrom.snapshot));
      return;
    }
    if (observed && observed.incomplete.length === 0) {
      return;
    }

    const image = spec.image;
    if (!image) {
      throw new DriverError(`VM ${spec.id} has neither image nor clone_from`, 'create', spec.id);
    }

    let steps: readonly string[];
    if (observed) {
      this.logger.info(`Resuming definition of VM ${spec.id}: ${observed.incomplete.join(', ')}`);
      steps = observed.incomplete;
    } else {
      this.logger.info(`Creating VM ${spec.id} from ${image}`);
      await this.run('create', spec.id, buildQmCreate(spec));
      steps = DEFINITION_STEPS;
    }

    const pool = spec.hardware.storagePool;
    if (steps.includes('importdisk')) {
      await this.run('importdisk', spec.id, buildQmImportDisk(spec.id, image, pool));
    }
    if (steps.includes('attach')) {
      await this.run('attach', spec.id, buildQmAttachBootDisk(spec.id, pool));
    }
    if (steps.includes('resize')) {
      await this.run('resize', spec.id, buildQmResize(spec.id, 'scsi0', spec.hardware.diskSizeGb));
    }
  }

  async configure(spec: VmSpec): Promise<void> {
    this.logger.info(`Applying configuration to VM ${spec.id}`);
    await this.run('configure', spec.id, buildQmSet(spec));
  }

  async applyVolumes(spec: VmSpec): Promise<void> {
    const config = await this.readConfig(spec.id);
    for (const slot of missingDisks(config, spec)) {
      const volume = spec.volumes[slot - 1];
      if (!volume) continue;
      this.logger.info(`Allocating ${volume.sizeGb}G on ${volume.storage} as scsi${slot} of VM ${spec.id}`);
      await this.run('disk', spec.id, buildQmAddDisk(spec.id, slot, volume));
    }
  }

  async start(spec: VmSpec): Promise<void> {
    const status = await readStatus(this.executor, spec.id, buildQmStatus(spec.id));
    if (status !== 'running') {
      await this.run('start', spec.id, buildQmStart(spec.id));
    }
    await this.waitForGuestAgent(spec.id);
  }

  async isReady(spec: VmSpec): Promise<boolean> {
    try {
      await this.executor.run(buildQmAgentPing(spec.id));
      return true;
    } catch (error) {
      if (error instanceof HostCommandError) {
        this.logger.debug(`Guest agent on VM ${spec.id} not answering: ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  async stop(spec: VmSpec): Promise<void> {
    const status = await readStatus(this.executor, spec.id, buildQmStatus(spec.id));
    if (status === 'stopped' || status === null) {
      return;
    }
    await this.run(
      'shutdown',
      spec.id,
      buildQmShutdown(spec.id, this.shutdownTimeoutS),
      (this.shutdownTimeoutS + 30) * 1000
    );
  }

  async destroy(spec: VmSpec): Promise<void> {
    const status = await readStatus(this.executor, spec.id, buildQmStatus(spec.id));
    if (status === null) {
      this.logger.debug(`VM ${spec.id} does not exist; nothing to destroy`);
      return;
    }
    if (status !== 'stopped') {
      await this.stop(spec);
    }
    this.logger.info(`Destroying VM ${spec.id}`);
    await this.run('destroy', spec.id, buildQmDestroy(spec.id));
  }

  async listSnapshots(spec: VmSpec): Promise<string[]> {
    const result = await this.run('listsnapshot', spec.id, buildQmListSnapshot(spec.id));
    return parseSnapshotList(result.stdout);
  }

  async snapshot(spec: VmSpec, name: string): Promise<void> {
    this.logger.info(`Snapshot '${name}' of VM ${spec.id}`);
    await this.run('snapshot', spec.id, buildQmSnapshot(spec.id, name));
  }

  async sealIdentity(spec: VmSpec): Promise<void> {
    for (const argv of SEAL_STEPS) {
      await this.run('seal', spec.id, buildQmGuestExec(spec.id, argv));
    }
  }

  async convertToTemplate(spec: VmSpec): Promise<void> {
    this.logger.info(`Converting VM ${spec.id} to a template`);
    await this.run('template', spec.id, buildQmTemplate(spec.id));
  }

  private async waitForGuestAgent(id: number): Promise<void> {
    this.logger.info(`Waiting for guest agent on VM ${id}`);
    const result = await pollUntil(
      async () => {
        const ping = await this.executor.run(buildQmAgentPing(id));
        return { ok: true, output: ping.stdout };
      },
      this.guestAgent,
      this.sleep
    );

    if (!result.ok) {
      throw new DriverError(
        `Guest agent on VM ${id} did not respond after ${result.attempts.length} attempts`,
        'guest-agent',
        id,
        formatAttempts(result.attempts, this.guestAgent.attempts)
      );
    }
  }

  private async readConfig(id: number): Promise<GuestConfig> {
    const result = await this.run('config', id, buildQmConfig(id));
    return parseConfig(result.stdout);
  }

  private run(
    operation: string,
    id: number,
    command: HostCommand,
    timeoutMs: number | undefined = this.commandTimeoutMs
  ): Promise<CommandResult> {
    return runStep(this.executor, operation, id, command, timeoutMs);
  }
}
