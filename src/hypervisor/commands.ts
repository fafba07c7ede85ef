/**
 * Hypervisor Command Builders
 *
 * Builds argv arrays for `pct` (containers) and `qm` (VMs). Nothing here
 * runs a command; drivers hand the result to a CommandExecutor.
 */

import type { ContainerSpec, ContainerVolume, ResolvedNetwork, VmSpec, VmVolume } from '../config/types.js';
import type { HostCommand } from './types.js';

const PCT = 'pct';
const QM = 'qm';

function pct(...args: Array<string | number>): HostCommand {
  return { program: PCT, args: args.map(String) };
}

function qm(...args: Array<string | number>): HostCommand {
  return { program: QM, args: args.map(String) };
}

function nameserverArgs(network: ResolvedNetwork): string[] {
  return network.nameservers ? ['--nameserver', network.nameservers] : [];
}

// =============================================================================
// Containers
// =============================================================================

/**
 * Build the `net0` value for a container.
 */
export function formatContainerNet0(network: ResolvedNetwork): string {
  const parts = [`name=${network.interfaceName}`, `bridge=${network.bridge}`, `ip=${network.address}`];
  if (network.gateway) parts.push(`gw=${network.gateway}`);
  if (network.macAddress) parts.push(`hwaddr=${network.macAddress}`);
  return parts.join(',');
}

/**
 * Build the `mpN` value for a container bind mount.
 */
export function formatMountPoint(volume: ContainerVolume): string {
  return `${volume.hostPath},mp=${volume.mountPoint}${volume.readOnly ? ',ro=1' : ''}`;
}

/**
 * Create a container from its OS template.
 */
export function buildPctCreate(spec: ContainerSpec, osTemplate: string): HostCommand {
  return {
    program: PCT,
    args: [
      'create', String(spec.id), osTemplate,
      '--hostname', spec.name,
      '--cores', String(spec.hardware.cores),
      '--memory', String(spec.hardware.memoryMb),
      '--rootfs', `${spec.hardware.storagePool}:${spec.hardware.diskSizeGb}`,
      '--net0', formatContainerNet0(spec.network),
      '--unprivileged', spec.unprivileged ? '1' : '0',
      ...nameserverArgs(spec.network),
    ],
  };
}

/**
 * Clone a container from a template container, optionally at a snapshot.
 */
export function buildPctClone(spec: ContainerSpec, sourceId: number, snapshot?: string): HostCommand {
  const command = pct('clone', sourceId, spec.id, '--hostname', spec.name);
  if (snapshot) command.args.push('--snapname', snapshot);
  return command;
}

/**
 * Apply hardware and network settings to an existing container.
 */
export function buildPctSet(spec: ContainerSpec): HostCommand {
  return {
    program: PCT,
    args: [
      'set', String(spec.id),
      '--hostname', spec.name,
      '--cores', String(spec.hardware.cores),
      '--memory', String(spec.hardware.memoryMb),
      '--net0', formatContainerNet0(spec.network),
      ...nameserverArgs(spec.network),
    ],
  };
}

export function buildPctMount(id: number, index: number, volume: ContainerVolume): HostCommand {
  return pct('set', id, `--mp${index}`, formatMountPoint(volume));
}

export function buildPctStatus(id: number): HostCommand {
  return pct('status', id);
}

export function buildPctConfig(id: number): HostCommand {
  return pct('config', id);
}

export function buildPctStart(id: number): HostCommand {
  return pct('start', id);
}

export function buildPctStop(id: number): HostCommand {
  return pct('stop', id);
}

export function buildPctDestroy(id: number): HostCommand {
  return pct('destroy', id, '--purge', 1);
}

export function buildPctSnapshot(id: number, name: string): HostCommand {
  return pct('snapshot', id, name);
}

export function buildPctListSnapshot(id: number): HostCommand {
  return pct('listsnapshot', id);
}

export function buildPctTemplate(id: number): HostCommand {
  return pct('template', id);
}

/**
 * Run a command inside a running container.
 */
export function buildPctExec(id: number, argv: string[]): HostCommand {
  return pct('exec', id, '--', ...argv);
}

// =============================================================================
// Virtual machines
// =============================================================================

/**
 * Build the `net0` value for a VM (virtio NIC).
 */
export function formatVmNet0(network: ResolvedNetwork): string {
  const model = network.macAddress ? `virtio=${network.macAddress}` : 'virtio';
  return `${model},bridge=${network.bridge}`;
}

/**
 * Build the cloud-init `ipconfig0` value for a VM.
 */
export function formatIpConfig(network: ResolvedNetwork): string {
  if (network.address === 'dhcp') {
    return 'ip=dhcp';
  }
  return network.gateway ? `ip=${network.address},gw=${network.gateway}` : `ip=${network.address}`;
}

function vmSettingArgs(spec: VmSpec): string[] {
  return [
    '--name', spec.name,
    '--cores', String(spec.hardware.cores),
    '--memory', String(spec.hardware.memoryMb),
    '--net0', formatVmNet0(spec.network),
    '--ipconfig0', formatIpConfig(spec.network),
    '--agent', '1',
    ...nameserverArgs(spec.network),
  ];
}

/**
 * Create an empty VM shell ready for a cloud image.
 */
export function buildQmCreate(spec: VmSpec): HostCommand {
  return {
    program: QM,
    args: [
      'create', String(spec.id),
      ...vmSettingArgs(spec),
      '--scsihw', 'virtio-scsi-pci',
      '--serial0', 'socket',
    ],
  };
}

export function buildQmImportDisk(id: number, image: string, storagePool: string): HostCommand {
  return qm('importdisk', id, image, storagePool);
}

/**
 * Attach the imported disk as boot device and add the cloud-init drive.
 */
export function buildQmAttachBootDisk(id: number, storagePool: string): HostCommand {
  return qm(
    'set', id,
    '--scsi0', `${storagePool}:vm-${id}-disk-0`,
    '--boot', 'order=scsi0',
    '--ide2', `${storagePool}:cloudinit`
  );
}

export function buildQmResize(id: number, disk: string, sizeGb: number): HostCommand {
  return qm('resize', id, disk, `${sizeGb}G`);
}

/**
 * Full clone of a template VM, optionally at a snapshot.
 */
export function buildQmClone(spec: VmSpec, sourceId: number, snapshot?: string): HostCommand {
  const command = qm('clone', sourceId, spec.id, '--name', spec.name, '--full');
  if (snapshot) command.args.push('--snapname', snapshot);
  return command;
}

export function buildQmSet(spec: VmSpec): HostCommand {
  return { program: QM, args: ['set', String(spec.id), ...vmSettingArgs(spec)] };
}

/**
 * Allocate an additional data disk. Index 0 is the boot disk.
 */
export function buildQmAddDisk(id: number, index: number, volume: VmVolume): HostCommand {
  return qm('set', id, `--scsi${index}`, `${volume.storage}:${volume.sizeGb}`);
}

export function buildQmStatus(id: number): HostCommand {
  return qm('status', id);
}

export function buildQmConfig(id: number): HostCommand {
  return qm('config', id);
}

export function buildQmStart(id: number): HostCommand {
  return qm('start', id);
}

/**
 * Clean shutdown, forcing a stop if the guest does not comply in time.
 * Blocks until the VM is off.
 */
export function buildQmShutdown(id: number, timeoutS: number): HostCommand {
  return qm('shutdown', id, '--timeout', timeoutS, '--forceStop', 1);
}

export function buildQmDestroy(id: number): HostCommand {
  return qm('destroy', id, '--purge', 1);
}

export function buildQmSnapshot(id: number, name: string): HostCommand {
  return qm('snapshot', id, name);
}

export function buildQmListSnapshot(id: number): HostCommand {
  return qm('listsnapshot', id);
}

export function buildQmTemplate(id: number): HostCommand {
  return qm('template', id);
}

export function buildQmAgentPing(id: number): HostCommand {
  return qm('agent', id, 'ping');
}

/**
 * Run a command inside the guest through the QEMU guest agent.
 */
export function buildQmGuestExec(id: number, argv: string[]): HostCommand {
  return qm('guest', 'exec', id, '--', ...argv);
}
