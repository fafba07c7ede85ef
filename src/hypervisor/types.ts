/**
 * Hypervisor Types
 *
 * Host commands, their results, and values parsed from `pct`/`qm` output.
 */

/**
 * A program and its argv, spawned without a shell
 */
export interface HostCommand {
  program: string;
  args: string[];
}

/**
 * Captured result of a finished command
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Run status reported by `pct status` / `qm status`
 */
export type GuestStatus = 'running' | 'stopped';

/**
 * Flat `key: value` view of `pct config` / `qm config`
 */
export type GuestConfig = Record<string, string>;

/**
 * Parsed `net0` value, for either hypervisor flavour
 */
export interface NetDevice {
  /** Interface name inside the guest (containers only) */
  name?: string;
  bridge?: string;
  /** MAC address, upper-cased */
  hwaddr?: string;
  /** Container only: address or "dhcp" */
  ip?: string;
  /** Container only */
  gw?: string;
}
