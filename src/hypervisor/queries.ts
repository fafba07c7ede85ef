/**
 * Hypervisor Output Parsers
 *
 * Turns `pct`/`qm` text output and container config files into values the
 * drivers compare against the desired spec.
 */

import type { GuestConfig, GuestStatus, NetDevice } from './types.js';

/**
 * Parse `pct status` / `qm status` output ("status: running").
 *
 * @returns The status, or null when the output carries none
 */
export function parseStatus(stdout: string): GuestStatus | null {
  const match = /^status:\s*(\S+)/m.exec(stdout);
  if (!match) {
    return null;
  }
  return match[1] === 'running' ? 'running' : 'stopped';
}

/**
 * Parse `pct config` / `qm config` output into a flat key/value map.
 *
 * Snapshot sections (starting with `[name]`) are ignored.
 */
export function parseConfig(stdout: string): GuestConfig {
  const config: GuestConfig = {};
  for (const rawLine of stdout.split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith('[')) {
      break;
    }
    const separator = line.indexOf(':');
    if (line === '' || line.startsWith('#') || separator <= 0) {
      continue;
    }
    config[line.slice(0, separator).trim()] = line.slice(separator + 1).trim();
  }
  return config;
}

/**
 * Parse a `net0` value from either flavour.
 *
 * Containers: `name=eth0,bridge=vmbr0,hwaddr=..,ip=..,gw=..`.
 * VMs: `virtio=AA:BB:..,bridge=vmbr0`.
 */
export function parseNetDevice(value: string): NetDevice {
  const device: NetDevice = {};
  for (const part of value.split(',')) {
    const [key, ...rest] = part.split('=');
    const val = rest.join('=');
    switch (key) {
      case 'name':
        device.name = val;
        break;
      case 'bridge':
        device.bridge = val;
        break;
      case 'hwaddr':
      case 'virtio':
      case 'e1000':
        if (val) device.hwaddr = val.toUpperCase();
        break;
      case 'ip':
        device.ip = val;
        break;
      case 'gw':
        device.gw = val;
        break;
    }
  }
  return device;
}

/**
 * Parse `pct listsnapshot` / `qm listsnapshot` output into snapshot names.
 *
 * Lines look like "`-> pre-features   2024-01-01 10:00:00   no-description";
 * the pseudo snapshot `current` is dropped.
 */
export function parseSnapshotList(stdout: string): string[] {
  const names: string[] = [];
  for (const line of stdout.split('\n')) {
    const name = line.replace(/^[\s`|>-]+/, '').split(/\s+/)[0];
    if (name && name !== 'current') {
      names.push(name);
    }
  }
  return names;
}

/**
 * Extract `lxc.idmap` entries from a container config file.
 */
export function parseIdmapEntries(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => /^lxc\.idmap\s*[:=]/.test(line))
    .map((line) => line.replace(/^lxc\.idmap\s*[:=]\s*/, ''));
}
