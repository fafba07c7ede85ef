/**
 * Unit tests for hypervisor output parsers
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  parseConfig,
  parseIdmapEntries,
  parseNetDevice,
  parseSnapshotList,
  parseStatus,
} from '../../../src/hypervisor/queries.js';

describe('parseStatus', () => {
  it('should read running and stopped', () => {
    assert.strictEqual(parseStatus('status: running\n'), 'running');
    assert.strictEqual(parseStatus('status: stopped\n'), 'stopped');
  });

  it('should treat any other status as stopped', () => {
    assert.strictEqual(parseStatus('status: paused\n'), 'stopped');
  });

  it('should return null without a status line', () => {
    assert.strictEqual(parseStatus(''), null);
    assert.strictEqual(parseStatus('unexpected output'), null);
  });
});

describe('parseConfig', () => {
  it('should read key/value lines up to the first snapshot section', () => {
    const config = parseConfig(
      [
        '# managed by guestsmith',
        'arch: amd64',
        'cores: 2',
        'description: tier: web',
        'hostname: web',
        'net0: name=eth0,bridge=vmbr0,ip=dhcp',
        '',
        '[pre-features]',
        'cores: 1',
      ].join('\n')
    );

    assert.deepStrictEqual(config, {
      arch: 'amd64',
      cores: '2',
      description: 'tier: web',
      hostname: 'web',
      net0: 'name=eth0,bridge=vmbr0,ip=dhcp',
    });
  });
});

describe('parseNetDevice', () => {
  it('should parse a container interface', () => {
    assert.deepStrictEqual(
      parseNetDevice('name=eth0,bridge=vmbr0,hwaddr=bc:24:11:00:00:01,ip=10.0.0.5/24,gw=10.0.0.1,type=veth'),
      { name: 'eth0', bridge: 'vmbr0', hwaddr: 'BC:24:11:00:00:01', ip: '10.0.0.5/24', gw: '10.0.0.1' }
    );
  });

  it('should parse a VM interface', () => {
    assert.deepStrictEqual(parseNetDevice('virtio=BC:24:11:00:00:02,bridge=vmbr1,firewall=1'), {
      hwaddr: 'BC:24:11:00:00:02',
      bridge: 'vmbr1',
    });
  });

  it('should ignore a model without a MAC address', () => {
    assert.deepStrictEqual(parseNetDevice('virtio,bridge=vmbr0'), { bridge: 'vmbr0' });
  });

  it('should return an empty device for an empty value', () => {
    assert.deepStrictEqual(parseNetDevice(''), {});
  });
});

describe('parseSnapshotList', () => {
  it('should return snapshot names without the current marker', () => {
    const output = [
      '`-> pre-features    2026-01-01 10:00:00     no-description',
      '  `-> template      2026-01-01 11:00:00     no-description',
      '     `-> current                            You are here!',
      '',
    ].join('\n');

    assert.deepStrictEqual(parseSnapshotList(output), ['pre-features', 'template']);
  });

  it('should return nothing for an unsnapshotted guest', () => {
    assert.deepStrictEqual(parseSnapshotList('`-> current  You are here!\n'), []);
  });
});

describe('parseIdmapEntries', () => {
  it('should collect lxc.idmap lines in either syntax', () => {
    const content = [
      'arch: amd64',
      'unprivileged: 1',
      'lxc.idmap: u 0 100000 65536',
      'lxc.idmap = g 0 100000 65536',
      '#lxc.idmap: u 0 0 1',
    ].join('\n');

    assert.deepStrictEqual(parseIdmapEntries(content), ['u 0 100000 65536', 'g 0 100000 65536']);
  });

  it('should return nothing when the map was never written', () => {
    assert.deepStrictEqual(parseIdmapEntries('arch: amd64\nunprivileged: 1\n'), []);
  });
});
