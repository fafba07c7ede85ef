/**
 * Unit tests for hypervisor command builders
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  buildPctClone,
  buildPctCreate,
  buildPctDestroy,
  buildPctExec,
  buildPctMount,
  buildPctSet,
  buildQmAddDisk,
  buildQmAgentPing,
  buildQmAttachBootDisk,
  buildQmClone,
  buildQmCreate,
  buildQmGuestExec,
  buildQmImportDisk,
  buildQmResize,
  buildQmSet,
  buildQmShutdown,
  formatContainerNet0,
  formatIpConfig,
  formatMountPoint,
  formatVmNet0,
} from '../../../src/hypervisor/commands.js';
import { containerSpec, vmSpec } from '../../helpers/fixtures.js';

const STATIC_NETWORK = {
  interfaceName: 'eth1',
  bridge: 'vmbr1',
  address: '10.0.0.5/24',
  gateway: '10.0.0.1',
  macAddress: 'BC:24:11:00:00:01',
};

describe('container commands', () => {
  describe('formatContainerNet0', () => {
    it('should render a DHCP interface', () => {
      assert.strictEqual(
        formatContainerNet0({ interfaceName: 'eth0', bridge: 'vmbr0', address: 'dhcp' }),
        'name=eth0,bridge=vmbr0,ip=dhcp'
      );
    });

    it('should append gateway and MAC address', () => {
      assert.strictEqual(
        formatContainerNet0(STATIC_NETWORK),
        'name=eth1,bridge=vmbr1,ip=10.0.0.5/24,gw=10.0.0.1,hwaddr=BC:24:11:00:00:01'
      );
    });
  });

  it('should render bind mounts', () => {
    assert.strictEqual(
      formatMountPoint({ hostPath: '/srv/data', mountPoint: '/data', readOnly: false }),
      '/srv/data,mp=/data'
    );
    assert.strictEqual(
      formatMountPoint({ hostPath: '/srv/data', mountPoint: '/data', readOnly: true }),
      '/srv/data,mp=/data,ro=1'
    );
  });

  it('should build pct create from the OS template', () => {
    assert.deepStrictEqual(buildPctCreate(containerSpec(), 'local:vztmpl/debian.tar.zst'), {
      program: 'pct',
      args: [
        'create', '101', 'local:vztmpl/debian.tar.zst',
        '--hostname', 'web',
        '--cores', '2',
        '--memory', '1024',
        '--rootfs', 'local-lvm:8',
        '--net0', 'name=eth0,bridge=vmbr0,ip=dhcp',
        '--unprivileged', '1',
      ],
    });
  });

  it('should pass nameservers and the privileged flag', () => {
    const spec = containerSpec({
      unprivileged: false,
      network: { interfaceName: 'eth0', bridge: 'vmbr0', address: 'dhcp', nameservers: '1.1.1.1 9.9.9.9' },
    });

    const args = buildPctCreate(spec, 'tpl').args;

    assert.deepStrictEqual(args.slice(-4), ['--unprivileged', '0', '--nameserver', '1.1.1.1 9.9.9.9']);
  });

  it('should build pct clone with and without a snapshot', () => {
    assert.deepStrictEqual(buildPctClone(containerSpec(), 100).args, ['clone', '100', '101', '--hostname', 'web']);
    assert.deepStrictEqual(buildPctClone(containerSpec(), 100, 'template').args, [
      'clone', '100', '101', '--hostname', 'web', '--snapname', 'template',
    ]);
  });

  it('should build pct set with every managed setting', () => {
    assert.deepStrictEqual(buildPctSet(containerSpec({ network: STATIC_NETWORK })).args, [
      'set', '101',
      '--hostname', 'web',
      '--cores', '2',
      '--memory', '1024',
      '--net0', 'name=eth1,bridge=vmbr1,ip=10.0.0.5/24,gw=10.0.0.1,hwaddr=BC:24:11:00:00:01',
    ]);
  });

  it('should build mount, destroy and exec commands', () => {
    assert.deepStrictEqual(
      buildPctMount(101, 2, { hostPath: '/srv/logs', mountPoint: '/var/log/app', readOnly: true }).args,
      ['set', '101', '--mp2', '/srv/logs,mp=/var/log/app,ro=1']
    );
    assert.deepStrictEqual(buildPctDestroy(101).args, ['destroy', '101', '--purge', '1']);
    assert.deepStrictEqual(buildPctExec(101, ['sh', '-c', 'true']).args, ['exec', '101', '--', 'sh', '-c', 'true']);
  });
});

describe('VM commands', () => {
  it('should render the NIC with an optional MAC address', () => {
    assert.strictEqual(formatVmNet0({ interfaceName: 'eth0', bridge: 'vmbr0', address: 'dhcp' }), 'virtio,bridge=vmbr0');
    assert.strictEqual(formatVmNet0(STATIC_NETWORK), 'virtio=BC:24:11:00:00:01,bridge=vmbr1');
  });

  it('should render cloud-init ipconfig', () => {
    assert.strictEqual(formatIpConfig({ interfaceName: 'eth0', bridge: 'vmbr0', address: 'dhcp' }), 'ip=dhcp');
    assert.strictEqual(formatIpConfig(STATIC_NETWORK), 'ip=10.0.0.5/24,gw=10.0.0.1');
    assert.strictEqual(
      formatIpConfig({ interfaceName: 'eth0', bridge: 'vmbr0', address: '10.0.0.9/24' }),
      'ip=10.0.0.9/24'
    );
  });

  it('should build qm create with the agent enabled', () => {
    assert.deepStrictEqual(buildQmCreate(vmSpec()), {
      program: 'qm',
      args: [
        'create', '201',
        '--name', 'db',
        '--cores', '2',
        '--memory', '2048',
        '--net0', 'virtio,bridge=vmbr0',
        '--ipconfig0', 'ip=dhcp',
        '--agent', '1',
        '--scsihw', 'virtio-scsi-pci',
        '--serial0', 'socket',
      ],
    });
  });

  it('should build the cloud image import sequence', () => {
    assert.deepStrictEqual(buildQmImportDisk(201, '/images/debian.qcow2', 'local-lvm').args, [
      'importdisk', '201', '/images/debian.qcow2', 'local-lvm',
    ]);
    assert.deepStrictEqual(buildQmAttachBootDisk(201, 'local-lvm').args, [
      'set', '201',
      '--scsi0', 'local-lvm:vm-201-disk-0',
      '--boot', 'order=scsi0',
      '--ide2', 'local-lvm:cloudinit',
    ]);
    assert.deepStrictEqual(buildQmResize(201, 'scsi0', 16).args, ['resize', '201', 'scsi0', '16G']);
  });

  it('should build a full clone', () => {
    assert.deepStrictEqual(buildQmClone(vmSpec(), 200).args, ['clone', '200', '201', '--name', 'db', '--full']);
    assert.deepStrictEqual(buildQmClone(vmSpec(), 200, 'golden').args, [
      'clone', '200', '201', '--name', 'db', '--full', '--snapname', 'golden',
    ]);
  });

  it('should build qm set without create-only options', () => {
    assert.deepStrictEqual(buildQmSet(vmSpec()).args, [
      'set', '201',
      '--name', 'db',
      '--cores', '2',
      '--memory', '2048',
      '--net0', 'virtio,bridge=vmbr0',
      '--ipconfig0', 'ip=dhcp',
      '--agent', '1',
    ]);
  });

  it('should build disk, shutdown and guest agent commands', () => {
    assert.deepStrictEqual(buildQmAddDisk(201, 1, { storage: 'fast', sizeGb: 20 }).args, ['set', '201', '--scsi1', 'fast:20']);
    assert.deepStrictEqual(buildQmShutdown(201, 180).args, ['shutdown', '201', '--timeout', '180', '--forceStop', '1']);
    assert.deepStrictEqual(buildQmAgentPing(201).args, ['agent', '201', 'ping']);
    assert.deepStrictEqual(buildQmGuestExec(201, ['/bin/sh', '-c', 'true']).args, [
      'guest', 'exec', '201', '--', '/bin/sh', '-c', 'true',
    ]);
  });
});
