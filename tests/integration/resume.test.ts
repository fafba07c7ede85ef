/**
 * Integration tests for resuming against the real drivers, over a host
 * stand-in that keeps run state, snapshots and the guest agent.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { createDrivers } from '../../src/cli/runtime.js';
import type { ResourceSpec } from '../../src/config/types.js';
import { ConvergenceEngine } from '../../src/core/engine.js';
import { FeaturePipeline, type FeatureRunner } from '../../src/core/features.js';
import { HealthGate } from '../../src/core/health.js';
import type { HostCommand } from '../../src/hypervisor/index.js';
import { computeSpecHash } from '../../src/lib/hash.js';
import { MemoryStateStore } from '../../src/state/memory.js';
import {
  RecordingExecutor,
  captureLogger,
  containerSpec,
  failure,
  storeOf,
  vmSpec,
  type Responder,
} from '../helpers/fixtures.js';

const NOW = '2026-03-01T00:00:00.000Z';

const CONTAINER_CONFIG = [
  'arch: amd64',
  'cores: 2',
  'hostname: web',
  'memory: 1024',
  'net0: name=eth0,bridge=vmbr0,hwaddr=BC:24:11:AA:BB:CC,ip=dhcp,type=veth',
  'unprivileged: 1',
].join('\n');

const VM_CONFIG = [
  'agent: 1',
  'cores: 2',
  'ipconfig0: ip=dhcp',
  'memory: 2048',
  'name: db',
  'net0: virtio=BC:24:11:AA:BB:CC,bridge=vmbr0',
  'scsi0: local-lvm:vm-201-disk-0,size=16G',
].join('\n');

interface HostOptions {
  config: string;
  /** `template` calls that fail before one succeeds */
  templateFailures?: number;
  /** Whether the guest agent ever answers */
  agent?: boolean;
}

/**
 * One running guest. Like the real CLIs, exec into a stopped guest fails.
 */
function runningGuest(options: HostOptions): Responder {
  let status = 'running';
  let template = false;
  let templateFailures = options.templateFailures ?? 0;
  const snapshots: string[] = [];

  return (command: HostCommand) => {
    const [sub] = command.args;
    switch (sub) {
      case 'status':
        return `status: ${status}\n`;
      case 'config':
        return template ? `${options.config}\ntemplate: 1\n` : options.config;
      case 'start':
        status = 'running';
        return undefined;
      case 'stop':
      case 'shutdown':
        status = 'stopped';
        return undefined;
      case 'exec':
      case 'guest':
        return status === 'running' ? undefined : failure(command, `${command.args[1] ?? ''} not running`);
      case 'agent':
        return options.agent === false ? failure(command, 'QEMU guest agent is not running') : undefined;
      case 'listsnapshot':
        return [...snapshots.map((name) => `\`-> ${name}   ${NOW}   no-description`), '`-> current   You are here!'].join('\n');
      case 'snapshot':
        snapshots.push(command.args[2] ?? '');
        return undefined;
      case 'template':
        if (templateFailures > 0) {
          templateFailures--;
          return failure(command, 'unable to create template');
        }
        template = true;
        return undefined;
      default:
        return undefined;
    }
  };
}

class RecordingRunner implements FeatureRunner {
  readonly ran: string[] = [];

  async runFeature(spec: ResourceSpec, feature: string): Promise<void> {
    this.ran.push(`${spec.id}:${feature}`);
  }

  async runApplication(spec: ResourceSpec, script: string): Promise<void> {
    this.ran.push(`${spec.id}:app:${script}`);
  }
}

function setup(spec: ResourceSpec, host: Responder) {
  const store = storeOf([spec]);
  const executor = new RecordingExecutor(host);
  const { logger } = captureLogger();
  const runner = new RecordingRunner();
  const state = new MemoryStateStore([
    {
      version: 1,
      id: spec.id,
      kind: spec.kind,
      stage: spec.kind === 'vm' ? 'volumes-applied' : 'customizing',
      resumeStage: spec.kind === 'vm' ? 'volumes-applied' : 'customizing',
      updatedAt: NOW,
      specHash: computeSpecHash(spec),
    },
  ]);
  const engine = new ConvergenceEngine({
    store,
    state,
    drivers: createDrivers(store, executor, logger, false),
    features: new FeaturePipeline(runner, logger),
    health: new HealthGate({ probe: async () => ({ ok: true, output: 'ok' }) }, { logger }),
    logger,
    now: () => new Date(NOW),
  });
  return { engine, state, executor, runner };
}

describe('resuming against the host', () => {
  it('should convert a stopped, snapshotted template without sealing it again', async () => {
    const spec = containerSpec({ isTemplate: true });
    const { engine, state, executor } = setup(
      spec,
      runningGuest({ config: CONTAINER_CONFIG, templateFailures: 1 })
    );

    const first = await engine.converge(101);

    assert.strictEqual(first.status, 'failed');
    assert.strictEqual(first.status === 'failed' ? first.stage : undefined, 'completed');
    assert.strictEqual((await state.get(101))?.resumeStage, 'customizing');

    const before = executor.lines().length;
    const second = await engine.converge(101);

    assert.strictEqual(second.status, 'completed');
    assert.deepStrictEqual(executor.lines().slice(before), [
      'pct status 101',
      'pct config 101',
      'pct status 101',
      'pct config 101',
      'pct listsnapshot 101',
      'pct template 101',
    ]);
    assert.strictEqual((await state.get(101))?.stage, 'completed');
  });

  it('should not run features on a running VM whose agent never answers', async () => {
    const spec = vmSpec({ features: ['docker'] });
    const { engine, state, executor, runner } = setup(spec, runningGuest({ config: VM_CONFIG, agent: false }));

    const result = await engine.converge(201);

    assert.strictEqual(result.status, 'failed');
    assert.strictEqual(result.status === 'failed' ? result.stage : undefined, 'running');
    assert.deepStrictEqual(runner.ran, []);
    assert.deepStrictEqual(executor.lines(), [
      'qm status 201',
      'qm config 201',
      'qm agent 201 ping',
      'qm status 201',
      'qm agent 201 ping',
      'qm agent 201 ping',
      'qm agent 201 ping',
    ]);
    const record = await state.get(201);
    assert.strictEqual(record?.resumeStage, 'volumes-applied');
    assert.strictEqual(record?.failure?.code, 'DRIVER_ERROR');
  });
});
