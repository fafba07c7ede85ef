/**
 * Lifecycle Stages
 *
 * One handler per forward transition: an inspection of the stage's
 * postcondition and the side effects that establish it. The engine asks
 * `satisfied` first and only calls `apply` when it returns false.
 */

import type { ResourceKind } from '../config/types.js';
import type { BoundResource } from '../drivers/types.js';
import type { Logger } from '../lib/logger.js';
import type { ResourceRecord } from '../state/types.js';
import { HostInvariantError } from './errors.js';
import type { FeaturePipeline } from './features.js';
import type { HealthGate } from './health.js';
import { STAGE_ORDER, type LifecycleStage, type ProgressStage, type TargetStage } from './types.js';

/**
 * Snapshot names taken around the feature pipeline
 */
export const PRE_FEATURES_SNAPSHOT = 'pre-features';
export const POST_FEATURES_SNAPSHOT = 'post-features';

/**
 * Collaborators available to stage handlers
 */
export interface StageContext {
  resource: BoundResource;
  features: FeaturePipeline;
  health: HealthGate;
  logger: Logger;
}

export interface StageHandler {
  /** Whether live state already meets the stage's postcondition */
  satisfied(ctx: StageContext): Promise<boolean>;
  /** Establish the postcondition */
  apply(ctx: StageContext): Promise<void>;
}

/**
 * Stages a resource passes through, given whether its driver has an
 * identity-map capability.
 */
export function lifecycleStages(hasIdentityMap: boolean): ProgressStage[] {
  return STAGE_ORDER.filter((stage) => hasIdentityMap || stage !== 'idmap-verified');
}

/**
 * Stages for a resource kind when no driver is at hand.
 */
export function lifecycleForKind(kind: ResourceKind): ProgressStage[] {
  return lifecycleStages(kind === 'container');
}

/**
 * Stages for a bound resource.
 */
export function lifecycleFor(resource: BoundResource): ProgressStage[] {
  return lifecycleStages(resource.identityMap !== undefined);
}

/**
 * Position of a stage in the total order; `failed` sorts before everything.
 */
export function stageIndex(stage: LifecycleStage): number {
  return stage === 'failed' ? -1 : STAGE_ORDER.indexOf(stage);
}

/**
 * Whether `stage` is at or beyond `required`.
 */
export function hasReached(stage: LifecycleStage, required: ProgressStage): boolean {
  return stage !== 'failed' && stageIndex(stage) >= stageIndex(required);
}

/**
 * Stage a record resumes from
 */
export function currentStage(record: ResourceRecord | null): ProgressStage {
  if (!record) return 'undefined';
  return record.stage === 'failed' ? record.resumeStage : record.stage;
}

/**
 * The stage after `current` in `lifecycle`, or undefined at the end.
 */
export function nextStage(lifecycle: ProgressStage[], current: ProgressStage): TargetStage | undefined {
  const currentIndex = stageIndex(current);
  return lifecycle.find(
    (stage): stage is TargetStage => stage !== 'undefined' && stageIndex(stage) > currentIndex
  );
}

async function snapshotOnce(resource: BoundResource, name: string): Promise<void> {
  const existing = await resource.listSnapshots();
  if (!existing.includes(name)) {
    await resource.snapshot(name);
  }
}

const defined: StageHandler = {
  satisfied: async ({ resource }) => {
    const observed = await resource.inspect();
    return observed !== null && observed.incomplete.length === 0;
  },
  apply: async ({ resource }) => resource.define(await resource.inspect()),
};

const configured: StageHandler = {
  satisfied: async ({ resource, logger }) => {
    const observed = await resource.inspect();
    if (observed && observed.drift.length > 0) {
      logger.debug(`[${resource.spec.id}] drift: ${observed.drift.join('; ')}`);
    }
    return observed !== null && observed.drift.length === 0;
  },
  apply: ({ resource }) => resource.configure(),
};

const idmapVerified: StageHandler = {
  satisfied: async ({ resource }) => (resource.identityMap ? resource.identityMap.verify() : true),
  apply: async ({ resource }) => {
    const identityMap = resource.identityMap;
    if (!identityMap) return;

    await identityMap.cycle();
    if (!(await identityMap.verify())) {
      const id = resource.spec.id;
      throw new HostInvariantError(
        `Identity map for ${id} is still missing after a start/stop cycle`,
        `Restart the container's agent service (systemctl restart pve-container@${id}), then run guestsmith up again.`
      );
    }
  },
};

const volumesApplied: StageHandler = {
  satisfied: async ({ resource }) => {
    const observed = await resource.inspect();
    return observed !== null && observed.volumesMissing.length === 0;
  },
  apply: ({ resource }) => resource.applyVolumes(),
};

const running: StageHandler = {
  // Booted is not enough: the guest must answer before features run
  satisfied: async ({ resource }) =>
    (await resource.inspect())?.status === 'running' && (await resource.isReady()),
  apply: ({ resource }) => resource.start(),
};

const customizing: StageHandler = {
  // Feature scripts leave no trace the driver can observe
  satisfied: async () => false,
  apply: async ({ resource, features }) => {
    if (resource.spec.lifecycleSnapshots) {
      await snapshotOnce(resource, PRE_FEATURES_SNAPSHOT);
    }
    await features.apply(resource.spec);
  },
};

const completed: StageHandler = {
  satisfied: async ({ resource }) =>
    resource.spec.isTemplate && (await resource.inspect())?.template === true,
  apply: async (ctx) => {
    const { resource, health } = ctx;
    const spec = resource.spec;
    if (spec.isTemplate) {
      await finalizeTemplate(ctx);
      return;
    }

    await health.verify(spec);
    if (spec.lifecycleSnapshots) {
      await snapshotOnce(resource, POST_FEATURES_SNAPSHOT);
    }
  },
};

/**
 * Health gate, seal, stop, snapshot, convert.
 *
 * Resumes from what the host shows: a stopped guest that already has the
 * template snapshot only needs converting. Sealing runs inside the guest,
 * so a guest found stopped before the snapshot is started and sealed again.
 */
async function finalizeTemplate({ resource, health, logger }: StageContext): Promise<void> {
  const spec = resource.spec;
  const observed = await resource.inspect();
  const snapshots = await resource.listSnapshots();

  if (observed?.status === 'stopped' && snapshots.includes(spec.templateSnapshot)) {
    logger.info(`[${spec.id}] sealed and snapshotted; converting to a template`);
  } else {
    if (observed?.status === 'stopped') {
      logger.info(`[${spec.id}] starting again to seal before templating`);
      await resource.start();
    }
    await health.verify(spec);
    logger.info(`[${spec.id}] finalizing template`);
    await resource.sealIdentity();
    await resource.stop();
    if (!snapshots.includes(spec.templateSnapshot)) {
      await resource.snapshot(spec.templateSnapshot);
    }
  }

  await resource.convertToTemplate();
}

/**
 * Handler for each stage reachable by a forward transition
 */
export const STAGE_HANDLERS: Record<TargetStage, StageHandler> = {
  defined,
  configured,
  'idmap-verified': idmapVerified,
  'volumes-applied': volumesApplied,
  running,
  customizing,
  completed,
};
