/**
 * Convergence Planner
 *
 * Previews what `up` would do from the records alone: dependency order and,
 * per resource, the stages still ahead. No hypervisor calls are made, so a
 * stage the engine would fast-forward still shows as pending.
 */

import type { ConfigurationStore } from '../config/store.js';
import type { ResourceKind } from '../config/types.js';
import { computeSpecHash } from '../lib/hash.js';
import type { FailureRecord, StateStore } from '../state/types.js';
import { resolveOrder } from './dependencies.js';
import { currentStage, lifecycleForKind, nextStage } from './stages.js';
import type { LifecycleStage, ProgressStage, TargetStage } from './types.js';

/**
 * Planned work for one resource
 */
export interface PlanEntry {
  id: number;
  name: string;
  kind: ResourceKind;
  /** Stage on record, or null when never converged */
  recorded: LifecycleStage | null;
  /** Stage convergence resumes from */
  resumeFrom: ProgressStage;
  /** Stages still ahead, in order */
  pending: TargetStage[];
  /** Whether the resolved spec differs from the one last converged */
  specChanged: boolean;
  failure?: FailureRecord;
}

/**
 * Result of plan computation
 */
export interface PlanResult {
  order: number[];
  entries: PlanEntry[];
  summary: {
    pending: number;
    upToDate: number;
  };
}

/**
 * Compute the plan for `ids` (all configured ids when empty).
 *
 * @throws ConfigError for an unknown id
 * @throws DependencyCycleError when the requested graph has a cycle
 */
export async function computePlan(
  ids: number[],
  store: ConfigurationStore,
  state: StateStore
): Promise<PlanResult> {
  const order = resolveOrder(ids.length > 0 ? ids : store.ids(), store);
  const entries: PlanEntry[] = [];

  for (const id of order) {
    const spec = store.get(id);
    const record = await state.get(id);
    const resumeFrom = currentStage(record);
    const lifecycle = lifecycleForKind(spec.kind);

    const pending: TargetStage[] = [];
    for (let next = nextStage(lifecycle, resumeFrom); next !== undefined; next = nextStage(lifecycle, next)) {
      pending.push(next);
    }

    const entry: PlanEntry = {
      id,
      name: spec.name,
      kind: spec.kind,
      recorded: record ? record.stage : null,
      resumeFrom,
      pending,
      specChanged: record !== null && record.specHash !== computeSpecHash(spec),
    };
    if (record?.failure) entry.failure = record.failure;
    entries.push(entry);
  }

  const pendingCount = entries.filter((e) => e.pending.length > 0).length;
  return {
    order,
    entries,
    summary: {
      pending: pendingCount,
      upToDate: entries.length - pendingCount,
    },
  };
}

/**
 * Check if a plan has any work to do.
 */
export function hasPendingWork(plan: PlanResult): boolean {
  return plan.summary.pending > 0;
}
