/**
 * Convergence Engine
 *
 * Drives each resource forward through its lifecycle, one stage at a time:
 * inspect the next stage's postcondition, act only when it does not hold,
 * and persist the record after every transition so a rerun resumes where
 * the last one stopped.
 */

import type { ConfigurationStore } from '../config/store.js';
import type { ResourceSpec } from '../config/types.js';
import { selectDriver, type DriverSet } from '../drivers/types.js';
import { computeSpecHash } from '../lib/hash.js';
import type { Logger } from '../lib/logger.js';
import type { StateStore } from '../state/types.js';
import { resolveOrder } from './dependencies.js';
import { ConvergeError, isGuestsmithError } from './errors.js';
import type { FeaturePipeline } from './features.js';
import type { HealthGate } from './health.js';
import {
  STAGE_HANDLERS,
  currentStage,
  hasReached,
  lifecycleFor,
  nextStage,
  type StageContext,
} from './stages.js';
import type {
  BatchResult,
  ConvergeEvent,
  ConvergeProgressCallback,
  ConvergeResult,
  ProgressStage,
} from './types.js';

/**
 * Collaborators and options for the engine
 */
export interface EngineOptions {
  store: ConfigurationStore;
  state: StateStore;
  drivers: DriverSet;
  features: FeaturePipeline;
  health: HealthGate;
  logger: Logger;
  /** Progress callback for CLI reporting */
  onProgress?: ConvergeProgressCallback;
  /** Checked between stage transitions only */
  signal?: AbortSignal;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export class ConvergenceEngine {
  private readonly store: ConfigurationStore;
  private readonly state: StateStore;
  private readonly drivers: DriverSet;
  private readonly features: FeaturePipeline;
  private readonly health: HealthGate;
  private readonly logger: Logger;
  private readonly onProgress: ConvergeProgressCallback | undefined;
  private readonly signal: AbortSignal | undefined;
  private readonly now: () => Date;

  constructor(options: EngineOptions) {
    this.store = options.store;
    this.state = options.state;
    this.drivers = options.drivers;
    this.features = options.features;
    this.health = options.health;
    this.logger = options.logger;
    this.onProgress = options.onProgress;
    this.signal = options.signal;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Bring one resource to `completed`.
   *
   * A resource whose dependencies have not reached `running` (or whose clone
   * source is not `completed`) is reported as blocked and left untouched.
   *
   * @throws ConfigError for an unknown id
   * @throws StateError when a record cannot be read
   */
  async converge(id: number): Promise<ConvergeResult> {
    const spec = this.store.get(id);

    const blockedBy = await this.unmetDependencies(spec);
    if (blockedBy.length > 0) {
      this.logger.warning(
        `[${id}] waiting on ${blockedBy.join(', ')}; converge ${blockedBy.length === 1 ? 'it' : 'them'} first`
      );
      this.emit({ type: 'resource-blocked', id, blockedBy });
      return { id, status: 'blocked', blockedBy };
    }

    const record = await this.state.get(id);
    let current = currentStage(record);

    if (record?.stage === 'completed') {
      this.emit({ type: 'resource-start', id, name: spec.name, stage: current });
      this.emit({ type: 'resource-complete', id });
      return { id, status: 'completed', stage: 'completed' };
    }

    const resource = selectDriver(spec, this.drivers);
    const lifecycle = lifecycleFor(resource);
    const ctx: StageContext = {
      resource,
      features: this.features,
      health: this.health,
      logger: this.logger,
    };
    const specHash = computeSpecHash(spec);

    this.emit({
      type: 'resource-start',
      id,
      name: spec.name,
      stage: current,
      ...(record?.failure ? { resumedAfterFailure: record.failure.message } : {}),
    });

    for (let next = nextStage(lifecycle, current); next !== undefined; next = nextStage(lifecycle, current)) {
      if (this.signal?.aborted) {
        this.logger.warning(`[${id}] cancelled at '${current}'`);
        this.emit({ type: 'resource-cancelled', id, stage: current });
        return { id, status: 'cancelled', stage: current };
      }

      const handler = STAGE_HANDLERS[next];
      try {
        if (await handler.satisfied(ctx)) {
          this.emit({ type: 'stage-skipped', id, stage: next });
        } else {
          this.emit({ type: 'stage-start', id, stage: next });
          await handler.apply(ctx);
        }
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        if (failure instanceof ConvergeError) {
          failure.stage = next;
        }
        await this.persistFailure(spec, current, next, failure, specHash);
        this.logger.error(`[${id}] ${next} failed: ${failure.message}`);
        this.emit({ type: 'resource-failed', id, stage: next, error: failure });
        return { id, status: 'failed', stage: next, error: failure };
      }

      await this.persist(spec, next, specHash);
      this.emit({ type: 'stage-complete', id, stage: next });
      current = next;
    }

    this.emit({ type: 'resource-complete', id });
    return { id, status: 'completed', stage: 'completed' };
  }

  /**
   * Converge several resources in dependency order.
   *
   * Dependencies not in `ids` are converged too. After a failure,
   * independent resources continue; dependents are reported as blocked and
   * get no record.
   *
   * @throws ConfigError for an unknown id
   * @throws DependencyCycleError before any side effect
   */
  async convergeBatch(ids: number[]): Promise<BatchResult> {
    const order = resolveOrder(ids, this.store);
    const results: ConvergeResult[] = [];
    const unsuccessful = new Set<number>();

    for (const id of order) {
      if (this.signal?.aborted) {
        const stage = currentStage(await this.state.get(id));
        this.emit({ type: 'resource-cancelled', id, stage });
        results.push({ id, status: 'cancelled', stage });
        unsuccessful.add(id);
        continue;
      }

      const blockedBy = this.store.dependenciesOf(id).filter((dep) => unsuccessful.has(dep));
      if (blockedBy.length > 0) {
        this.logger.warning(`[${id}] skipped: depends on ${blockedBy.join(', ')}, which did not complete`);
        this.emit({ type: 'resource-blocked', id, blockedBy });
        results.push({ id, status: 'blocked', blockedBy });
        unsuccessful.add(id);
        continue;
      }

      const result = await this.converge(id);
      results.push(result);
      if (result.status !== 'completed') {
        unsuccessful.add(id);
      }
    }

    const count = (status: ConvergeResult['status']): number =>
      results.filter((r) => r.status === status).length;

    return {
      order,
      results,
      summary: {
        completed: count('completed'),
        failed: count('failed'),
        blocked: count('blocked'),
        cancelled: count('cancelled'),
      },
    };
  }

  /**
   * Remove the live resource, then its record.
   *
   * @throws ConfigError for an unknown id
   */
  async destroy(id: number): Promise<void> {
    const spec = this.store.get(id);
    const dependents = this.store
      .ids()
      .filter((other) => other !== id && this.store.dependenciesOf(other).includes(id));
    if (dependents.length > 0) {
      this.logger.warning(`[${id}] ${dependents.join(', ')} depend on this resource`);
    }

    await selectDriver(spec, this.drivers).destroy();
    await this.state.remove(id);
    this.logger.info(`[${id}] destroyed`);
  }

  /**
   * Destroy and converge again from `undefined`. A resource whose
   * dependencies are not ready is reported as blocked and not destroyed.
   */
  async reprovision(id: number): Promise<ConvergeResult> {
    const blockedBy = await this.unmetDependencies(this.store.get(id));
    if (blockedBy.length > 0) {
      this.logger.warning(`[${id}] not reprovisioning: waiting on ${blockedBy.join(', ')}`);
      this.emit({ type: 'resource-blocked', id, blockedBy });
      return { id, status: 'blocked', blockedBy };
    }

    await this.destroy(id);
    return this.converge(id);
  }

  private async unmetDependencies(spec: ResourceSpec): Promise<number[]> {
    const unmet: number[] = [];
    for (const dep of this.store.dependenciesOf(spec.id)) {
      const required: ProgressStage = spec.cloneFrom?.id === dep ? 'completed' : 'running';
      const record = await this.state.get(dep);
      if (!record || !hasReached(record.stage, required)) {
        unmet.push(dep);
      }
    }
    return unmet;
  }

  private async persist(spec: ResourceSpec, stage: ProgressStage, specHash: string): Promise<void> {
    await this.state.put({
      version: 1,
      id: spec.id,
      kind: spec.kind,
      stage,
      resumeStage: stage,
      updatedAt: this.now().toISOString(),
      specHash,
    });
  }

  private async persistFailure(
    spec: ResourceSpec,
    resumeStage: ProgressStage,
    attempted: ProgressStage,
    error: Error,
    specHash: string
  ): Promise<void> {
    const at = this.now().toISOString();
    await this.state.put({
      version: 1,
      id: spec.id,
      kind: spec.kind,
      stage: 'failed',
      resumeStage,
      updatedAt: at,
      specHash,
      failure: {
        stage: attempted,
        code: isGuestsmithError(error) ? error.code : 'UNKNOWN',
        message: error.message,
        at,
      },
    });
  }

  private emit(event: ConvergeEvent): void {
    this.onProgress?.(event);
  }
}
