/**
 * Dry-Run Driver
 *
 * Wraps a real driver whose executor only logs. Every inspection reports
 * "not satisfied" so the rehearsal walks through each stage and prints the
 * commands that would run.
 */

import type { ResourceSpec } from '../config/types.js';
import type { Logger } from '../lib/logger.js';
import type { IdentityMapCapability, ObservedResource, ResourceDriver } from './types.js';

export class DryRunDriver<S extends ResourceSpec> implements ResourceDriver<S> {
  readonly kind: S['kind'];
  readonly identityMap?: IdentityMapCapability<S>;

  private readonly cycled = new Set<number>();

  constructor(
    private readonly inner: ResourceDriver<S>,
    private readonly logger: Logger
  ) {
    this.kind = inner.kind;

    const innerMap = inner.identityMap;
    if (innerMap) {
      this.identityMap = {
        // The map only "appears" once the cycle has been rehearsed
        verify: async (spec) => this.cycled.has(spec.id),
        cycle: async (spec) => {
          await innerMap.cycle(spec);
          this.cycled.add(spec.id);
        },
      };
    }
  }

  async inspect(spec: S): Promise<ObservedResource | null> {
    this.logger.debug(`[dry-run] assuming ${spec.kind} ${spec.id} needs every stage`);
    return null;
  }

  define(spec: S, observed?: ObservedResource | null): Promise<void> {
    return this.inner.define(spec, observed);
  }

  configure(spec: S): Promise<void> {
    return this.inner.configure(spec);
  }

  applyVolumes(spec: S): Promise<void> {
    return this.inner.applyVolumes(spec);
  }

  start(spec: S): Promise<void> {
    return this.inner.start(spec);
  }

  async isReady(): Promise<boolean> {
    return false;
  }

  stop(spec: S): Promise<void> {
    return this.inner.stop(spec);
  }

  destroy(spec: S): Promise<void> {
    return this.inner.destroy(spec);
  }

  async listSnapshots(): Promise<string[]> {
    return [];
  }

  snapshot(spec: S, name: string): Promise<void> {
    return this.inner.snapshot(spec, name);
  }

  sealIdentity(spec: S): Promise<void> {
    return this.inner.sealIdentity(spec);
  }

  convertToTemplate(spec: S): Promise<void> {
    return this.inner.convertToTemplate(spec);
  }
}
