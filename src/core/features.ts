/**
 * Feature Pipeline
 *
 * Applies a resource's feature list in declared order, then its application
 * step. The first failure stops the pipeline; nothing is reordered,
 * deduplicated or retried.
 */

import type { ResourceSpec } from '../config/types.js';
import type { Logger } from '../lib/logger.js';
import { FeatureError, errorMessage } from './errors.js';

/**
 * Executes one feature installer or application step against a running resource.
 *
 * Implementations throw on failure.
 */
export interface FeatureRunner {
  runFeature(spec: ResourceSpec, feature: string): Promise<void>;
  runApplication(spec: ResourceSpec, script: string): Promise<void>;
}

export class FeaturePipeline {
  constructor(
    private readonly runner: FeatureRunner,
    private readonly logger: Logger
  ) {}

  /**
   * Run every feature, then the application step when one is declared.
   *
   * @throws FeatureError naming the step that failed
   */
  async apply(spec: ResourceSpec): Promise<void> {
    const total = spec.features.length;
    for (const [index, feature] of spec.features.entries()) {
      this.logger.info(`[${spec.id}] feature ${index + 1}/${total}: ${feature}`);
      await this.step(feature, () => this.runner.runFeature(spec, feature));
    }

    if (spec.applicationScript) {
      const script = spec.applicationScript;
      this.logger.info(`[${spec.id}] application step: ${script}`);
      await this.step('application', () => this.runner.runApplication(spec, script));
    }
  }

  private async step(name: string, run: () => Promise<void>): Promise<void> {
    try {
      await run();
    } catch (error) {
      if (error instanceof FeatureError) {
        throw error;
      }
      throw new FeatureError(`Feature '${name}' failed: ${errorMessage(error)}`, name);
    }
  }
}
