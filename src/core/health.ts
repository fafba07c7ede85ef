/**
 * Health Gate
 *
 * Polls each declared readiness check under its own retry policy. A check
 * that never passes fails the resource with every attempt on record.
 */

import type { HealthCheck, ResourceSpec } from '../config/types.js';
import type { Logger } from '../lib/logger.js';
import { formatAttempts, pollUntil, type AttemptOutcome, type Sleep } from '../lib/retry.js';
import { ReadinessError } from './errors.js';

/**
 * Runs a single probe attempt. Throwing counts as a failed attempt.
 */
export interface Prober {
  probe(spec: ResourceSpec, check: HealthCheck): Promise<AttemptOutcome>;
}

export interface HealthGateOptions {
  logger: Logger;
  sleep?: Sleep;
}

export class HealthGate {
  private readonly logger: Logger;
  private readonly sleep: Sleep | undefined;

  constructor(
    private readonly prober: Prober,
    options: HealthGateOptions
  ) {
    this.logger = options.logger;
    this.sleep = options.sleep;
  }

  /**
   * Run every check in order.
   *
   * @throws ReadinessError for the first check that exhausts its attempts
   */
  async verify(spec: ResourceSpec): Promise<void> {
    for (const check of spec.healthChecks) {
      this.logger.info(`[${spec.id}] health check '${check.name}' (up to ${check.attempts} attempts)`);

      const result = await pollUntil(
        async (attempt) => {
          const outcome = await this.prober.probe(spec, check);
          if (!outcome.ok) {
            this.logger.debug(`[${spec.id}] ${check.name} attempt ${attempt}: ${outcome.output.trim()}`);
          }
          return outcome;
        },
        { attempts: check.attempts, intervalMs: check.intervalMs },
        this.sleep
      );

      if (!result.ok) {
        throw new ReadinessError(
          `Health check '${check.name}' failed for ${spec.id} after ${result.attempts.length} attempts:\n` +
            formatAttempts(result.attempts, check.attempts),
          check.name,
          result.attempts
        );
      }
    }
  }
}
