/**
 * Readiness Probes
 *
 * Command probes run `<healthCheckDir>/<script> <args…>` on the host; HTTP
 * probes issue a GET with a per-attempt timeout.
 */

import type { HealthCheck, ResourceSpec } from '../config/types.js';
import type { Prober } from '../core/health.js';
import { HostCommandError, type CommandExecutor } from '../hypervisor/index.js';
import type { Logger } from '../lib/logger.js';
import type { AttemptOutcome } from '../lib/retry.js';
import { errorMessage } from '../core/errors.js';

/**
 * The subset of fetch used by HTTP probes
 */
export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<{ status: number }>;

export interface HostProberOptions {
  logger: Logger;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  /** Timeout for a command probe (default: 60000) */
  commandTimeoutMs?: number;
  /** Report HTTP checks as passing without sending requests */
  dryRun?: boolean;
}

export class HostProber implements Prober {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly executor: CommandExecutor,
    private readonly options: HostProberOptions
  ) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async probe(spec: ResourceSpec, check: HealthCheck): Promise<AttemptOutcome> {
    switch (check.type) {
      case 'command':
        return this.probeCommand(spec, check);
      case 'http':
        return this.probeHttp(check);
    }
  }

  private async probeCommand(
    spec: ResourceSpec,
    check: Extract<HealthCheck, { type: 'command' }>
  ): Promise<AttemptOutcome> {
    try {
      const result = await this.executor.run(
        { program: check.script, args: check.args },
        {
          timeoutMs: this.options.commandTimeoutMs ?? 60_000,
          env: { GUESTSMITH_RESOURCE_ID: String(spec.id) },
        }
      );
      return { ok: true, output: result.stdout };
    } catch (error) {
      if (error instanceof HostCommandError) {
        const output = `${error.stdout}${error.stderr}`.trim();
        return { ok: false, output: output || error.message };
      }
      throw error;
    }
  }

  private async probeHttp(check: Extract<HealthCheck, { type: 'http' }>): Promise<AttemptOutcome> {
    if (this.options.dryRun) {
      this.options.logger.info(`[dry-run] GET ${check.url} (expect ${check.expectStatus})`);
      return { ok: true, output: '' };
    }

    try {
      const response = await this.fetchImpl(check.url, { signal: AbortSignal.timeout(check.timeoutMs) });
      return {
        ok: response.status === check.expectStatus,
        output: `HTTP ${response.status} (expected ${check.expectStatus})`,
      };
    } catch (error) {
      return { ok: false, output: errorMessage(error) };
    }
  }
}
