/**
 * Script Feature Runner
 *
 * Runs `<featureDir>/<feature>.sh <id> <handoff.json>` on the host. The
 * handoff file holds the resolved spec and is written read-only so a
 * script cannot alter what later scripts see.
 */

import { chmod, mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ResourceSpec } from '../config/types.js';
import { FeatureError } from '../core/errors.js';
import type { FeatureRunner } from '../core/features.js';
import { HostCommandError, type CommandExecutor } from '../hypervisor/index.js';
import type { Logger } from '../lib/logger.js';

export interface ScriptFeatureRunnerOptions {
  featureDir: string;
  /** Directory receiving <id>.json handoff files */
  handoffDir: string;
  /** Timeout for a single script */
  timeoutMs: number;
  logger: Logger;
  /** Log the handoff path instead of writing it */
  dryRun?: boolean;
}

export class ScriptFeatureRunner implements FeatureRunner {
  constructor(
    private readonly executor: CommandExecutor,
    private readonly options: ScriptFeatureRunnerOptions
  ) {}

  async runFeature(spec: ResourceSpec, feature: string): Promise<void> {
    await this.runScript(spec, feature, join(this.options.featureDir, `${feature}.sh`));
  }

  async runApplication(spec: ResourceSpec, script: string): Promise<void> {
    await this.runScript(spec, 'application', script);
  }

  /**
   * Write the resolved spec for scripts to read.
   *
   * @returns Path of the handoff file
   */
  async writeHandoff(spec: ResourceSpec): Promise<string> {
    const handoffPath = join(this.options.handoffDir, `${spec.id}.json`);
    if (this.options.dryRun) {
      this.options.logger.debug(`[dry-run] would write ${handoffPath}`);
      return handoffPath;
    }

    await mkdir(this.options.handoffDir, { recursive: true });
    // The previous file is read-only; replace it rather than write through it
    await rm(handoffPath, { force: true });
    await writeFile(handoffPath, `${JSON.stringify(spec, null, 2)}\n`, { encoding: 'utf-8', mode: 0o444 });
    // mode above is masked by the umask
    await chmod(handoffPath, 0o444);
    return handoffPath;
  }

  private async runScript(spec: ResourceSpec, name: string, scriptPath: string): Promise<void> {
    const handoffPath = await this.writeHandoff(spec);

    try {
      const result = await this.executor.run(
        { program: scriptPath, args: [String(spec.id), handoffPath] },
        {
          timeoutMs: this.options.timeoutMs,
          env: { GUESTSMITH_RESOURCE_ID: String(spec.id) },
        }
      );
      const output = result.stdout.trim();
      if (output) {
        this.options.logger.debug(`[${spec.id}] ${name}: ${output}`);
      }
    } catch (error) {
      if (error instanceof HostCommandError) {
        throw new FeatureError(
          `${name === 'application' ? 'Application step' : `Feature '${name}'`} failed for ${spec.id}: ${error.message}`,
          name,
          `${error.stdout}${error.stderr}`
        );
      }
      throw error;
    }
  }
}
