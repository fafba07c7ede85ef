/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import type { BatchResult, ConvergeEvent, ConvergeResult, LifecycleStage } from '../core/types.js';
import type { ErrorCode, GuestsmithError } from '../core/errors.js';
import { errorMessage, isGuestsmithError } from '../core/errors.js';
import type { PlanResult } from '../core/planner.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  dryRun?: boolean;
  order?: number[];
  resources?: ResourceResult[];
  plan?: PlanResult['entries'];
  status?: StatusRow[];
  error?: ErrorOutput;
  summary?: Record<string, number>;
}

/**
 * Outcome of converging or destroying one resource
 */
export interface ResourceResult {
  id: number;
  status: ConvergeResult['status'] | 'destroyed';
  stage?: string;
  blockedBy?: number[];
  error?: ErrorOutput;
}

/**
 * One row of the status table
 */
export interface StatusRow {
  id: number;
  name: string;
  kind: string;
  stage: LifecycleStage;
  updatedAt?: string;
  specChanged: boolean;
  failure?: string;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

const STAGE_VERBS: Record<string, string> = {
  defined: 'Defining',
  configured: 'Configuring',
  'idmap-verified': 'Verifying identity map',
  'volumes-applied': 'Attaching volumes',
  running: 'Starting',
  customizing: 'Applying features',
  completed: 'Checking health and completing',
};

function toErrorOutput(error: unknown): ErrorOutput {
  if (isGuestsmithError(error)) {
    const output: ErrorOutput = { code: error.code, message: error.message };
    if (error.suggestion) output.suggestion = error.suggestion;
    return output;
  }
  return { code: 'UNKNOWN', message: errorMessage(error) };
}

/**
 * CLI-specific output formatter.
 *
 * In JSON mode, output is collected and emitted as a single JSON object at
 * flush.
 */
export class OutputFormatter {
  private mode: OutputMode;
  private result: CommandResult;
  private indentLevel: number = 0;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  /**
   * Check if in JSON mode.
   */
  isJson(): boolean {
    return this.mode === 'json';
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  /**
   * Print a success message.
   */
  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message.
   */
  error(message: string, error?: GuestsmithError): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      ...(error?.suggestion ? { suggestion: error.suggestion } : {}),
    };
  }

  /**
   * Print an info message.
   */
  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  /**
   * Print a warning message.
   */
  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }
  }

  /**
   * Print a blank line.
   */
  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  // ===========================================================================
  // Convergence Progress
  // ===========================================================================

  /**
   * Report a convergence event.
   *
   * In human mode events print as they happen; in JSON mode terminal events
   * become entries of `resources`.
   */
  progress(event: ConvergeEvent): void {
    switch (event.type) {
      case 'resource-start':
        this.info(`${event.name} (${event.id}): at '${event.stage}'`);
        this.indent();
        if (event.resumedAfterFailure) {
          this.warning(`resuming after failure: ${event.resumedAfterFailure.split('\n')[0] ?? ''}`);
        }
        break;
      case 'stage-skipped':
        this.info(`· ${event.stage} (already satisfied)`);
        break;
      case 'stage-start':
        this.info(`${STAGE_VERBS[event.stage] ?? event.stage}...`);
        break;
      case 'stage-complete':
        this.success(event.stage);
        break;
      case 'resource-complete':
        this.success('completed');
        this.dedent();
        this.addResource({ id: event.id, status: 'completed', stage: 'completed' });
        break;
      case 'resource-failed':
        if (this.mode === 'human') {
          console.error(`${this.getIndent()}✗ ${event.stage} failed: ${event.error.message}`);
          if (isGuestsmithError(event.error) && event.error.suggestion) {
            console.error(`${this.getIndent()}  Fix: ${event.error.suggestion}`);
          }
        }
        this.dedent();
        this.addResource({
          id: event.id,
          status: 'failed',
          stage: event.stage,
          error: toErrorOutput(event.error),
        });
        break;
      case 'resource-blocked':
        this.warning(`${event.id}: blocked by ${event.blockedBy.join(', ')}`);
        this.addResource({ id: event.id, status: 'blocked', blockedBy: event.blockedBy });
        break;
      case 'resource-cancelled':
        this.warning(`${event.id}: cancelled at '${event.stage}'`);
        this.dedent();
        this.addResource({ id: event.id, status: 'cancelled', stage: event.stage });
        break;
    }
  }

  /**
   * Record a destroyed resource.
   */
  destroyed(id: number): void {
    this.success(`${id} destroyed`);
    this.addResource({ id, status: 'destroyed' });
  }

  private addResource(resource: ResourceResult): void {
    if (!this.result.resources) {
      this.result.resources = [];
    }
    this.result.resources.push(resource);
  }

  /**
   * Print the batch summary and mark the command failed unless every
   * resource completed.
   */
  batchSummary(batch: BatchResult): void {
    const { completed, failed, blocked, cancelled } = batch.summary;
    const parts = [`${completed} completed`];
    if (failed) parts.push(`${failed} failed`);
    if (blocked) parts.push(`${blocked} blocked`);
    if (cancelled) parts.push(`${cancelled} cancelled`);

    this.newline();
    this.info(`Done. ${parts.join(', ')}.`);

    this.result.order = batch.order;
    this.result.summary = { ...batch.summary };
    if (completed !== batch.results.length) {
      this.result.success = false;
    }
  }

  // ===========================================================================
  // Table Output
  // ===========================================================================

  /**
   * Print a table of data.
   *
   * @param headers - Column headers
   * @param rows - Row data
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      console.log(`${this.getIndent()}${headerLine.trimEnd()}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        console.log(`${this.getIndent()}${rowLine.trimEnd()}`);
      }
    }
  }

  // ===========================================================================
  // Status Output
  // ===========================================================================

  /**
   * Print the status table.
   */
  statusTable(rows: StatusRow[]): void {
    if (this.mode === 'human') {
      this.table(
        ['ID', 'NAME', 'KIND', 'STAGE', 'UPDATED', 'NOTE'],
        rows.map((row) => [
          String(row.id),
          row.name,
          row.kind,
          row.stage,
          row.updatedAt ?? '-',
          [row.specChanged ? 'config changed' : '', row.failure ?? ''].filter(Boolean).join('; '),
        ])
      );
      this.newline();
      this.info(`${rows.length} resource${rows.length === 1 ? '' : 's'} configured.`);
    }

    this.result.status = rows;
  }

  // ===========================================================================
  // Validate Output
  // ===========================================================================

  /**
   * Print validation success.
   */
  validationSuccess(containers: number, vms: number, order: number[]): void {
    if (this.mode === 'human') {
      this.success('Configuration valid');
      this.indent();
      this.info(`Containers: ${containers}`);
      this.info(`VMs: ${vms}`);
      this.info(`Order: ${order.join(' -> ') || '(empty)'}`);
      this.dedent();
    }

    this.result.order = order;
    this.result.summary = { containers, vms };
  }

  /**
   * Print validation errors.
   */
  validationError(error: GuestsmithError, errors: Array<{ path: string; message: string }>): void {
    this.result.success = false;

    if (this.mode === 'human') {
      this.error(error.message, error);
      this.newline();
      for (const err of errors) {
        console.log(`  - ${err.path}: ${err.message}`);
      }
    }

    this.result.error = {
      code: error.code,
      message: error.message,
      details: { errors },
    };
  }

  // ===========================================================================
  // Plan Output
  // ===========================================================================

  /**
   * Print plan summary.
   */
  planSummary(plan: PlanResult): void {
    if (this.mode === 'human') {
      if (plan.summary.pending === 0) {
        this.info('No changes needed. All resources are completed.');
      } else {
        this.info(`Plan: ${plan.summary.pending} resource${plan.summary.pending === 1 ? '' : 's'} to converge`);
        this.newline();

        for (const entry of plan.entries) {
          const symbol = entry.recorded === null ? '+' : entry.pending.length === 0 ? '=' : '~';
          console.log(`  ${symbol} ${entry.id} ${entry.name} (${entry.kind})`);
          if (entry.pending.length > 0) {
            console.log(`    from '${entry.resumeFrom}': ${entry.pending.join(' -> ')}`);
          }
          if (entry.failure) {
            console.log(`    last failure at '${entry.failure.stage}': ${entry.failure.message.split('\n')[0] ?? ''}`);
          }
          if (entry.specChanged) {
            console.log('    configuration changed since last convergence');
          }
        }

        this.newline();
        this.info('Run `guestsmith up <file>` to apply.');
      }
    }

    this.result.order = plan.order;
    this.result.plan = plan.entries;
    this.result.summary = { ...plan.summary };
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  /**
   * Mark output as coming from a dry run.
   */
  setDryRun(dryRun: boolean): void {
    if (dryRun) {
      this.result.dryRun = true;
    }
  }

  /**
   * Set success status explicitly.
   */
  setSuccess(success: boolean): void {
    this.result.success = success;
  }

  /**
   * Get the command result object.
   */
  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }

  /**
   * Get the exit code based on success status.
   */
  getExitCode(): number {
    return this.result.success ? 0 : 1;
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  options: { json?: boolean }
): OutputFormatter {
  return new OutputFormatter(command, options);
}
