/**
 * Up Command Handler
 *
 * Converges the given resources (every configured resource when none are
 * named) in dependency order.
 */

import { Logger } from '../../lib/logger.js';
import { createOutput } from '../output.js';
import {
  abortOnInterrupt,
  createRuntime,
  handleError,
  loadStore,
  parseIds,
  type GlobalOptions,
} from '../runtime.js';

/**
 * Options for the up command
 */
export interface UpCommandOptions extends GlobalOptions {
  dryRun?: boolean;
}

/**
 * Execute the up command.
 *
 * @param file - Path to the host configuration file
 * @param ids - Resource ids (all configured when empty)
 * @param options - Command options
 */
export async function upCommand(
  file: string,
  ids: string[],
  options: UpCommandOptions
): Promise<void> {
  const output = createOutput('up', options);
  output.setDryRun(options.dryRun === true);
  const interrupt = abortOnInterrupt(Logger.fromOptions(options));

  try {
    const requested = parseIds(ids);
    output.info(`Loading configuration: ${file}`);
    const store = await loadStore(file);
    output.success('Configuration validated');

    const runtime = await createRuntime(store, {
      ...options,
      command: 'up',
      dryRun: options.dryRun === true,
      onProgress: (event) => output.progress(event),
      signal: interrupt.signal,
    });

    try {
      output.newline();
      const batch = await runtime.engine.convergeBatch(requested.length > 0 ? requested : store.ids());
      output.batchSummary(batch);
    } finally {
      await runtime.release();
    }

    interrupt.dispose();
    output.flush();
    process.exit(output.getExitCode());
  } catch (error) {
    interrupt.dispose();
    handleError(output, error);
  }
}
