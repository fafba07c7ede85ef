/**
 * Validate Command Handler
 *
 * Validates the host configuration and both resource documents without
 * touching the hypervisor: schema, cross-document invariants, and a cycle
 * check over the whole dependency graph.
 */

import { findCycle, resolveOrder } from '../../core/dependencies.js';
import { DependencyCycleError } from '../../core/errors.js';
import { createOutput } from '../output.js';
import { handleError, loadStore, type GlobalOptions } from '../runtime.js';

/**
 * Execute the validate command.
 *
 * @param file - Path to the host configuration file
 * @param options - Command options
 */
export async function validateCommand(
  file: string,
  options: GlobalOptions
): Promise<void> {
  const output = createOutput('validate', options);

  try {
    output.info(`Validating configuration: ${file}`);
    const store = await loadStore(file);

    const cycle = findCycle(store);
    if (cycle) {
      throw new DependencyCycleError(cycle);
    }

    const resources = store.all();
    output.validationSuccess(
      resources.filter((r) => r.kind === 'container').length,
      resources.filter((r) => r.kind === 'vm').length,
      resolveOrder(store.ids(), store)
    );

    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
