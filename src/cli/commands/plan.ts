/**
 * Plan Command Handler
 *
 * Shows dependency order and the stages still ahead for each resource, from
 * the records alone. Makes no hypervisor calls and takes no lock.
 */

import { computePlan } from '../../core/planner.js';
import { StateManager } from '../../state/manager.js';
import { createOutput } from '../output.js';
import { handleError, loadStore, parseIds, type GlobalOptions } from '../runtime.js';

/**
 * Execute the plan command.
 *
 * @param file - Path to the host configuration file
 * @param ids - Resource ids (all configured when empty)
 * @param options - Command options
 */
export async function planCommand(
  file: string,
  ids: string[],
  options: GlobalOptions
): Promise<void> {
  const output = createOutput('plan', options);

  try {
    const store = await loadStore(file);
    const plan = await computePlan(parseIds(ids), store, new StateManager(store.settings.stateDir));

    output.planSummary(plan);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
