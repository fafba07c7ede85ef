/**
 * Destroy Command Handler
 *
 * Removes live resources and their records. Only explicitly named ids are
 * destroyed.
 */

import { destroyOrder } from '../../core/dependencies.js';
import { createOutput } from '../output.js';
import { createRuntime, handleError, loadStore, parseIds, type GlobalOptions } from '../runtime.js';

/**
 * Execute the destroy command.
 *
 * @param file - Path to the host configuration file
 * @param ids - Resource ids to destroy
 * @param options - Command options
 */
export async function destroyCommand(
  file: string,
  ids: string[],
  options: GlobalOptions
): Promise<void> {
  const output = createOutput('destroy', options);

  try {
    const requested = parseIds(ids);
    const store = await loadStore(file);
    // Unknown ids fail before anything is removed
    const order = destroyOrder(requested, store);

    const runtime = await createRuntime(store, { ...options, command: 'destroy' });
    try {
      for (const id of order) {
        output.info(`Destroying ${store.get(id).name} (${id})...`);
        await runtime.engine.destroy(id);
        output.destroyed(id);
      }
    } finally {
      await runtime.release();
    }

    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
