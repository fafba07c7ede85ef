/**
 * Reprovision Command Handler
 *
 * Destroys each named resource and converges it again from scratch.
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
 * Execute the reprovision command.
 *
 * @param file - Path to the host configuration file
 * @param ids - Resource ids to rebuild
 * @param options - Command options
 */
export async function reprovisionCommand(
  file: string,
  ids: string[],
  options: GlobalOptions
): Promise<void> {
  const output = createOutput('reprovision', options);
  const interrupt = abortOnInterrupt(Logger.fromOptions(options));

  try {
    const requested = parseIds(ids);
    const store = await loadStore(file);
    for (const id of requested) store.get(id);

    const runtime = await createRuntime(store, {
      ...options,
      command: 'reprovision',
      onProgress: (event) => output.progress(event),
      signal: interrupt.signal,
    });

    let allCompleted = true;
    try {
      for (const id of requested) {
        output.info(`Reprovisioning ${store.get(id).name} (${id})`);
        const result = await runtime.engine.reprovision(id);
        if (result.status !== 'completed') {
          allCompleted = false;
        }
      }
    } finally {
      await runtime.release();
    }

    output.setSuccess(allCompleted);
    interrupt.dispose();
    output.flush();
    process.exit(output.getExitCode());
  } catch (error) {
    interrupt.dispose();
    handleError(output, error);
  }
}
