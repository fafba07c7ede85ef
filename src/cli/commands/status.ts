/**
 * Status Command Handler
 *
 * Shows the recorded stage of each resource, when it last moved, the last
 * failure, and whether its configuration changed since.
 */

import { computeSpecHash } from '../../lib/hash.js';
import { StateManager } from '../../state/manager.js';
import { createOutput, type StatusRow } from '../output.js';
import { handleError, loadStore, parseIds, type GlobalOptions } from '../runtime.js';

/**
 * Execute the status command.
 *
 * @param file - Path to the host configuration file
 * @param ids - Resource ids (all configured when empty)
 * @param options - Command options
 */
export async function statusCommand(
  file: string,
  ids: string[],
  options: GlobalOptions
): Promise<void> {
  const output = createOutput('status', options);

  try {
    const store = await loadStore(file);
    const state = new StateManager(store.settings.stateDir);
    const requested = parseIds(ids);

    const rows: StatusRow[] = [];
    for (const id of requested.length > 0 ? requested : store.ids()) {
      const spec = store.get(id);
      const record = await state.get(id);
      const row: StatusRow = {
        id,
        name: spec.name,
        kind: spec.kind,
        stage: record ? record.stage : 'undefined',
        specChanged: record !== null && record.specHash !== computeSpecHash(spec),
      };
      if (record) row.updatedAt = record.updatedAt;
      if (record?.failure) {
        row.failure = `${record.failure.stage}: ${record.failure.message.split('\n')[0] ?? ''}`;
      }
      rows.push(row);
    }

    output.statusTable(rows);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
