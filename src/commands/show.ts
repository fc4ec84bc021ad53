import { Command } from 'commander';
import { getUpdate, listUpdateEvents } from '../application/index.js';
import { parseId, printJson, withRuntime } from './context.js';

export const showCommand = new Command('show')
  .argument('<id>', 'Update id', parseId)
  .description('Show an update record with its event history')
  .action(async (id: number, _options: object, command: Command) => {
    const shown = await withRuntime(command, { notify: false }, async ({ ledger }) => {
      const record = await getUpdate(ledger, id);
      const history = await listUpdateEvents(ledger, id);
      return { record, projected_state: history.projected_state, events: history.data };
    });
    printJson(shown);
  });
