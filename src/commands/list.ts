import { Command, Option } from 'commander';
import { UPDATE_STATES, describeTarget } from '../domain/index.js';
import type { UpdateState } from '../domain/index.js';
import { listUpdates } from '../application/index.js';
import { parseNonNegativeInt, parsePositiveInt, withRuntime } from './context.js';

interface ListOptions {
  state?: UpdateState;
  name?: string;
  limit?: number;
  offset?: number;
}

export const listCommand = new Command('list')
  .description('List update records, newest first')
  .addOption(new Option('--state <state>', 'Only records in this state').choices(UPDATE_STATES))
  .option('--name <name>', 'Only records with this name')
  .option('--limit <n>', 'Page size (max 500)', parsePositiveInt)
  .option('--offset <n>', 'Records to skip', parseNonNegativeInt)
  .action(async (options: ListOptions, command: Command) => {
    const { data } = await withRuntime(command, { notify: false }, ({ ledger }) =>
      listUpdates(ledger, options),
    );

    for (const record of data) {
      console.log(
        `${String(record.id).padStart(6)}  ${record.state.padEnd(11)}  ${record.created_at.toISOString()}  ${describeTarget(record)}`,
      );
    }
  });
