import { Command } from 'commander';
import { listEvents } from '../application/index.js';
import { parseCursor, parsePositiveInt, printJson, withRuntime } from './context.js';

interface EventsOptions {
  after?: number;
  limit?: number;
}

export const eventsCommand = new Command('events')
  .description('Print the event log in append order')
  .option('--after <id>', 'Only events after this id', parseCursor)
  .option('--limit <n>', 'Page size (max 500)', parsePositiveInt)
  .action(async (options: EventsOptions, command: Command) => {
    const page = await withRuntime(command, { notify: false }, ({ ledger }) => listEvents(ledger, options));
    printJson(page);
  });
