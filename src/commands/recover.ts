import { Command } from 'commander';
import { runRecovery } from '../application/index.js';
import { printJson, withRuntime } from './context.js';

export const recoverCommand = new Command('recover')
  .description('Resolve updates left pending by a crash')
  .action(async (_options: object, command: Command) => {
    const report = await withRuntime(command, { notify: true }, ({ ledger, log, onEvent }) =>
      runRecovery(ledger, { log, onEvent }),
    );
    printJson(report);
  });
