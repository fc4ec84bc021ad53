import { Command } from 'commander';
import { verifyLedger } from '../application/index.js';
import { printJson, withRuntime } from './context.js';

export const verifyCommand = new Command('verify')
  .description('Replay every record against its history; exits 1 on drift')
  .action(async (_options: object, command: Command) => {
    const report = await withRuntime(command, { notify: false }, ({ ledger }) => verifyLedger(ledger));
    printJson(report);
    if (report.issues.length > 0) {
      process.exitCode = 1;
    }
  });
