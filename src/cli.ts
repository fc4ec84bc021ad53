#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { applyCommand } from './commands/apply.js';
import { eventsCommand } from './commands/events.js';
import { listCommand } from './commands/list.js';
import { migrateCommand } from './commands/migrate.js';
import { recoverCommand } from './commands/recover.js';
import { rollbackCommand } from './commands/rollback.js';
import { serveCommand } from './commands/serve.js';
import { showCommand } from './commands/show.js';
import { verifyCommand } from './commands/verify.js';
import { errorMessage } from './domain/index.js';

const program = new Command();

program
  .name('update-ledger')
  .description('Apply and roll back updates against an append-only event log')
  .version('0.1.0')
  .option('-c, --config <file>', 'Path to the YAML config file');

program.addCommand(serveCommand);
program.addCommand(migrateCommand);
program.addCommand(applyCommand);
program.addCommand(rollbackCommand);
program.addCommand(recoverCommand);
program.addCommand(listCommand);
program.addCommand(showCommand);
program.addCommand(eventsCommand);
program.addCommand(verifyCommand);

try {
  await program.parseAsync(process.argv);
} catch (err: unknown) {
  console.error(`update-ledger: ${errorMessage(err)}`);
  process.exitCode = 1;
}
