import { Command } from 'commander';
import { createDbClient, migrate } from '../infrastructure/index.js';
import { loadContext } from './context.js';

export const migrateCommand = new Command('migrate')
  .description('Create the ledger tables and indexes if they do not exist')
  .action(async (_options: object, command: Command) => {
    const { config, log } = loadContext(command);
    const { sql } = createDbClient(config.database.url, { max: 1 });
    try {
      await migrate(sql, log);
    } finally {
      await sql.end();
    }
  });
