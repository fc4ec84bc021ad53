import { Command } from 'commander';
import { parseId, printJson, withRuntime } from './context.js';

export const rollbackCommand = new Command('rollback')
  .argument('<id>', 'Update id', parseId)
  .description('Roll back an applied or failed update; exits 1 if the inverse fails')
  .action(async (id: number, _options: object, command: Command) => {
    const result = await withRuntime(command, { notify: true }, ({ machine }) => machine.rollback(id));

    if (result.inverse.ok) {
      printJson({ record: result.record, inverse: { ok: true } });
      return;
    }

    printJson({ record: result.record, inverse: { ok: false, error: result.inverse.error.message } });
    process.exitCode = 1;
  });
