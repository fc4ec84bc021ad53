import { Command } from 'commander';
import { printJson, withRuntime } from './context.js';

export const applyCommand = new Command('apply')
  .argument('<name>', 'Update name')
  .argument('[version]', 'Update version')
  .description('Apply an update and record its outcome; exits 1 if the attempt fails')
  .action(async (name: string, version: string | undefined, _options: object, command: Command) => {
    const result = await withRuntime(command, { notify: true }, ({ machine }) =>
      machine.apply(name, version ?? null),
    );

    if (result.outcome === 'applied') {
      printJson({ outcome: result.outcome, record: result.record });
      return;
    }

    printJson({ outcome: result.outcome, record: result.record, error: result.error.message });
    process.exitCode = 1;
  });
