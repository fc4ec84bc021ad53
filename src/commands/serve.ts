import { Command } from 'commander';
import { runRecovery } from '../application/index.js';
import { createRuntime } from '../runtime.js';
import { buildServer } from '../server.js';
import { loadContext } from './context.js';

export const serveCommand = new Command('serve')
  .description('Run the HTTP API')
  .action(async (_options: object, command: Command) => {
    const { config, log } = loadContext(command, 'stdout');
    const runtime = await createRuntime(config, log, { notify: true });
    const { ledger, machine, onEvent } = runtime;

    // Nothing is in flight yet, so every pending record is stale.
    if (config.recovery.on_startup) {
      await runRecovery(ledger, { log, onEvent });
    }

    const fastify = await buildServer({ ledger, machine, log, onEvent });

    // onClose MUST be registered BEFORE listen()
    fastify.addHook('onClose', async () => {
      await runtime.close();
    });

    await fastify.listen({ host: config.server.host, port: config.server.port });

    const shutdown = (signal: NodeJS.Signals): void => {
      log.info({ signal }, 'Shutting down...');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
