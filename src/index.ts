import { createLogger, loadConfig } from './infrastructure/index.js';
import { buildServer } from './server.js';

/**
 * Bootstrap.
 *
 * Order:
 * 1) Load config (fails fast on an invalid analyzer file)
 * 2) Build the Fastify app
 * 3) Register shutdown hooks
 * 4) listen()
 */
const log = createLogger();

async function main(): Promise<void> {
  const config = loadConfig();
  const fastify = await buildServer(config);

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down...');
    void fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({ host: config.server.host, port: config.server.port });
  log.info(
    { host: config.server.host, port: config.server.port, customRules: config.dmesg.custom_error_patterns.length },
    'Analysis server listening',
  );
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Server crashed');
  process.exit(1);
});
