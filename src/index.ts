import pino from 'pino';
import { buildApp } from './app.js';
import { loadBridgeConfig } from './infrastructure/index.js';

/**
 * Bootstrap the webhook bridge.
 *
 * Order:
 * 1) Configuration from the environment
 * 2) Root logger, shared with Fastify
 * 3) Server assembly
 * 4) Shutdown hooks
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadBridgeConfig();

  const log = pino({ level: config.logLevel });

  const fastify = await buildApp({ config, log });

  // --------------------------------------------------
  // Shutdown
  // --------------------------------------------------

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });

  log.info(
    { workspace: config.workspaceName, app_url: config.appUrl },
    'Webhook bridge ready',
  );
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
