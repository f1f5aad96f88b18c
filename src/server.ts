import { pino, multistream, type DestinationStream } from 'pino';
import { buildApp } from './app.js';
import { EventBusLogStream, loadEventBusConfig } from './infrastructure/index.js';

/**
 * Bootstrap the EventBus server.
 *
 * Order:
 * 1) Load and validate config
 * 2) Logger, with log event forwarding when configured
 * 3) Build app, register shutdown hooks
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadEventBusConfig();

  const logStream = config.logEventService !== null ? new EventBusLogStream() : undefined;
  const destination: DestinationStream = logStream
    ? multistream([{ stream: process.stdout }, { stream: logStream }])
    : process.stdout;

  const logger = pino({ level: process.env['LOG_LEVEL'] ?? 'info' }, destination);

  const fastify = await buildApp({ config, logger, logStream });

  // --------------------------------------------------
  // Shutdown
  // --------------------------------------------------

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({ host, port });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
