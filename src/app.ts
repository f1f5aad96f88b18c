import { randomUUID } from 'node:crypto';
import Fastify from 'fastify';
import { pino, type Logger } from 'pino';
import type { EventBusConfig, EventBusLogStream, HttpTransport } from './infrastructure/index.js';
import type { EventSerializer, JobRegistry } from './application/index.js';
import { eventBusPlugin, eventBusRoutes } from './interfaces/http/index.js';

export interface BuildAppOptions {
  config: EventBusConfig;
  logger?: Logger;
  transport?: HttpTransport;
  jobs?: JobRegistry;
  serializer?: EventSerializer;
  /** Flushed to `config.logEventService` after every response. */
  logStream?: EventBusLogStream;
}

/**
 * Builds the Fastify app without listening.
 *
 * Order:
 * 1) EventBus services plugin
 * 2) HTTP routes
 * 3) Log forwarding hook, when configured
 */
export async function buildApp(options: BuildAppOptions) {
  const { config } = options;
  const logger = options.logger ?? pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

  const fastify = Fastify({
    loggerInstance: logger,
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  });

  await fastify.register(eventBusPlugin, {
    config,
    log: logger,
    transport: options.transport,
    jobs: options.jobs,
    serializer: options.serializer,
  });
  await fastify.register(eventBusRoutes);

  const { logStream } = options;
  const logService = config.logEventService;
  if (logStream && logService !== null) {
    // Throws EventBusConfigError here, not on the first response.
    const sink = fastify.eventBus.buses.getInstance(logService);
    fastify.addHook('onResponse', async (request) => {
      await logStream.flush(sink, { requestId: request.id });
    });
  }

  return fastify;
}
