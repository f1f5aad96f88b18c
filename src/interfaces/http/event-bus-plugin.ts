import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import {
  createEventBusServices,
  type EventBusServices,
  type EventBusServicesOptions,
} from '../../container.js';

export type EventBusPluginOptions = EventBusServicesOptions;

/**
 * Fastify plugin that builds the EventBus services once and decorates
 * `fastify.eventBus` for the routes.
 */
async function eventBusPlugin(fastify: FastifyInstance, opts: EventBusPluginOptions): Promise<void> {
  const services = createEventBusServices(opts);

  fastify.decorate('eventBus', services);

  fastify.log.info(
    {
      event_services: services.buses.serviceNames,
      default_service: services.config.eventServiceDefault,
      stream_configs: services.config.eventStreams === null ? 'none' : 'configured',
    },
    'EventBus services ready',
  );
}

export default fp(eventBusPlugin, {
  name: 'event-bus',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.eventBus` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    eventBus: EventBusServices;
  }
}
