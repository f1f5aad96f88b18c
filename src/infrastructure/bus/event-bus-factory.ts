import type { Logger } from 'pino';
import { EventBusConfigError, EventType, parseEventTypeMask } from '../../domain/index.js';
import type { EventBusProvider } from '../../application/ports.js';
import type { EventServiceConfig } from '../config/index.js';
import type { HttpTransport } from '../http/index.js';
import { EventBus } from './event-bus.js';
import type { StreamConfigs } from './stream-configs.js';

/** Producer name under a stream's `producers` setting. */
export const EVENT_STREAM_CONFIG_PRODUCER_NAME = 'mediawiki_eventbus';

/** Service name of the destination that accepts sends and does nothing. */
export const EVENT_SERVICE_DISABLED_NAME = '_disabled_eventbus_';

/** Seconds. */
export const DEFAULT_REQUEST_TIMEOUT = 10;

export interface EventBusFactoryOptions {
  enableEventBus: string | number;
  eventServiceDefault: string;
  eventServices: Record<string, EventServiceConfig>;
  maxBatchByteSize: number;
  /** Null when no stream configuration exists at all. */
  streamConfigs: StreamConfigs | null;
}

/**
 * Registry of event bus destinations, created lazily and cached per
 * service name for the lifetime of the factory.
 */
export class EventBusFactory implements EventBusProvider {
  private readonly instances = new Map<string, EventBus>();
  private readonly allowedTypes: number;

  constructor(
    private readonly options: EventBusFactoryOptions,
    private readonly transport: HttpTransport,
    private readonly log: Logger,
  ) {
    const parsed = parseEventTypeMask(options.enableEventBus);
    if (parsed.unknown.length > 0) {
      log.warn(
        { enableEventBus: options.enableEventBus, unknown: parsed.unknown },
        'Unknown event type in EnableEventBus setting, allowing all event types',
      );
    }
    this.allowedTypes = parsed.mask;
  }

  /** Configured service names, without the disabled sentinel. */
  get serviceNames(): string[] {
    return Object.keys(this.options.eventServices);
  }

  /**
   * Resolves the event service a stream is produced to.
   *
   * Without stream configuration every stream goes to the default service.
   * An undeclared stream, or one that is disabled for this producer, goes
   * to the disabled destination whatever service it names.
   */
  getEventServiceNameForStream(stream: string): string {
    const { streamConfigs, eventServiceDefault } = this.options;
    if (streamConfigs === null) return eventServiceDefault;

    const config = streamConfigs.get(stream);
    if (!config) {
      this.log.debug({ stream }, 'Stream is not declared, events will not be produced');
      return EVENT_SERVICE_DISABLED_NAME;
    }

    const producer = config.producers?.[EVENT_STREAM_CONFIG_PRODUCER_NAME];
    if (config.enabled === false || producer?.enabled === false) {
      return EVENT_SERVICE_DISABLED_NAME;
    }

    return producer?.event_service_name
      ?? config.destination_event_service
      ?? eventServiceDefault;
  }

  /**
   * Returns the destination for a service name. Throws
   * `EventBusConfigError` when the service is not configured with a url.
   */
  getInstance(serviceName: string): EventBus {
    const cached = this.instances.get(serviceName);
    if (cached) return cached;

    const instance = serviceName === EVENT_SERVICE_DISABLED_NAME
      ? this.createDisabled()
      : this.create(serviceName);
    this.instances.set(serviceName, instance);
    return instance;
  }

  getInstanceForStream(stream: string): EventBus {
    return this.getInstance(this.getEventServiceNameForStream(stream));
  }

  private create(serviceName: string): EventBus {
    const service = this.options.eventServices[serviceName];
    if (!service?.url) {
      const message = `Could not get configuration of EventBus instance for '${serviceName}'. `
        + `'${serviceName}' must exist in EventServices with a url in main config.`;
      this.log.error({ service: serviceName }, message);
      throw new EventBusConfigError(message);
    }

    return new EventBus(
      {
        url: service.url,
        timeout: service.timeout ?? DEFAULT_REQUEST_TIMEOUT,
        maxBatchByteSize: this.options.maxBatchByteSize,
        allowedTypes: this.allowedTypes,
        forwardXClientIP: service.x_client_ip_forwarding_enabled ?? false,
      },
      this.transport,
      this.log.child({ event_service: serviceName }),
    );
  }

  private createDisabled(): EventBus {
    return new EventBus(
      {
        url: EVENT_SERVICE_DISABLED_NAME,
        timeout: DEFAULT_REQUEST_TIMEOUT,
        maxBatchByteSize: this.options.maxBatchByteSize,
        allowedTypes: EventType.NONE,
        forwardXClientIP: false,
      },
      this.transport,
      this.log,
    );
  }
}
