export { EventBus } from './event-bus.js';
export type { EventBusOptions } from './event-bus.js';
export {
  EventBusFactory,
  EVENT_STREAM_CONFIG_PRODUCER_NAME,
  EVENT_SERVICE_DISABLED_NAME,
  DEFAULT_REQUEST_TIMEOUT,
} from './event-bus-factory.js';
export type { EventBusFactoryOptions } from './event-bus-factory.js';
export { StreamConfigs } from './stream-configs.js';
