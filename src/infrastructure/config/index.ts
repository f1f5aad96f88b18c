export {
  eventBusConfigSchema,
  eventServiceSchema,
  streamConfigSchema,
  producerConfigSchema,
  siteSettingsSchema,
  DEFAULT_CONFIG,
  loadEventBusConfig,
  parseEventBusConfig,
} from './event-bus-config.js';
export type {
  EventBusConfig,
  EventBusConfigInput,
  EventServiceConfig,
  StreamConfig,
  LoadConfigOptions,
} from './event-bus-config.js';
