import type { Logger } from 'pino';
import {
  CdnPurgeRelayer,
  EventBusJobQueue,
  EventFactory,
  EventHooks,
  EventSerializer,
  JobExecutor,
  JobRegistry,
  RecentChangeFeed,
  StreamNameMapper,
  createNullJob,
  NULL_JOB_TYPE,
} from './application/index.js';
import {
  EventBusFactory,
  StreamConfigs,
  createFetchTransport,
  type EventBusConfig,
  type HttpTransport,
} from './infrastructure/index.js';

/** Everything a host needs to produce events and run jobs. */
export interface EventBusServices {
  config: EventBusConfig;
  buses: EventBusFactory;
  events: EventFactory;
  hooks: EventHooks;
  jobQueue: EventBusJobQueue;
  jobs: JobRegistry;
  executor: JobExecutor;
  recentChanges: RecentChangeFeed;
  /** Null when no purge stream is configured. */
  cdnPurges: CdnPurgeRelayer | null;
}

export interface EventBusServicesOptions {
  config: EventBusConfig;
  log: Logger;
  transport?: HttpTransport;
  /** Job types runnable through the job endpoint. The `null` job is always added. */
  jobs?: JobRegistry;
  serializer?: EventSerializer;
}

/**
 * Composition root. Builds one destination registry per call; callers
 * keep the result for the lifetime of the process.
 */
export function createEventBusServices(options: EventBusServicesOptions): EventBusServices {
  const { config } = options;
  const log = options.log.child({ component: 'eventbus' });

  const buses = new EventBusFactory(
    {
      enableEventBus: config.enableEventBus,
      eventServiceDefault: config.eventServiceDefault,
      eventServices: config.eventServices,
      maxBatchByteSize: config.maxBatchByteSize,
      streamConfigs: config.eventStreams === null ? null : new StreamConfigs(config.eventStreams),
    },
    options.transport ?? createFetchTransport(),
    log,
  );

  const events = new EventFactory(
    config.wiki,
    options.serializer ?? new EventSerializer(),
    new StreamNameMapper(config.streamNamesMap),
  );

  const jobs = options.jobs ?? new JobRegistry();
  if (!jobs.has(NULL_JOB_TYPE)) jobs.register(NULL_JOB_TYPE, createNullJob);

  return {
    config,
    buses,
    events,
    hooks: new EventHooks(events, buses, log),
    jobQueue: new EventBusJobQueue(events, buses, config.secretKey, log),
    jobs,
    executor: new JobExecutor(log),
    recentChanges: new RecentChangeFeed(events, buses, config.recentChangeStream, log),
    cdnPurges: config.cdnPurgeStream === null
      ? null
      : new CdnPurgeRelayer(events, buses, config.cdnPurgeStream, log),
  };
}
