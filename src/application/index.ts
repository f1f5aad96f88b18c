export {
  BINARY_VALUE_PREFIX,
  LOG_EVENTS_MAX_BYTES,
  BinaryDecodeError,
  decodeBinaryValue,
  isRecord,
  metaBlocks,
  partitionEvents,
  removeNulls,
  replaceBinaryValue,
  replaceBinaryValuesRecursive,
  serializeEvent,
  serializeEvents,
  summarizeEventsForLog,
  validateJsonSerializable,
} from './json-events.js';
export type { EventBatch } from './json-events.js';
export { SIGNATURE_FIELD, signEvent, signJobEvent, verifySignature, withoutSignature } from './signature.js';
export { EventSerializer, timestampToDt } from './event-serializer.js';
export type { CreateEventOptions, EventSerializerOptions, Timestamp } from './event-serializer.js';
export { articleUrl, userPageUrl, wikiUrlencode } from './wiki-urls.js';
export type { SiteSettings } from './wiki-urls.js';
export { EventFactory, PAGE_CHANGE_STREAM_DEFAULT, PAGE_CHANGE_STREAM_KEY } from './event-factory.js';
export { PageEntities, SUPPRESSED_ALL, visibilityAttrs } from './page-entities.js';
export type { VisibilityAttrs } from './page-entities.js';
export type {
  PageDeleteInput,
  PageUndeleteInput,
  PageMoveInput,
  RevisionTagsChangeInput,
  RevisionVisibilityChangeInput,
  PagePropertiesChangeInput,
  PageLinksChangeInput,
  PageRestrictionsChangeInput,
  UserBlockChangeInput,
  RecentChangeRecord,
  RecentChangeType,
  ResourceChangeOptions,
} from './event-factory.js';
export { StreamNameMapper } from './stream-name-mapper.js';
export type { EventBusProvider, EventSink, SendResult, SkipReason } from './ports.js';
export { DeferredUpdateQueue } from './deferred-updates.js';
export type { DeferredUpdate, MergeableUpdate } from './deferred-updates.js';
export { EventBusSendUpdate } from './send-update.js';
export { EventHooks } from './event-hooks.js';
export type { LinksUpdateInput, RevisionVisibilityChange } from './event-hooks.js';
export { EventBusJobQueue } from './job-queue.js';
export { JobRegistry } from './job-registry.js';
export { JobExecutor } from './job-executor.js';
export type { JobExecutionResult } from './job-executor.js';
export { HttpError } from './errors.js';
export { validateJobEvent, decodeBinaryParams, isJsonContentType } from './job-event-validator.js';
export type { JobEventRequest } from './job-event-validator.js';
export { CdnPurgeRelayer, CDN_PURGE_CHANNEL } from './cdn-purge-relayer.js';
export type { CdnPurge } from './cdn-purge-relayer.js';
export { RecentChangeFeed } from './recent-change-feed.js';
export { createNullJob, NULL_JOB_TYPE } from './jobs/null-job.js';
