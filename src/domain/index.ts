export type { EventMeta, EventAttributes, WikiEvent, RequestContext } from './event.js';
export { EventType, parseEventTypeMask, allowsEventType } from './event-type.js';
export type { EventTypeName, SendableEventType, ParsedEventTypeMask } from './event-type.js';
export { SuppressedDataError, RevisionDeleted } from './entities.js';
export type {
  PageTitle,
  UserRecord,
  RevisionContent,
  RevisionRecord,
  RevisionSlot,
  BlockRecord,
  LinkTarget,
  PageProperties,
} from './entities.js';
export type {
  CampaignSettings,
  CampaignCreated,
  CampaignModified,
  CampaignRemoved,
  CampaignChange,
  CampaignChangeKind,
} from './campaign.js';
export { CHANGELOG_KIND } from './page-change.js';
export type {
  PageState,
  RedirectTarget,
  PageCreated,
  PageEdited,
  PageMoved,
  PageDeleted,
  PageUndeleted,
  PageVisibilityChanged,
  PageChange,
  PageChangeKind,
} from './page-change.js';
export { ReadOnlyError, UnknownJobTypeError } from './job.js';
export type { Job, JobParams, JobSpecification, JobRunContext, JobConstructor } from './job.js';
export { EventBusConfigError, JobQueueError } from './errors.js';
