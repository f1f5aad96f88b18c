import type { Logger } from 'pino';
import type { CampaignChange, PageChange, PageTitle, RevisionRecord, UserRecord, WikiEvent } from '../domain/index.js';
import type { DeferredUpdateQueue } from './deferred-updates.js';
import type {
  EventFactory,
  PageDeleteInput,
  PageLinksChangeInput,
  PageMoveInput,
  PagePropertiesChangeInput,
  PageRestrictionsChangeInput,
  PageUndeleteInput,
  RevisionTagsChangeInput,
  UserBlockChangeInput,
} from './event-factory.js';
import type { EventBusProvider } from './ports.js';
import { EventBusSendUpdate } from './send-update.js';

export interface LinksUpdateInput {
  properties: PagePropertiesChangeInput;
  links: PageLinksChangeInput;
}

export interface RevisionVisibilityChange {
  /** Null when the revision could not be loaded. */
  revision: RevisionRecord | null;
  oldBits: number;
  newBits: number;
}

/**
 * Turns wiki changes into events queued on the caller's unit of work.
 *
 * Handlers never throw: a change that cannot be turned into an event is
 * logged and dropped so the wiki action itself is unaffected.
 */
export class EventHooks {
  constructor(
    private readonly events: EventFactory,
    private readonly buses: EventBusProvider,
    private readonly log: Logger,
  ) {}

  onPageDelete(queue: DeferredUpdateQueue, input: PageDeleteInput): void {
    this.emit(queue, 'page-delete', () => [this.events.createPageDeleteEvent(input, queue.context)]);
  }

  onPageUndelete(queue: DeferredUpdateQueue, input: PageUndeleteInput): void {
    this.emit(queue, 'page-undelete', () => [this.events.createPageUndeleteEvent(input, queue.context)]);
  }

  onPageMove(queue: DeferredUpdateQueue, input: PageMoveInput): void {
    this.emit(queue, 'page-move', () => [this.events.createPageMoveEvent(input, queue.context)]);
  }

  onPageCreate(queue: DeferredUpdateQueue, revision: RevisionRecord): void {
    this.emit(queue, 'page-create', () => [this.events.createPageCreateEvent(revision, queue.context)]);
  }

  /**
   * A saved revision. A null edit (nothing new stored) becomes a
   * `null_edit` resource change instead of a revision event.
   */
  onRevisionSaved(
    queue: DeferredUpdateQueue,
    revision: RevisionRecord,
    options: { nullEdit?: boolean; contentChanged?: boolean } = {},
  ): void {
    if (options.nullEdit) {
      this.onResourceChange(queue, revision.title, ['null_edit']);
      return;
    }
    this.emit(queue, 'revision-create', () => [
      this.events.createRevisionCreateEvent(revision, options.contentChanged ?? true, queue.context),
    ]);
  }

  onPagePurge(queue: DeferredUpdateQueue, title: PageTitle): void {
    this.onResourceChange(queue, title, ['purge']);
  }

  /** Properties and links changes. Nothing is sent for an empty side. */
  onLinksUpdate(queue: DeferredUpdateQueue, input: LinksUpdateInput): void {
    this.emit(queue, 'links-update', () => {
      const { properties, links } = input;
      const out: WikiEvent[] = [];
      if (hasEntries(properties.addedProperties) || hasEntries(properties.removedProperties)) {
        out.push(this.events.createPagePropertiesChangeEvent(properties, queue.context));
      }
      if ((links.addedLinks?.length ?? 0) > 0 || (links.removedLinks?.length ?? 0) > 0) {
        out.push(this.events.createPageLinksChangeEvent(links, queue.context));
      }
      return out;
    });
  }

  onPageProtect(queue: DeferredUpdateQueue, input: PageRestrictionsChangeInput): void {
    this.emit(queue, 'page-restrictions-change', () => [
      this.events.createPageRestrictionsChangeEvent(input, queue.context),
    ]);
  }

  onRevisionTagsChange(queue: DeferredUpdateQueue, input: RevisionTagsChangeInput): void {
    this.emit(queue, 'revision-tags-change', () => [
      this.events.createRevisionTagsChangeEvent(input, queue.context),
    ]);
  }

  /** One event per revision that could be loaded. */
  onRevisionVisibilityChange(
    queue: DeferredUpdateQueue,
    performer: UserRecord,
    changes: readonly RevisionVisibilityChange[],
  ): void {
    this.emit(queue, 'revision-visibility-change', () =>
      changes.flatMap(({ revision, oldBits, newBits }) =>
        revision === null
          ? []
          : [this.events.createRevisionVisibilityChangeEvent({ revision, performer, oldBits, newBits }, queue.context)],
      ),
    );
  }

  onUserBlockChange(queue: DeferredUpdateQueue, input: UserBlockChangeInput): void {
    this.emit(queue, 'user-blocks-change', () => [
      this.events.createUserBlockChangeEvent(input, queue.context),
    ]);
  }

  /** Page state change for the changelog stream, alongside the per-kind events above. */
  onPageChange(queue: DeferredUpdateQueue, change: PageChange): void {
    this.emit(queue, `page-change-${change.kind}`, () => [
      this.events.createPageChangeEvent(change, queue.context),
    ]);
  }

  onCampaignChange(queue: DeferredUpdateQueue, change: CampaignChange): void {
    this.emit(queue, `campaign-${change.kind}`, () => {
      const event = this.events.createCampaignEvent(change, queue.context);
      return event ? [event] : [];
    });
  }

  private onResourceChange(queue: DeferredUpdateQueue, title: PageTitle, tags: string[]): void {
    this.emit(queue, 'resource-change', () => [
      this.events.createResourceChangeEvent(this.events.articleUrl(title), tags, queue.context),
    ]);
  }

  /** Builds events, then queues one send update per stream. */
  private emit(queue: DeferredUpdateQueue, change: string, build: () => WikiEvent[]): void {
    let built: WikiEvent[];
    try {
      built = build();
    } catch (err: unknown) {
      this.log.error({ err, change }, 'Failed to create events for wiki change');
      return;
    }

    const byStream = new Map<string, WikiEvent[]>();
    for (const event of built) {
      const list = byStream.get(event.meta.stream);
      if (list) list.push(event);
      else byStream.set(event.meta.stream, [event]);
    }

    for (const [stream, events] of byStream) {
      try {
        queue.add(EventBusSendUpdate.forStream(this.buses, stream, events));
      } catch (err: unknown) {
        this.log.error({ err, change, stream }, 'Failed to queue events for wiki change');
      }
    }
  }
}

function hasEntries(value: Record<string, unknown> | undefined): boolean {
  return value !== undefined && Object.keys(value).length > 0;
}
