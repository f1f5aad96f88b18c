import { createHash } from 'node:crypto';
import type {
  BlockRecord,
  CampaignChange,
  CampaignSettings,
  EventAttributes,
  JobSpecification,
  LinkTarget,
  PageChange,
  PageProperties,
  PageTitle,
  RequestContext,
  RevisionContent,
  RevisionRecord,
  UserRecord,
  WikiEvent,
} from '../domain/index.js';
import { CHANGELOG_KIND, RevisionDeleted, SuppressedDataError } from '../domain/index.js';
import { EventSerializer, type Timestamp } from './event-serializer.js';
import { removeNulls, replaceBinaryValue, replaceBinaryValuesRecursive, isRecord } from './json-events.js';
import { PageEntities, SUPPRESSED_ALL, visibilityAttrs } from './page-entities.js';
import { StreamNameMapper } from './stream-name-mapper.js';
import { articleUrl, userPageUrl, wikiUrlencode, type SiteSettings } from './wiki-urls.js';

// ------------------------------------------------------------------
// Inputs
// ------------------------------------------------------------------

export interface PageDeleteInput {
  pageId: number;
  title: PageTitle;
  isRedirect?: boolean;
  performer: UserRecord;
  reason: string | null;
  /** Number of revisions moved to the archive; null when unknown. */
  archivedRevisionCount: number | null;
  latestRevisionId?: number | null;
  timestamp?: Timestamp;
}

export interface PageUndeleteInput {
  pageId: number;
  /** Page id the page had before it was deleted. */
  oldPageId: number | null;
  title: PageTitle;
  isRedirect?: boolean;
  performer: UserRecord;
  reason: string | null;
  timestamp?: Timestamp;
}

export interface PageMoveInput {
  oldTitle: PageTitle;
  newTitle: PageTitle;
  /** Null revision created by the move. */
  revision: RevisionRecord;
  performer: UserRecord;
  reason: string | null;
  /** Redirect page left behind at the old title, if any. */
  redirect?: { pageId: number; revisionId: number } | null;
}

export interface RevisionTagsChangeInput {
  revision: RevisionRecord;
  prevTags: readonly string[];
  addedTags: readonly string[];
  removedTags: readonly string[];
  performer?: UserRecord | null;
}

export interface RevisionVisibilityChangeInput {
  revision: RevisionRecord;
  performer: UserRecord;
  oldBits: number;
  newBits: number;
}

interface PageStateInput {
  pageId: number;
  title: PageTitle;
  revisionId: number;
  isRedirect: boolean;
  performer?: UserRecord | null;
}

export interface PagePropertiesChangeInput extends PageStateInput {
  addedProperties?: PageProperties;
  removedProperties?: PageProperties;
}

export interface PageLinksChangeInput extends PageStateInput {
  addedLinks?: readonly LinkTarget[];
  removedLinks?: readonly LinkTarget[];
}

export interface PageRestrictionsChangeInput extends PageStateInput {
  performer: UserRecord;
  reason: string | null;
  /** Action name to the groups allowed to perform it, e.g. `{ edit: ['sysop'] }`. */
  restrictions: Record<string, readonly string[]>;
}

export interface UserBlockChangeInput {
  block: BlockRecord;
  performer: UserRecord;
  priorBlock?: BlockRecord | null;
}

export type RecentChangeType = 'edit' | 'new' | 'log' | 'categorize' | 'external';

export interface RecentChangeRecord {
  id: number | null;
  type: RecentChangeType;
  title: PageTitle;
  /** Title with spaces, as shown to readers. */
  titleText: string;
  comment: string | null;
  timestamp: Timestamp;
  user: string;
  bot: boolean;
  minor?: boolean | null;
  patrolled?: boolean | null;
  length?: { old: number | null; new: number | null } | null;
  revision?: { old: number | null; new: number | null } | null;
  logId?: number | null;
  logType?: string | null;
  logAction?: string | null;
}

// ------------------------------------------------------------------
// Attribute helpers
// ------------------------------------------------------------------

function visibilityOf(bits: number): { text: boolean; user: boolean; comment: boolean } {
  return {
    text: (bits & RevisionDeleted.TEXT) === 0,
    user: (bits & RevisionDeleted.USER) === 0,
    comment: (bits & RevisionDeleted.COMMENT) === 0,
  };
}

function isPositiveId(id: number | null | undefined): id is number {
  return typeof id === 'number' && Number.isInteger(id) && id > 0;
}

function loadContent(revision: RevisionRecord): RevisionContent | null {
  try {
    return revision.content();
  } catch (err: unknown) {
    if (err instanceof SuppressedDataError) return null;
    throw err;
  }
}

function uniqueTags(prev: readonly string[], added: readonly string[], removed: readonly string[]): string[] {
  const drop = new Set(removed);
  return [...new Set([...prev, ...added])].filter((tag) => !drop.has(tag));
}

function setComment(attrs: EventAttributes, comment: string | null | undefined): void {
  if (comment !== null && comment !== undefined && comment !== '') {
    attrs['comment'] = comment;
  }
}

/** `streamNamesMap` key naming the page change stream. */
export const PAGE_CHANGE_STREAM_KEY = 'mediawiki_page_change';
export const PAGE_CHANGE_STREAM_DEFAULT = 'mediawiki.page_change.v1';

/** Revision fields that may carry suppressed data. */
const SUPPRESSIBLE_REVISION_FIELDS = ['rev_size', 'rev_sha1', 'comment', 'editor', 'content_slots'] as const;

const JOB_DEDUP_IGNORED_PARAMS = new Set(['rootJobTimestamp', 'rootJobSignature', 'requestId']);

export interface ResourceChangeOptions {
  /** Defaults to `resource_change`. */
  stream?: string;
  dt?: Timestamp;
}

/**
 * Builds one event per kind of wiki change. Takes plain records and does
 * no I/O. Default stream names go through the stream name mapper.
 */
export class EventFactory {
  private readonly entities: PageEntities;

  constructor(
    private readonly site: SiteSettings,
    private readonly serializer: EventSerializer = new EventSerializer(),
    private readonly streamNames: StreamNameMapper = new StreamNameMapper(),
  ) {
    this.entities = new PageEntities(serializer);
  }

  articleUrl(title: PageTitle | string): string {
    return articleUrl(this.site, title);
  }

  // ── Shared attribute blocks ────────────────────────────────────

  performerAttrs(user: UserRecord): EventAttributes {
    const attrs: EventAttributes = {
      user_text: user.name,
      user_groups: [...user.groups],
      user_is_bot: user.id !== 0 ? user.isBot : false,
    };
    if (user.id !== 0) attrs['user_id'] = user.id;
    if (user.editCount !== undefined && user.editCount !== null) {
      attrs['user_edit_count'] = user.editCount;
    }
    if (user.registration) {
      attrs['user_registration_dt'] = this.serializer.timestampToDt(user.registration);
    }
    return attrs;
  }

  private pageAttrs(pageId: number, title: PageTitle, isRedirect: boolean): EventAttributes {
    return {
      database: this.site.dbName,
      page_id: pageId,
      page_title: title.prefixedDbKey,
      page_namespace: title.namespace,
      page_is_redirect: isRedirect,
    };
  }

  /**
   * Revision entity attributes. Hidden performer and comment are left out,
   * and suppressed content reads as a non-redirect.
   */
  revisionAttrs(revision: RevisionRecord, performer?: UserRecord | null): EventAttributes {
    const content = loadContent(revision);
    const attrs: EventAttributes = {
      ...this.pageAttrs(revision.pageId, revision.title, content?.isRedirect ?? false),
      rev_id: revision.id,
      rev_timestamp: this.serializer.timestampToDt(revision.timestamp),
      rev_minor_edit: revision.minor,
    };

    if (revision.sha1 !== null) attrs['rev_sha1'] = revision.sha1;
    if (revision.size !== null) attrs['rev_len'] = revision.size;
    if (content) {
      attrs['rev_content_model'] = content.model;
      attrs['rev_content_format'] = content.format;
    }
    if (isPositiveId(revision.parentId)) attrs['rev_parent_id'] = revision.parentId;

    const visible = visibilityOf(revision.visibility);
    const who = performer ?? revision.performer;
    if (who && visible.user) attrs['performer'] = this.performerAttrs(who);
    if (visible.comment) setComment(attrs, revision.comment);

    return attrs;
  }

  private blockAttrs(block: BlockRecord): EventAttributes {
    const attrs: EventAttributes = {
      name: block.blocksName,
      email: block.blocksEmail,
      user_talk: block.blocksUserTalk,
      account_create: block.blocksAccountCreation,
    };
    if (block.expiry !== 'infinity') {
      attrs['expiry_dt'] = this.serializer.timestampToDt(block.expiry);
    }
    return attrs;
  }

  private event(
    schema: string,
    stream: string,
    uri: string,
    attrs: EventAttributes,
    context?: RequestContext,
    dt?: Timestamp,
  ): WikiEvent {
    return this.serializer.createEvent(schema, this.streamNames.resolve(stream), uri, attrs, {
      domain: this.site.domain,
      requestId: context?.requestId,
      dt,
    });
  }

  // ── Page events ────────────────────────────────────────────────

  createPageDeleteEvent(input: PageDeleteInput, context?: RequestContext): WikiEvent {
    const attrs: EventAttributes = {
      ...this.pageAttrs(input.pageId, input.title, input.isRedirect ?? false),
      performer: this.performerAttrs(input.performer),
    };
    setComment(attrs, input.reason);
    if (isPositiveId(input.latestRevisionId)) attrs['rev_id'] = input.latestRevisionId;
    if (input.archivedRevisionCount !== null) attrs['rev_count'] = input.archivedRevisionCount;

    return this.event(
      '/mediawiki/page/delete/1.0.0',
      'mediawiki.page-delete',
      this.articleUrl(input.title),
      attrs,
      context,
      input.timestamp,
    );
  }

  createPageUndeleteEvent(input: PageUndeleteInput, context?: RequestContext): WikiEvent {
    const attrs: EventAttributes = {
      ...this.pageAttrs(input.pageId, input.title, input.isRedirect ?? false),
      performer: this.performerAttrs(input.performer),
    };
    setComment(attrs, input.reason);
    if (isPositiveId(input.oldPageId) && input.oldPageId !== input.pageId) {
      attrs['prior_state'] = { page_id: input.oldPageId };
    }

    return this.event(
      '/mediawiki/page/undelete/1.0.0',
      'mediawiki.page-undelete',
      this.articleUrl(input.title),
      attrs,
      context,
      input.timestamp,
    );
  }

  createPageMoveEvent(input: PageMoveInput, context?: RequestContext): WikiEvent {
    const { revision, oldTitle, newTitle } = input;
    const content = loadContent(revision);

    const priorState: EventAttributes = {
      page_title: oldTitle.prefixedDbKey,
      page_namespace: oldTitle.namespace,
    };
    if (isPositiveId(revision.parentId)) priorState['rev_id'] = revision.parentId;

    const attrs: EventAttributes = {
      ...this.pageAttrs(revision.pageId, newTitle, content?.isRedirect ?? false),
      performer: this.performerAttrs(input.performer),
      rev_id: revision.id,
      prior_state: priorState,
    };

    if (input.redirect && isPositiveId(input.redirect.pageId)) {
      attrs['new_redirect_page'] = {
        page_id: input.redirect.pageId,
        page_title: oldTitle.prefixedDbKey,
        page_namespace: oldTitle.namespace,
        rev_id: input.redirect.revisionId,
      };
    }
    setComment(attrs, input.reason);

    return this.event(
      '/mediawiki/page/move/1.0.0',
      'mediawiki.page-move',
      this.articleUrl(newTitle),
      attrs,
      context,
      revision.timestamp,
    );
  }

  createPageCreateEvent(revision: RevisionRecord, context?: RequestContext): WikiEvent {
    return this.event(
      '/mediawiki/revision/create/1.0.0',
      'mediawiki.page-create',
      this.articleUrl(revision.title),
      this.revisionAttrs(revision),
      context,
      revision.timestamp,
    );
  }

  createPagePropertiesChangeEvent(input: PagePropertiesChangeInput, context?: RequestContext): WikiEvent {
    const attrs = this.pageStateAttrs(input);
    const encode = (props: PageProperties): Record<string, unknown> =>
      Object.fromEntries(Object.entries(props).map(([k, v]) => [k, replaceBinaryValue(v)]));

    if (input.addedProperties && Object.keys(input.addedProperties).length > 0) {
      attrs['added_properties'] = encode(input.addedProperties);
    }
    if (input.removedProperties && Object.keys(input.removedProperties).length > 0) {
      attrs['removed_properties'] = encode(input.removedProperties);
    }

    return this.event(
      '/mediawiki/page/properties-change/1.0.0',
      'mediawiki.page-properties-change',
      this.articleUrl(input.title),
      attrs,
      context,
    );
  }

  createPageLinksChangeEvent(input: PageLinksChangeInput, context?: RequestContext): WikiEvent {
    const attrs = this.pageStateAttrs(input);
    const linkData = (link: LinkTarget) => ({
      link: link.external
        ? link.target
        : this.site.articlePath.replace('$1', () => wikiUrlencode(link.target)),
      external: link.external,
    });

    if (input.addedLinks && input.addedLinks.length > 0) {
      attrs['added_links'] = input.addedLinks.map(linkData);
    }
    if (input.removedLinks && input.removedLinks.length > 0) {
      attrs['removed_links'] = input.removedLinks.map(linkData);
    }

    return this.event(
      '/mediawiki/page/links-change/1.0.0',
      'mediawiki.page-links-change',
      this.articleUrl(input.title),
      attrs,
      context,
    );
  }

  createPageRestrictionsChangeEvent(input: PageRestrictionsChangeInput, context?: RequestContext): WikiEvent {
    const attrs = this.pageStateAttrs(input);
    attrs['page_restrictions'] = Object.fromEntries(
      Object.entries(input.restrictions).map(([action, groups]) => [action, [...groups]]),
    );
    setComment(attrs, input.reason);

    return this.event(
      '/mediawiki/page/restrictions-change/1.0.0',
      'mediawiki.page-restrictions-change',
      this.articleUrl(input.title),
      attrs,
      context,
    );
  }

  private pageStateAttrs(input: PageStateInput): EventAttributes {
    const attrs: EventAttributes = {
      ...this.pageAttrs(input.pageId, input.title, input.isRedirect),
      rev_id: input.revisionId,
    };
    if (input.performer) attrs['performer'] = this.performerAttrs(input.performer);
    return attrs;
  }

  // ── Revision events ────────────────────────────────────────────

  createRevisionCreateEvent(
    revision: RevisionRecord,
    contentChanged: boolean,
    context?: RequestContext,
  ): WikiEvent {
    const attrs = this.revisionAttrs(revision);
    attrs['rev_content_changed'] = contentChanged;

    return this.event(
      '/mediawiki/revision/create/1.0.0',
      'mediawiki.revision-create',
      this.articleUrl(revision.title),
      attrs,
      context,
      revision.timestamp,
    );
  }

  createRevisionTagsChangeEvent(input: RevisionTagsChangeInput, context?: RequestContext): WikiEvent {
    const attrs = this.revisionAttrs(input.revision);
    if (input.performer) attrs['performer'] = this.performerAttrs(input.performer);
    attrs['tags'] = uniqueTags(input.prevTags, input.addedTags, input.removedTags);
    attrs['prior_state'] = { tags: [...input.prevTags] };

    return this.event(
      '/mediawiki/revision/tags-change/1.0.0',
      'mediawiki.revision-tags-change',
      this.articleUrl(input.revision.title),
      attrs,
      context,
    );
  }

  createRevisionVisibilityChangeEvent(input: RevisionVisibilityChangeInput, context?: RequestContext): WikiEvent {
    const attrs = this.revisionAttrs(input.revision, input.performer);
    attrs['visibility'] = visibilityOf(input.newBits);
    attrs['prior_state'] = { visibility: visibilityOf(input.oldBits) };

    return this.event(
      '/mediawiki/revision/visibility-change/1.0.0',
      'mediawiki.revision-visibility-change',
      this.articleUrl(input.revision.title),
      attrs,
      context,
    );
  }

  // ── User events ────────────────────────────────────────────────

  createUserBlockChangeEvent(input: UserBlockChangeInput, context?: RequestContext): WikiEvent {
    const { block } = input;
    const target = block.target;
    const attrs: EventAttributes = {
      database: this.site.dbName,
      user_text: target.name,
      user_groups: [...target.groups],
      blocks: this.blockAttrs(block),
      performer: this.performerAttrs(input.performer),
    };
    if (target.id !== 0) attrs['user_id'] = target.id;
    setComment(attrs, block.reason);
    if (input.priorBlock) {
      attrs['prior_state'] = { blocks: this.blockAttrs(input.priorBlock) };
    }

    return this.event(
      '/mediawiki/user/blocks-change/1.0.0',
      'mediawiki.user-blocks-change',
      userPageUrl(this.site, target.name),
      attrs,
      context,
      block.timestamp,
    );
  }

  // ── Resource and feed events ───────────────────────────────────

  createResourceChangeEvent(
    uri: string,
    tags: readonly string[],
    context?: RequestContext,
    options: ResourceChangeOptions = {},
  ): WikiEvent {
    return this.event(
      '/resource_change/1.0.0',
      options.stream ?? 'resource_change',
      uri,
      { tags: [...tags] },
      context,
      options.dt,
    );
  }

  /** Recent change feed entry, with every null attribute dropped. */
  createRecentChangeEvent(stream: string, rc: RecentChangeRecord, context?: RequestContext): WikiEvent {
    const attrs: EventAttributes = {
      id: rc.id,
      type: rc.type,
      namespace: rc.title.namespace,
      title: rc.titleText,
      title_url: this.articleUrl(rc.title),
      comment: rc.comment,
      timestamp: Math.floor(new Date(this.serializer.timestampToDt(rc.timestamp)).getTime() / 1000),
      user: rc.user,
      bot: rc.bot,
      minor: rc.minor ?? null,
      patrolled: rc.patrolled ?? null,
      length: rc.length ?? null,
      revision: rc.revision ?? null,
      log_id: rc.logId ?? null,
      log_type: rc.logType ?? null,
      log_action: rc.logAction ?? null,
      server_url: this.site.canonicalServer,
      server_name: this.site.domain,
      wiki: this.site.dbName,
    };
    const pruned = removeNulls(attrs);

    return this.event(
      '/mediawiki/recentchange/1.0.0',
      stream,
      this.articleUrl(rc.title),
      isRecord(pruned) ? pruned : {},
      context,
      rc.timestamp,
    );
  }

  // ── Campaign events ────────────────────────────────────────────

  private campaignSettingsAttrs(settings: CampaignSettings): EventAttributes {
    return {
      start_dt: this.serializer.timestampToDt(settings.start),
      end_dt: this.serializer.timestampToDt(settings.end),
      enabled: settings.enabled,
      archived: settings.archived,
      banners: [...settings.banners],
    };
  }

  /**
   * Campaign create, change or delete event. Null when a created or
   * modified campaign has no settings to report.
   */
  createCampaignEvent(change: CampaignChange, context?: RequestContext): WikiEvent | null {
    const attrs: EventAttributes = {
      database: this.site.dbName,
      performer: this.performerAttrs(change.performer),
      campaign_name: change.campaignName,
    };
    setComment(attrs, change.summary);

    let action: 'create' | 'change' | 'delete';
    switch (change.kind) {
      case 'created':
        if (!change.settings) return null;
        Object.assign(attrs, this.campaignSettingsAttrs(change.settings));
        action = 'create';
        break;
      case 'modified':
        if (!change.settings) return null;
        Object.assign(attrs, this.campaignSettingsAttrs(change.settings));
        attrs['prior_state'] = this.campaignSettingsAttrs(change.priorSettings);
        action = 'change';
        break;
      case 'removed':
        attrs['prior_state'] = this.campaignSettingsAttrs(change.priorSettings);
        action = 'delete';
        break;
      default: {
        const unreachable: never = change;
        throw new TypeError(`Unknown campaign change: ${JSON.stringify(unreachable)}`);
      }
    }

    return this.event(
      `/mediawiki/centralnotice/campaign/${action}/1.0.0`,
      `mediawiki.centralnotice.campaign-${action}`,
      change.campaignUrl,
      attrs,
      context,
      change.timestamp,
    );
  }

  // ── Page change events ─────────────────────────────────────────

  get pageChangeStream(): string {
    return this.streamNames.resolveKey(PAGE_CHANGE_STREAM_KEY, PAGE_CHANGE_STREAM_DEFAULT);
  }

  /**
   * Page state change in the changelog form: the page, its current
   * revision and, where it changed, the prior state.
   */
  createPageChangeEvent(change: PageChange, context?: RequestContext): WikiEvent {
    const { entities } = this;
    // Edits and moves happen at their revision's time; the rest at their log time, or now.
    const dt = change.kind === 'create' || change.kind === 'edit' || change.kind === 'move'
      ? change.revision.timestamp
      : change.timestamp;
    const page = entities.page(change.page, change.redirectTarget);
    const revision = entities.revision(change.revision);

    const attrs: EventAttributes = {
      changelog_kind: CHANGELOG_KIND[change.kind],
      page_change_kind: change.kind,
      dt: this.serializer.timestampToDt(dt),
      wiki_id: this.site.dbName,
      page,
    };
    if (change.performer) attrs['performer'] = entities.user(change.performer);
    if ('reason' in change) attrs['comment'] = change.reason;
    attrs['revision'] = revision;

    switch (change.kind) {
      case 'create':
        break;
      case 'edit':
        if (change.parentRevision) {
          attrs['prior_state'] = { revision: entities.revision(change.parentRevision) };
        }
        break;
      case 'move':
        if (change.createdRedirectPage) {
          attrs['created_redirect_page'] = entities.page(change.createdRedirectPage);
        }
        attrs['prior_state'] = {
          page: { page_title: change.oldTitle.prefixedDbKey },
          revision: entities.revision(change.parentRevision),
        };
        break;
      case 'delete':
        if (change.archivedRevisionCount !== undefined && change.archivedRevisionCount !== null) {
          page['revision_count'] = change.archivedRevisionCount;
        }
        if (change.suppressed) {
          for (const field of SUPPRESSIBLE_REVISION_FIELDS) delete revision[field];
          Object.assign(revision, visibilityAttrs(SUPPRESSED_ALL));
          attrs['prior_state'] = { revision: visibilityAttrs(change.revision.visibility) };
        }
        break;
      case 'undelete':
        if (isPositiveId(change.oldPageId) && change.oldPageId !== change.page.pageId) {
          attrs['prior_state'] = { page: { page_id: change.oldPageId } };
        }
        break;
      case 'visibility_change': {
        // Only the visibility fields that changed.
        const prior: EventAttributes = {};
        for (const [key, value] of Object.entries(visibilityAttrs(change.priorVisibility))) {
          if (revision[key] !== value) prior[key] = value;
        }
        attrs['prior_state'] = { revision: prior };
        break;
      }
      default: {
        const unreachable: never = change;
        throw new TypeError(`Unknown page change: ${JSON.stringify(unreachable)}`);
      }
    }

    return this.serializer.createEvent(
      '/mediawiki/page/change/1.0.0',
      this.pageChangeStream,
      this.articleUrl(change.page.title),
      attrs,
      { domain: this.site.domain, requestId: context?.requestId, dt },
    );
  }

  // ── Job events ─────────────────────────────────────────────────

  /** Hash identifying duplicate jobs: type, title and params minus root-job bookkeeping. */
  jobDeduplicationSha1(job: JobSpecification): string {
    const params = Object.fromEntries(
      Object.entries(job.params).filter(([key]) => !JOB_DEDUP_IGNORED_PARAMS.has(key)),
    );
    const info = {
      type: job.type,
      namespace: job.title.namespace,
      title: job.title.prefixedDbKey,
      params: replaceBinaryValuesRecursive(params),
    };
    return createHash('sha1').update(JSON.stringify(info), 'utf8').digest('hex');
  }

  /**
   * Unsigned job event. `meta.request_id` comes from `params.requestId`
   * when the job carries one.
   */
  createJobEvent(job: JobSpecification, context?: RequestContext): WikiEvent {
    const attrs: EventAttributes = {
      database: this.site.dbName,
      type: job.type,
      page_namespace: job.title.namespace,
      page_title: job.title.prefixedDbKey,
    };

    if (job.releaseTimestamp !== undefined && job.releaseTimestamp !== null) {
      attrs['delay_until'] = this.serializer.timestampToDt(job.releaseTimestamp);
    }
    if (job.ignoreDuplicates) {
      attrs['sha1'] = this.jobDeduplicationSha1(job);
    }

    const { rootJobTimestamp, rootJobSignature, requestId } = job.params;
    if (
      (typeof rootJobTimestamp === 'string' || typeof rootJobTimestamp === 'number')
      && typeof rootJobSignature === 'string'
    ) {
      attrs['root_event'] = {
        signature: rootJobSignature,
        dt: this.serializer.timestampToDt(rootJobTimestamp),
      };
    }
    attrs['params'] = replaceBinaryValuesRecursive(job.params);

    return this.serializer.createEvent(
      '/mediawiki/job/1.0.0',
      this.streamNames.resolve(`mediawiki.job.${job.type}`),
      this.articleUrl(job.title),
      attrs,
      {
        domain: this.site.domain,
        requestId: typeof requestId === 'string' ? requestId : context?.requestId,
      },
    );
  }
}
