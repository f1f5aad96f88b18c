import type {
  EventAttributes,
  PageState,
  RedirectTarget,
  RevisionRecord,
  RevisionSlot,
  UserRecord,
} from '../domain/index.js';
import { RevisionDeleted } from '../domain/index.js';
import type { EventSerializer } from './event-serializer.js';

/** Format assumed for a slot that recorded none. */
const DEFAULT_CONTENT_FORMATS: Readonly<Record<string, string>> = {
  wikitext: 'text/x-wiki',
  text: 'text/plain',
  css: 'text/css',
  javascript: 'text/javascript',
  json: 'application/json',
};

/** Every part of the revision hidden. */
export const SUPPRESSED_ALL = RevisionDeleted.TEXT
  | RevisionDeleted.COMMENT
  | RevisionDeleted.USER
  | RevisionDeleted.RESTRICTED;

export type VisibilityAttrs = {
  is_content_visible: boolean;
  is_editor_visible: boolean;
  is_comment_visible: boolean;
};

export function visibilityAttrs(bits: number): VisibilityAttrs {
  return {
    is_content_visible: (bits & RevisionDeleted.TEXT) === 0,
    is_editor_visible: (bits & RevisionDeleted.USER) === 0,
    is_comment_visible: (bits & RevisionDeleted.COMMENT) === 0,
  };
}

/**
 * Page, user, revision and slot entities as nested in page change events.
 */
export class PageEntities {
  constructor(private readonly serializer: EventSerializer) {}

  page(page: PageState, redirectTarget?: RedirectTarget | null): EventAttributes {
    const attrs: EventAttributes = {
      page_id: page.pageId,
      page_title: page.title.prefixedDbKey,
      namespace_id: page.title.namespace,
      is_redirect: page.isRedirect,
    };
    if (page.isRedirect && redirectTarget) {
      attrs['redirect_page_link'] = this.redirectLink(redirectTarget);
    }
    return attrs;
  }

  private redirectLink(target: RedirectTarget): EventAttributes {
    const { link, page } = target;
    const attrs: EventAttributes = {
      page_title: link.prefixedDbKey,
      namespace_id: link.namespace,
    };
    if (link.interwiki) attrs['interwiki_prefix'] = link.interwiki;
    if (page) {
      attrs['page_id'] = page.pageId;
      attrs['is_redirect'] = page.isRedirect;
    }
    return attrs;
  }

  user(user: UserRecord): EventAttributes {
    const registered = user.id !== 0;
    const attrs: EventAttributes = {
      user_text: user.name,
      groups: [...user.groups],
      is_bot: registered && user.isBot,
      is_registered: registered,
      is_system: user.isSystem ?? false,
      is_temp: user.isTemp ?? false,
    };
    if (registered) attrs['user_id'] = user.id;
    if (user.registration) {
      attrs['registration_dt'] = this.serializer.timestampToDt(user.registration);
    }
    if (registered && user.editCount !== undefined && user.editCount !== null) {
      attrs['edit_count'] = user.editCount;
    }
    return attrs;
  }

  /**
   * Hidden editor and comment are left out. An empty comment is kept, so it
   * reads differently from a hidden one.
   */
  revision(revision: RevisionRecord): EventAttributes {
    const visible = visibilityAttrs(revision.visibility);
    const attrs: EventAttributes = {
      rev_id: revision.id,
      rev_dt: this.serializer.timestampToDt(revision.timestamp),
      is_minor_edit: revision.minor,
    };
    if (revision.sha1 !== null) attrs['rev_sha1'] = revision.sha1;
    if (revision.size !== null) attrs['rev_size'] = revision.size;
    if (revision.parentId !== null && revision.parentId > 0) {
      attrs['rev_parent_id'] = revision.parentId;
    }
    if (visible.is_comment_visible && revision.comment !== null) {
      attrs['comment'] = revision.comment;
    }
    if (visible.is_editor_visible && revision.performer) {
      attrs['editor'] = this.user(revision.performer);
    }
    Object.assign(attrs, visible);

    const slots = revision.slots ?? [];
    if (slots.length > 0) {
      attrs['content_slots'] = Object.fromEntries(slots.map((slot) => [slot.role, this.slot(slot)]));
    }
    return attrs;
  }

  slot(slot: RevisionSlot): EventAttributes {
    const attrs: EventAttributes = {
      slot_role: slot.role,
      content_model: slot.model,
      content_sha1: slot.sha1,
      content_size: slot.size,
    };
    const format = slot.format ?? DEFAULT_CONTENT_FORMATS[slot.model];
    if (format !== undefined) attrs['content_format'] = format;
    if (slot.originRevisionId !== undefined && slot.originRevisionId !== null) {
      attrs['origin_rev_id'] = slot.originRevisionId;
    }
    return attrs;
  }
}
