import type { PageTitle, RevisionRecord, UserRecord } from './entities.js';

/** A page as it is after the change. */
export interface PageState {
  readonly pageId: number;
  readonly title: PageTitle;
  readonly isRedirect: boolean;
}

/**
 * Where a redirect page points. `page` is set when the target is a page on
 * this wiki and left out for interwiki and special page targets.
 */
export interface RedirectTarget {
  readonly link: PageTitle & { readonly interwiki?: string };
  readonly page?: PageState | null;
}

interface PageChangeBase {
  readonly page: PageState;
  /** Null when the performer is hidden, e.g. by a suppressing delete. */
  readonly performer: UserRecord | null;
  /** Current revision of the page. */
  readonly revision: RevisionRecord;
  readonly redirectTarget?: RedirectTarget | null;
}

export interface PageCreated extends PageChangeBase {
  readonly kind: 'create';
}

export interface PageEdited extends PageChangeBase {
  readonly kind: 'edit';
  readonly parentRevision?: RevisionRecord | null;
}

export interface PageMoved extends PageChangeBase {
  readonly kind: 'move';
  /** Revision before the one the move created. */
  readonly parentRevision: RevisionRecord;
  readonly oldTitle: PageTitle;
  readonly reason: string;
  readonly createdRedirectPage?: PageState | null;
}

export interface PageDeleted extends PageChangeBase {
  readonly kind: 'delete';
  readonly reason: string;
  /** Wiki timestamp of the log entry. Defaults to now. */
  readonly timestamp?: string;
  readonly archivedRevisionCount?: number | null;
  /** True when the delete also hides the page from other admins. */
  readonly suppressed?: boolean;
}

export interface PageUndeleted extends PageChangeBase {
  readonly kind: 'undelete';
  readonly reason: string;
  readonly timestamp?: string;
  /** Page id the page had while it was archived. */
  readonly oldPageId?: number | null;
}

export interface PageVisibilityChanged extends PageChangeBase {
  readonly kind: 'visibility_change';
  /** Visibility bits of the revision before the change. */
  readonly priorVisibility: number;
  readonly timestamp?: string;
}

export type PageChange =
  | PageCreated
  | PageEdited
  | PageMoved
  | PageDeleted
  | PageUndeleted
  | PageVisibilityChanged;

export type PageChangeKind = PageChange['kind'];

/** How each kind of page change reads in a changelog. */
export const CHANGELOG_KIND = {
  create: 'insert',
  edit: 'update',
  move: 'update',
  visibility_change: 'update',
  delete: 'delete',
  undelete: 'insert',
} as const satisfies Record<PageChangeKind, 'insert' | 'update' | 'delete'>;
