/**
 * Plain data records describing wiki entities.
 *
 * The event builder receives these from its host instead of reaching into
 * a page/revision/user model. They carry no framework dependencies.
 */

/** Raised by a revision when its content is hidden from the current audience. */
export class SuppressedDataError extends Error {
  constructor(message = 'Revision data is suppressed') {
    super(message);
    this.name = 'SuppressedDataError';
  }
}

export interface PageTitle {
  readonly namespace: number;
  /** Namespace prefix plus db key, e.g. `Talk:Main_Page`. */
  readonly prefixedDbKey: string;
}

export interface UserRecord {
  /** 0 for anonymous users. */
  readonly id: number;
  readonly name: string;
  readonly groups: readonly string[];
  readonly isBot: boolean;
  readonly editCount?: number | null;
  /** Wiki timestamp of the registration, when known. */
  readonly registration?: string | null;
  /** Maintenance account acting on behalf of the software. */
  readonly isSystem?: boolean;
  /** Temporary account created for a logged-out editor. */
  readonly isTemp?: boolean;
}

export interface RevisionContent {
  readonly model: string;
  readonly format: string;
  readonly isRedirect: boolean;
}

/** Content metadata of one slot of a revision. No content body. */
export interface RevisionSlot {
  /** `main` for the primary slot. */
  readonly role: string;
  readonly model: string;
  /** Null when the slot did not record one; the model's default applies. */
  readonly format: string | null;
  readonly sha1: string;
  readonly size: number;
  /** Revision that introduced this slot content, when known. */
  readonly originRevisionId?: number | null;
}

/** Revision deletion bits. */
export const RevisionDeleted = {
  TEXT: 1,
  COMMENT: 2,
  USER: 4,
  RESTRICTED: 8,
} as const;

export interface RevisionRecord {
  readonly id: number;
  readonly pageId: number;
  readonly title: PageTitle;
  readonly parentId: number | null;
  /** Wiki timestamp (`YYYYMMDDHHMMSS`) or ISO-8601. */
  readonly timestamp: string;
  readonly performer: UserRecord | null;
  readonly comment: string | null;
  readonly minor: boolean;
  readonly size: number | null;
  readonly sha1: string | null;
  /** Bit field of `RevisionDeleted` flags. */
  readonly visibility: number;
  readonly slots?: readonly RevisionSlot[];
  /**
   * Loads the main slot content. Returns null when the revision has none,
   * throws `SuppressedDataError` when it is hidden.
   */
  content(): RevisionContent | null;
}

export interface BlockRecord {
  readonly target: UserRecord;
  readonly blocksName: boolean;
  readonly blocksEmail: boolean;
  readonly blocksUserTalk: boolean;
  readonly blocksAccountCreation: boolean;
  /** Wiki timestamp, or `infinity`. */
  readonly expiry: string;
  readonly reason: string | null;
  readonly timestamp: string;
}

export interface LinkTarget {
  /** Internal page link (prefixed db key) or external URL. */
  readonly target: string;
  readonly external: boolean;
}

export type PageProperties = Record<string, string | Uint8Array>;
