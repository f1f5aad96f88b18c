import type { RequestContext } from './event.js';
import type { PageTitle } from './entities.js';

export type JobParams = Record<string, unknown>;

/**
 * Serializable description of a job, as pushed to the queue.
 */
export interface JobSpecification {
  readonly type: string;
  readonly params: JobParams;
  /** Page the job concerns. */
  readonly title: PageTitle;
  /** When true, queued duplicates (same type and dedup params) collapse. */
  readonly ignoreDuplicates?: boolean;
  /** Unix time in seconds. */
  readonly releaseTimestamp?: number | null;
}

/** What a running job may touch besides its own params. */
export interface JobRunContext {
  readonly request: RequestContext;
  /** Queue for work the job wants to run after it has finished. */
  defer(name: string, fn: () => Promise<void> | void): void;
}

/**
 * A runnable job. `run` resolves to `true` on success and `false` on a
 * handled failure, in which case `lastError` explains it.
 */
export interface Job {
  readonly type: string;
  readonly params: JobParams;
  readonly allowRetries: boolean;
  readonly lastError: string | null;
  run(context: JobRunContext): Promise<unknown>;
  teardown?(status: boolean): Promise<void> | void;
}

/** Builds a job from its type and params. Throws when it cannot. */
export type JobConstructor = (params: JobParams) => Job;

/** Thrown by job code when the wiki database refuses writes. */
export class ReadOnlyError extends Error {
  constructor(message = 'Database is in read-only mode') {
    super(message);
    this.name = 'ReadOnlyError';
  }
}

export class UnknownJobTypeError extends Error {
  constructor(readonly jobType: string) {
    super(`Invalid job command '${jobType}'`);
    this.name = 'UnknownJobTypeError';
  }
}
