import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import { ReadOnlyError, type Job, type RequestContext } from '../domain/index.js';
import { DeferredUpdateQueue } from './deferred-updates.js';

export interface JobExecutionResult {
  status: boolean;
  readonly: boolean;
  error: string | null;
  timeMs: number;
}

/**
 * Runs one job to completion.
 *
 * Errors are caught and reported in the result; teardown is always
 * attempted. A job that does not allow retries reports `status: true`
 * even when it failed, so the caller does not retry it endlessly. Its
 * `error` still says what went wrong.
 */
export class JobExecutor {
  constructor(
    private readonly log: Logger,
    private readonly now: () => number = () => performance.now(),
  ) {}

  async execute(job: Job, context: RequestContext): Promise<JobExecutionResult> {
    const startedAt = this.now();
    const jobLog = this.log.child({ job_type: job.type, request_id: context.requestId });
    const updates = new DeferredUpdateQueue(jobLog, context);

    let status = false;
    let readonly = false;
    let error: string | null = null;

    try {
      const result = await job.run({
        request: context,
        defer: (name, fn) => updates.addCallable(name, fn),
      });

      if (result === false) {
        error = job.lastError ?? 'Job returned false';
        jobLog.error({ job_error: error }, 'Failed executing job');
      } else {
        if (result !== true) {
          jobLog.warn({ result_type: typeof result }, 'Job returned a non-boolean result, treating it as success');
        }
        status = true;
        await updates.run();
      }
    } catch (err: unknown) {
      if (err instanceof ReadOnlyError) {
        readonly = true;
        error = 'Database is in read-only mode';
      } else {
        error = err instanceof Error ? err.message : String(err);
      }
      jobLog.error({ err }, 'Failed executing job');
    }

    try {
      await job.teardown?.(status);
    } catch (err: unknown) {
      jobLog.error({ err }, 'Job teardown failed');
    }

    const timeMs = Math.round(this.now() - startedAt);
    jobLog.info({ job_status: status, job_duration: timeMs }, 'Finished job execution');

    if (!status && !job.allowRetries) {
      status = true;
    }

    return { status, readonly, error, timeMs };
  }
}
