import type { Logger } from 'pino';
import {
  EventType,
  JobQueueError,
  type JobSpecification,
  type RequestContext,
  type WikiEvent,
} from '../domain/index.js';
import type { EventFactory } from './event-factory.js';
import type { EventBusProvider } from './ports.js';
import { signJobEvent } from './signature.js';

function dedupKey(event: WikiEvent): string {
  const sha1 = event['sha1'];
  return typeof sha1 === 'string' ? `sha1:${sha1}` : `id:${event.meta.id}`;
}

/**
 * Job queue that hands every pushed job to the event intake service as a
 * signed job event. Scheduling and execution happen elsewhere.
 */
export class EventBusJobQueue {
  constructor(
    private readonly events: EventFactory,
    private readonly buses: EventBusProvider,
    private readonly secretKey: string,
    private readonly log: Logger,
  ) {}

  /** Signed job event, or null when the job cannot be serialized. */
  createJobEvent(job: JobSpecification, context?: RequestContext): WikiEvent | null {
    return signJobEvent(this.events.createJobEvent(job, context), this.secretKey, this.log);
  }

  /**
   * Sends the jobs, collapsing duplicates. Resolves to the number of job
   * events handed over; throws `JobQueueError` when a destination did not
   * take them.
   */
  async push(jobs: readonly JobSpecification[], context: RequestContext): Promise<number> {
    // Later duplicates replace earlier ones but keep their position.
    const unique = new Map<string, WikiEvent>();
    for (const job of jobs) {
      let event: WikiEvent | null;
      try {
        event = this.createJobEvent(job, context);
      } catch (err: unknown) {
        this.log.warn({ err, job_type: job.type }, 'Dropping job that could not be turned into an event');
        continue;
      }
      if (event === null) {
        this.log.warn({ job_type: job.type }, 'Dropping job that could not be serialized');
        continue;
      }
      unique.set(dedupKey(event), event);
    }
    if (unique.size === 0) return 0;

    const byService = new Map<string, WikiEvent[]>();
    for (const event of unique.values()) {
      const service = this.buses.getEventServiceNameForStream(event.meta.stream);
      const list = byService.get(service);
      if (list) list.push(event);
      else byService.set(service, [event]);
    }

    const errors: string[] = [];
    for (const [service, events] of byService) {
      const result = await this.buses.getInstance(service).send(events, EventType.JOB, context);
      if (result.status === 'failed') {
        errors.push(...result.errors);
      } else if (result.status === 'skipped' && result.reason === 'serialization-failed') {
        errors.push(`Could not serialize jobs for ${service}`);
      }
    }

    if (errors.length > 0) {
      throw new JobQueueError(`Could not enqueue jobs: ${errors.join('; ')}`, errors);
    }
    return unique.size;
  }
}
