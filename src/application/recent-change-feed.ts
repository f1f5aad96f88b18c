import type { Logger } from 'pino';
import { EventType } from '../domain/index.js';
import type { DeferredUpdateQueue } from './deferred-updates.js';
import type { EventFactory, RecentChangeRecord } from './event-factory.js';
import { serializeEvents } from './json-events.js';
import type { EventBusProvider } from './ports.js';

/**
 * Recent changes feed: each change is formatted to a pre-serialized
 * one-event batch and sent after the unit of work.
 */
export class RecentChangeFeed {
  constructor(
    private readonly events: EventFactory,
    private readonly buses: EventBusProvider,
    private readonly stream: string,
    private readonly log: Logger,
  ) {}

  format(rc: RecentChangeRecord, queue?: DeferredUpdateQueue): string | null {
    const event = this.events.createRecentChangeEvent(this.stream, rc, queue?.context);
    return serializeEvents([event], this.log);
  }

  send(queue: DeferredUpdateQueue, line: string): void {
    const service = this.buses.getEventServiceNameForStream(this.stream);
    queue.addCallable('RecentChangeFeed', async () => {
      await this.buses.getInstance(service).send(line, EventType.EVENT, queue.context);
    });
  }

  /** Formats and queues a change. False when it could not be formatted. */
  notify(queue: DeferredUpdateQueue, rc: RecentChangeRecord): boolean {
    const line = this.format(rc, queue);
    if (line === null) return false;
    this.send(queue, line);
    return true;
  }
}
