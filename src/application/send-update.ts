import {
  EventType,
  type RequestContext,
  type SendableEventType,
  type WikiEvent,
} from '../domain/index.js';
import type { MergeableUpdate } from './deferred-updates.js';
import type { EventBusProvider, SendResult } from './ports.js';

/**
 * Collects events per event service during one unit of work and sends
 * each service's list once.
 *
 * Instances of the same event type merge, so every producer can create
 * its own update and the queue still flushes one POST per service.
 */
export class EventBusSendUpdate implements MergeableUpdate {
  readonly name = 'EventBusSendUpdate';
  private readonly events = new Map<string, WikiEvent[]>();

  constructor(
    private readonly provider: EventBusProvider,
    serviceName: string,
    events: readonly WikiEvent[],
    readonly type: SendableEventType = EventType.EVENT,
  ) {
    this.add(serviceName, events);
  }

  static forStream(
    provider: EventBusProvider,
    stream: string,
    events: readonly WikiEvent[],
    type: SendableEventType = EventType.EVENT,
  ): EventBusSendUpdate {
    return new EventBusSendUpdate(provider, provider.getEventServiceNameForStream(stream), events, type);
  }

  get mergeKey(): string {
    return `eventbus-send:${this.type}`;
  }

  /** Read-only view of the queued events per service. */
  get pending(): ReadonlyMap<string, readonly WikiEvent[]> {
    return this.events;
  }

  add(serviceName: string, events: readonly WikiEvent[]): this {
    if (!Array.isArray(events) || events.some((event) => Array.isArray(event))) {
      throw new TypeError('EventBusSendUpdate events must be a flat list of events');
    }
    const list = this.events.get(serviceName);
    if (list) {
      list.push(...events);
    } else {
      this.events.set(serviceName, [...events]);
    }
    return this;
  }

  /** Appends `other`'s lists after this update's, per service. */
  merge(other: MergeableUpdate): this {
    if (!(other instanceof EventBusSendUpdate) || other.type !== this.type) {
      throw new TypeError(`Cannot merge ${other.mergeKey} into ${this.mergeKey}`);
    }
    for (const [serviceName, events] of other.events) {
      this.add(serviceName, events);
    }
    return this;
  }

  /**
   * Sends every non-empty list once and forgets all queued events.
   * A service that is not configured throws before anything is sent.
   */
  async doUpdate(context: RequestContext): Promise<Map<string, SendResult>> {
    const batches = [...this.events].filter(([, events]) => events.length > 0);
    this.events.clear();

    const targets = batches.map(([serviceName, events]) => ({
      serviceName,
      events,
      bus: this.provider.getInstance(serviceName),
    }));

    const results = new Map<string, SendResult>();
    for (const { serviceName, events, bus } of targets) {
      results.set(serviceName, await bus.send(events, this.type, context));
    }
    return results;
  }
}
