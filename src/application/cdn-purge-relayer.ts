import type { Logger } from 'pino';
import { EventBusConfigError, EventType, type RequestContext } from '../domain/index.js';
import type { Timestamp } from './event-serializer.js';
import type { EventFactory } from './event-factory.js';
import type { EventBusProvider } from './ports.js';

export const CDN_PURGE_CHANNEL = 'cdn-url-purges';

export interface CdnPurge {
  url: string;
  /** When the purge was requested. Defaults to now. */
  timestamp?: Timestamp;
}

/**
 * Relays CDN purge requests as `resource_change` events on a dedicated
 * stream, sent with the purge event type.
 */
export class CdnPurgeRelayer {
  private readonly stream: string;

  constructor(
    private readonly events: EventFactory,
    private readonly buses: EventBusProvider,
    stream: string | null,
    private readonly log: Logger,
  ) {
    if (!stream) {
      throw new EventBusConfigError('CdnPurgeRelayer requires a stream to be configured');
    }
    this.stream = stream;
  }

  /** Resolves to true when every purge was accepted (or there were none). */
  async notify(channel: string, purges: readonly CdnPurge[], context?: RequestContext): Promise<boolean> {
    if (channel !== CDN_PURGE_CHANNEL) {
      throw new RangeError(`CdnPurgeRelayer only relays the '${CDN_PURGE_CHANNEL}' channel, got '${channel}'`);
    }
    if (purges.length === 0) return true;

    const events = purges.map((purge) =>
      this.events.createResourceChangeEvent(purge.url, ['mediawiki'], context, {
        stream: this.stream,
        dt: purge.timestamp,
      }),
    );

    const bus = this.buses.getInstance(this.buses.getEventServiceNameForStream(this.stream));
    const result = await bus.send(events, EventType.PURGE, context);
    if (result.status !== 'sent') {
      this.log.warn({ stream: this.stream, purges: purges.length, result }, 'CDN purges were not relayed');
      return false;
    }
    return true;
  }
}
