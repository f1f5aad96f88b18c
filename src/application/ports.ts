import type { RequestContext, SendableEventType, WikiEvent } from '../domain/index.js';

export type SkipReason = 'type-not-allowed' | 'empty' | 'serialization-failed';

/**
 * Outcome of one `send`. Delivery failures are reported here and logged,
 * never thrown.
 */
export type SendResult =
  | { status: 'sent' }
  | { status: 'skipped'; reason: SkipReason }
  | { status: 'failed'; errors: string[] };

/** One event intake destination. */
export interface EventSink {
  send(
    events: readonly WikiEvent[] | string,
    type?: SendableEventType,
    context?: RequestContext,
  ): Promise<SendResult>;
}

/** Resolves stream and service names to destinations. */
export interface EventBusProvider {
  getEventServiceNameForStream(stream: string): string;
  getInstance(serviceName: string): EventSink;
}
