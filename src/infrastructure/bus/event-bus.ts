import { Buffer } from 'node:buffer';
import type { Logger } from 'pino';
import {
  EventType,
  allowsEventType,
  type RequestContext,
  type SendableEventType,
  type WikiEvent,
} from '../../domain/index.js';
import {
  partitionEvents,
  summarizeEventsForLog,
  validateJsonSerializable,
  type EventBatch,
} from '../../application/json-events.js';
import type { EventSink, SendResult } from '../../application/ports.js';
import type { HttpResponse, HttpTransport } from '../http/index.js';

export interface EventBusOptions {
  url: string;
  /** Seconds. */
  timeout: number;
  maxBatchByteSize: number;
  /** Bit mask of `EventType` values this destination accepts. */
  allowedTypes: number;
  forwardXClientIP: boolean;
}

function parseBody(body: string): unknown[] {
  try {
    const parsed: unknown = JSON.parse(body);
    return Array.isArray(parsed) ? parsed : [parsed];
  } catch {
    return [body];
  }
}

/**
 * Delivery client for one event intake endpoint.
 *
 * `send` never throws: delivery problems are logged and reported in the
 * returned `SendResult`. There are no retries.
 */
export class EventBus implements EventSink {
  constructor(
    readonly options: EventBusOptions,
    private readonly transport: HttpTransport,
    private readonly log: Logger,
  ) {}

  get url(): string {
    return this.options.url;
  }

  async send(
    events: readonly WikiEvent[] | string,
    type: SendableEventType = EventType.EVENT,
    context?: RequestContext,
  ): Promise<SendResult> {
    if (!allowsEventType(this.options.allowedTypes, type)) {
      return { status: 'skipped', reason: 'type-not-allowed' };
    }

    if (events.length === 0) {
      this.log.error('Must call send with at least 1 event. Aborting send.');
      return { status: 'skipped', reason: 'empty' };
    }

    const batches = this.toBatches(events);
    if (batches === null) {
      return { status: 'skipped', reason: 'serialization-failed' };
    }

    const errors: string[] = [];
    for (const batch of batches) {
      const error = await this.post(batch, context);
      if (error !== null) errors.push(error);
    }

    return errors.length === 0 ? { status: 'sent' } : { status: 'failed', errors };
  }

  private toBatches(events: readonly WikiEvent[] | string): EventBatch[] | null {
    const max = this.options.maxBatchByteSize;

    if (typeof events === 'string') {
      if (Buffer.byteLength(events, 'utf8') <= max) {
        return [{ body: events, events: [] }];
      }
      const parsed = parseBody(events);
      // Not a JSON array: the caller's body is sent as it is.
      if (parsed.length === 1 && parsed[0] === events) {
        return [{ body: events, events: [] }];
      }
      return partitionEvents(parsed, max, this.log);
    }

    validateJsonSerializable(events, this.log);
    return partitionEvents(events, max, this.log);
  }

  /** Returns the failure message, or null on 201. */
  private async post(batch: EventBatch, context?: RequestContext): Promise<string | null> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.options.forwardXClientIP && context?.clientIp) {
      headers['x-client-ip'] = context.clientIp;
    }

    let response: HttpResponse;
    try {
      response = await this.transport.post({
        url: this.options.url,
        body: batch.body,
        headers,
        timeout: this.options.timeout,
      });
    } catch (err: unknown) {
      response = {
        code: 0,
        reason: '',
        body: '',
        error: err instanceof Error ? err.message : String(err),
      };
    }

    // 201: all accepted. 207: some accepted. 400: none accepted.
    if (response.code === 201) return null;

    const message = response.error ? response.error : `${response.code}: ${response.reason}`;
    const events = batch.events.length > 0 ? batch.events : parseBody(batch.body);
    this.log.error(
      {
        url: this.options.url,
        events: summarizeEventsForLog(events, Buffer.byteLength(batch.body, 'utf8')),
        service_response: response,
      },
      `Unable to deliver all events: ${message}`,
    );
    return message;
  }
}
