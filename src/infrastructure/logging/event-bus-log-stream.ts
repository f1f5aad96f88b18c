import type { DestinationStream } from 'pino';
import type { RequestContext, WikiEvent } from '../../domain/index.js';
import { isRecord, replaceBinaryValuesRecursive } from '../../application/json-events.js';
import type { EventSink, SendResult } from '../../application/ports.js';

/** Keys pino adds to every record. */
const PINO_KEYS = ['level', 'time', 'pid', 'hostname', 'msg'] as const;

function isWikiEvent(value: unknown): value is WikiEvent {
  if (!isRecord(value) || typeof value['$schema'] !== 'string') return false;
  const meta = value['meta'];
  return isRecord(meta) && typeof meta['stream'] === 'string';
}

/**
 * pino destination that forwards log records carrying a complete event
 * (a `$schema` and a `meta` block) to an event service.
 *
 * Records are buffered and handed to a sink together on `flush`. The
 * `private` key and pino's own keys are stripped first.
 */
export class EventBusLogStream implements DestinationStream {
  private buffered: WikiEvent[] = [];

  get pending(): number {
    return this.buffered.length;
  }

  write(line: string): void {
    let record: unknown;
    try {
      record = JSON.parse(line);
    } catch {
      return;
    }
    if (!isRecord(record)) return;

    const event: Record<string, unknown> = { ...record };
    for (const key of PINO_KEYS) delete event[key];
    delete event['private'];

    const cleaned = replaceBinaryValuesRecursive(event);
    if (isWikiEvent(cleaned)) this.buffered.push(cleaned);
  }

  async flush(sink: EventSink, context?: RequestContext): Promise<SendResult | null> {
    if (this.buffered.length === 0) return null;
    const events = this.buffered;
    this.buffered = [];
    return sink.send(events, undefined, context);
  }
}
