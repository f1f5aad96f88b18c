import { randomUUID } from 'node:crypto';
import type { EventAttributes, EventMeta, WikiEvent } from '../domain/index.js';

export type Timestamp = string | number | Date;

export interface EventSerializerOptions {
  generateId?: () => string;
  /** Request id for events built outside a request. Defaults to a UUID. */
  generateRequestId?: () => string;
  now?: () => Date;
}

export interface CreateEventOptions {
  domain?: string;
  /** Event time. Defaults to now. */
  dt?: Timestamp;
  /** Generated when absent. */
  requestId?: string;
}

const WIKI_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;

/**
 * Converts a wiki timestamp (`YYYYMMDDHHMMSS`), a Unix time in seconds,
 * a Date or an ISO-8601 string to ISO-8601 without milliseconds.
 */
export function timestampToDt(ts: Timestamp): string {
  let date: Date;
  if (ts instanceof Date) {
    date = ts;
  } else if (typeof ts === 'number') {
    date = new Date(ts * 1000);
  } else {
    const m = WIKI_TIMESTAMP.exec(ts);
    date = m
      ? new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]), Number(m[4]), Number(m[5]), Number(m[6])))
      : new Date(ts);
  }
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Invalid timestamp: ${String(ts)}`);
  }
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Builds the event envelope: `$schema` plus a `meta` block over the
 * caller's attributes. Never mutates `attrs`.
 */
export class EventSerializer {
  private readonly generateId: () => string;
  private readonly generateRequestId: () => string;
  private readonly now: () => Date;

  constructor(options: EventSerializerOptions = {}) {
    this.generateId = options.generateId ?? randomUUID;
    this.generateRequestId = options.generateRequestId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  createEvent(
    schema: string,
    stream: string,
    uri: string,
    attrs: EventAttributes,
    options: CreateEventOptions = {},
  ): WikiEvent {
    return {
      ...attrs,
      $schema: schema,
      meta: this.createMeta(stream, uri, options),
    };
  }

  createMeta(stream: string, uri: string, options: CreateEventOptions = {}): EventMeta {
    const meta: EventMeta = {
      uri,
      stream,
      id: this.generateId(),
      dt: this.timestampToDt(options.dt),
    };
    if (options.domain !== undefined) meta.domain = options.domain;
    meta.request_id = options.requestId ?? this.generateRequestId();
    return meta;
  }

  timestampToDt(ts?: Timestamp): string {
    return timestampToDt(ts ?? this.now());
  }
}
