import { Buffer, isUtf8 } from 'node:buffer';
import type { Logger } from 'pino';

/** Prefix marking a base64 encoded binary value inside an event. */
export const BINARY_VALUE_PREFIX = 'data:application/octet-stream;base64,';

/** Above this serialized size, logged events are reduced to their `meta` blocks. */
export const LOG_EVENTS_MAX_BYTES = 8192;

export class BinaryDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BinaryDecodeError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function metaOf(event: unknown): unknown {
  return isRecord(event) ? event['meta'] : undefined;
}

export function metaBlocks(events: readonly unknown[]): unknown[] {
  return events.map(metaOf);
}

// ── Binary values ──────────────────────────────────────────────────

/**
 * Bytes that are not valid UTF-8 become a `data:` string holding their
 * base64 encoding. Valid UTF-8 bytes become plain strings. Anything else
 * is returned unchanged.
 */
export function replaceBinaryValue(value: unknown): unknown {
  if (!(value instanceof Uint8Array)) return value;
  const bytes = Buffer.from(value.buffer, value.byteOffset, value.byteLength);
  return isUtf8(bytes)
    ? bytes.toString('utf8')
    : BINARY_VALUE_PREFIX + bytes.toString('base64');
}

export function replaceBinaryValuesRecursive(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(replaceBinaryValuesRecursive);
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      out[key] = replaceBinaryValuesRecursive(v);
    }
    return out;
  }
  return replaceBinaryValue(value);
}

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Inverse of `replaceBinaryValue`. Returns null when `value` does not carry
 * the binary prefix.
 */
export function decodeBinaryValue(value: string): Buffer | null {
  if (!value.startsWith(BINARY_VALUE_PREFIX)) return null;
  const encoded = value.slice(BINARY_VALUE_PREFIX.length);
  if (!BASE64.test(encoded)) {
    throw new BinaryDecodeError('Malformed base64 in binary value');
  }
  return Buffer.from(encoded, 'base64');
}

// ── Null pruning ───────────────────────────────────────────────────

/** Copy of `value` with every null-valued object key removed, at any depth. */
export function removeNulls(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(removeNulls);
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      if (v !== null) out[key] = removeNulls(v);
    }
    return out;
  }
  return value;
}

// ── Serialization ──────────────────────────────────────────────────

function stringify(value: unknown): string | null {
  const json: string | undefined = JSON.stringify(value);
  return json === undefined ? null : json;
}

/**
 * Serializes a list of events to a JSON array. Returns null, after logging
 * only the events' meta blocks, when the events cannot be encoded.
 */
export function serializeEvents(events: readonly unknown[], log: Logger): string | null {
  try {
    const json = stringify(events);
    if (json === null) throw new TypeError('Events serialized to nothing');
    return json;
  } catch (err: unknown) {
    log.error(
      { err, events: metaBlocks(events) },
      'Serializing events failed. Aborting send.',
    );
    return null;
  }
}

/** Serializes a single event to a JSON object. Same failure contract as `serializeEvents`. */
export function serializeEvent(event: unknown, log: Logger): string | null {
  try {
    const json = stringify(event);
    if (json === null) throw new TypeError('Event serialized to nothing');
    return json;
  } catch (err: unknown) {
    log.error({ err, events: [metaOf(event)] }, 'Serializing event failed');
    return null;
  }
}

export interface EventBatch {
  body: string;
  events: unknown[];
}

/**
 * Splits events into JSON array bodies of at most `maxBytes` each.
 * An event larger than the limit is sent in a body of its own.
 * Null when any event cannot be serialized.
 */
export function partitionEvents(
  events: readonly unknown[],
  maxBytes: number,
  log: Logger,
): EventBatch[] | null {
  const batches: EventBatch[] = [];
  let parts: string[] = [];
  let members: unknown[] = [];
  let bytes = 2; // []

  const close = (): void => {
    if (parts.length === 0) return;
    batches.push({ body: `[${parts.join(',')}]`, events: members });
    parts = [];
    members = [];
    bytes = 2;
  };

  for (const event of events) {
    const json = serializeEvent(event, log);
    if (json === null) return null;
    const size = Buffer.byteLength(json, 'utf8') + (parts.length === 0 ? 0 : 1);
    if (parts.length > 0 && bytes + size > maxBytes) {
      close();
      bytes += Buffer.byteLength(json, 'utf8');
    } else {
      bytes += size;
    }
    parts.push(json);
    members.push(event);
  }
  close();

  return batches;
}

/** Events as they should appear in a log entry for a body of `bodyBytes` bytes. */
export function summarizeEventsForLog(events: readonly unknown[], bodyBytes: number): unknown[] {
  return bodyBytes > LOG_EVENTS_MAX_BYTES ? metaBlocks(events) : [...events];
}

// ── Validation ─────────────────────────────────────────────────────

function isScalar(value: unknown): boolean {
  return value === null
    || typeof value === 'string'
    || typeof value === 'boolean'
    || (typeof value === 'number' && Number.isFinite(value));
}

function typeName(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'Object';
  }
  return typeof value;
}

interface Offender {
  path: string;
  value: unknown;
}

/** `ancestors` holds the containers on the current path; meeting one again is a cycle. */
function findNonScalar(part: unknown, path: string, ancestors: WeakSet<object>): Offender | null {
  if (Array.isArray(part) || isRecord(part)) {
    if (ancestors.has(part)) return { path, value: part };
    ancestors.add(part);
    const entries: Array<[string, unknown]> = Array.isArray(part)
      ? part.map((v, i) => [String(i), v])
      : Object.entries(part);
    try {
      for (const [key, v] of entries) {
        const found = findNonScalar(v, path === '' ? key : `${path}.${key}`, ancestors);
        if (found) return found;
      }
    } finally {
      ancestors.delete(part);
    }
    return null;
  }
  return isScalar(part) ? null : { path, value: part };
}

/**
 * Logs the first value in each event that JSON cannot carry as a scalar.
 * Does not reject anything. Returns how many events were flagged.
 */
export function validateJsonSerializable(events: readonly unknown[], log: Logger): number {
  let flagged = 0;
  for (const event of events) {
    const offender = findNonScalar(event, '', new WeakSet());
    if (!offender) continue;
    flagged++;
    log.error(
      {
        events: serializeEvents([event], log),
        prop_name: offender.path,
        prop_val_type: typeName(offender.value),
      },
      'Non-scalar value found in the event',
    );
  }
  return flagged;
}
