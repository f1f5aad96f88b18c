import { Buffer } from 'node:buffer';
import { createHmac, timingSafeEqual } from 'node:crypto';
import type { Logger } from 'pino';
import type { WikiEvent } from '../domain/index.js';
import { serializeEvent } from './json-events.js';

export const SIGNATURE_FIELD = 'mediawiki_signature';

/** Keyed hash over serialized event bytes, hex encoded. */
export function signEvent(serialized: string, secret: string): string {
  return createHmac('sha1', secret).update(serialized, 'utf8').digest('hex');
}

/** Constant time comparison against the signature recomputed from `serialized`. */
export function verifySignature(serialized: string, secret: string, signature: string): boolean {
  const expected = Buffer.from(signEvent(serialized, secret), 'utf8');
  const given = Buffer.from(signature, 'utf8');
  if (expected.length !== given.length) return false;
  return timingSafeEqual(expected, given);
}

/** Copy of `event` without its signature field. */
export function withoutSignature(event: Record<string, unknown>): Record<string, unknown> {
  const rest = { ...event };
  delete rest[SIGNATURE_FIELD];
  return rest;
}

/**
 * Signs an event over its serialization without the signature field and
 * returns a copy carrying the result. Null when the event cannot be serialized.
 */
export function signJobEvent(event: WikiEvent, secret: string, log: Logger): WikiEvent | null {
  const serialized = serializeEvent(withoutSignature(event), log);
  if (serialized === null) return null;
  return { ...event, mediawiki_signature: signEvent(serialized, secret) };
}
