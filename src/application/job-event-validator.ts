import type { JobParams } from '../domain/index.js';
import { HttpError } from './errors.js';
import { BinaryDecodeError, decodeBinaryValue, isRecord } from './json-events.js';
import { SIGNATURE_FIELD, verifySignature, withoutSignature } from './signature.js';

const REQUIRED_FIELDS = ['database', 'type', 'params'] as const;

export interface JobEventRequest {
  database: string;
  type: string;
  params: JobParams;
  /** The event as received, signature included. */
  event: Record<string, unknown>;
}

export function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  const mediaType = contentType.split(';')[0]?.trim().toLowerCase();
  return mediaType === 'application/json';
}

/** Decodes top-level `data:` binary params in place. */
export function decodeBinaryParams(params: JobParams): void {
  for (const [key, value] of Object.entries(params)) {
    if (typeof value !== 'string') continue;
    try {
      const decoded = decodeBinaryValue(value);
      if (decoded !== null) params[key] = decoded;
    } catch (err: unknown) {
      if (err instanceof BinaryDecodeError) {
        throw new HttpError(500, 'Failed to decode binary job params', { param: key, error: err.message });
      }
      throw err;
    }
  }
}

/**
 * Checks an inbound job event and returns its parts. Throws `HttpError`
 * with 415, 400, 403 or 500.
 */
export function validateJobEvent(
  body: unknown,
  contentType: string | undefined,
  secretKey: string,
): JobEventRequest {
  if (!isJsonContentType(contentType)) {
    throw new HttpError(415, 'Unsupported Content-Type', { content_type: contentType ?? null });
  }

  const event = isRecord(body) ? body : {};
  const missing = REQUIRED_FIELDS.filter((field) => !(field in event));
  if (missing.length > 0) {
    throw new HttpError(400, 'Invalid event received', { missing_params: missing });
  }

  const { database, type, params } = event;
  if (typeof database !== 'string' || typeof type !== 'string' || !isRecord(params)) {
    throw new HttpError(400, 'Invalid event received', {
      invalid_params: REQUIRED_FIELDS.filter((field) =>
        field === 'params' ? !isRecord(event[field]) : typeof event[field] !== 'string'),
    });
  }

  const signature = event[SIGNATURE_FIELD];
  if (typeof signature !== 'string' || signature === '') {
    throw new HttpError(403, 'Missing mediawiki signature');
  }
  const serialized = JSON.stringify(withoutSignature(event));
  if (!verifySignature(serialized, secretKey, signature)) {
    throw new HttpError(403, 'Invalid mediawiki signature');
  }

  decodeBinaryParams(params);

  return { database, type, params, event };
}
