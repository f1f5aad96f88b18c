/**
 * Metadata envelope carried by every event.
 *
 * `id` is a random UUIDv4 per event instance. `uri`, `stream` and `dt`
 * are derived from the source entity.
 */
export interface EventMeta {
  uri: string;
  stream: string;
  id: string;
  domain?: string;
  dt?: string;
  request_id?: string;
}

/** Type-specific attributes merged at the top level of an event. */
export type EventAttributes = Record<string, unknown>;

/**
 * A fully built event as it travels to the event intake service.
 *
 * Only `mediawiki_signature` may be added after construction.
 */
export interface WikiEvent extends EventAttributes {
  $schema: string;
  meta: EventMeta;
  mediawiki_signature?: string;
}

/**
 * Per unit of work context. Carried explicitly instead of being read
 * from a global request object.
 */
export interface RequestContext {
  requestId: string;
  clientIp?: string;
}
