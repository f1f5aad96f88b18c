/**
 * Bit mask of event kinds a destination accepts.
 */
export const EventType = {
  NONE: 0,
  EVENT: 1,
  JOB: 2,
  PURGE: 4,
  ALL: 7,
} as const;

export type EventTypeName = keyof typeof EventType;

/** A single kind of event handed to `send`. */
export type SendableEventType = typeof EventType.EVENT | typeof EventType.JOB | typeof EventType.PURGE;

export interface ParsedEventTypeMask {
  mask: number;
  /** Tokens that named no known type. When non-empty, `mask` is ALL. */
  unknown: string[];
}

function tokenValue(token: string): number | undefined {
  const name = token.startsWith('TYPE_') ? token.slice('TYPE_'.length) : token;
  switch (name) {
    case 'NONE':
    case 'EVENT':
    case 'JOB':
    case 'PURGE':
    case 'ALL':
      return EventType[name];
    default:
      return undefined;
  }
}

/**
 * Parses an allowed-types setting.
 *
 * Accepts a number, a single name (`TYPE_EVENT`) or a `|` separated union
 * (`TYPE_EVENT|TYPE_PURGE`). An empty value means ALL. Any unknown name
 * makes the whole setting fall back to ALL.
 */
export function parseEventTypeMask(value: string | number | undefined | null): ParsedEventTypeMask {
  if (value === undefined || value === null) {
    return { mask: EventType.ALL, unknown: [] };
  }
  if (typeof value === 'number') {
    return { mask: value & EventType.ALL, unknown: [] };
  }

  const tokens = value.split('|').map((t) => t.trim()).filter((t) => t !== '');
  if (tokens.length === 0) {
    return { mask: EventType.ALL, unknown: [] };
  }

  let mask: number = EventType.NONE;
  const unknown: string[] = [];
  for (const token of tokens) {
    const bits = tokenValue(token);
    if (bits === undefined) {
      unknown.push(token);
    } else {
      mask |= bits;
    }
  }

  return unknown.length > 0 ? { mask: EventType.ALL, unknown } : { mask, unknown };
}

export function allowsEventType(mask: number, type: SendableEventType): boolean {
  return (mask & type) !== 0;
}
