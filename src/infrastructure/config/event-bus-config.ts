import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { EventBusConfigError } from '../../domain/index.js';

// ── Schemas ───────────────────────────────────────────────────────────

export const eventServiceSchema = z.object({
  url: z.string().min(1).optional(),
  /** Seconds. */
  timeout: z.number().positive().optional(),
  x_client_ip_forwarding_enabled: z.boolean().optional(),
});

export type EventServiceConfig = z.infer<typeof eventServiceSchema>;

export const producerConfigSchema = z.object({
  enabled: z.boolean().optional(),
  event_service_name: z.string().min(1).optional(),
});

export const streamConfigSchema = z.object({
  /** `false` turns every producer of the stream off. */
  enabled: z.boolean().optional(),
  /** Deprecated. Use `producers.mediawiki_eventbus.event_service_name`. */
  destination_event_service: z.string().min(1).optional(),
  producers: z.record(z.string(), producerConfigSchema).optional(),
});

export type StreamConfig = z.infer<typeof streamConfigSchema>;

export const siteSettingsSchema = z.object({
  dbName: z.string().min(1).default('wiki'),
  domain: z.string().min(1).default('localhost'),
  canonicalServer: z.string().min(1).default('http://localhost'),
  articlePath: z.string().includes('$1').default('/wiki/$1'),
  userNamespace: z.string().min(1).default('User'),
});

/**
 * Full EventBus configuration. Every key has a default, so an empty
 * object is a valid configuration.
 */
export const eventBusConfigSchema = z.object({
  /** Allowed event types: a mask, a name, or `TYPE_EVENT|TYPE_JOB`. */
  enableEventBus: z.union([z.string(), z.number().int().nonnegative()]).default('TYPE_ALL'),
  eventServiceDefault: z.string().min(1).default('eventbus'),
  eventServices: z.record(z.string(), eventServiceSchema).default({}),
  /** Null means there is no stream configuration at all. */
  eventStreams: z.record(z.string(), streamConfigSchema).nullable().default(null),
  maxBatchByteSize: z.number().int().positive().default(4 * 1024 * 1024),
  streamNamesMap: z.record(z.string(), z.string().min(1)).default({}),
  secretKey: z.string().default(''),
  enableRunJobApi: z.boolean().default(false),
  readOnlyReason: z.string().nullable().default(null),
  wiki: siteSettingsSchema.default({}),
  cdnPurgeStream: z.string().min(1).nullable().default(null),
  recentChangeStream: z.string().min(1).default('mediawiki.recentchange'),
  /** Event service receiving forwarded log records. Null disables forwarding. */
  logEventService: z.string().min(1).nullable().default(null),
});

export type EventBusConfig = z.infer<typeof eventBusConfigSchema>;
export type EventBusConfigInput = z.input<typeof eventBusConfigSchema>;

export const DEFAULT_CONFIG: EventBusConfig = eventBusConfigSchema.parse({});

// ── Loading ───────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(filePath: string): unknown {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {};
    }
    throw new EventBusConfigError(`Cannot read EventBus config at ${filePath}`, { cause: err });
  }

  try {
    return JSON.parse(content);
  } catch (err: unknown) {
    throw new EventBusConfigError(`EventBus config at ${filePath} is not valid JSON`, { cause: err });
  }
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env['EVENTBUS_SECRET_KEY']) overrides['secretKey'] = env['EVENTBUS_SECRET_KEY'];
  if (env['EVENTBUS_ENABLE']) overrides['enableEventBus'] = env['EVENTBUS_ENABLE'];
  if (env['EVENTBUS_SERVICE_DEFAULT']) overrides['eventServiceDefault'] = env['EVENTBUS_SERVICE_DEFAULT'];
  return overrides;
}

/** Validates a raw configuration object, throwing `EventBusConfigError` that lists every bad key. */
export function parseEventBusConfig(raw: unknown, source = 'config'): EventBusConfig {
  const parsed = eventBusConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new EventBusConfigError(`Invalid EventBus ${source}: ${detail}`);
  }
  return parsed.data;
}

/**
 * Loads configuration from `config/eventbus.json` (or `EVENTBUS_CONFIG`),
 * applies environment overrides and validates the result.
 *
 * A missing file yields the defaults. An unreadable or invalid file throws
 * `EventBusConfigError`.
 */
export function loadEventBusConfig(options: LoadConfigOptions = {}): EventBusConfig {
  const env = options.env ?? process.env;
  const filePath = options.path
    ?? env['EVENTBUS_CONFIG']
    ?? resolve(process.cwd(), 'config', 'eventbus.json');

  const raw = readConfigFile(filePath);
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new EventBusConfigError(`EventBus config at ${filePath} must be a JSON object`);
  }

  return parseEventBusConfig({ ...raw, ...envOverrides(env) }, `config at ${filePath}`);
}
