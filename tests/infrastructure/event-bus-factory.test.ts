import { describe, it, expect, beforeEach } from 'vitest';
import { EventBusConfigError, EventType } from '../../src/domain/index.js';
import {
  DEFAULT_REQUEST_TIMEOUT,
  EVENT_SERVICE_DISABLED_NAME,
  EventBusFactory,
  StreamConfigs,
  type EventBusFactoryOptions,
  type StreamConfig,
} from '../../src/infrastructure/index.js';
import { fakeLogger, fakeTransport, makeEvent, type FakeTransport } from '../helpers.js';

const SERVICES = {
  'eventgate-main': { url: 'https://main.test/v1/events' },
  'eventgate-analytics': { url: 'https://analytics.test/v1/events', timeout: 2, x_client_ip_forwarding_enabled: true },
  'no-url': {},
};

describe('EventBusFactory', () => {
  let log: ReturnType<typeof fakeLogger>;
  let transport: FakeTransport;

  beforeEach(() => {
    log = fakeLogger();
    transport = fakeTransport();
  });

  function factory(
    streams: Record<string, StreamConfig> | null,
    overrides: Partial<EventBusFactoryOptions> = {},
  ): EventBusFactory {
    return new EventBusFactory(
      {
        enableEventBus: 'TYPE_ALL',
        eventServiceDefault: 'eventgate-main',
        eventServices: SERVICES,
        maxBatchByteSize: 4096,
        streamConfigs: streams === null ? null : new StreamConfigs(streams),
        ...overrides,
      },
      transport,
      log,
    );
  }

  // ── Stream resolution ──────────────────────────────────

  describe('getEventServiceNameForStream', () => {
    it('uses the default service when there is no stream configuration', () => {
      expect(factory(null).getEventServiceNameForStream('anything')).toBe('eventgate-main');
    });

    it('disables undeclared streams', () => {
      expect(factory({}).getEventServiceNameForStream('s1')).toBe(EVENT_SERVICE_DISABLED_NAME);
    });

    it('disables a stream turned off for all producers', () => {
      const buses = factory({ s1: { enabled: false } });
      expect(buses.getEventServiceNameForStream('s1')).toBe(EVENT_SERVICE_DISABLED_NAME);
    });

    it('disables a stream turned off for this producer, whatever service it names', () => {
      const buses = factory({
        s1: {
          destination_event_service: 'eventgate-analytics',
          producers: { mediawiki_eventbus: { enabled: false, event_service_name: 'eventgate-analytics' } },
        },
      });
      expect(buses.getEventServiceNameForStream('s1')).toBe(EVENT_SERVICE_DISABLED_NAME);
    });

    it('prefers the producer setting over the deprecated destination', () => {
      const buses = factory({
        both: {
          destination_event_service: 'old',
          producers: { mediawiki_eventbus: { event_service_name: 'eventgate-analytics' } },
        },
        legacy: { destination_event_service: 'eventgate-analytics' },
        plain: {},
      });

      expect(buses.getEventServiceNameForStream('both')).toBe('eventgate-analytics');
      expect(buses.getEventServiceNameForStream('legacy')).toBe('eventgate-analytics');
      expect(buses.getEventServiceNameForStream('plain')).toBe('eventgate-main');
    });

    it('matches pattern keys', () => {
      const buses = factory({ '/^mediawiki\\.job\\..+/': { destination_event_service: 'eventgate-analytics' } });
      expect(buses.getEventServiceNameForStream('mediawiki.job.refreshLinks')).toBe('eventgate-analytics');
      expect(buses.getEventServiceNameForStream('mediawiki.page-delete')).toBe(EVENT_SERVICE_DISABLED_NAME);
    });
  });

  // ── Instances ──────────────────────────────────────────

  describe('getInstance', () => {
    it('builds a destination from the service settings', () => {
      const bus = factory(null).getInstance('eventgate-analytics');
      expect(bus.options).toEqual({
        url: 'https://analytics.test/v1/events',
        timeout: 2,
        maxBatchByteSize: 4096,
        allowedTypes: EventType.ALL,
        forwardXClientIP: true,
      });
      expect(log.child).toHaveBeenCalledWith({ event_service: 'eventgate-analytics' });
    });

    it('applies the default timeout', () => {
      expect(factory(null).getInstance('eventgate-main').options.timeout).toBe(DEFAULT_REQUEST_TIMEOUT);
    });

    it('caches instances per service', () => {
      const buses = factory(null);
      expect(buses.getInstance('eventgate-main')).toBe(buses.getInstance('eventgate-main'));
    });

    it('throws a config error for unknown services and services without url', () => {
      const buses = factory(null);

      expect(() => buses.getInstance('nope')).toThrow(EventBusConfigError);
      expect(() => buses.getInstance('nope')).toThrow(
        "Could not get configuration of EventBus instance for 'nope'. "
          + "'nope' must exist in EventServices with a url in main config.",
      );
      expect(() => buses.getInstance('no-url')).toThrow(EventBusConfigError);
      expect(log.error).toHaveBeenCalledWith({ service: 'nope' }, expect.stringContaining("'nope'"));
    });

    it('gives a disabled destination that never posts', async () => {
      const buses = factory({});
      const bus = buses.getInstanceForStream('undeclared');

      expect(bus.url).toBe(EVENT_SERVICE_DISABLED_NAME);
      await expect(bus.send([makeEvent()])).resolves.toEqual({ status: 'skipped', reason: 'type-not-allowed' });
      expect(transport.post).not.toHaveBeenCalled();
    });

    it('applies the allowed type mask to every destination', async () => {
      const bus = factory(null, { enableEventBus: 'TYPE_EVENT|TYPE_PURGE' }).getInstance('eventgate-main');

      await expect(bus.send([makeEvent()], EventType.JOB)).resolves.toEqual({
        status: 'skipped',
        reason: 'type-not-allowed',
      });
      await expect(bus.send([makeEvent()], EventType.PURGE)).resolves.toEqual({ status: 'sent' });
    });

    it('warns and allows everything for an unknown type name', () => {
      const bus = factory(null, { enableEventBus: 'TYPE_BOGUS' }).getInstance('eventgate-main');

      expect(bus.options.allowedTypes).toBe(EventType.ALL);
      expect(log.warn).toHaveBeenCalledWith(
        { enableEventBus: 'TYPE_BOGUS', unknown: ['TYPE_BOGUS'] },
        'Unknown event type in EnableEventBus setting, allowing all event types',
      );
    });
  });

  it('lists configured service names', () => {
    expect(factory(null).serviceNames).toEqual(['eventgate-main', 'eventgate-analytics', 'no-url']);
  });
});

describe('StreamConfigs', () => {
  it('prefers an exact key over a matching pattern', () => {
    const configs = new StreamConfigs({
      '/^mediawiki\\..+/': { destination_event_service: 'pattern' },
      'mediawiki.page-delete': { destination_event_service: 'exact' },
    });

    expect(configs.get('mediawiki.page-delete')?.destination_event_service).toBe('exact');
    expect(configs.get('mediawiki.page-move')?.destination_event_service).toBe('pattern');
    expect(configs.get('other')).toBeUndefined();
  });

  it('rejects an invalid pattern', () => {
    expect(() => new StreamConfigs({ '/(unclosed/': {} })).toThrow(EventBusConfigError);
  });
});
