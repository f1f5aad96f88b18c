import { describe, it, expect, beforeEach } from 'vitest';
import { EventBusConfigError, EventType } from '../../src/domain/index.js';
import { CDN_PURGE_CHANNEL, CdnPurgeRelayer, EventFactory, StreamNameMapper } from '../../src/application/index.js';
import { GENERATED_REQUEST_ID, SITE, fakeLogger, fakeProvider, fixedSerializer } from '../helpers.js';

const CONTEXT = { requestId: 'req-1' };

describe('CdnPurgeRelayer', () => {
  let log: ReturnType<typeof fakeLogger>;
  let events: EventFactory;

  beforeEach(() => {
    log = fakeLogger();
    events = new EventFactory(SITE, fixedSerializer(), new StreamNameMapper());
  });

  it('requires a stream', () => {
    expect(() => new CdnPurgeRelayer(events, fakeProvider(), null, log)).toThrow(EventBusConfigError);
  });

  it('sends one resource change per purged URL as purge events', async () => {
    const provider = fakeProvider((stream) => (stream === 'resource-purge' ? 'purges' : 'main'));
    const relayer = new CdnPurgeRelayer(events, provider, 'resource-purge', log);

    const ok = await relayer.notify(
      CDN_PURGE_CHANNEL,
      [{ url: 'https://test.wiki.local/wiki/A', timestamp: 0 }, { url: 'https://test.wiki.local/wiki/B' }],
      CONTEXT,
    );

    expect(ok).toBe(true);
    expect(provider.sinks.get('purges')?.send).toHaveBeenCalledWith(
      [
        expect.objectContaining({
          tags: ['mediawiki'],
          meta: expect.objectContaining({
            uri: 'https://test.wiki.local/wiki/A',
            stream: 'resource-purge',
            dt: '1970-01-01T00:00:00Z',
          }),
        }),
        expect.objectContaining({
          meta: expect.objectContaining({ uri: 'https://test.wiki.local/wiki/B', dt: '2024-05-06T07:08:09Z' }),
        }),
      ],
      EventType.PURGE,
      CONTEXT,
    );
  });

  it('gives purges sent without a context a generated request id', async () => {
    const provider = fakeProvider();
    const relayer = new CdnPurgeRelayer(events, provider, 'resource-purge', log);

    await relayer.notify(CDN_PURGE_CHANNEL, [{ url: 'https://test.wiki.local/wiki/A' }]);

    const sent = provider.sinks.get('main')?.send.mock.calls[0]?.[0];
    expect(typeof sent === 'string' ? sent : sent?.[0]?.meta.request_id).toBe(GENERATED_REQUEST_ID);
  });

  it('does nothing for an empty purge list', async () => {
    const provider = fakeProvider();
    const relayer = new CdnPurgeRelayer(events, provider, 'resource-purge', log);

    await expect(relayer.notify(CDN_PURGE_CHANNEL, [])).resolves.toBe(true);
    expect(provider.sinks.size).toBe(0);
  });

  it('rejects other channels', async () => {
    const relayer = new CdnPurgeRelayer(events, fakeProvider(), 'resource-purge', log);
    await expect(relayer.notify('other', [{ url: 'https://x/' }])).rejects.toThrow(RangeError);
  });

  it('warns and reports false when the purges were not sent', async () => {
    const provider = fakeProvider(undefined, { status: 'skipped', reason: 'type-not-allowed' });
    const relayer = new CdnPurgeRelayer(events, provider, 'resource-purge', log);

    await expect(relayer.notify(CDN_PURGE_CHANNEL, [{ url: 'https://x/' }])).resolves.toBe(false);
    expect(log.warn).toHaveBeenCalledWith(
      { stream: 'resource-purge', purges: 1, result: { status: 'skipped', reason: 'type-not-allowed' } },
      'CDN purges were not relayed',
    );
  });
});
