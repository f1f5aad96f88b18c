import { describe, it, expect, vi, afterEach } from 'vitest';
import { pino } from 'pino';
import { EventBusConfigError } from '../../src/domain/index.js';
import { buildApp } from '../../src/app.js';
import { signEvent } from '../../src/application/index.js';
import {
  EventBusLogStream,
  parseEventBusConfig,
  type EventBusConfigInput,
} from '../../src/infrastructure/index.js';
import { TEST_TITLE, fakeTransport } from '../helpers.js';

const SECRET = 'test-secret';
const JOB_URL = '/eventbus/v0/internal/job/execute';

function signed(event: Record<string, unknown>): Record<string, unknown> {
  return { ...event, mediawiki_signature: signEvent(JSON.stringify(event), SECRET) };
}

function jobEvent(params: Record<string, unknown> = {}, type = 'null'): Record<string, unknown> {
  return signed({ database: 'testwiki', type, params });
}

describe('EventBus routes', () => {
  let app: Awaited<ReturnType<typeof buildApp>> | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  async function makeApp(overrides: EventBusConfigInput = {}, logStream?: EventBusLogStream) {
    const transport = fakeTransport();
    const instance = await buildApp({
      config: parseEventBusConfig({
        enableRunJobApi: true,
        secretKey: SECRET,
        eventServiceDefault: 'main',
        eventServices: { main: { url: 'https://intake.test/v1/events' } },
        ...overrides,
      }),
      logger: pino({ level: 'silent' }),
      transport,
      logStream,
    });
    app = instance;
    return { app: instance, transport };
  }

  // ── Job execution ──────────────────────────────────────

  describe('POST /eventbus/v0/internal/job/execute', () => {
    it('returns 501 when the job API is disabled', async () => {
      const { app } = await makeApp({ enableRunJobApi: false });
      const res = await app.inject({ method: 'POST', url: JOB_URL, payload: jobEvent() });

      expect(res.statusCode).toBe(501);
      expect(res.json()).toEqual({ message: 'Set enableRunJobApi to true to enable the job execution API' });
    });

    it('returns 423 when the wiki is read-only', async () => {
      const { app } = await makeApp({ readOnlyReason: 'maintenance' });
      const res = await app.inject({ method: 'POST', url: JOB_URL, payload: jobEvent() });

      expect(res.statusCode).toBe(423);
      expect(res.json()).toEqual({ message: 'Wiki is in read-only mode', reason: 'maintenance' });
    });

    it('returns 415 for a body that is not JSON', async () => {
      const { app } = await makeApp();
      const res = await app.inject({
        method: 'POST',
        url: JOB_URL,
        headers: { 'content-type': 'text/plain' },
        payload: 'hello',
      });

      expect(res.statusCode).toBe(415);
      expect(res.json()).toEqual({ message: 'Unsupported Content-Type', content_type: 'text/plain' });
    });

    it('returns 400 listing missing fields', async () => {
      const { app } = await makeApp();
      const res = await app.inject({ method: 'POST', url: JOB_URL, payload: { type: 'null' } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ message: 'Invalid event received', missing_params: ['database', 'params'] });
    });

    it('returns 403 for an unsigned event', async () => {
      const { app } = await makeApp();
      const res = await app.inject({
        method: 'POST',
        url: JOB_URL,
        payload: { database: 'testwiki', type: 'null', params: {} },
      });

      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({ message: 'Missing mediawiki signature' });
    });

    it('returns 403 for a tampered event', async () => {
      const { app } = await makeApp();
      const res = await app.inject({ method: 'POST', url: JOB_URL, payload: { ...jobEvent(), database: 'otherwiki' } });

      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({ message: 'Invalid mediawiki signature' });
    });

    it('returns 400 for an unknown job type', async () => {
      const { app } = await makeApp();
      const res = await app.inject({ method: 'POST', url: JOB_URL, payload: jobEvent({}, 'nope') });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        message: 'Failed creating job from description',
        error: "Invalid job command 'nope'",
        type: 'nope',
      });
    });

    it('runs a job and returns 200 with its result', async () => {
      const { app } = await makeApp();
      const res = await app.inject({ method: 'POST', url: JOB_URL, payload: jobEvent() });

      expect(res.statusCode).toBe(200);
      const body: unknown = res.json();
      expect(body).toMatchObject({ status: true, readonly: false, error: null });
      expect(body).toHaveProperty('timeMs', expect.any(Number));
    });

    it('returns 500 when the job fails', async () => {
      const { app } = await makeApp();
      const res = await app.inject({ method: 'POST', url: JOB_URL, payload: jobEvent({ fail: true }) });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({
        message: 'Internal Server Error',
        error: 'Failure requested by job params',
        readonly: false,
      });
    });

    it('returns 200 for a failed job that must not be retried', async () => {
      const { app } = await makeApp();
      const res = await app.inject({
        method: 'POST',
        url: JOB_URL,
        payload: jobEvent({ fail: true, allowRetries: false }),
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ status: true, error: 'Failure requested by job params' });
    });

    it('accepts job events produced by the job queue', async () => {
      const { app } = await makeApp();
      const event = app.eventBus.jobQueue.createJobEvent(
        { type: 'null', title: TEST_TITLE, params: {} },
        { requestId: 'req-1' },
      );
      const res = await app.inject({ method: 'POST', url: JOB_URL, payload: event ?? {} });

      expect(res.statusCode).toBe(200);
    });
  });

  // ── Health ─────────────────────────────────────────────

  describe('GET /eventbus/v0/health', () => {
    it('lists services and job types', async () => {
      const { app } = await makeApp();
      const res = await app.inject({ method: 'GET', url: '/eventbus/v0/health' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'ok', event_services: ['main'], job_types: ['null'] });
    });
  });

  // ── Log forwarding ─────────────────────────────────────

  describe('log event forwarding', () => {
    it('fails to build when the log event service is not configured', async () => {
      await expect(makeApp({ logEventService: 'logs' }, new EventBusLogStream())).rejects.toThrow(
        EventBusConfigError,
      );
    });

    it('flushes buffered log events to the log event service after a response', async () => {
      const logStream = new EventBusLogStream();
      const { app, transport } = await makeApp({ logEventService: 'main' }, logStream);
      logStream.write(JSON.stringify({
        level: 30,
        $schema: '/mediawiki/log/1.0.0',
        meta: { uri: 'https://test.wiki.local/wiki/Test', stream: 'mediawiki.log-events', id: '1' },
      }));

      await app.inject({ method: 'GET', url: '/eventbus/v0/health' });

      await vi.waitFor(() => expect(transport.requests).toHaveLength(1));
      expect(transport.requests[0]?.body).toBe(
        '[{"$schema":"/mediawiki/log/1.0.0","meta":{"uri":"https://test.wiki.local/wiki/Test","stream":"mediawiki.log-events","id":"1"}}]',
      );
    });
  });
});
