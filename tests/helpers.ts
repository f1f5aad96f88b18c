import { vi, type Mock } from 'vitest';
import type { PageTitle, RevisionRecord, UserRecord, WikiEvent } from '../src/domain/index.js';
import {
  EventSerializer,
  type EventBusProvider,
  type EventSink,
  type SendResult,
  type SiteSettings,
} from '../src/application/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../src/infrastructure/index.js';

/** pino stand-in. `child` returns the same logger so calls land on one set of spies. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as import('pino').Logger;
}

export const SITE: SiteSettings = {
  dbName: 'testwiki',
  domain: 'test.wiki.local',
  canonicalServer: 'https://test.wiki.local',
  articlePath: '/wiki/$1',
  userNamespace: 'User',
};

/** Fixed "now" for deterministic `meta.dt`. */
export const FIXED_NOW = new Date('2024-05-06T07:08:09.123Z');

/** Request id given to events built without a request context. */
export const GENERATED_REQUEST_ID = 'req-generated';

/** Serializer with sequential ids (`id-1`, `id-2`, ...) and a fixed clock. */
export function fixedSerializer(): EventSerializer {
  let counter = 0;
  return new EventSerializer({
    generateId: () => `id-${++counter}`,
    generateRequestId: () => GENERATED_REQUEST_ID,
    now: () => FIXED_NOW,
  });
}

export const TEST_TITLE: PageTitle = { namespace: 0, prefixedDbKey: 'Test' };

export function makeUser(overrides: Partial<UserRecord> = {}): UserRecord {
  return {
    id: 7,
    name: 'Editor',
    groups: ['*', 'user'],
    isBot: false,
    ...overrides,
  };
}

export function makeRevision(overrides: Partial<RevisionRecord> = {}): RevisionRecord {
  return {
    id: 101,
    pageId: 23,
    title: TEST_TITLE,
    parentId: 100,
    timestamp: '20240102030405',
    performer: makeUser(),
    comment: 'edit summary',
    minor: false,
    size: 42,
    sha1: 'abc123',
    visibility: 0,
    content: () => ({ model: 'wikitext', format: 'text/x-wiki', isRedirect: false }),
    ...overrides,
  };
}

let eventCounter = 0;

/** Minimal complete event with defaults. */
export function makeEvent(overrides: Partial<WikiEvent> = {}): WikiEvent {
  eventCounter++;
  return {
    $schema: '/test/event/1.0.0',
    meta: { uri: 'https://test.wiki.local/wiki/Test', stream: 'test.stream', id: `event-${eventCounter}` },
    ...overrides,
  };
}

export interface FakeTransport extends HttpTransport {
  requests: HttpRequest[];
}

/**
 * In-process transport recording every request. Answers with `respond`,
 * or 201 Created.
 */
export function fakeTransport(
  respond: (request: HttpRequest) => HttpResponse | Promise<HttpResponse> = () => ({
    code: 201,
    reason: 'Created',
    body: '',
  }),
): FakeTransport {
  const requests: HttpRequest[] = [];
  return {
    requests,
    post: vi.fn(async (request: HttpRequest) => {
      requests.push(request);
      return respond(request);
    }),
  };
}

type SendFn = EventSink['send'];

export interface FakeSink extends EventSink {
  send: Mock<SendFn>;
}

export interface FakeProvider extends EventBusProvider {
  sinks: Map<string, FakeSink>;
}

/**
 * Destination registry stand-in. Streams go to `route(stream)` (default
 * `main`); every sink answers with `result`.
 */
export function fakeProvider(
  route: (stream: string) => string = () => 'main',
  result: SendResult = { status: 'sent' },
): FakeProvider {
  const sinks = new Map<string, FakeSink>();
  return {
    sinks,
    getEventServiceNameForStream: route,
    getInstance(serviceName: string) {
      let sink = sinks.get(serviceName);
      if (!sink) {
        sink = { send: vi.fn<SendFn>(async () => result) };
        sinks.set(serviceName, sink);
      }
      return sink;
    },
  };
}
