import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EventBusConfigError } from '../../src/domain/index.js';
import { DEFAULT_CONFIG, loadEventBusConfig, parseEventBusConfig } from '../../src/infrastructure/index.js';

describe('loadEventBusConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'eventbus-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(content: string): string {
    const path = join(dir, 'eventbus.json');
    writeFileSync(path, content);
    return path;
  }

  it('returns defaults when the file does not exist', () => {
    const config = loadEventBusConfig({ path: join(dir, 'missing.json'), env: {} });

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.eventServiceDefault).toBe('eventbus');
    expect(config.eventStreams).toBeNull();
    expect(config.maxBatchByteSize).toBe(4 * 1024 * 1024);
    expect(config.enableEventBus).toBe('TYPE_ALL');
  });

  it('merges the file over defaults', () => {
    const path = write(JSON.stringify({
      eventServiceDefault: 'eventgate-main',
      eventServices: { 'eventgate-main': { url: 'https://main.test/v1/events' } },
      wiki: { dbName: 'devwiki' },
    }));
    const config = loadEventBusConfig({ path, env: {} });

    expect(config.eventServiceDefault).toBe('eventgate-main');
    expect(config.eventServices).toEqual({ 'eventgate-main': { url: 'https://main.test/v1/events' } });
    expect(config.wiki).toEqual({
      dbName: 'devwiki',
      domain: 'localhost',
      canonicalServer: 'http://localhost',
      articlePath: '/wiki/$1',
      userNamespace: 'User',
    });
    expect(config.enableRunJobApi).toBe(false);
  });

  it('applies environment overrides', () => {
    const path = write(JSON.stringify({ secretKey: 'from-file' }));
    const config = loadEventBusConfig({
      path,
      env: { EVENTBUS_SECRET_KEY: 'test-secret', EVENTBUS_ENABLE: 'TYPE_EVENT', EVENTBUS_SERVICE_DEFAULT: 'other' },
    });

    expect(config.secretKey).toBe('test-secret');
    expect(config.enableEventBus).toBe('TYPE_EVENT');
    expect(config.eventServiceDefault).toBe('other');
  });

  it('reads the path from EVENTBUS_CONFIG', () => {
    const path = write(JSON.stringify({ logEventService: 'logs' }));
    expect(loadEventBusConfig({ env: { EVENTBUS_CONFIG: path } }).logEventService).toBe('logs');
  });

  it('throws on invalid JSON', () => {
    const path = write('{ not json');
    expect(() => loadEventBusConfig({ path, env: {} })).toThrow(EventBusConfigError);
  });

  it('throws when the file is not an object', () => {
    const path = write('[]');
    expect(() => loadEventBusConfig({ path, env: {} })).toThrow(`EventBus config at ${path} must be a JSON object`);
  });

  it('names the offending key of an invalid file', () => {
    const path = write(JSON.stringify({ maxBatchByteSize: -1 }));
    expect(() => loadEventBusConfig({ path, env: {} })).toThrow(/maxBatchByteSize/);
  });
});

describe('parseEventBusConfig', () => {
  it('accepts an empty object', () => {
    expect(parseEventBusConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('rejects an article path without $1', () => {
    expect(() => parseEventBusConfig({ wiki: { articlePath: '/wiki/' } })).toThrow(/Invalid EventBus config: wiki\.articlePath/);
  });
});
