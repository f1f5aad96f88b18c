import { describe, it, expect } from 'vitest';
import { UnknownJobTypeError } from '../../src/domain/index.js';
import { JobRegistry, NULL_JOB_TYPE, createNullJob } from '../../src/application/index.js';

const CONTEXT = { request: { requestId: 'req-1' }, defer: () => undefined };

describe('JobRegistry', () => {
  it('creates registered job types and lists them sorted', () => {
    const registry = new JobRegistry()
      .register('refreshLinks', createNullJob)
      .register(NULL_JOB_TYPE, createNullJob);

    expect(registry.types).toEqual(['null', 'refreshLinks']);
    expect(registry.has('null')).toBe(true);
    expect(registry.create('null', {}).type).toBe('null');
  });

  it('throws UnknownJobTypeError for other types', () => {
    expect(() => new JobRegistry().create('nope', {})).toThrow(new UnknownJobTypeError('nope'));
    expect(() => new JobRegistry().create('nope', {})).toThrow("Invalid job command 'nope'");
  });
});

describe('createNullJob', () => {
  it('succeeds by default', async () => {
    const job = createNullJob({});
    await expect(job.run(CONTEXT)).resolves.toBe(true);
    expect(job.allowRetries).toBe(true);
    expect(job.lastError).toBeNull();
  });

  it('fails on request, with a reason', async () => {
    const job = createNullJob({ fail: true, allowRetries: false });
    await expect(job.run(CONTEXT)).resolves.toBe(false);
    expect(job.allowRetries).toBe(false);
    expect(job.lastError).toBe('Failure requested by job params');
  });
});
