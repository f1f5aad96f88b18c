import { describe, it, expect, vi, afterEach } from 'vitest';
import { createFetchTransport } from '../../src/infrastructure/index.js';

const REQUEST = {
  url: 'https://intake.test/v1/events',
  body: '[{"a":1}]',
  headers: { 'content-type': 'application/json' },
  timeout: 5,
};

describe('createFetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('POSTs the body and returns status, reason and body', async () => {
    const mockFetch = vi.fn().mockResolvedValue({
      status: 201,
      statusText: 'Created',
      text: async () => '',
    });
    vi.stubGlobal('fetch', mockFetch);

    await expect(createFetchTransport().post(REQUEST)).resolves.toEqual({ code: 201, reason: 'Created', body: '' });
    expect(mockFetch).toHaveBeenCalledWith(
      'https://intake.test/v1/events',
      expect.objectContaining({
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '[{"a":1}]',
        signal: expect.any(AbortSignal),
      }),
    );
  });

  it('returns code 0 with the error message when fetch throws', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('Network error')));

    await expect(createFetchTransport().post(REQUEST)).resolves.toEqual({
      code: 0,
      reason: '',
      body: '',
      error: 'Network error',
    });
  });
});
