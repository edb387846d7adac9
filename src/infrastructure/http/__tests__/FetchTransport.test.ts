import { afterEach, describe, expect, it, vi } from 'vitest';
import { createFetchTransport } from '../FetchTransport.js';

const request = {
  url: 'https://search.test/v1/search',
  method: 'POST' as const,
  headers: { 'Content-Type': 'application/json' },
  body: '{"query":"term life"}',
};

describe('createFetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the status and parsed JSON body', async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ success: true }), { status: 201 }));
    vi.stubGlobal('fetch', fetchMock);

    const response = await createFetchTransport(1000)(request);

    expect(response).toEqual({ status: 201, body: { success: true } });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('falls back to an empty body when the response is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>busy</html>', { status: 503 })));

    await expect(createFetchTransport(1000)(request)).resolves.toEqual({ status: 503, body: {} });
  });

  it('aborts requests that outlive the timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: { signal?: AbortSignal }) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          }),
      ),
    );

    await expect(createFetchTransport(10)(request)).rejects.toThrow('aborted');
  });
});
