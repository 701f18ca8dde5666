import { afterEach, describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import { FetchError, fetchWithTimeout } from '../fetch-with-timeout.js';

const URL_UNDER_TEST = 'https://places.example.test/api/textsearch/json?key=test-secret';

function hangUntilAborted(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    if (init?.signal?.aborted) {
      reject(new DOMException('This operation was aborted', 'AbortError'));
      return;
    }
    init?.signal?.addEventListener('abort', () => reject(new DOMException('This operation was aborted', 'AbortError')));
  });
}

describe('fetchWithTimeout', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('returns the response untouched, including HTTP error statuses', async () => {
    mock.method(globalThis, 'fetch', async () => new Response('nope', { status: 503 }));

    const response = await fetchWithTimeout(URL_UNDER_TEST, { method: 'GET' }, { timeoutMs: 1000 });

    assert.equal(response.status, 503);
    assert.equal(await response.text(), 'nope');
  });

  it('aborts and reports TIMEOUT when the upstream hangs', async () => {
    mock.method(globalThis, 'fetch', hangUntilAborted);

    await assert.rejects(
      fetchWithTimeout(URL_UNDER_TEST, {}, { timeoutMs: 10, provider: 'google_places' }),
      (err: unknown) => {
        assert.ok(err instanceof FetchError);
        assert.equal(err.errorKind, 'TIMEOUT');
        assert.equal(err.host, 'places.example.test');
        assert.ok(err.message.startsWith('google_places timeout after '));
        assert.ok(!err.message.includes('test-secret'));
        return true;
      }
    );
  });

  it('reports ABORT when the caller signal fires', async () => {
    mock.method(globalThis, 'fetch', hangUntilAborted);
    const controller = new AbortController();

    const pending = fetchWithTimeout(URL_UNDER_TEST, {}, { timeoutMs: 5000, signal: controller.signal });
    controller.abort();

    await assert.rejects(pending, (err: unknown) => {
      assert.ok(err instanceof FetchError);
      assert.equal(err.errorKind, 'ABORT');
      return true;
    });
  });

  it('reports ABORT without calling out when the signal is already aborted', async () => {
    const fetchMock = mock.method(globalThis, 'fetch', hangUntilAborted);
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(
      fetchWithTimeout(URL_UNDER_TEST, {}, { timeoutMs: 5000, signal: controller.signal }),
      (err: unknown) => err instanceof FetchError && err.errorKind === 'ABORT'
    );
    // fetch still receives an aborted signal and rejects immediately
    assert.equal(fetchMock.mock.callCount(), 1);
  });

  it('classifies DNS and generic network failures', async () => {
    mock.method(globalThis, 'fetch', async () => {
      throw new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND places.example.test') });
    });

    await assert.rejects(
      fetchWithTimeout(URL_UNDER_TEST, {}, { timeoutMs: 1000 }),
      (err: unknown) => err instanceof FetchError && err.errorKind === 'DNS_FAIL'
    );

    mock.restoreAll();
    mock.method(globalThis, 'fetch', async () => {
      throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:443') });
    });

    await assert.rejects(
      fetchWithTimeout(URL_UNDER_TEST, {}, { timeoutMs: 1000 }),
      (err: unknown) => err instanceof FetchError && err.errorKind === 'NETWORK_ERROR'
    );
  });
});
