import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { checkUpstream, upstreamUrl } from '../src/upstream/probe.js';
import { classifyFetchError } from '../src/errors.js';
import { connectionRefused, hangingFetch, jsonResponse } from './helpers.js';

const ENDPOINT = 'http://upstream.test:11434';

describe('upstreamUrl', () => {
  it('should append the path to the base URL', () => {
    expect(upstreamUrl(ENDPOINT, '/api/tags').href).toBe('http://upstream.test:11434/api/tags');
  });

  it('should keep a base path prefix', () => {
    expect(upstreamUrl('http://proxy.test/ollama/', '/api/chat').href).toBe(
      'http://proxy.test/ollama/api/chat'
    );
  });

  it('should drop a query string on the base URL', () => {
    expect(upstreamUrl('http://upstream.test:11434/?x=1', '/api/tags').href).toBe(
      'http://upstream.test:11434/api/tags'
    );
  });
});

describe('classifyFetchError', () => {
  it('should classify socket errors from the cause', () => {
    expect(classifyFetchError(connectionRefused())).toBe('connection_refused');
    expect(
      classifyFetchError(new TypeError('fetch failed', { cause: { code: 'ENOTFOUND' } }))
    ).toBe('dns_failure');
    expect(
      classifyFetchError(new TypeError('fetch failed', { cause: { code: 'UND_ERR_CONNECT_TIMEOUT' } }))
    ).toBe('timeout');
  });

  it('should classify abort signals as timeouts', () => {
    expect(classifyFetchError(Object.assign(new Error('aborted'), { name: 'TimeoutError' }))).toBe('timeout');
    expect(classifyFetchError(Object.assign(new Error('aborted'), { name: 'AbortError' }))).toBe('timeout');
  });

  it('should fall back to request_error', () => {
    expect(classifyFetchError(new Error('boom'))).toBe('request_error');
    expect(classifyFetchError('boom')).toBe('request_error');
    expect(classifyFetchError(null)).toBe('request_error');
  });
});

describe('checkUpstream', () => {
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should report a reachable upstream', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ models: [] }));

    const health = await checkUpstream(ENDPOINT, 1000);

    expect(health.reachable).toBe(true);
    expect(health.detail).toBeUndefined();
    expect(health.checkedAt).toBeInstanceOf(Date);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(String(mockFetch.mock.calls[0][0])).toBe('http://upstream.test:11434/api/tags');
    expect(mockFetch.mock.calls[0][1]).toMatchObject({ method: 'GET' });
  });

  it('should accept a URL object', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ models: [] }));

    const health = await checkUpstream(new URL(ENDPOINT), 1000);

    expect(health.reachable).toBe(true);
  });

  it('should report a non-success status', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ error: 'overloaded' }, 503));

    const health = await checkUpstream(ENDPOINT, 1000);

    expect(health).toMatchObject({ reachable: false, detail: 'unexpected_status:503' });
  });

  it('should report a refused connection', async () => {
    mockFetch.mockRejectedValue(connectionRefused());

    const health = await checkUpstream(ENDPOINT, 1000);

    expect(health).toMatchObject({ reachable: false, detail: 'connection_refused' });
  });

  it('should report a DNS failure', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed', { cause: { code: 'ENOTFOUND' } }));

    const health = await checkUpstream(ENDPOINT, 1000);

    expect(health).toMatchObject({ reachable: false, detail: 'dns_failure' });
  });

  it('should give up after the timeout', async () => {
    mockFetch.mockImplementation(hangingFetch);

    const started = Date.now();
    const health = await checkUpstream(ENDPOINT, 30);

    expect(health).toMatchObject({ reachable: false, detail: 'timeout' });
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it('should not call fetch for an invalid endpoint', async () => {
    const health = await checkUpstream('not a url', 1000);

    expect(health).toMatchObject({ reachable: false, detail: 'invalid_endpoint' });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should probe afresh on every call', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ models: [] }))
      .mockRejectedValueOnce(connectionRefused());

    expect((await checkUpstream(ENDPOINT, 1000)).reachable).toBe(true);
    expect((await checkUpstream(ENDPOINT, 1000)).reachable).toBe(false);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });
});
