import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { fetchMock } = vi.hoisted(() => ({ fetchMock: vi.fn() }));

vi.mock('node-fetch', () => ({ default: fetchMock }));

import { fetchJson, textOf } from '../tools/shared/web.js';

const opts = { timeoutMs: 100, userAgent: 'test-agent' };

function response(status: number, body: string) {
  return { ok: status >= 200 && status < 300, status, text: async () => body };
}

function hangUntilAborted(_url: string, init: { signal: AbortSignal }) {
  return new Promise((_resolve, reject) => {
    init.signal.addEventListener('abort', () => reject(new Error('The operation was aborted.')));
  });
}

describe('fetchJson', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('parses a JSON body', async () => {
    fetchMock.mockResolvedValue(response(200, '{"AbstractText":"Otters"}'));

    await expect(fetchJson('https://api.example.test/', opts)).resolves.toEqual({
      status: 'success',
      value: { AbstractText: 'Otters' }
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.example.test/');
    expect(init.headers).toEqual({ 'User-Agent': 'test-agent', 'Accept': 'application/json' });
  });

  it('reports non-success statuses', async () => {
    fetchMock.mockResolvedValue(response(503, 'unavailable'));

    await expect(fetchJson('https://api.example.test/', opts)).resolves.toEqual({
      status: 'failure',
      reason: 'HTTP 503'
    });
  });

  it('treats a blank body as empty', async () => {
    fetchMock.mockResolvedValue(response(200, '  '));

    await expect(fetchJson('https://api.example.test/', opts)).resolves.toEqual({ status: 'empty' });
  });

  it('reports malformed JSON as a failure', async () => {
    fetchMock.mockResolvedValue(response(200, '<html>'));

    const result = await fetchJson('https://api.example.test/', opts);
    expect(result.status).toBe('failure');
  });

  it('reports network errors', async () => {
    fetchMock.mockRejectedValue(new Error('getaddrinfo ENOTFOUND api.example.test'));

    await expect(fetchJson('https://api.example.test/', opts)).resolves.toEqual({
      status: 'failure',
      reason: 'getaddrinfo ENOTFOUND api.example.test'
    });
  });

  it('times out slow requests', async () => {
    vi.useFakeTimers();
    fetchMock.mockImplementation(hangUntilAborted);

    const pending = fetchJson('https://api.example.test/', opts);
    await vi.advanceTimersByTimeAsync(100);

    await expect(pending).resolves.toEqual({ status: 'failure', reason: 'timeout after 100ms' });
  });

  it('stops when the caller aborts', async () => {
    fetchMock.mockImplementation(hangUntilAborted);
    const ctrl = new AbortController();

    const pending = fetchJson('https://api.example.test/', { ...opts, timeoutMs: 10_000, signal: ctrl.signal });
    ctrl.abort();

    await expect(pending).resolves.toEqual({ status: 'failure', reason: 'aborted' });
  });

  it('does not start a request for an already aborted signal', async () => {
    const ctrl = new AbortController();
    ctrl.abort();

    await expect(fetchJson('https://api.example.test/', { ...opts, signal: ctrl.signal })).resolves.toEqual({
      status: 'failure',
      reason: 'aborted'
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('textOf', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns trimmed text on success', () => {
    expect(textOf({ status: 'success', value: '  Otters  ' }, 'Test')).toBe('Otters');
  });

  it('logs failures but not aborts', () => {
    expect(textOf({ status: 'failure', reason: 'HTTP 429' }, 'Test')).toBe('');
    expect(textOf({ status: 'failure', reason: 'aborted' }, 'Test')).toBe('');
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith('Test lookup failed: HTTP 429');
  });
});
