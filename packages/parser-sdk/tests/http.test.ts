import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fetchText, HttpStatusError } from '../src/http.js';

interface MockFetchResponse {
  ok: boolean;
  status?: number;
  text?: string;
  error?: Error;
}

function mockFetchSequence(responses: MockFetchResponse[]) {
  let idx = 0;
  const fetchMock = vi.fn().mockImplementation(() => {
    const response = responses[Math.min(idx, responses.length - 1)]!;
    idx += 1;

    if (response.error) {
      return Promise.reject(response.error);
    }

    return Promise.resolve({
      ok: response.ok,
      status: response.status ?? (response.ok ? 200 : 500),
      text: () => Promise.resolve(response.text ?? ''),
    });
  });

  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

const PAGE_URL = 'https://listings.example.com/page';
const NO_DELAY = { retryDelaysMs: [0] };

describe('fetchText', () => {
  beforeEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the response body', async () => {
    mockFetchSequence([{ ok: true, text: '<html>ok</html>' }]);
    await expect(fetchText(PAGE_URL, NO_DELAY)).resolves.toBe('<html>ok</html>');
  });

  it('sends a browser user agent', async () => {
    const fetchMock = mockFetchSequence([{ ok: true, text: '' }]);
    await fetchText(PAGE_URL, NO_DELAY);

    const [, init] = fetchMock.mock.calls[0]!;
    expect(init.headers['User-Agent']).toMatch(/^Mozilla\/5\.0/);
  });

  it('retries on 503 and succeeds', async () => {
    const fetchMock = mockFetchSequence([{ ok: false, status: 503 }, { ok: true, text: 'second' }]);

    await expect(fetchText(PAGE_URL, NO_DELAY)).resolves.toBe('second');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('retries on network errors', async () => {
    const fetchMock = mockFetchSequence([{ ok: false, error: new Error('socket hang up') }, { ok: true, text: 'body' }]);

    await expect(fetchText(PAGE_URL, NO_DELAY)).resolves.toBe('body');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('throws immediately on 404 without retries', async () => {
    const fetchMock = mockFetchSequence([{ ok: false, status: 404 }]);

    await expect(fetchText(PAGE_URL, NO_DELAY)).rejects.toThrow(`GET ${PAGE_URL} returned 404`);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxAttempts with the last error', async () => {
    const fetchMock = mockFetchSequence([{ ok: false, status: 500 }]);

    const error = await fetchText(PAGE_URL, { ...NO_DELAY, maxAttempts: 2 }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({ status: 500, url: PAGE_URL });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('uses an injected fetch implementation', async () => {
    const fetchImpl = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      text: () => Promise.resolve('injected'),
    });

    await expect(fetchText(PAGE_URL, { fetchImpl })).resolves.toBe('injected');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});
