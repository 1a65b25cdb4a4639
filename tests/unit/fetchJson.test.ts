/**
 * Unit tests for the JSON fetch helper
 */

import { fetchJson } from '../../src/lib/http/fetchJson';
import { DataFetchError } from '../../src/lib/utils/errors';
import { fetchCall, headerOf, jsonResponse, textResponse } from '../helpers/http';

describe('fetchJson', () => {
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return the parsed body of a GET', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ seasonScheduleYear: 2020 }));

    const data = await fetchJson({ service: 'nba', url: 'https://data.nba.test/today.json', timeoutMs: 1000 });

    expect(data).toEqual({ seasonScheduleYear: 2020 });
    const { url, init } = fetchCall(fetchSpy, 0);
    expect(url).toBe('https://data.nba.test/today.json');
    expect(init.method).toBe('GET');
    expect(headerOf(init, 'Accept')).toBe('application/json');
  });

  it('should send a form as urlencoded', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ ok: true }));

    await fetchJson({
      service: 'reddit',
      url: 'https://oauth.reddit.test/api/submit',
      method: 'POST',
      headers: { 'User-Agent': 'test-agent' },
      form: { title: 'Hello world', kind: 'self' },
      timeoutMs: 1000,
    });

    const { init } = fetchCall(fetchSpy, 0);
    expect(init.method).toBe('POST');
    expect(String(init.body)).toBe('title=Hello+world&kind=self');
    expect(headerOf(init, 'Content-Type')).toBe('application/x-www-form-urlencoded');
    expect(headerOf(init, 'User-Agent')).toBe('test-agent');
  });

  it('should raise a DataFetchError with the status for error responses', async () => {
    fetchSpy.mockResolvedValueOnce(textResponse('Service Unavailable', 503));

    const request = fetchJson({ service: 'nba', url: 'https://data.nba.test/x.json', timeoutMs: 1000 });

    await expect(request).rejects.toThrow(DataFetchError);
    await expect(request).rejects.toMatchObject({
      message: 'nba request failed: 503 - Service Unavailable',
      service: 'nba',
      url: 'https://data.nba.test/x.json',
      status: 503,
    });
  });

  it('should wrap network failures', async () => {
    const cause = new TypeError('fetch failed');
    fetchSpy.mockRejectedValueOnce(cause);

    await expect(
      fetchJson({ service: 'reddit', url: 'https://oauth.reddit.test/api/v1/me', timeoutMs: 1000 })
    ).rejects.toMatchObject({ message: 'reddit request failed: fetch failed', originalError: cause });
  });

  it('should abort after the timeout', async () => {
    fetchSpy.mockImplementationOnce(
      (_input: unknown, init?: RequestInit) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
          });
        })
    );

    await expect(
      fetchJson({ service: 'nba', url: 'https://data.nba.test/slow.json', timeoutMs: 10 })
    ).rejects.toMatchObject({ message: 'nba request timed out after 10ms' });
  });
});
