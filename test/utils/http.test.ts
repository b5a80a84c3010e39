import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { jsonResponse, textResponse } from '../helpers/fetchMock.js';
import { classifyStatus, fetchJson } from '../../src/utils/http.js';

const mocks = vi.hoisted(() => ({ fetch: vi.fn() }));
vi.mock('node-fetch', () => ({ default: mocks.fetch }));

const Schema = z.object({ value: z.number() });

afterEach(() => {
  mocks.fetch.mockReset();
});

describe('classifyStatus', () => {
  it('maps auth, rate limit and everything else', () => {
    expect(classifyStatus(401)).toBe('Unauthorized');
    expect(classifyStatus(403)).toBe('Unauthorized');
    expect(classifyStatus(429)).toBe('RateLimited');
    expect(classifyStatus(500)).toBe('Unreachable');
    expect(classifyStatus(404)).toBe('Unreachable');
  });
});

describe('fetchJson', () => {
  it('returns the validated payload', async () => {
    mocks.fetch.mockResolvedValue(jsonResponse({ value: 4.2, extra: true }));
    const res = await fetchJson('weather', 'https://example.test/a', Schema);
    expect(res).toEqual({ ok: true, value: { value: 4.2 } });
    expect(mocks.fetch).toHaveBeenCalledWith('https://example.test/a', expect.objectContaining({ method: 'GET' }));
  });

  it('classifies HTTP failures', async () => {
    mocks.fetch.mockResolvedValue(textResponse('bad key', 401));
    const res = await fetchJson('earthObservation', 'https://example.test/a', Schema);
    expect(res).toEqual({
      ok: false,
      error: { kind: 'Unauthorized', source: 'earthObservation', message: 'earthObservation 401: bad key', status: 401 },
    });
  });

  it('reports rate limiting', async () => {
    mocks.fetch.mockResolvedValue(textResponse('slow down', 429));
    const res = await fetchJson('chat', 'https://example.test/a', Schema);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.kind).toBe('RateLimited');
  });

  it('treats network errors and timeouts as Unreachable', async () => {
    mocks.fetch.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND example.test'));
    const offline = await fetchJson('weather', 'https://example.test/a', Schema);
    expect(offline).toEqual({
      ok: false,
      error: { kind: 'Unreachable', source: 'weather', message: 'getaddrinfo ENOTFOUND example.test' },
    });

    mocks.fetch.mockRejectedValueOnce(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }));
    const slow = await fetchJson('weather', 'https://example.test/a', Schema);
    expect(slow).toEqual({ ok: false, error: { kind: 'Unreachable', source: 'weather', message: 'request timed out' } });
  });

  it('treats a timeout while reading the body as Unreachable', async () => {
    const aborted = () => Promise.reject(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }));

    mocks.fetch.mockResolvedValueOnce({ ...jsonResponse({ value: 1 }), json: aborted });
    expect(await fetchJson('weather', 'https://example.test/a', Schema)).toEqual({
      ok: false,
      error: { kind: 'Unreachable', source: 'weather', message: 'request timed out' },
    });

    mocks.fetch.mockResolvedValueOnce({ ...textResponse('', 503), text: aborted });
    expect(await fetchJson('weather', 'https://example.test/a', Schema)).toEqual({
      ok: false,
      error: { kind: 'Unreachable', source: 'weather', message: 'request timed out', status: 503 },
    });
  });

  it('flags payloads that do not match the schema', async () => {
    mocks.fetch.mockResolvedValue(jsonResponse({ value: 'warm' }));
    const res = await fetchJson('airQuality', 'https://example.test/a', Schema);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.kind).toBe('MalformedResponse');
      expect(res.error.message).toMatch(/^unexpected payload \(value: /);
    }
  });

  it('flags bodies that are not JSON', async () => {
    mocks.fetch.mockResolvedValue(textResponse('<html>', 200));
    const res = await fetchJson('weather', 'https://example.test/a', Schema);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.kind).toBe('MalformedResponse');
  });
});
