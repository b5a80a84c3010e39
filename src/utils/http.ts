import fetch from 'node-fetch';
import type { Response } from 'node-fetch';
import type { z, ZodTypeAny } from 'zod';
import { fail, ok, type AdapterError, type AdapterErrorKind, type FetchResult, type SourceName } from '../types.js';

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface JsonRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export function classifyStatus(status: number): AdapterErrorKind {
  if (status === 401 || status === 403) return 'Unauthorized';
  if (status === 429) return 'RateLimited';
  return 'Unreachable';
}

const isTimeout = (err: unknown) =>
  err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');

function describe(err: unknown): string {
  if (isTimeout(err)) return 'request timed out';
  return err instanceof Error ? err.message : String(err);
}

/**
 * Call an upstream JSON endpoint and validate the payload against `schema`.
 * Never throws for upstream problems: every failure comes back as an AdapterError.
 */
export async function fetchJson<S extends ZodTypeAny>(
  source: SourceName,
  url: string,
  schema: S,
  req: JsonRequest = {},
): Promise<FetchResult<z.output<S>>> {
  const error = (kind: AdapterErrorKind, message: string, status?: number): AdapterError =>
    status === undefined ? { kind, source, message } : { kind, source, message, status };

  let resp: Response;
  try {
    resp = await fetch(url, {
      method: req.method ?? 'GET',
      headers: { Accept: 'application/json', ...req.headers },
      body: req.body,
      signal: AbortSignal.timeout(req.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (err) {
    return fail(error('Unreachable', describe(err)));
  }

  // the timeout signal also covers reading the body
  if (!resp.ok) {
    let text: string;
    try {
      text = await resp.text();
    } catch (err) {
      if (isTimeout(err)) return fail(error('Unreachable', describe(err), resp.status));
      text = '';
    }
    return fail(error(classifyStatus(resp.status), `${source} ${resp.status}: ${text || resp.statusText}`, resp.status));
  }

  let body: unknown;
  try {
    body = await resp.json();
  } catch (err) {
    if (isTimeout(err)) return fail(error('Unreachable', describe(err)));
    return fail(error('MalformedResponse', `invalid JSON: ${describe(err)}`));
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'unexpected shape';
    return fail(error('MalformedResponse', `unexpected payload (${where})`));
  }
  return ok(parsed.data);
}
