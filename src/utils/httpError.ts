import { ZodError } from 'zod';

export type HttpError = Error & { status: number; code: string };

export function httpError(status: number, code: string, message?: string): HttpError {
  return Object.assign(new Error(message ?? code), { status, code });
}

export interface NormalizedHttpError {
  status: number;
  body: { error: string; message?: string; details?: unknown };
}

function statusFrom(err: unknown): number {
  const status = typeof err === 'object' && err && 'status' in err ? Number(err.status) : NaN;
  return Number.isFinite(status) && status >= 400 && status < 600 ? status : 500;
}

export function toHttpError(err: unknown): NormalizedHttpError {
  if (err instanceof ZodError) {
    return { status: 400, body: { error: 'Bad Request', details: err.format() } };
  }
  const status = statusFrom(err);
  const code = typeof err === 'object' && err && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  const message = err instanceof Error ? err.message : undefined;
  const error = code ?? (status === 500 ? 'Internal Server Error' : message ?? 'Error');
  const body: NormalizedHttpError['body'] = { error };
  // internals of a 500 stay in the logs
  if (message && message !== error && status < 500) body.message = message;
  return { status, body };
}
