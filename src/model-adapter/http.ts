/**
 * HTTP helper for provider calls
 *
 * Every outbound request carries a timeout; failures surface as AdapterError.
 */

import { AdapterError } from './types';

export interface JsonRequestOptions {
  provider: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

export async function requestJson(url: string, options: JsonRequestOptions): Promise<unknown> {
  const { provider, method = 'POST', headers = {}, body, timeoutMs, signal } = options;

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  let response: Response;
  let text: string;
  try {
    if (signal?.aborted) {
      throw new AdapterError('Request was aborted', { code: 'REQUEST_ABORTED', provider, retryable: false });
    }
    response = await fetch(url, {
      method,
      headers: { 'Content-Type': 'application/json', ...headers },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: controller.signal,
    });
    // The body is read under the same deadline as the headers
    text = await untilAborted(response.text(), controller.signal);
  } catch (error) {
    if (error instanceof AdapterError) throw error;
    if (timedOut) {
      throw new AdapterError(`Request timed out after ${timeoutMs}ms`, {
        code: 'TIMEOUT',
        provider,
        retryable: true,
      });
    }
    if (signal?.aborted) {
      throw new AdapterError('Request was aborted', { code: 'REQUEST_ABORTED', provider, retryable: false });
    }
    throw new AdapterError(error instanceof Error ? error.message : String(error), {
      code: 'NETWORK_ERROR',
      provider,
      retryable: true,
      details: error,
    });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }

  if (!response.ok) {
    throw new AdapterError(extractErrorMessage(text) ?? `HTTP ${response.status}: ${response.statusText}`, {
      code: `HTTP_${response.status}`,
      provider,
      retryable: RETRYABLE_STATUSES.has(response.status),
      statusCode: response.status,
    });
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new AdapterError('Response body is not valid JSON', {
      code: 'INVALID_RESPONSE',
      provider,
      retryable: false,
      details: text.slice(0, 200),
    });
  }
}

function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error('Request was aborted'));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function extractErrorMessage(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed)) {
      const error = parsed.error;
      if (typeof error === 'string') return error;
      if (isRecord(error) && typeof error.message === 'string') return error.message;
      if (typeof parsed.message === 'string') return parsed.message;
    }
  } catch {
    // not JSON
  }
  return body.trim() === '' ? undefined : body.trim().slice(0, 200);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}
