/**
 * @fileoverview Maps provider HTTP failures onto InferenceError kinds.
 *
 * | status / failure        | kind            |
 * |-------------------------|-----------------|
 * | 401, 403                | Unauthorized    |
 * | 429                     | RateLimited     |
 * | 408, 5xx, network error | Transient       |
 * | anything else           | InvalidResponse |
 *
 * @module orga-runtime/providers/error-mapping
 */

import { InferenceError, toError } from '../types/errors.js';
import { isPlainObject } from '../context/conversation.js';

/**
 * Pulls a readable message out of a provider error body.
 */
export function extractMessage(body: unknown, fallback: string): string {
  if (isPlainObject(body)) {
    const error = body['error'];
    if (isPlainObject(error) && typeof error['message'] === 'string') return error['message'];
    if (typeof body['message'] === 'string') return body['message'];
    if (typeof error === 'string') return error;
  }
  if (typeof body === 'string' && body !== '') return body;
  return fallback;
}

/**
 * Reads `Retry-After` as milliseconds. Only the delta-seconds form is used.
 */
export function parseRetryAfter(headers: Headers | undefined): number | undefined {
  const raw = headers?.get('retry-after');
  if (raw === null || raw === undefined) return undefined;
  const seconds = Number.parseFloat(raw);
  return Number.isNaN(seconds) || seconds < 0 ? undefined : Math.round(seconds * 1000);
}

export function mapHttpError(status: number, body: unknown, provider: string, headers?: Headers): InferenceError {
  const message = `${provider}: ${extractMessage(body, `HTTP ${status}`)}`;

  if (status === 401 || status === 403) {
    return new InferenceError('Unauthorized', message, { statusCode: status });
  }
  if (status === 429) {
    const retryAfterMs = parseRetryAfter(headers);
    return new InferenceError('RateLimited', message, {
      statusCode: status,
      ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
    });
  }
  if (status === 408 || status >= 500) {
    return new InferenceError('Transient', message, { statusCode: status });
  }
  return new InferenceError('InvalidResponse', message, { statusCode: status });
}

/**
 * Wraps a rejected `fetch` (DNS, reset, timeout, abort) as Transient.
 */
export function mapNetworkError(cause: unknown, provider: string): InferenceError {
  if (cause instanceof InferenceError) return cause;
  const error = toError(cause);
  return new InferenceError('Transient', `${provider}: ${error.message}`, { cause: error });
}

export function invalidResponse(provider: string, detail: string): InferenceError {
  return new InferenceError('InvalidResponse', `${provider}: ${detail}`);
}
