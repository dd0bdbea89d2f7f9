/**
 * Maps undici failures and upstream HTTP statuses onto the gateway error
 * taxonomy.
 *
 * @packageDocumentation
 */

import type { IncomingHttpHeaders } from 'node:http';
import {
  ClientDisconnectedError,
  UpstreamBadResponseError,
  UpstreamRateLimitedError,
  UpstreamServerError,
  UpstreamTimeoutError,
  errorCode,
  toInternalError,
  type GatewayError,
  type TimeoutPhase,
} from '../errors.js';

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

/** Body snippet kept on upstream HTTP errors. */
const BODY_SNIPPET_CHARS = 200;

/**
 * Classify a thrown undici error.
 *
 * @param bodyPhase phase reported when the body timer fires
 */
export function classifyFailure(cause: unknown, signal: AbortSignal, bodyPhase: TimeoutPhase): GatewayError {
  if (signal.aborted) return new ClientDisconnectedError();

  const code = errorCode(cause);
  switch (code) {
    case 'UND_ERR_CONNECT_TIMEOUT':
      return new UpstreamTimeoutError('connect', { cause });
    case 'UND_ERR_HEADERS_TIMEOUT':
      return new UpstreamTimeoutError('first-byte', { cause });
    case 'UND_ERR_BODY_TIMEOUT':
      return new UpstreamTimeoutError(bodyPhase, { cause });
  }

  if (code !== undefined && CONNECTION_CODES.has(code)) {
    return new UpstreamServerError(`Upstream connection failed (${code})`, { cause, details: { code } });
  }
  return toInternalError(cause);
}

/**
 * `Retry-After` as milliseconds. Accepts delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | string[] | undefined, now: number = Date.now()): number | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (raw === undefined || raw.trim() === '') return undefined;

  const seconds = Number(raw);
  if (Number.isFinite(seconds)) return Math.max(0, Math.round(seconds * 1000));

  const date = Date.parse(raw);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

const CALLER_FAULT_PATTERN = /invalid[_ ]?request|bad[_ ]?request|invalid_argument|validation/i;

/**
 * Classify a non-2xx upstream response.
 */
export function classifyStatus(status: number, headers: IncomingHttpHeaders, bodyText: string): GatewayError {
  const snippet = bodyText.slice(0, BODY_SNIPPET_CHARS);
  const opts = { upstreamStatus: status, details: snippet ? { upstream_body: snippet } : undefined };

  if (status === 429) {
    return new UpstreamRateLimitedError('Upstream rate limited the request', {
      ...opts,
      retryAfterMs: parseRetryAfter(headers['retry-after']),
    });
  }
  if (status === 400 || status === 422) {
    return new UpstreamServerError(`Upstream rejected the request (${status})`, { ...opts, callerFault: true });
  }
  if (status >= 500) {
    return new UpstreamServerError(`Upstream returned ${status}`, {
      ...opts,
      callerFault: CALLER_FAULT_PATTERN.test(snippet),
    });
  }
  return new UpstreamBadResponseError(`Upstream returned unexpected status ${status}`, opts);
}
