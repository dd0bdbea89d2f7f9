/**
 * Gateway error taxonomy and the Result type components return.
 *
 * Components never throw across their boundaries: failures travel as
 * `{ ok: false, error }` values and are mapped to HTTP responses once,
 * at the server edge.
 *
 * @packageDocumentation
 */

export type Result<T, E = GatewayError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E = GatewayError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type ErrorKind =
  | 'Unauthorized'
  | 'ValidationError'
  | 'ModelNotFound'
  | 'PayloadTooLarge'
  | 'UpstreamTimeout'
  | 'UpstreamServerError'
  | 'UpstreamRateLimited'
  | 'UpstreamBadResponse'
  | 'InternalError'
  | 'ClientDisconnected';

/** Which phase of an upstream call ran out of time. */
export type TimeoutPhase = 'connect' | 'first-byte' | 'idle';

/**
 * OpenAI-style error body.
 */
export interface ErrorBody {
  error: {
    message: string;
    type: string;
    code: number;
    param?: string;
    upstream_status?: number;
    attempts?: number;
    details?: Record<string, unknown>;
  };
}

export interface GatewayErrorOptions {
  upstreamStatus?: number;
  param?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export abstract class GatewayError extends Error {
  abstract readonly kind: ErrorKind;
  /** HTTP status sent to the client. */
  abstract readonly status: number;
  /** OpenAI `error.type` string. */
  abstract readonly type: string;

  readonly upstreamStatus: number | undefined;
  readonly param: string | undefined;
  details: Record<string, unknown> | undefined;
  /** Number of upstream attempts made before this error surfaced. */
  attempts: number | undefined;

  constructor(message: string, opts: GatewayErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.upstreamStatus = opts.upstreamStatus;
    this.param = opts.param;
    this.details = opts.details;
  }

  /** Merge extra context into `details`. */
  addDetails(extra: Record<string, unknown>): this {
    this.details = { ...this.details, ...extra };
    return this;
  }

  /** Message safe to send to the client. */
  publicMessage(): string {
    return this.message;
  }

  toBody(): ErrorBody {
    const body: ErrorBody = {
      error: { message: this.publicMessage(), type: this.type, code: this.status },
    };
    if (this.param !== undefined) body.error.param = this.param;
    if (this.upstreamStatus !== undefined) body.error.upstream_status = this.upstreamStatus;
    if (this.attempts !== undefined) body.error.attempts = this.attempts;
    if (this.details !== undefined) body.error.details = this.details;
    return body;
  }
}

export class UnauthorizedError extends GatewayError {
  readonly kind = 'Unauthorized';
  readonly status = 401;
  readonly type = 'authentication_error';
}

export class ValidationError extends GatewayError {
  readonly kind = 'ValidationError';
  readonly status = 400;
  readonly type = 'invalid_request_error';
}

export class ModelNotFoundError extends GatewayError {
  readonly kind = 'ModelNotFound';
  readonly status = 404;
  readonly type = 'model_not_found';
  readonly modelId: string;

  constructor(modelId: string) {
    super(`The model '${modelId}' does not exist. Use GET /v1/models to list available models.`, {
      param: 'model',
    });
    this.modelId = modelId;
  }
}

export class PayloadTooLargeError extends GatewayError {
  readonly kind = 'PayloadTooLarge';
  readonly status = 413;
  readonly type = 'payload_too_large';
}

export class UpstreamTimeoutError extends GatewayError {
  readonly kind = 'UpstreamTimeout';
  readonly status = 504;
  readonly type = 'upstream_timeout';
  readonly phase: TimeoutPhase;

  constructor(phase: TimeoutPhase, opts: GatewayErrorOptions = {}) {
    super(`Upstream ${phase} timeout`, opts);
    this.phase = phase;
  }
}

export class UpstreamServerError extends GatewayError {
  readonly kind = 'UpstreamServerError';
  readonly status = 502;
  readonly type = 'upstream_server_error';
  /** Set when the upstream blames the request itself; such failures are not retried. */
  readonly callerFault: boolean;

  constructor(message: string, opts: GatewayErrorOptions & { callerFault?: boolean } = {}) {
    super(message, opts);
    this.callerFault = opts.callerFault ?? false;
  }
}

export class UpstreamRateLimitedError extends GatewayError {
  readonly kind = 'UpstreamRateLimited';
  readonly status = 502;
  readonly type = 'upstream_rate_limited';
  /** Delay requested through `Retry-After`, when the upstream sent one. */
  readonly retryAfterMs: number | undefined;

  constructor(message: string, opts: GatewayErrorOptions & { retryAfterMs?: number } = {}) {
    super(message, { ...opts, upstreamStatus: opts.upstreamStatus ?? 429 });
    this.retryAfterMs = opts.retryAfterMs;
  }
}

export class UpstreamBadResponseError extends GatewayError {
  readonly kind = 'UpstreamBadResponse';
  readonly status = 502;
  readonly type = 'upstream_bad_response';
}

export class InternalError extends GatewayError {
  readonly kind = 'InternalError';
  readonly status = 500;
  readonly type = 'internal_error';

  publicMessage(): string {
    return 'Internal server error';
  }
}

/** The client went away; nothing is written back. */
export class ClientDisconnectedError extends GatewayError {
  readonly kind = 'ClientDisconnected';
  readonly status = 499;
  readonly type = 'client_disconnected';

  constructor() {
    super('Client disconnected');
  }
}

/** Wraps anything thrown by a defect into an InternalError. */
export function toInternalError(cause: unknown): InternalError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return new InternalError(message, { cause });
}

/** Reads the `code` of a Node or undici error, looking through `cause` as well. */
export function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  if ('code' in value && typeof value.code === 'string') return value.code;
  if ('cause' in value) return errorCode(value.cause);
  return undefined;
}
