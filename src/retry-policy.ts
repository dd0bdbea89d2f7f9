/**
 * Retry Policy
 *
 * Decides whether an upstream failure is worth another attempt and how long
 * to wait first. Only the connection phase of an upstream call is ever
 * retried; once bytes reach the transcoder the policy is out of the loop.
 *
 * @packageDocumentation
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { RetryConfig } from './config.js';
import {
  ClientDisconnectedError,
  UpstreamRateLimitedError,
  UpstreamServerError,
  err,
  type GatewayError,
  type Result,
} from './errors.js';
import { silentLogger, type Logger } from './logger.js';

export type RandomSource = () => number;

export class RetryPolicy {
  readonly config: Readonly<RetryConfig>;
  private readonly random: RandomSource;

  constructor(config: RetryConfig, random: RandomSource = Math.random) {
    this.config = config;
    this.random = random;
  }

  isRetryable(error: GatewayError): boolean {
    if (error instanceof UpstreamServerError) return !error.callerFault;
    return error.kind === 'UpstreamTimeout' || error.kind === 'UpstreamRateLimited';
  }

  /**
   * Backoff before retry `attempt` (1-based). The result is never below the
   * base delay; jitter only adds.
   */
  delayFor(attempt: number, error?: GatewayError): number {
    const { initialDelayMs, multiplier, maxDelayMs, jitter } = this.config;
    let base = Math.min(maxDelayMs, initialDelayMs * multiplier ** (attempt - 1));

    if (error instanceof UpstreamRateLimitedError && error.retryAfterMs !== undefined) {
      base = Math.min(maxDelayMs, error.retryAfterMs);
    }

    return base + Math.floor(base * jitter * this.random());
  }

  /**
   * Run `op` until it succeeds, fails with a non-retryable error, or the
   * attempt budget runs out. The error returned carries the number of
   * attempts made.
   */
  async execute<T>(
    op: (attempt: number) => Promise<Result<T>>,
    signal: AbortSignal,
    logger: Logger = silentLogger,
  ): Promise<Result<T>> {
    const { maxAttempts } = this.config;

    for (let attempt = 1; ; attempt++) {
      if (signal.aborted) return err(new ClientDisconnectedError());

      logger.debug({ event: 'upstream.attempt', attempt }, 'Opening upstream call');
      const result = await op(attempt);
      if (result.ok) return result;

      const error = result.error;
      error.attempts = attempt;

      if (attempt >= maxAttempts || !this.isRetryable(error)) {
        return result;
      }

      const delayMs = this.delayFor(attempt, error);
      logger.warn(
        { event: 'upstream.retry', attempt, delayMs, kind: error.kind, upstreamStatus: error.upstreamStatus },
        `Upstream failed (${error.message}); retrying in ${delayMs}ms`,
      );

      try {
        await sleep(delayMs, undefined, { signal });
      } catch (cause) {
        if (signal.aborted) return err(new ClientDisconnectedError());
        throw cause;
      }
    }
  }
}
