/**
 * Upload Relay
 *
 * Streams a client's multipart upload to the upstream file endpoint without
 * buffering it. Uploads are never retried; a failure carries enough context
 * (`bytes_sent`, upstream status, `retryable`) for the client to decide.
 *
 * @packageDocumentation
 */

import { Transform, type Readable, type TransformCallback } from 'node:stream';
import { z } from 'zod';
import {
  PayloadTooLargeError,
  UpstreamBadResponseError,
  ValidationError,
  err,
  ok,
  type GatewayError,
  type Result,
} from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { RetryPolicy } from './retry-policy.js';
import type { FileObject } from './types.js';
import type { UpstreamClient } from './upstream/client.js';

export interface RelayInput {
  body: Readable;
  contentType: string | undefined;
  /** Declared `Content-Length`, when the client sent one. */
  contentLength: number | undefined;
}

export interface UploadRelayOptions {
  upstream: Pick<UpstreamClient, 'uploadFile'>;
  maxBytes: number;
  /** Only consulted for the `retryable` hint; uploads are not retried. */
  retry: Pick<RetryPolicy, 'isRetryable'>;
  logger?: Logger;
  now?: () => number;
}

const UpstreamFileSchema = z
  .object({
    id: z.string().min(1),
    filename: z.string().optional(),
    created_at: z.number().optional(),
    meta: z
      .object({
        name: z.string().optional(),
        size: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/** Counts bytes through and fails once the limit is crossed. */
class ByteCounter extends Transform {
  bytes = 0;
  exceeded = false;
  private readonly limit: number;

  constructor(limit: number) {
    super();
    this.limit = limit;
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    if (this.bytes > this.limit) {
      this.exceeded = true;
      callback(new PayloadTooLargeError(`Upload exceeds ${this.limit} bytes`));
      return;
    }
    callback(null, chunk);
  }
}

function isMultipart(contentType: string | undefined): contentType is string {
  return contentType !== undefined && /^multipart\/form-data\s*;.*boundary=/i.test(contentType);
}

export class UploadRelay {
  private readonly upstream: Pick<UpstreamClient, 'uploadFile'>;
  private readonly maxBytes: number;
  private readonly retry: Pick<RetryPolicy, 'isRetryable'>;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(opts: UploadRelayOptions) {
    this.upstream = opts.upstream;
    this.maxBytes = opts.maxBytes;
    this.retry = opts.retry;
    this.logger = opts.logger ?? silentLogger;
    this.now = opts.now ?? Date.now;
  }

  async relay(input: RelayInput, signal: AbortSignal, logger: Logger = this.logger): Promise<Result<FileObject>> {
    if (!isMultipart(input.contentType)) {
      return err(new ValidationError('Content-Type must be multipart/form-data with a boundary', { param: 'file' }));
    }
    if (input.contentLength !== undefined && input.contentLength > this.maxBytes) {
      return err(
        new PayloadTooLargeError(`Upload of ${input.contentLength} bytes exceeds ${this.maxBytes} bytes`, {
          details: { max_bytes: this.maxBytes },
        }),
      );
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal.addEventListener('abort', onAbort, { once: true });

    const counter = new ByteCounter(this.maxBytes);
    counter.on('error', () => controller.abort());
    input.body.on('error', (cause) => counter.destroy(cause));
    input.body.pipe(counter);

    const started = this.now();
    const result = await this.upstream.uploadFile(
      { body: counter, contentType: input.contentType, contentLength: input.contentLength },
      controller.signal,
    );
    signal.removeEventListener('abort', onAbort);

    if (!result.ok) {
      input.body.unpipe(counter);
      counter.destroy();
      const error: GatewayError = counter.exceeded
        ? new PayloadTooLargeError(`Upload exceeds ${this.maxBytes} bytes`, { details: { max_bytes: this.maxBytes } })
        : result.error;
      error.addDetails({
        bytes_sent: counter.bytes,
        retryable: this.retry.isRetryable(error),
      });
      logger.warn(
        { event: 'upload.failed', kind: error.kind, bytesSent: counter.bytes, upstreamStatus: error.upstreamStatus },
        'Upload relay failed',
      );
      return err(error);
    }

    const parsed = UpstreamFileSchema.safeParse(result.value.body);
    if (!parsed.success) {
      const error = new UpstreamBadResponseError('Upstream file response is missing an id', {
        upstreamStatus: result.value.statusCode,
      });
      return err(error.addDetails({ bytes_sent: counter.bytes, retryable: false }));
    }

    const file = parsed.data;
    const object: FileObject = {
      id: file.id,
      object: 'file',
      // Upper bound: the counted body includes part headers and boundaries.
      bytes: file.meta?.size ?? counter.bytes,
      created_at: file.created_at ?? Math.floor(this.now() / 1000),
      filename: file.filename ?? file.meta?.name ?? 'upload',
      purpose: 'assistants',
    };

    logger.info(
      { event: 'upload.completed', fileId: object.id, bytes: counter.bytes, durationMs: this.now() - started },
      'Upload relayed',
    );
    return ok(object);
  }
}
