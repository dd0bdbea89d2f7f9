/**
 * Upstream HTTP client.
 *
 * One undici `Agent` per gateway carries the three phase timeouts:
 * `connect.timeout` for the TCP/TLS handshake, `headersTimeout` for the
 * first byte and `bodyTimeout` for gaps between body chunks.
 *
 * @packageDocumentation
 */

import type { Readable } from 'node:stream';
import { Agent, FormData, request } from 'undici';
import type { UpstreamConfig } from '../config.js';
import {
  ClientDisconnectedError,
  PayloadTooLargeError,
  UpstreamBadResponseError,
  UpstreamServerError,
  err,
  ok,
  type Result,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { classifyFailure, classifyStatus } from './classify.js';
import { UpstreamSession } from './session.js';

export const COMPLETIONS_PATH = '/api/chat/completions';
export const MODELS_PATH = '/api/models';
export const FILES_PATH = '/api/v1/files/';

type ResponseData = Awaited<ReturnType<typeof request>>;

export interface UploadInput {
  body: Readable;
  contentType: string;
  contentLength?: number;
}

export interface UploadResponse {
  statusCode: number;
  body: unknown;
}

/** A file held in memory, sent as the `file` field of a multipart form. */
export interface AttachmentFile {
  data: Buffer;
  filename: string;
  contentType: string;
}

export interface FetchedAttachment {
  statusCode: number;
  contentType: string | undefined;
  data: Buffer;
}

export class UpstreamClient {
  private readonly config: UpstreamConfig;
  private readonly agent: Agent;
  private readonly logger: Logger;

  constructor(config: UpstreamConfig, logger: Logger = silentLogger) {
    this.config = config;
    this.logger = logger;
    this.agent = new Agent({
      connect: { timeout: config.connectTimeoutMs },
      headersTimeout: config.firstByteTimeoutMs,
      bodyTimeout: config.idleTimeoutMs,
    });
  }

  private url(path: string): string {
    return `${this.config.baseUrl}${path}`;
  }

  private headers(extra: Record<string, string>): Record<string, string> {
    const headers: Record<string, string> = { ...extra };
    if (this.config.apiKey) headers['authorization'] = `Bearer ${this.config.apiKey}`;
    return headers;
  }

  /**
   * Start a streaming completion. Resolves once the first body chunk has
   * arrived, which ends the connection phase.
   */
  async openCompletion(payload: unknown, signal: AbortSignal): Promise<Result<UpstreamSession>> {
    if (signal.aborted) return err(new ClientDisconnectedError());

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal.addEventListener('abort', onAbort, { once: true });
    const unlink = () => signal.removeEventListener('abort', onAbort);

    let response: ResponseData;
    try {
      response = await request(this.url(COMPLETIONS_PATH), {
        method: 'POST',
        dispatcher: this.agent,
        signal: controller.signal,
        headers: this.headers({ 'content-type': 'application/json', accept: 'text/event-stream' }),
        body: JSON.stringify(payload),
      });
    } catch (cause) {
      unlink();
      return err(classifyFailure(cause, controller.signal, 'first-byte'));
    }

    if (response.statusCode !== 200) {
      unlink();
      const text = await readText(response);
      return err(classifyStatus(response.statusCode, response.headers, text));
    }

    const body = response.body;
    const iterator: AsyncIterator<Uint8Array> = body[Symbol.asyncIterator]();
    let first: IteratorResult<Uint8Array>;
    try {
      first = await iterator.next();
    } catch (cause) {
      unlink();
      body.destroy();
      return err(classifyFailure(cause, controller.signal, 'first-byte'));
    }

    unlink();
    if (first.done) {
      return err(new UpstreamServerError('Upstream closed the stream without sending data', { upstreamStatus: 200 }));
    }
    if (controller.signal.aborted) {
      body.destroy();
      return err(new ClientDisconnectedError());
    }

    return ok(new UpstreamSession(controller, body, iterator, first.value, signal));
  }

  /** Raw JSON of the upstream model listing. */
  async listModels(signal?: AbortSignal): Promise<Result<unknown>> {
    const guard = signal ?? new AbortController().signal;
    try {
      const response = await request(this.url(MODELS_PATH), {
        method: 'GET',
        dispatcher: this.agent,
        signal: guard,
        headers: this.headers({ accept: 'application/json' }),
      });
      if (response.statusCode !== 200) {
        const text = await readText(response);
        return err(classifyStatus(response.statusCode, response.headers, text));
      }
      return await readJson(response);
    } catch (cause) {
      return err(classifyFailure(cause, guard, 'first-byte'));
    }
  }

  /**
   * Forward a multipart body as-is. Never retried: a consumed stream cannot
   * be replayed.
   */
  async uploadFile(input: UploadInput, signal: AbortSignal): Promise<Result<UploadResponse>> {
    const headers: Record<string, string> = { 'content-type': input.contentType };
    if (input.contentLength !== undefined) headers['content-length'] = String(input.contentLength);
    return this.postFile(input.body, headers, signal);
  }

  /** Upload an in-memory file; undici writes the multipart envelope. */
  async uploadAttachment(file: AttachmentFile, signal: AbortSignal): Promise<Result<UploadResponse>> {
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(file.data)], { type: file.contentType }), file.filename);
    return this.postFile(form, {}, signal);
  }

  /**
   * Download a client-referenced attachment through the gateway's agent.
   * Stops reading once `maxBytes` is crossed.
   */
  async fetchAttachment(url: string, maxBytes: number, signal: AbortSignal): Promise<Result<FetchedAttachment>> {
    try {
      const response = await request(url, { method: 'GET', dispatcher: this.agent, signal });
      const contentType = response.headers['content-type'];
      const body: AsyncIterable<Uint8Array> = response.body;
      const chunks: Buffer[] = [];
      let size = 0;
      for await (const chunk of body) {
        const buf = Buffer.from(chunk);
        size += buf.length;
        if (size > maxBytes) {
          response.body.destroy();
          return err(new PayloadTooLargeError(`Attachment exceeds ${maxBytes} bytes`, { details: { max_bytes: maxBytes } }));
        }
        chunks.push(buf);
      }
      return ok({
        statusCode: response.statusCode,
        contentType: typeof contentType === 'string' ? contentType : undefined,
        data: Buffer.concat(chunks),
      });
    } catch (cause) {
      return err(classifyFailure(cause, signal, 'first-byte'));
    }
  }

  private async postFile(
    body: Readable | FormData,
    headers: Record<string, string>,
    signal: AbortSignal,
  ): Promise<Result<UploadResponse>> {
    try {
      const response = await request(this.url(FILES_PATH), {
        method: 'POST',
        dispatcher: this.agent,
        signal,
        headers: this.headers({ ...headers, accept: 'application/json' }),
        body,
      });
      if (response.statusCode < 200 || response.statusCode >= 300) {
        const text = await readText(response);
        return err(classifyStatus(response.statusCode, response.headers, text));
      }
      const json = await readJson(response);
      if (!json.ok) return json;
      return ok({ statusCode: response.statusCode, body: json.value });
    } catch (cause) {
      return err(classifyFailure(cause, signal, 'idle'));
    }
  }

  async close(): Promise<void> {
    this.logger.debug('Closing upstream agent');
    await this.agent.close();
  }
}

async function readText(response: ResponseData): Promise<string> {
  try {
    return await response.body.text();
  } catch {
    // Error bodies are informational only.
    return '';
  }
}

async function readJson(response: ResponseData): Promise<Result<unknown>> {
  const text = await response.body.text();
  try {
    return ok(JSON.parse(text));
  } catch {
    return err(
      new UpstreamBadResponseError('Upstream returned a body that is not JSON', {
        upstreamStatus: response.statusCode,
        details: { upstream_body: text.slice(0, 200) },
      }),
    );
  }
}
