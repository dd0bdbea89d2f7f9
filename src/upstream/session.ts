/**
 * Live handle to one in-flight upstream completion call.
 * @packageDocumentation
 */

import type { Readable } from 'node:stream';
import { ClientDisconnectedError, err, ok, type Result } from '../errors.js';
import { classifyFailure } from './classify.js';

/**
 * Pull-based byte source. `null` marks the end of input.
 */
export interface ByteSource {
  read(): Promise<Result<Uint8Array | null>>;
}

export class UpstreamSession implements ByteSource {
  private readonly controller: AbortController;
  private readonly iterator: AsyncIterator<Uint8Array>;
  private readonly body: Readable;
  private pending: Uint8Array | null;
  private finished = false;
  private readonly unlink: () => void;

  /** Bytes handed to the reader so far, first chunk included. */
  bytesRead = 0;

  constructor(
    controller: AbortController,
    body: Readable,
    iterator: AsyncIterator<Uint8Array>,
    firstChunk: Uint8Array,
    parent: AbortSignal,
  ) {
    this.controller = controller;
    this.body = body;
    this.iterator = iterator;
    this.pending = firstChunk;

    const onParentAbort = () => this.cancel();
    parent.addEventListener('abort', onParentAbort, { once: true });
    this.unlink = () => parent.removeEventListener('abort', onParentAbort);
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  async read(): Promise<Result<Uint8Array | null>> {
    if (this.cancelled) return err(new ClientDisconnectedError());
    if (this.finished) return ok(null);

    if (this.pending) {
      const chunk = this.pending;
      this.pending = null;
      this.bytesRead += chunk.byteLength;
      return ok(chunk);
    }

    try {
      const next = await this.iterator.next();
      if (this.cancelled) return err(new ClientDisconnectedError());
      if (next.done) {
        this.close();
        return ok(null);
      }
      this.bytesRead += next.value.byteLength;
      return ok(next.value);
    } catch (cause) {
      this.close();
      return err(classifyFailure(cause, this.controller.signal, 'idle'));
    }
  }

  /** Abort the upstream request and drop the connection. Idempotent. */
  cancel(): void {
    if (!this.controller.signal.aborted) this.controller.abort();
    this.close();
  }

  /** Release the body without aborting. Idempotent. */
  close(): void {
    if (this.finished) return;
    this.finished = true;
    this.pending = null;
    this.unlink();
    this.body.destroy();
  }
}
