/**
 * Stream Transcoder
 *
 * Converts the upstream `chat:completion` event stream into ordered
 * {@link StreamChunk}s. One transcoder serves exactly one upstream session.
 *
 * ```
 * Idle ──bytes──▶ Open ──event──▶ Emitting ──sentinel──▶ Done
 *                   │                 │
 *                   └──bad data / upstream error / early EOF──▶ Errored
 * ```
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import {
  UpstreamBadResponseError,
  UpstreamServerError,
  type GatewayError,
} from '../errors.js';
import type { StreamChunk, Usage } from '../types.js';
import type { ByteSource } from '../upstream/session.js';
import { SseDecoder } from './sse-parser.js';

export type TranscoderState = 'Idle' | 'Open' | 'Emitting' | 'Done' | 'Errored';

export type TranscoderEvent =
  | { kind: 'chunk'; chunk: StreamChunk }
  | { kind: 'error'; error: GatewayError; index: number }
  | { kind: 'done' };

const UPSTREAM_SENTINEL = '[DONE]';
const COMPLETION_EVENT_TYPE = 'chat:completion';

const UpstreamErrorSchema = z.union([
  z.string(),
  z
    .object({
      detail: z.string().optional(),
      message: z.string().optional(),
      code: z.union([z.string(), z.number()]).optional(),
    })
    .passthrough(),
]);

const UsageSchema = z
  .object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
    total_tokens: z.number().optional(),
  })
  .catchall(z.unknown());

const UpstreamEventSchema = z.object({
  type: z.string().optional(),
  data: z
    .object({
      phase: z.string().optional(),
      delta_content: z.string().nullish(),
      edit_content: z.string().nullish(),
      usage: UsageSchema.nullish(),
      error: UpstreamErrorSchema.nullish(),
    })
    .passthrough()
    .default({}),
});

type UpstreamEventData = z.infer<typeof UpstreamEventSchema>['data'];

type ChunkParts = Pick<StreamChunk, 'content' | 'reasoning' | 'usage'> & { finishReason?: StreamChunk['finishReason'] };

const TOOL_BLOCK_OPEN = /\n*<glm_block[^>]*>\{"type": "mcp", "data": \{"metadata": \{/g;
const TOOL_BLOCK_CLOSE = /", "result": "".*<\/glm_block>/gs;

function afterLast(text: string, marker: string): string {
  const at = text.lastIndexOf(marker);
  return at === -1 ? text : text.slice(at + marker.length);
}

function upstreamErrorMessage(error: z.infer<typeof UpstreamErrorSchema>): string {
  if (typeof error === 'string') return error;
  return error.detail ?? error.message ?? 'Upstream reported an error';
}

export class StreamTranscoder {
  private currentState: TranscoderState = 'Idle';
  private readonly sse = new SseDecoder();
  private nextIndex = 0;
  /** A chunk with a finish reason has been emitted. */
  private finished = false;

  get state(): TranscoderState {
    return this.currentState;
  }

  private get closed(): boolean {
    return this.currentState === 'Done' || this.currentState === 'Errored';
  }

  feed(bytes: Uint8Array): TranscoderEvent[] {
    if (this.closed) return [];
    if (this.currentState === 'Idle') this.currentState = 'Open';
    return this.handlePayloads(this.sse.push(bytes));
  }

  /** Upstream end of input. */
  end(): TranscoderEvent[] {
    if (this.closed) return [];
    const events = this.handlePayloads(this.sse.end());
    if (this.closed) return events;

    if (this.finished) {
      this.currentState = 'Done';
      events.push({ kind: 'done' });
    } else {
      events.push(this.error(new UpstreamBadResponseError('Upstream stream ended before completion')));
    }
    return events;
  }

  /** A read from the upstream failed mid-stream. */
  fail(error: GatewayError): TranscoderEvent[] {
    if (this.closed) return [];
    return [this.error(error)];
  }

  private handlePayloads(payloads: string[]): TranscoderEvent[] {
    const events: TranscoderEvent[] = [];
    for (const payload of payloads) {
      if (this.closed) break;
      this.handlePayload(payload, events);
    }
    return events;
  }

  private handlePayload(payload: string, out: TranscoderEvent[]): void {
    if (payload.trim() === UPSTREAM_SENTINEL) {
      this.complete(out);
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(payload);
    } catch {
      out.push(this.error(malformed('Upstream sent malformed JSON', payload)));
      return;
    }

    const parsed = UpstreamEventSchema.safeParse(json);
    if (!parsed.success) {
      out.push(this.error(malformed('Upstream event has an unexpected shape', payload)));
      return;
    }

    const event = parsed.data;
    if (event.type !== undefined && event.type !== COMPLETION_EVENT_TYPE) return;

    const data = event.data;
    if (data.error) {
      out.push(this.error(new UpstreamServerError(upstreamErrorMessage(data.error), { details: { in_stream: true } })));
      return;
    }

    switch (data.phase) {
      case 'thinking': {
        const text = afterLast(data.delta_content ?? '', '</summary>\n');
        if (text) out.push(this.chunk({ reasoning: text }));
        return;
      }
      case 'answer': {
        const text = afterLast(answerText(data), '</details>');
        if (text) out.push(this.chunk({ content: text }));
        return;
      }
      case 'tool_call': {
        const text = answerText(data).replace(TOOL_BLOCK_OPEN, '{').replace(TOOL_BLOCK_CLOSE, '');
        if (text) out.push(this.chunk({ content: text }));
        return;
      }
      case 'other': {
        const text = data.delta_content ?? '';
        if (this.finished) {
          if (text) out.push(this.chunk({ content: text }));
          return;
        }
        out.push(this.chunk({ content: text || undefined, finishReason: 'stop', usage: usageOf(data) }));
        return;
      }
      case 'done':
        this.complete(out);
        return;
      default:
        return;
    }
  }

  private complete(out: TranscoderEvent[]): void {
    if (!this.finished) out.push(this.chunk({ finishReason: 'stop' }));
    this.currentState = 'Done';
    out.push({ kind: 'done' });
  }

  private chunk(parts: ChunkParts): TranscoderEvent {
    const index = this.nextIndex++;
    const chunk: StreamChunk = { index, finishReason: parts.finishReason ?? null };
    if (index === 0) chunk.role = 'assistant';
    if (parts.content !== undefined) chunk.content = parts.content;
    if (parts.reasoning !== undefined) chunk.reasoning = parts.reasoning;
    if (parts.usage !== undefined) chunk.usage = parts.usage;
    if (chunk.finishReason !== null) this.finished = true;
    this.currentState = 'Emitting';
    return { kind: 'chunk', chunk };
  }

  private error(error: GatewayError): TranscoderEvent {
    this.currentState = 'Errored';
    return { kind: 'error', error, index: this.nextIndex++ };
  }
}

function answerText(data: UpstreamEventData): string {
  return data.delta_content || data.edit_content || '';
}

function usageOf(data: UpstreamEventData): Usage | undefined {
  const usage = data.usage;
  if (!usage || Object.keys(usage).length === 0) return undefined;
  return usage;
}

function malformed(message: string, payload: string): UpstreamBadResponseError {
  return new UpstreamBadResponseError(message, { details: { payload: payload.slice(0, 200) } });
}

/**
 * Pull bytes from `source` until the transcoder closes. Ends without an
 * event when the session is cancelled.
 */
export async function* transcode(
  source: ByteSource,
  transcoder: StreamTranscoder = new StreamTranscoder(),
): AsyncGenerator<TranscoderEvent, void, undefined> {
  while (transcoder.state !== 'Done' && transcoder.state !== 'Errored') {
    const read = await source.read();
    let events: TranscoderEvent[];
    if (!read.ok) {
      if (read.error.kind === 'ClientDisconnected') return;
      events = transcoder.fail(read.error);
    } else if (read.value === null) {
      events = transcoder.end();
    } else {
      events = transcoder.feed(read.value);
    }
    yield* events;
  }
}
