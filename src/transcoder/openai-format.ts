/**
 * OpenAI wire encoders for transcoded chunks.
 * @packageDocumentation
 */

import type { GatewayError } from '../errors.js';
import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionChunkDelta,
  FinishReason,
  StreamChunk,
  ToolCall,
  Usage,
} from '../types.js';

/** Identity shared by every object of one completion. */
export interface CompletionMeta {
  id: string;
  created: number;
  model: string;
}

export const SSE_DONE = 'data: [DONE]\n\n';

export function encodeSse(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export function toChunkObject(chunk: StreamChunk, meta: CompletionMeta): ChatCompletionChunk {
  const delta: ChatCompletionChunkDelta = {};
  if (chunk.role) delta.role = chunk.role;
  if (chunk.reasoning !== undefined) delta.reasoning_content = chunk.reasoning;
  if (chunk.content !== undefined) delta.content = chunk.content;
  if (chunk.toolCalls) delta.tool_calls = chunk.toolCalls.map((call, index) => ({ index, ...call }));

  const out: ChatCompletionChunk = {
    id: meta.id,
    object: 'chat.completion.chunk',
    created: meta.created,
    model: meta.model,
    choices: [{ index: 0, delta, finish_reason: chunk.finishReason }],
  };
  if (chunk.usage) out.usage = chunk.usage;
  return out;
}

/**
 * Terminal frame for a stream that failed after it started.
 */
export function toErrorChunk(error: GatewayError, meta: CompletionMeta): ChatCompletionChunk {
  return {
    id: meta.id,
    object: 'chat.completion.chunk',
    created: meta.created,
    model: meta.model,
    choices: [{ index: 0, delta: {}, finish_reason: 'error' }],
    error: { message: error.publicMessage(), type: error.type, code: error.status },
  };
}

/**
 * Folds streamed chunks into one `chat.completion`.
 */
export class CompletionAggregator {
  private content = '';
  private reasoning = '';
  private finishReason: FinishReason = 'stop';
  private usage: Usage | undefined;
  private toolCalls: ToolCall[] = [];

  add(chunk: StreamChunk): void {
    if (chunk.content) this.content += chunk.content;
    if (chunk.reasoning) this.reasoning += chunk.reasoning;
    if (chunk.finishReason) this.finishReason = chunk.finishReason;
    if (chunk.usage) this.usage = chunk.usage;
    if (chunk.toolCalls) this.toolCalls.push(...chunk.toolCalls);
  }

  build(meta: CompletionMeta): ChatCompletion {
    const message: ChatCompletion['choices'][number]['message'] = { role: 'assistant', content: this.content };
    if (this.reasoning) message.reasoning_content = this.reasoning;
    if (this.toolCalls.length > 0) message.tool_calls = this.toolCalls;

    const out: ChatCompletion = {
      id: meta.id,
      object: 'chat.completion',
      created: meta.created,
      model: meta.model,
      choices: [{ index: 0, message, finish_reason: this.finishReason }],
    };
    if (this.usage) out.usage = this.usage;
    return out;
  }
}
