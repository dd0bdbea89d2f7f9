/**
 * Completion Gateway
 *
 * Orchestrates one chat completion: validate, resolve the model, upload
 * attachments, open the upstream under the retry policy, then either
 * aggregate the transcoded stream or hand the caller a lazy sequence of
 * client events.
 *
 * @packageDocumentation
 */

import { nanoid } from 'nanoid';
import type { Principal } from '../auth-gate.js';
import {
  ClientDisconnectedError,
  ValidationError,
  err,
  ok,
  type GatewayError,
  type Result,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { ModelRegistry } from '../models/registry.js';
import type { RetryPolicy } from '../retry-policy.js';
import {
  CompletionAggregator,
  toChunkObject,
  toErrorChunk,
  type CompletionMeta,
} from '../transcoder/openai-format.js';
import { transcode, type TranscoderEvent } from '../transcoder/stream-transcoder.js';
import type { ChatCompletion, ChatCompletionChunk, ModelDescriptor } from '../types.js';
import type { UpstreamClient } from '../upstream/client.js';
import type { UpstreamSession } from '../upstream/session.js';
import type { AttachmentResolver } from './attachments.js';
import { ToolCallExtractor } from './tool-calls.js';
import { buildUpstreamBody } from './upstream-request.js';
import { hasAttachments, toolsEnabled, validateCompletionRequest, type CompletionRequest } from './validation.js';

/** What a streaming caller writes, one entry per frame. */
export type ClientEvent =
  | { kind: 'chunk'; data: ChatCompletionChunk }
  | { kind: 'error'; data: ChatCompletionChunk; error: GatewayError }
  | { kind: 'done' };

export type CompletionOutcome =
  | { kind: 'aggregate'; completion: ChatCompletion; attempts: number }
  | { kind: 'stream'; events: AsyncGenerator<ClientEvent, void, undefined>; attempts: number };

export type CompletionUpstream = Pick<UpstreamClient, 'openCompletion'>;
export type AttachmentSource = Pick<AttachmentResolver, 'resolve'>;

export interface CompletionGatewayOptions {
  registry: ModelRegistry;
  upstream: CompletionUpstream;
  attachments: AttachmentSource;
  retry: RetryPolicy;
  logger?: Logger;
  idFactory?: () => string;
  now?: () => number;
}

export class CompletionGateway {
  private readonly registry: ModelRegistry;
  private readonly upstream: CompletionUpstream;
  private readonly attachments: AttachmentSource;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly idFactory: () => string;
  private readonly now: () => number;

  constructor(opts: CompletionGatewayOptions) {
    this.registry = opts.registry;
    this.upstream = opts.upstream;
    this.attachments = opts.attachments;
    this.retry = opts.retry;
    this.logger = opts.logger ?? silentLogger;
    this.idFactory = opts.idFactory ?? nanoid;
    this.now = opts.now ?? Date.now;
  }

  async handle(
    body: unknown,
    principal: Principal,
    signal: AbortSignal,
    logger: Logger = this.logger,
  ): Promise<Result<CompletionOutcome>> {
    const validated = validateCompletionRequest(body);
    if (!validated.ok) return validated;
    const request = validated.value;

    const resolved = this.registry.resolve(request.model);
    if (!resolved.ok) return resolved;
    const model = resolved.value;

    const unsupported = checkCapabilities(request, model);
    if (unsupported) return err(unsupported);

    const log = logger.child({ model: model.id, stream: request.stream, principal: principal.fingerprint });
    const refs = await this.attachments.resolve(request, signal, log);
    if (!refs.ok) return refs;

    const payload = buildUpstreamBody(request, model, { chatId: this.idFactory(), messageId: this.idFactory() }, refs.value);
    const tools = toolsEnabled(request);
    if (tools) log.debug({ event: 'tools.enabled', count: request.tools?.length ?? 0 }, 'Tool calling enabled');

    let attempts = 0;
    const opened = await this.retry.execute(
      (attempt) => {
        attempts = attempt;
        return this.upstream.openCompletion(payload, signal);
      },
      signal,
      log,
    );
    if (!opened.ok) return opened;

    const session = opened.value;
    const meta: CompletionMeta = {
      id: `chatcmpl-${this.idFactory()}`,
      created: Math.floor(this.now() / 1000),
      model: request.model,
    };

    if (!request.stream) {
      const aggregated = await this.aggregate(session, meta, signal, log, tools);
      if (!aggregated.ok) {
        aggregated.error.attempts = attempts;
        return aggregated;
      }
      return ok({ kind: 'aggregate', completion: aggregated.value, attempts });
    }

    return ok({ kind: 'stream', events: this.stream(session, meta, signal, log, tools), attempts });
  }

  private async aggregate(
    session: UpstreamSession,
    meta: CompletionMeta,
    signal: AbortSignal,
    log: Logger,
    tools: boolean,
  ): Promise<Result<ChatCompletion>> {
    const aggregator = new CompletionAggregator();
    try {
      for await (const event of this.events(session, tools, log)) {
        if (event.kind === 'chunk') {
          aggregator.add(event.chunk);
        } else if (event.kind === 'error') {
          log.warn({ event: 'stream.errored', kind: event.error.kind, err: event.error.message }, 'Upstream stream failed');
          return err(event.error);
        } else {
          return ok(aggregator.build(meta));
        }
      }
    } finally {
      session.close();
    }

    if (signal.aborted) {
      log.info({ event: 'stream.cancelled', bytes: session.bytesRead }, 'Client went away during completion');
    }
    return err(new ClientDisconnectedError());
  }

  private async *stream(
    session: UpstreamSession,
    meta: CompletionMeta,
    signal: AbortSignal,
    log: Logger,
    tools: boolean,
  ): AsyncGenerator<ClientEvent, void, undefined> {
    const started = this.now();
    let chunks = 0;
    let finished = false;

    try {
      for await (const event of this.events(session, tools, log)) {
        if (signal.aborted) break;

        if (event.kind === 'chunk') {
          chunks++;
          yield { kind: 'chunk', data: toChunkObject(event.chunk, meta) };
        } else if (event.kind === 'error') {
          finished = true;
          log.warn(
            { event: 'stream.errored', kind: event.error.kind, err: event.error.message, chunks, index: event.index },
            'Upstream stream failed',
          );
          yield { kind: 'error', data: toErrorChunk(event.error, meta), error: event.error };
          return;
        } else {
          finished = true;
          log.info({ event: 'stream.completed', chunks, durationMs: this.now() - started }, 'Stream completed');
          yield { kind: 'done' };
          return;
        }
      }
    } finally {
      if (!finished) {
        session.cancel();
        log.info({ event: 'stream.cancelled', chunks, bytes: session.bytesRead }, 'Stream cancelled');
      } else {
        session.close();
      }
    }
  }

  /** Transcoded events, with tool call blocks lifted out of the answer when tools are on. */
  private async *events(session: UpstreamSession, tools: boolean, log: Logger): AsyncGenerator<TranscoderEvent, void, undefined> {
    if (!tools) {
      yield* transcode(session);
      return;
    }
    const extractor = new ToolCallExtractor(this.idFactory);
    for await (const event of transcode(session)) {
      if (event.kind !== 'chunk') {
        yield event;
        continue;
      }
      const chunk = extractor.process(event.chunk);
      if (!chunk) continue;
      if (chunk.toolCalls) {
        log.info({ event: 'tools.called', names: chunk.toolCalls.map((c) => c.function.name) }, 'Model requested tool calls');
      }
      yield { kind: 'chunk', chunk };
    }
  }
}

function checkCapabilities(request: CompletionRequest, model: ModelDescriptor): ValidationError | null {
  if (request.stream && !model.capabilities.streaming) {
    return new ValidationError(`Model '${model.id}' does not support streaming`, { param: 'stream' });
  }
  if (!model.capabilities.files && hasAttachments(request)) {
    return new ValidationError(`Model '${model.id}' does not accept image or file content`, { param: 'messages' });
  }
  return null;
}
