/**
 * Completion Gateway Server
 *
 * OpenAI-compatible HTTP front for a single upstream provider.
 *
 * Features:
 * - `POST /v1/chat/completions` (aggregate JSON or SSE)
 * - `GET /v1/models`
 * - `POST /v1/files` (streamed multipart relay)
 * - `GET /health` (unauthenticated)
 * - CORS on every response, bearer auth on every `/v1/*` route
 *
 * @packageDocumentation
 */

import * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import { nanoid } from 'nanoid';
import { AuthGate, type Principal } from './auth-gate.js';
import type { GatewayConfig } from './config.js';
import {
  ClientDisconnectedError,
  PayloadTooLargeError,
  ValidationError,
  err,
  errorCode,
  ok,
  toInternalError,
  type GatewayError,
  type Result,
} from './errors.js';
import { AttachmentResolver } from './gateway/attachments.js';
import { CompletionGateway, type ClientEvent } from './gateway/completion-gateway.js';
import { handleHealthRequest } from './health.js';
import { createLogger, type Logger } from './logger.js';
import { createUpstreamModelSource } from './models/discovery.js';
import { ModelRegistry } from './models/registry.js';
import { RetryPolicy, type RandomSource } from './retry-policy.js';
import { SSE_DONE, encodeSse } from './transcoder/openai-format.js';
import { StatsCollector, type RequestRoute } from './stats.js';
import { UploadRelay } from './upload-relay.js';
import { UpstreamClient } from './upstream/client.js';

export interface GatewayServerOptions {
  config: GatewayConfig;
  logger?: Logger;
  /** Jitter source for retry backoff. */
  random?: RandomSource;
  stats?: StatsCollector;
}

interface RequestContext {
  requestId: string;
  log: Logger;
  signal: AbortSignal;
  started: number;
}

interface Completed {
  route: RequestRoute;
  streaming: boolean;
  status: number;
  attempts: number;
  success: boolean;
  cancelled: boolean;
}

const ALLOWED_METHODS = 'GET, POST, OPTIONS';
const ALLOWED_HEADERS = 'Content-Type, Authorization';

/**
 * Resolves true once the response drains, false if it closes first.
 */
function waitForDrain(res: http.ServerResponse): Promise<boolean> {
  if (res.destroyed) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onDrain = () => {
      cleanup();
      resolve(true);
    };
    const onClose = () => {
      cleanup();
      resolve(false);
    };
    const cleanup = () => {
      res.off('drain', onDrain);
      res.off('close', onClose);
    };
    res.on('drain', onDrain);
    res.on('close', onClose);
  });
}

function declaredLength(req: http.IncomingMessage): number | undefined {
  const raw = req.headers['content-length'];
  if (raw === undefined) return undefined;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : undefined;
}

export class GatewayServer {
  readonly config: GatewayConfig;
  readonly registry: ModelRegistry;
  readonly stats: StatsCollector;
  private readonly logger: Logger;
  private readonly auth: AuthGate;
  private readonly upstream: UpstreamClient;
  private readonly gateway: CompletionGateway;
  private readonly uploads: UploadRelay;
  private server: http.Server | null = null;

  constructor(opts: GatewayServerOptions) {
    const { config } = opts;
    this.config = config;
    this.logger = opts.logger ?? createLogger({ level: config.logLevel, pretty: config.logPretty });
    this.stats = opts.stats ?? new StatsCollector();
    this.auth = new AuthGate(config.authTokens);
    this.upstream = new UpstreamClient(config.upstream, this.logger.child({ component: 'upstream' }));

    const retry = new RetryPolicy(config.retry, opts.random);
    this.registry = new ModelRegistry({
      entries: config.models,
      source: config.modelRefreshIntervalMs > 0 ? createUpstreamModelSource(this.upstream, config.models) : undefined,
      refreshIntervalMs: config.modelRefreshIntervalMs,
      logger: this.logger.child({ component: 'registry' }),
    });
    this.gateway = new CompletionGateway({
      registry: this.registry,
      upstream: this.upstream,
      attachments: new AttachmentResolver({ upstream: this.upstream, maxBytes: config.maxUploadBytes }),
      retry,
      logger: this.logger,
    });
    this.uploads = new UploadRelay({
      upstream: this.upstream,
      maxBytes: config.maxUploadBytes,
      retry,
      logger: this.logger,
    });
  }

  /**
   * Start listening. Resolves with the bound address.
   */
  async start(): Promise<AddressInfo> {
    if (this.config.modelRefreshIntervalMs > 0) {
      void this.registry.refresh();
      this.registry.start();
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((cause: unknown) => {
        const error = toInternalError(cause);
        this.logger.error({ err: cause }, `Unhandled error: ${error.message}`);
        this.sendError(res, error);
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP port'));
          return;
        }
        this.logger.info(
          { host: address.address, port: address.port, models: this.registry.list().length },
          `Completion gateway listening on http://${address.address}:${address.port}`,
        );
        resolve(address);
      });
    });
  }

  /**
   * Stop the server, dropping open streams.
   */
  async stop(): Promise<void> {
    this.registry.stop();
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        server.closeAllConnections();
      });
    }
    await this.upstream.close();
    this.logger.info('Gateway stopped');
  }

  /**
   * Handle incoming request
   */
  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', this.config.corsOrigin);
    res.setHeader('Access-Control-Allow-Methods', ALLOWED_METHODS);
    res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS);

    // Handle preflight
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    if (url.pathname === '/health' && req.method === 'GET') {
      handleHealthRequest(res, {
        modelCount: () => this.registry.list().length,
        stats: () => this.stats.getStats(),
      });
      return;
    }

    if (!url.pathname.startsWith('/v1/')) {
      this.sendNotFound(res, url.pathname);
      return;
    }

    const requestId = nanoid(12);
    const log = this.logger.child({ requestId });
    res.setHeader('X-Request-Id', requestId);

    const principal = this.auth.authenticate(req.headers.authorization);
    if (!principal.ok) {
      log.info({ event: 'request.rejected', path: url.pathname, kind: principal.error.kind }, principal.error.message);
      this.sendError(res, principal.error);
      return;
    }

    log.info(
      { event: 'request.received', method: req.method, path: url.pathname, principal: principal.value.fingerprint },
      `${req.method ?? 'GET'} ${url.pathname}`,
    );

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });
    const ctx: RequestContext = { requestId, log, signal: controller.signal, started: Date.now() };

    if (url.pathname === '/v1/chat/completions' && req.method === 'POST') {
      await this.handleChatCompletions(req, res, principal.value, ctx);
      return;
    }

    if (url.pathname === '/v1/models' && req.method === 'GET') {
      this.sendJson(res, 200, this.registry.toModelList());
      return;
    }

    if (url.pathname === '/v1/files' && req.method === 'POST') {
      await this.handleFileUpload(req, res, ctx);
      return;
    }

    this.sendNotFound(res, url.pathname);
  }

  private async handleChatCompletions(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    principal: Principal,
    ctx: RequestContext,
  ): Promise<void> {
    const body = await this.readJsonBody(req, ctx.signal);
    if (!body.ok) {
      this.fail(res, ctx, body.error, { route: 'completion', streaming: false, attempts: 0 });
      return;
    }

    const outcome = await this.gateway.handle(body.value, principal, ctx.signal, ctx.log);
    if (!outcome.ok) {
      this.fail(res, ctx, outcome.error, {
        route: 'completion',
        streaming: false,
        attempts: outcome.error.attempts ?? 0,
      });
      return;
    }

    const result = outcome.value;
    if (result.kind === 'aggregate') {
      this.sendJson(res, 200, result.completion);
      this.record(ctx, { route: 'completion', streaming: false, status: 200, attempts: result.attempts, success: true, cancelled: false });
      return;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    res.flushHeaders();

    const last = await this.pipeEvents(res, result.events, ctx.signal);
    const cancelled = ctx.signal.aborted;
    if (!res.writableEnded && !res.destroyed) res.end();

    this.record(ctx, {
      route: 'completion',
      streaming: true,
      status: cancelled ? 499 : 200,
      attempts: result.attempts,
      success: !cancelled && last === 'done',
      cancelled,
    });
  }

  /**
   * Write client events as SSE frames, pulling the next event only after
   * the socket has accepted the previous one.
   */
  private async pipeEvents(
    res: http.ServerResponse,
    events: AsyncGenerator<ClientEvent, void, undefined>,
    signal: AbortSignal,
  ): Promise<ClientEvent['kind'] | null> {
    let last: ClientEvent['kind'] | null = null;

    for await (const event of events) {
      if (signal.aborted) break;
      last = event.kind;

      const frame = event.kind === 'done' ? SSE_DONE : encodeSse(event.data);
      if (!res.write(frame)) {
        const drained = await waitForDrain(res);
        if (!drained) break;
      }
      if (event.kind !== 'chunk') break;
    }
    return last;
  }

  private async handleFileUpload(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    ctx: RequestContext,
  ): Promise<void> {
    const result = await this.uploads.relay(
      { body: req, contentType: req.headers['content-type'], contentLength: declaredLength(req) },
      ctx.signal,
      ctx.log,
    );

    if (!result.ok) {
      // The body may be partly unread; do not reuse the connection.
      res.setHeader('Connection', 'close');
      this.fail(res, ctx, result.error, { route: 'upload', streaming: false, attempts: 1 });
      return;
    }

    this.sendJson(res, 200, result.value);
    this.record(ctx, { route: 'upload', streaming: false, status: 200, attempts: 1, success: true, cancelled: false });
  }

  /**
   * Read a JSON body of at most `maxBodyBytes`. A client that goes away
   * before the body is complete yields `ClientDisconnected`.
   */
  private readJsonBody(req: http.IncomingMessage, signal: AbortSignal): Promise<Result<unknown>> {
    const limit = this.config.maxBodyBytes;
    const declared = declaredLength(req);
    if (declared !== undefined && declared > limit) {
      req.resume();
      return Promise.resolve(err(new PayloadTooLargeError(`Request body exceeds ${limit} bytes`)));
    }

    return new Promise((resolve) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let tooLarge = false;

      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size > limit) tooLarge = true;
        if (!tooLarge) chunks.push(chunk);
      });
      req.on('end', () => {
        if (tooLarge) {
          resolve(err(new PayloadTooLargeError(`Request body exceeds ${limit} bytes`)));
          return;
        }
        try {
          resolve(ok(JSON.parse(Buffer.concat(chunks).toString('utf8'))));
        } catch {
          resolve(err(new ValidationError('Request body must be valid JSON')));
        }
      });
      req.on('error', (cause) => {
        const disconnected = signal.aborted || errorCode(cause) === 'ECONNRESET';
        resolve(err(disconnected ? new ClientDisconnectedError() : toInternalError(cause)));
      });
      req.on('close', () => {
        if (!req.complete) resolve(err(new ClientDisconnectedError()));
      });
    });
  }

  private fail(
    res: http.ServerResponse,
    ctx: RequestContext,
    error: GatewayError,
    info: Pick<Completed, 'route' | 'streaming' | 'attempts'>,
  ): void {
    const cancelled = error.kind === 'ClientDisconnected';
    if (cancelled) {
      ctx.log.info({ event: 'request.cancelled' }, 'Client disconnected before a response was sent');
    } else if (error.kind === 'InternalError') {
      ctx.log.error({ err: error.cause ?? error }, `Internal error: ${error.message}`);
      this.sendError(res, error);
    } else {
      ctx.log.warn(
        { event: 'request.failed', kind: error.kind, status: error.status, attempts: error.attempts },
        error.message,
      );
      this.sendError(res, error);
    }
    this.record(ctx, { ...info, status: error.status, success: false, cancelled });
  }

  private record(ctx: RequestContext, completed: Completed): void {
    this.stats.recordRequest({ timestamp: Date.now(), latencyMs: Date.now() - ctx.started, ...completed });
  }

  private sendJson(res: http.ServerResponse, status: number, payload: unknown): void {
    const body = JSON.stringify(payload);
    res.writeHead(status, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
    res.end(body);
  }

  /**
   * Send error response
   */
  private sendError(res: http.ServerResponse, error: GatewayError): void {
    if (res.headersSent) {
      if (!res.writableEnded) res.end();
      return;
    }
    if (error.kind === 'PayloadTooLarge') res.setHeader('Connection', 'close');
    this.sendJson(res, error.status, error.toBody());
  }

  private sendNotFound(res: http.ServerResponse, pathname: string): void {
    this.sendJson(res, 404, {
      error: { message: `Unknown endpoint: ${pathname}`, type: 'not_found', code: 404 },
    });
  }
}

/**
 * Create a new gateway server
 */
export function createGatewayServer(opts: GatewayServerOptions): GatewayServer {
  return new GatewayServer(opts);
}

/**
 * Create and start a gateway in one step.
 */
export async function startGateway(opts: GatewayServerOptions): Promise<GatewayServer> {
  const server = createGatewayServer(opts);
  await server.start();
  return server;
}
