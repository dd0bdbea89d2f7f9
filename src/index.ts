/**
 * completion-gateway
 *
 * OpenAI-compatible chat completion gateway in front of a single upstream
 * provider: bearer auth, model table, connection-phase retries, SSE
 * transcoding with cancellation, prompt-driven tool calls, attachment
 * uploads and a streamed file upload relay.
 *
 * @example
 * ```typescript
 * import { loadConfig, startGateway } from 'completion-gateway';
 *
 * const gateway = await startGateway({ config: loadConfig(process.env) });
 * ```
 *
 * @packageDocumentation
 */

// Server
export { GatewayServer, createGatewayServer, startGateway } from './server.js';
export type { GatewayServerOptions } from './server.js';

// Configuration
export { loadConfig, ConfigError, DEFAULT_MODELS, ModelEntrySchema } from './config.js';
export type { GatewayConfig, ModelEntry, RetryConfig, UpstreamConfig } from './config.js';

// Components
export { AuthGate } from './auth-gate.js';
export type { Principal } from './auth-gate.js';
export { ModelRegistry } from './models/registry.js';
export { createUpstreamModelSource, formatModelName } from './models/discovery.js';
export type { ModelSource } from './models/discovery.js';
export { RetryPolicy } from './retry-policy.js';
export { StreamTranscoder, transcode } from './transcoder/stream-transcoder.js';
export type { TranscoderEvent, TranscoderState } from './transcoder/stream-transcoder.js';
export { CompletionGateway } from './gateway/completion-gateway.js';
export type { ClientEvent, CompletionOutcome } from './gateway/completion-gateway.js';
export { validateCompletionRequest } from './gateway/validation.js';
export type { CompletionRequest, ToolDefinition } from './gateway/validation.js';
export { AttachmentResolver } from './gateway/attachments.js';
export { ToolCallExtractor, parseToolCalls } from './gateway/tool-calls.js';
export { UploadRelay } from './upload-relay.js';
export { UpstreamClient } from './upstream/client.js';
export { UpstreamSession } from './upstream/session.js';

// Errors
export * from './errors.js';

// Observability
export { handleHealthRequest, checkHealth } from './health.js';
export { StatsCollector } from './stats.js';
export type { StatsSnapshot } from './stats.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// Wire types
export type * from './types.js';
