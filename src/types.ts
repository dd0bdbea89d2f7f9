/**
 * Gateway Core Types
 *
 * Domain types shared by the registry, transcoder and gateway, plus the
 * OpenAI-compatible wire shapes the gateway writes.
 *
 * @packageDocumentation
 */

// ============================================================================
// Models
// ============================================================================

export interface ModelCapabilities {
  streaming: boolean;
  files: boolean;
  /** Images and videos are placed inline in the last user message. */
  vision: boolean;
}

/**
 * Upstream switches applied when a request for this model is translated.
 */
export interface ModelFeatures {
  thinking: boolean;
  webSearch: boolean;
  mcpServers: readonly string[];
}

export interface ModelDescriptor {
  /** Identifier clients send in `model`. */
  id: string;
  /** Identifier the upstream expects. */
  upstreamId: string;
  name: string;
  ownedBy: string;
  /** Unix seconds. */
  created: number;
  capabilities: ModelCapabilities;
  features: ModelFeatures;
}

// ============================================================================
// Streaming
// ============================================================================

/**
 * Token counters as reported by the upstream. Fields beyond the three
 * standard counters are kept as-is.
 */
export interface Usage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
  [key: string]: unknown;
}

export type FinishReason = 'stop' | 'length' | 'content_filter' | 'tool_calls' | 'error';

export interface ToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

/**
 * One incremental unit of a completion, in arrival order.
 */
export interface StreamChunk {
  /** 0-based, strictly increasing and gap-free within one session. */
  index: number;
  /** Only set on the first chunk of a session. */
  role?: 'assistant';
  content?: string;
  reasoning?: string;
  finishReason: FinishReason | null;
  /** Only set on the terminal chunk. */
  usage?: Usage;
  toolCalls?: ToolCall[];
}

// ============================================================================
// OpenAI wire format
// ============================================================================

export interface ChatCompletionChunkDelta {
  role?: 'assistant';
  content?: string;
  reasoning_content?: string;
  tool_calls?: Array<ToolCall & { index: number }>;
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: ChatCompletionChunkDelta;
    finish_reason: FinishReason | null;
  }>;
  usage?: Usage;
  error?: { message: string; type: string; code: number };
}

export interface ChatCompletion {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: { role: 'assistant'; content: string; reasoning_content?: string; tool_calls?: ToolCall[] };
    finish_reason: FinishReason;
  }>;
  usage?: Usage;
}

export interface ModelObject {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
  name: string;
}

export interface ModelList {
  object: 'list';
  data: ModelObject[];
}

export interface FileObject {
  id: string;
  object: 'file';
  /**
   * File size as reported upstream. Without that, the relayed multipart body
   * length, which also counts the part headers and boundaries.
   */
  bytes: number;
  created_at: number;
  filename: string;
  purpose: string;
}

// ============================================================================
// Upstream files
// ============================================================================

export type MediaKind = 'image' | 'video' | 'doc' | 'file';

/** A file stored upstream and referenced from a completion request. */
export interface UpstreamFileRef {
  id: string;
  name: string;
  media: MediaKind;
  /** Bytes, when the gateway uploaded the file itself. */
  size?: number;
  url: string;
}
