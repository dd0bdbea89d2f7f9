/**
 * Translates a validated completion request into the upstream body.
 * @packageDocumentation
 */

import type { ModelDescriptor, UpstreamFileRef } from '../types.js';
import { toolCallsText, toolResultText, withToolPrompt, type PromptMessage } from './tool-calls.js';
import { toolsEnabled, type ChatMessage, type CompletionRequest, type ContentPart } from './validation.js';

export type UpstreamContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } }
  | { type: 'video_url'; video_url: { url: string } };

export interface UpstreamMessage {
  role: PromptMessage['role'];
  content: string | UpstreamContentPart[];
}

export interface UpstreamCompletionBody {
  stream: true;
  model: string;
  messages: UpstreamMessage[];
  params: { temperature: number; top_p: number; max_tokens: number };
  features: {
    enable_thinking: boolean;
    web_search: boolean;
    auto_web_search: boolean;
    preview_mode: boolean;
  };
  mcp_servers: string[];
  files: UpstreamFileRef[];
  variables: Record<string, string>;
  chat_id: string;
  id: string;
  signature_prompt: string;
}

export interface UpstreamIds {
  chatId: string;
  messageId: string;
}

function textOf(content: ChatMessage['content']): string {
  if (typeof content === 'string') return content;
  return content
    .filter((p): p is Extract<ContentPart, { type: 'text' }> => p.type === 'text')
    .map((p) => p.text)
    .join('\n');
}

/**
 * Flatten the conversation to plain text. Tool results become user turns
 * and earlier assistant calls are written back as call blocks.
 */
export function toPromptMessages(messages: readonly ChatMessage[]): PromptMessage[] {
  const toolNames = new Map<string, string>();
  return messages.map((m): PromptMessage => {
    const text = textOf(m.content);
    if (m.role === 'tool') {
      const name = m.tool_call_id === undefined ? undefined : toolNames.get(m.tool_call_id);
      return { role: 'user', content: toolResultText(name, text) };
    }
    if (m.role === 'assistant' && m.tool_calls && m.tool_calls.length > 0) {
      for (const call of m.tool_calls) toolNames.set(call.id, call.function.name);
      return { role: 'assistant', content: `${text}\n${toolCallsText(m.tool_calls)}`.trim() };
    }
    return { role: m.role, content: text };
  });
}

function inlineRef(ref: UpstreamFileRef): UpstreamContentPart {
  const url = `${ref.id}_${ref.name}`;
  return ref.media === 'video' ? { type: 'video_url', video_url: { url } } : { type: 'image_url', image_url: { url } };
}

/**
 * Vision models read images and videos from the last user message; every
 * other reference, and all of them for other models, goes in `files`.
 */
function placeFiles(
  messages: PromptMessage[],
  refs: readonly UpstreamFileRef[],
  vision: boolean,
): { messages: UpstreamMessage[]; files: UpstreamFileRef[] } {
  const inline = vision ? refs.filter((r) => r.media === 'image' || r.media === 'video') : [];
  const files = refs.filter((r) => !inline.includes(r));
  let at = -1;
  messages.forEach((m, i) => {
    if (m.role === 'user') at = i;
  });
  if (inline.length === 0 || at === -1) return { messages, files: [...refs] };

  return {
    messages: messages.map((m, i): UpstreamMessage =>
      i === at ? { role: m.role, content: [{ type: 'text', text: m.content }, ...inline.map(inlineRef)] } : m,
    ),
    files,
  };
}

const pad = (n: number) => String(n).padStart(2, '0');

/** Prompt template variables the upstream substitutes. */
export function promptVariables(now: Date): Record<string, string> {
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
  return {
    '{{USER_LOCATION}}': 'Unknown',
    '{{CURRENT_DATETIME}}': `${date} ${time}`,
    '{{CURRENT_DATE}}': date,
    '{{CURRENT_TIME}}': time,
    '{{CURRENT_WEEKDAY}}': now.toLocaleDateString('en-US', { weekday: 'long' }),
    '{{CURRENT_TIMEZONE}}': Intl.DateTimeFormat().resolvedOptions().timeZone,
    '{{USER_LANGUAGE}}': 'en-US',
  };
}

export function buildUpstreamBody(
  request: CompletionRequest,
  model: ModelDescriptor,
  ids: UpstreamIds,
  refs: readonly UpstreamFileRef[] = [],
  now: Date = new Date(),
): UpstreamCompletionBody {
  let prompt = toPromptMessages(request.messages);
  const lastUser = [...prompt].reverse().find((m) => m.role === 'user');
  if (request.tools && toolsEnabled(request)) prompt = withToolPrompt(prompt, request.tools);
  const { messages, files } = placeFiles(prompt, refs, model.capabilities.vision);
  const { webSearch } = model.features;

  return {
    stream: true,
    model: model.upstreamId,
    messages,
    params: {
      temperature: request.temperature,
      top_p: request.top_p,
      max_tokens: request.max_tokens,
    },
    features: {
      enable_thinking: model.features.thinking,
      web_search: webSearch,
      auto_web_search: webSearch,
      preview_mode: webSearch,
    },
    mcp_servers: [...new Set(model.features.mcpServers)],
    files,
    variables: promptVariables(now),
    chat_id: ids.chatId,
    id: ids.messageId,
    signature_prompt: lastUser?.content ?? '',
  };
}
