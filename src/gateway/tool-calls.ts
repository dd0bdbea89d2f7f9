/**
 * Prompt-driven tool calling.
 *
 * The upstream has no function-calling API. Tool definitions are written
 * into the system prompt along with a trigger tag; the answer is watched for
 * that tag and the XML block after it is turned into OpenAI `tool_calls`.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { StreamChunk, ToolCall } from '../types.js';
import type { ChatMessage, ToolDefinition } from './validation.js';

export const TOOL_TRIGGER = '<tool_call>';

/** A message as the upstream reads it: one role, plain text. */
export interface PromptMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

type RequestToolCall = NonNullable<ChatMessage['tool_calls']>[number];

const PropertySchema = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
  })
  .passthrough();

const ParametersSchema = z
  .object({
    properties: z.record(z.unknown()).optional(),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

function describeParameters(parameters: Record<string, unknown> | undefined): string {
  const parsed = ParametersSchema.safeParse(parameters ?? {});
  const properties = parsed.success ? parsed.data.properties ?? {} : {};
  const required = new Set(parsed.success ? parsed.data.required ?? [] : []);

  const lines = Object.entries(properties).map(([name, raw]) => {
    const prop = PropertySchema.safeParse(raw);
    const type = prop.success && prop.data.type !== undefined ? [prop.data.type].flat().join('|') : 'any';
    const description = prop.success ? prop.data.description ?? '' : '';
    return `  - ${name} (${type}, ${required.has(name) ? 'required' : 'optional'}): ${description}`;
  });
  return lines.length > 0 ? lines.join('\n') : '  none';
}

export function toolsPrompt(tools: readonly ToolDefinition[]): string {
  const catalogue = tools
    .map((tool, i) =>
      [
        `${i + 1}. ${tool.function.name}`,
        `   Description: ${tool.function.description ?? ''}`,
        `   Parameters:\n${describeParameters(tool.function.parameters)}`,
      ].join('\n'),
    )
    .join('\n\n');

  return `You can use the following tools to help answer:

${catalogue}

When you need a tool, output exactly this format:

${TOOL_TRIGGER}
<function_calls>
    <function_call>
        <tool>tool name</tool>
        <args>
            <parameter_name>parameter value</parameter_name>
        </args>
    </function_call>
</function_calls>

Rules:
1. ${TOOL_TRIGGER} must be on a line of its own.
2. One <function_calls> block may hold several <function_call> entries.
3. Parameter names must match the tool definition exactly.
4. Write nothing after </function_calls>.`;
}

/**
 * Append the tool prompt to the first system message, or open the
 * conversation with one.
 */
export function withToolPrompt(messages: readonly PromptMessage[], tools: readonly ToolDefinition[]): PromptMessage[] {
  const prompt = toolsPrompt(tools);
  const at = messages.findIndex((m) => m.role === 'system');
  if (at === -1) return [{ role: 'system', content: prompt }, ...messages];
  return messages.map((m, i) => (i === at ? { role: m.role, content: `${m.content}\n\n${prompt}` } : m));
}

/** Earlier assistant calls, written back in the format the model was told to use. */
export function toolCallsText(calls: readonly RequestToolCall[]): string {
  const blocks = calls.map((call) => {
    let args: unknown;
    try {
      args = JSON.parse(call.function.arguments);
    } catch {
      args = undefined;
    }
    const entries: Array<readonly [string, unknown]> =
      typeof args === 'object' && args !== null && !Array.isArray(args)
        ? Object.entries(args)
        : [['raw_arguments', call.function.arguments]];
    const argLines = entries.map(([key, value]) => `<${key}>${JSON.stringify(value)}</${key}>`).join('\n');
    return `<function_call>\n<tool>${call.function.name}</tool>\n<args>\n${argLines}\n</args>\n</function_call>`;
  });
  return `${TOOL_TRIGGER}\n<function_calls>\n${blocks.join('\n')}\n</function_calls>`;
}

export function toolResultText(toolName: string | undefined, result: string): string {
  if (!toolName) return `Tool execution result:\n<tool_result>\n${result}\n</tool_result>`;
  return `Tool execution result:\n- Tool name: ${toolName}\n- Execution result:\n<tool_result>\n${result}\n</tool_result>`;
}

const CALLS_BLOCK = /<function_calls>([\s\S]*?)<\/function_calls>/;
const CALL_BLOCK = /<function_call>([\s\S]*?)<\/function_call>/g;
const TOOL_NAME = /<tool>([\s\S]*?)<\/tool>/;
const ARGS_BLOCK = /<args>([\s\S]*?)<\/args>/;
const ARG = /<([^\s>/]+)>([\s\S]*?)<\/\1>/g;

function argValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/**
 * Read the calls out of a captured `<function_calls>` block. Null when the
 * text holds no well-formed call.
 */
export function parseToolCalls(text: string, idFactory: () => string): ToolCall[] | null {
  if (!text.includes(TOOL_TRIGGER)) return null;
  const calls = CALLS_BLOCK.exec(text);
  if (!calls?.[1]) return null;

  const out: ToolCall[] = [];
  for (const [, block = ''] of calls[1].matchAll(CALL_BLOCK)) {
    const name = TOOL_NAME.exec(block)?.[1]?.trim();
    if (!name) continue;

    const args: Record<string, unknown> = {};
    const argsBlock = ARGS_BLOCK.exec(block)?.[1];
    if (argsBlock) {
      for (const [, key = '', value = ''] of argsBlock.matchAll(ARG)) args[key] = argValue(value);
    }
    out.push({ id: `call_${idFactory()}`, type: 'function', function: { name, arguments: JSON.stringify(args) } });
  }
  return out.length > 0 ? out : null;
}

/** Length of the longest suffix of `text` that could still grow into the trigger. */
function partialTrigger(text: string): number {
  for (let n = Math.min(TOOL_TRIGGER.length - 1, text.length); n > 0; n--) {
    if (text.endsWith(TOOL_TRIGGER.slice(0, n))) return n;
  }
  return 0;
}

/**
 * Rewrites the chunk sequence of one completion. Answer text is passed on
 * until the trigger appears; from there it is held back and, on the
 * terminal chunk, replaced by `tool_calls` with finish reason `tool_calls`.
 * A block that does not parse is released as plain text.
 */
export class ToolCallExtractor {
  private held = '';
  private capturing = false;
  private finished = false;
  private roleOwed = false;
  private readonly idFactory: () => string;

  constructor(idFactory: () => string) {
    this.idFactory = idFactory;
  }

  /** Null when the chunk has nothing left to send. */
  process(chunk: StreamChunk): StreamChunk | null {
    if (this.finished) return chunk;

    let content = chunk.content === undefined ? '' : this.scan(chunk.content);
    let toolCalls: ToolCall[] | undefined;
    let finishReason = chunk.finishReason;

    if (finishReason !== null) {
      this.finished = true;
      const calls = this.capturing ? parseToolCalls(this.held, this.idFactory) : null;
      if (calls) {
        toolCalls = calls;
        finishReason = 'tool_calls';
      } else {
        content += this.held;
      }
      this.held = '';
    }

    const out: StreamChunk = { index: chunk.index, finishReason };
    if (content) out.content = content;
    if (chunk.reasoning !== undefined) out.reasoning = chunk.reasoning;
    if (chunk.usage !== undefined) out.usage = chunk.usage;
    if (toolCalls) out.toolCalls = toolCalls;

    const empty = out.content === undefined && out.reasoning === undefined && finishReason === null;
    if (empty) {
      if (chunk.role) this.roleOwed = true;
      return null;
    }
    if (chunk.role || this.roleOwed) {
      out.role = 'assistant';
      this.roleOwed = false;
    }
    return out;
  }

  private scan(text: string): string {
    if (this.capturing) {
      this.held += text;
      return '';
    }
    const buffer = this.held + text;
    const at = buffer.indexOf(TOOL_TRIGGER);
    if (at !== -1) {
      this.capturing = true;
      this.held = buffer.slice(at);
      return buffer.slice(0, at);
    }
    const keep = partialTrigger(buffer);
    this.held = buffer.slice(buffer.length - keep);
    return buffer.slice(0, buffer.length - keep);
  }
}
