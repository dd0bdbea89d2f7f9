/**
 * Chat completion request schema.
 * @packageDocumentation
 */

import { z } from 'zod';
import { ValidationError, err, ok, type Result } from '../errors.js';

const TextPartSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

const ImagePartSchema = z.object({
  type: z.literal('image_url'),
  image_url: z.union([z.string().min(1), z.object({ url: z.string().min(1) })]),
});

const FilePartSchema = z.object({
  type: z.literal('file'),
  file: z.object({
    file_id: z.string().min(1),
    filename: z.string().optional(),
  }),
});

export const ContentPartSchema = z.discriminatedUnion('type', [TextPartSchema, ImagePartSchema, FilePartSchema]);

const ToolCallSchema = z.object({
  id: z.string().min(1),
  type: z.literal('function').default('function'),
  function: z.object({
    name: z.string().min(1),
    arguments: z.string().default('{}'),
  }),
});

export const MessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z
    .union([z.string(), z.array(ContentPartSchema)])
    .nullish()
    .transform((c) => c ?? ''),
  /** Calls an earlier assistant turn made. */
  tool_calls: z.array(ToolCallSchema).optional(),
  /** On `tool` messages: the call this result answers. */
  tool_call_id: z.string().optional(),
});

export const ToolSchema = z.object({
  type: z.literal('function'),
  function: z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    parameters: z.record(z.unknown()).optional(),
  }),
});

const ToolChoiceSchema = z.union([
  z.enum(['none', 'auto', 'required']),
  z.object({ type: z.literal('function'), function: z.object({ name: z.string().min(1) }) }),
]);

export const CompletionRequestSchema = z.object({
  model: z.string().min(1, 'model is required'),
  messages: z.array(MessageSchema).min(1, 'messages must contain at least one message'),
  stream: z.boolean().default(false),
  temperature: z.number().min(0).max(2).default(0.7),
  top_p: z.number().min(0).max(1).default(0.9),
  max_tokens: z.number().int().min(1).default(8192),
  tools: z.array(ToolSchema).optional(),
  tool_choice: ToolChoiceSchema.optional(),
});

export type ContentPart = z.infer<typeof ContentPartSchema>;
export type ChatMessage = z.infer<typeof MessageSchema>;
export type ToolDefinition = z.infer<typeof ToolSchema>;
export type CompletionRequest = Readonly<z.infer<typeof CompletionRequestSchema>>;

/** True when any message carries an image or file part. */
export function hasAttachments(request: CompletionRequest): boolean {
  return request.messages.some(
    (m) => Array.isArray(m.content) && m.content.some((p) => p.type !== 'text'),
  );
}

/** Tool calling is on when tools are offered and `tool_choice` is not `none`. */
export function toolsEnabled(request: CompletionRequest): boolean {
  return (request.tools?.length ?? 0) > 0 && request.tool_choice !== 'none';
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Validate a parsed JSON body. Unknown fields are dropped and the result is
 * frozen.
 */
export function validateCompletionRequest(body: unknown): Result<CompletionRequest> {
  const parsed = CompletionRequestSchema.safeParse(body);
  if (!parsed.success) {
    const [first] = parsed.error.issues;
    const path = first ? first.path.join('.') : '';
    const message = first ? (path ? `${path}: ${first.message}` : first.message) : 'Invalid request body';
    return err(
      new ValidationError(message, {
        param: path || undefined,
        details: {
          issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
        },
      }),
    );
  }
  return ok(deepFreeze(parsed.data));
}
