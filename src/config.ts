/**
 * Configuration Management
 *
 * Parses the environment into one immutable {@link GatewayConfig}. Components
 * receive the parts they need at construction time; nothing else reads
 * `process.env`.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

const DEFAULT_UPLOAD_LIMIT = 10 * 1024 * 1024; // 10MB

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

/**
 * A model entry as written in the `MODELS` variable.
 */
export const ModelEntrySchema = z.object({
  id: z.string().min(1),
  upstreamId: z.string().min(1),
  name: z.string().optional(),
  ownedBy: z.string().default('upstream'),
  streaming: z.boolean().default(true),
  files: z.boolean().default(false),
  vision: z.boolean().default(false),
  thinking: z.boolean().default(true),
  webSearch: z.boolean().default(false),
  mcpServers: z.array(z.string()).default([]),
});

export type ModelEntry = z.infer<typeof ModelEntrySchema>;

/**
 * Built-in model table, used when `MODELS` is not set.
 */
export const DEFAULT_MODELS: readonly ModelEntry[] = [
  { id: 'glm-4.6', upstreamId: 'GLM-4-6-API-V1', name: 'GLM-4.6', ownedBy: 'upstream', streaming: true, files: true, vision: false, thinking: true, webSearch: false, mcpServers: [] },
  { id: 'glm-4.6-nothinking', upstreamId: 'GLM-4-6-API-V1', name: 'GLM-4.6-NOTHINKING', ownedBy: 'upstream', streaming: true, files: true, vision: false, thinking: false, webSearch: false, mcpServers: [] },
  { id: 'glm-4.6-search', upstreamId: 'GLM-4-6-API-V1', name: 'GLM-4.6-SEARCH', ownedBy: 'upstream', streaming: true, files: true, vision: false, thinking: true, webSearch: true, mcpServers: ['deep-web-search'] },
  { id: 'glm-4.6-advanced-search', upstreamId: 'GLM-4-6-API-V1', name: 'GLM-4.6-ADVANCED-SEARCH', ownedBy: 'upstream', streaming: true, files: true, vision: false, thinking: true, webSearch: true, mcpServers: ['advanced-search'] },
  { id: 'glm-4.5v', upstreamId: 'glm-4.5v', name: 'GLM-4.5V', ownedBy: 'upstream', streaming: true, files: true, vision: true, thinking: true, webSearch: false, mcpServers: [] },
  { id: 'glm-4.5', upstreamId: '0727-360B-API', name: 'GLM-4.5', ownedBy: 'upstream', streaming: true, files: false, vision: false, thinking: true, webSearch: false, mcpServers: [] },
];

const modelsFromEnv = z
  .string()
  .optional()
  .transform((raw, ctx): unknown => {
    if (raw === undefined || raw.trim() === '') return undefined;
    try {
      return JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'MODELS must be a JSON array' });
      return z.NEVER;
    }
  })
  .pipe(z.array(ModelEntrySchema).min(1).optional());

/**
 * Environment schema. Keys are the variable names.
 */
const EnvSchema = z.object({
  GATEWAY_HOST: z.string().default('127.0.0.1'),
  GATEWAY_PORT: intFromEnv(8001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: booleanFromEnv,
  AUTH_TOKENS: z
    .string({ required_error: 'AUTH_TOKENS is required' })
    .transform((v) => v.split(',').map((s) => s.trim()).filter((s) => s.length > 0))
    .pipe(z.array(z.string()).min(1, 'AUTH_TOKENS must name at least one token')),
  UPSTREAM_BASE_URL: z
    .string({ required_error: 'UPSTREAM_BASE_URL is required' })
    .url()
    .transform((v) => v.replace(/\/+$/, '')),
  UPSTREAM_API_KEY: z.string().optional(),
  CONNECT_TIMEOUT_MS: intFromEnv(10_000, 1),
  FIRST_BYTE_TIMEOUT_MS: intFromEnv(60_000, 1),
  IDLE_TIMEOUT_MS: intFromEnv(60_000, 1),
  RETRY_MAX_ATTEMPTS: intFromEnv(3, 1),
  RETRY_INITIAL_DELAY_MS: intFromEnv(500),
  RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
  RETRY_MAX_DELAY_MS: intFromEnv(8_000),
  RETRY_JITTER: z.coerce.number().min(0).max(1).default(0.2),
  MAX_UPLOAD_BYTES: intFromEnv(DEFAULT_UPLOAD_LIMIT, 1),
  MAX_BODY_BYTES: intFromEnv(10 * 1024 * 1024, 1),
  MODEL_REFRESH_INTERVAL_MS: intFromEnv(0),
  MODELS: modelsFromEnv,
  CORS_ORIGIN: z.string().default('*'),
});

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Extra random delay, as a fraction of the base delay (0..1). */
  jitter: number;
}

export interface UpstreamConfig {
  baseUrl: string;
  apiKey: string | undefined;
  connectTimeoutMs: number;
  firstByteTimeoutMs: number;
  idleTimeoutMs: number;
}

export interface GatewayConfig {
  host: string;
  port: number;
  logLevel: string;
  logPretty: boolean;
  authTokens: readonly string[];
  upstream: UpstreamConfig;
  retry: RetryConfig;
  maxUploadBytes: number;
  maxBodyBytes: number;
  modelRefreshIntervalMs: number;
  models: readonly ModelEntry[];
  corsOrigin: string;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Build the gateway configuration from an environment map.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined>): GatewayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  return deepFreeze<GatewayConfig>({
    host: e.GATEWAY_HOST,
    port: e.GATEWAY_PORT,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY,
    authTokens: e.AUTH_TOKENS,
    upstream: {
      baseUrl: e.UPSTREAM_BASE_URL,
      apiKey: e.UPSTREAM_API_KEY,
      connectTimeoutMs: e.CONNECT_TIMEOUT_MS,
      firstByteTimeoutMs: e.FIRST_BYTE_TIMEOUT_MS,
      idleTimeoutMs: e.IDLE_TIMEOUT_MS,
    },
    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      initialDelayMs: e.RETRY_INITIAL_DELAY_MS,
      multiplier: e.RETRY_MULTIPLIER,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      jitter: e.RETRY_JITTER,
    },
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    maxBodyBytes: e.MAX_BODY_BYTES,
    modelRefreshIntervalMs: e.MODEL_REFRESH_INTERVAL_MS,
    models: e.MODELS ?? DEFAULT_MODELS.map((m) => ({ ...m, mcpServers: [...m.mcpServers] })),
    corsOrigin: e.CORS_ORIGIN,
  });
}
