/**
 * Upstream model discovery.
 *
 * Turns the upstream `/api/models` listing into model descriptors, adding
 * the `-nothinking`, `-search` and `-advanced-search` variants the upstream
 * capabilities allow.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { ModelEntry } from '../config.js';
import { UpstreamBadResponseError, err, ok, type Result } from '../errors.js';
import type { ModelDescriptor } from '../types.js';
import type { UpstreamClient } from '../upstream/client.js';

const UpstreamCapabilitiesSchema = z
  .object({
    think: z.boolean().optional(),
    web_search: z.boolean().optional(),
    vision: z.boolean().optional(),
    file_qa: z.boolean().optional(),
  })
  .passthrough();

const UpstreamModelSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  owned_by: z.string().optional(),
  info: z
    .object({
      is_active: z.boolean().optional(),
      created_at: z.number().optional(),
      meta: z
        .object({
          capabilities: UpstreamCapabilitiesSchema.nullish(),
          mcpServerIds: z.array(z.string()).nullish(),
        })
        .passthrough()
        .nullish(),
    })
    .passthrough()
    .optional(),
});

export const UpstreamModelsResponseSchema = z.object({
  data: z.array(UpstreamModelSchema),
});

export type UpstreamModel = z.infer<typeof UpstreamModelSchema>;

/**
 * `glm-4.6` → `GLM-4.6`, `glm-4.5v` → `GLM-4.5V`, `glm-air` → `GLM-Air`.
 */
export function formatModelName(id: string): string {
  if (!id) return '';
  const [head = '', ...rest] = id.split('-');
  const parts = [head.toUpperCase()];
  for (const part of rest) {
    if (/\d/.test(part)) {
      parts.push(part.toUpperCase());
    } else if (/[a-z]/i.test(part)) {
      parts.push(part.charAt(0).toUpperCase() + part.slice(1).toLowerCase());
    } else {
      parts.push(part);
    }
  }
  return parts.join('-');
}

function displayName(model: UpstreamModel): string {
  const name = model.name?.trim() ?? '';
  return /^[A-Za-z]/.test(name) ? name : formatModelName(model.id);
}

function publicId(model: UpstreamModel, name: string, aliases: ReadonlyMap<string, string>): string {
  return aliases.get(model.id) ?? name.toLowerCase().replace(/\s+/g, '-');
}

/**
 * Build descriptors for one upstream listing.
 *
 * @param aliases upstream id → public id, taken from the configured table
 */
export function descriptorsFromUpstream(
  models: readonly UpstreamModel[],
  aliases: ReadonlyMap<string, string>,
  nowSeconds: number,
): ModelDescriptor[] {
  const out: ModelDescriptor[] = [];

  for (const model of models) {
    if (model.info?.is_active === false) continue;

    const meta = model.info?.meta;
    const caps = meta?.capabilities ?? {};
    const mcpServers = meta?.mcpServerIds ?? [];
    const name = displayName(model);
    const id = publicId(model, name, aliases);

    const base: ModelDescriptor = {
      id,
      upstreamId: model.id,
      name,
      ownedBy: model.owned_by ?? 'upstream',
      created: model.info?.created_at ?? nowSeconds,
      capabilities: {
        streaming: true,
        files: caps.vision === true || caps.file_qa === true,
        vision: caps.vision === true,
      },
      features: { thinking: caps.think === true, webSearch: false, mcpServers },
    };
    out.push(base);

    if (caps.think) {
      out.push({
        ...base,
        id: `${id}-nothinking`,
        name: `${name}-NOTHINKING`,
        features: { ...base.features, thinking: false },
      });
    }

    if (caps.web_search) {
      out.push({
        ...base,
        id: `${id}-search`,
        name: `${name}-SEARCH`,
        features: { ...base.features, webSearch: true, mcpServers: ['deep-web-search', ...mcpServers] },
      });
      out.push({
        ...base,
        id: `${id}-advanced-search`,
        name: `${name}-ADVANCED-SEARCH`,
        features: { ...base.features, webSearch: true, mcpServers: ['advanced-search', ...mcpServers] },
      });
    }
  }

  return out;
}

/**
 * Maps each upstream id to the first configured public id that targets it.
 */
export function aliasesFromEntries(entries: readonly ModelEntry[]): Map<string, string> {
  const aliases = new Map<string, string>();
  for (const entry of entries) {
    if (!aliases.has(entry.upstreamId)) aliases.set(entry.upstreamId, entry.id);
  }
  return aliases;
}

export type ModelSource = (signal?: AbortSignal) => Promise<Result<ModelDescriptor[]>>;

/**
 * A {@link ModelSource} backed by the upstream listing endpoint.
 */
export function createUpstreamModelSource(
  client: Pick<UpstreamClient, 'listModels'>,
  entries: readonly ModelEntry[],
  now: () => number = Date.now,
): ModelSource {
  const aliases = aliasesFromEntries(entries);

  return async (signal) => {
    const listing = await client.listModels(signal);
    if (!listing.ok) return listing;

    const parsed = UpstreamModelsResponseSchema.safeParse(listing.value);
    if (!parsed.success) {
      return err(
        new UpstreamBadResponseError('Unexpected model listing from upstream', {
          details: { issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`) },
        }),
      );
    }
    return ok(descriptorsFromUpstream(parsed.data.data, aliases, Math.floor(now() / 1000)));
  };
}
