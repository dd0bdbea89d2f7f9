/**
 * In-memory model table.
 *
 * Readers get the last published snapshot and never wait on a refresh. A
 * refresh builds a new snapshot and swaps it in with one assignment; only
 * one refresh runs at a time and concurrent callers share it.
 *
 * @packageDocumentation
 */

import type { ModelEntry } from '../config.js';
import { ModelNotFoundError, err, ok, toInternalError, type Result } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { ModelDescriptor, ModelList } from '../types.js';
import type { ModelSource } from './discovery.js';

interface Snapshot {
  readonly list: readonly ModelDescriptor[];
  readonly byId: ReadonlyMap<string, ModelDescriptor>;
}

export interface ModelRegistryOptions {
  entries: readonly ModelEntry[];
  /** Optional upstream discovery merged under the configured entries. */
  source?: ModelSource;
  /** 0 disables periodic refresh. */
  refreshIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

export function descriptorFromEntry(entry: ModelEntry, created: number): ModelDescriptor {
  return {
    id: entry.id,
    upstreamId: entry.upstreamId,
    name: entry.name ?? entry.id,
    ownedBy: entry.ownedBy,
    created,
    capabilities: { streaming: entry.streaming, files: entry.files, vision: entry.vision },
    features: { thinking: entry.thinking, webSearch: entry.webSearch, mcpServers: [...entry.mcpServers] },
  };
}

/** Published descriptors are shared by every reader, nested tables included. */
function freezeDescriptor(d: ModelDescriptor): ModelDescriptor {
  return Object.freeze({
    ...d,
    capabilities: Object.freeze({ ...d.capabilities }),
    features: Object.freeze({ ...d.features, mcpServers: Object.freeze([...d.features.mcpServers]) }),
  });
}

function buildSnapshot(list: readonly ModelDescriptor[]): Snapshot {
  const frozen = Object.freeze(list.map(freezeDescriptor));
  return {
    list: frozen,
    byId: new Map(frozen.map((d) => [d.id, d])),
  };
}

export class ModelRegistry {
  private snapshot: Snapshot;
  private readonly configured: readonly ModelDescriptor[];
  private readonly source: ModelSource | undefined;
  private readonly refreshIntervalMs: number;
  private readonly logger: Logger;
  private inFlight: Promise<void> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(opts: ModelRegistryOptions) {
    this.source = opts.source;
    this.refreshIntervalMs = opts.refreshIntervalMs ?? 0;
    this.logger = opts.logger ?? silentLogger;

    const created = Math.floor((opts.now ?? Date.now)() / 1000);
    this.configured = opts.entries.map((e) => descriptorFromEntry(e, created));
    this.snapshot = buildSnapshot(this.configured);
  }

  resolve(publicId: string): Result<ModelDescriptor> {
    const descriptor = this.snapshot.byId.get(publicId);
    return descriptor ? ok(descriptor) : err(new ModelNotFoundError(publicId));
  }

  list(): readonly ModelDescriptor[] {
    return this.snapshot.list;
  }

  /** OpenAI `/v1/models` body. */
  toModelList(): ModelList {
    return {
      object: 'list',
      data: this.snapshot.list.map((d) => ({
        id: d.id,
        object: 'model',
        created: d.created,
        owned_by: d.ownedBy,
        name: d.name,
      })),
    };
  }

  /**
   * Re-read the upstream listing and publish a new snapshot. Resolves once
   * the refresh is over; a failed refresh keeps the current snapshot.
   */
  refresh(): Promise<void> {
    if (!this.source) return Promise.resolve();
    if (!this.inFlight) {
      this.inFlight = this.runRefresh(this.source).finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** Begin periodic refresh, when an interval and a source are configured. */
  start(): void {
    if (this.timer || !this.source || this.refreshIntervalMs <= 0) return;
    this.timer = setInterval(() => {
      void this.refresh();
    }, this.refreshIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async runRefresh(source: ModelSource): Promise<void> {
    let result: Awaited<ReturnType<ModelSource>>;
    try {
      result = await source();
    } catch (cause) {
      result = err(toInternalError(cause));
    }
    if (!result.ok) {
      this.logger.warn(
        { event: 'models.refresh_failed', kind: result.error.kind, err: result.error.message },
        'Model refresh failed; keeping previous table',
      );
      return;
    }

    const configuredIds = new Set(this.configured.map((d) => d.id));
    const merged = [...this.configured, ...result.value.filter((d) => !configuredIds.has(d.id))];
    this.snapshot = buildSnapshot(merged);
    this.logger.info(
      { event: 'models.refreshed', configured: this.configured.length, discovered: result.value.length, total: merged.length },
      'Model table refreshed',
    );
  }
}
