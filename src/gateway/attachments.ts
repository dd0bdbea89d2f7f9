/**
 * Attachment Resolver
 *
 * The upstream only reads files it stores itself. Before a completion is
 * opened, every `image_url` part (data URL or http(s) URL) is uploaded to
 * the upstream file endpoint, and `file` parts, which name a file already
 * uploaded through `/v1/files`, are turned into references.
 *
 * @packageDocumentation
 */

import { nanoid } from 'nanoid';
import { z } from 'zod';
import {
  PayloadTooLargeError,
  UpstreamBadResponseError,
  ValidationError,
  err,
  ok,
  type Result,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { MediaKind, UpstreamFileRef } from '../types.js';
import { FILES_PATH, type UpstreamClient } from '../upstream/client.js';
import type { CompletionRequest } from './validation.js';

export type AttachmentUpstream = Pick<UpstreamClient, 'uploadAttachment' | 'fetchAttachment'>;

export interface AttachmentResolverOptions {
  upstream: AttachmentUpstream;
  maxBytes: number;
  logger?: Logger;
  idFactory?: () => string;
}

const EXTENSION_BY_MIME: Readonly<Record<string, string>> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/gif': 'gif',
  'image/bmp': 'bmp',
  'image/webp': 'webp',
  'video/mp4': 'mp4',
  'application/pdf': 'pdf',
  'application/msword': 'doc',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
  'application/vnd.ms-excel': 'xls',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': 'xlsx',
  'application/vnd.ms-powerpoint': 'ppt',
  'application/vnd.openxmlformats-officedocument.presentationml.presentation': 'pptx',
  'text/plain': 'txt',
  'text/markdown': 'md',
  'text/csv': 'csv',
};

const MIME_BY_EXTENSION: ReadonlyMap<string, string> = new Map(
  Object.entries(EXTENSION_BY_MIME).map(([mime, ext]) => [ext, mime]),
);

const IMAGE_EXTENSIONS = new Set(['png', 'jpg', 'jpeg', 'gif', 'bmp', 'webp']);
const VIDEO_EXTENSIONS = new Set(['mp4']);
const DOCUMENT_EXTENSIONS = new Set(['pdf', 'doc', 'docx', 'xls', 'xlsx', 'ppt', 'pptx']);

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const UploadedSchema = z
  .object({
    id: z.string().min(1),
    filename: z.string().optional(),
  })
  .passthrough();

function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot === -1 ? '' : name.slice(dot + 1).toLowerCase();
}

function lastPathSegment(url: URL): string {
  const raw = url.pathname.split('/').pop() ?? '';
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

export function mediaOf(name: string): MediaKind {
  const ext = extensionOf(name);
  if (IMAGE_EXTENSIONS.has(ext)) return 'image';
  if (VIDEO_EXTENSIONS.has(ext)) return 'video';
  if (DOCUMENT_EXTENSIONS.has(ext)) return 'doc';
  return 'file';
}

/** Reference to a file uploaded earlier through `/v1/files`. */
export function referenceFile(fileId: string, filename: string | undefined): UpstreamFileRef {
  const name = filename ?? fileId;
  return { id: fileId, name, media: mediaOf(name), url: `${FILES_PATH}${fileId}` };
}

interface Decoded {
  data: Buffer;
  contentType: string;
}

/** Decode a `data:<mime>;base64,<payload>` URL. */
export function decodeDataUrl(url: string, param: string): Result<Decoded> {
  const comma = url.indexOf(',');
  const header = comma === -1 ? '' : url.slice('data:'.length, comma);
  if (!header.endsWith(';base64')) {
    return err(new ValidationError('Only base64 data URLs are supported', { param }));
  }
  const payload = url.slice(comma + 1).replace(/\s+/g, '');
  if (payload.length === 0 || !BASE64.test(payload)) {
    return err(new ValidationError('Data URL payload is not valid base64', { param }));
  }
  const contentType = header.slice(0, -';base64'.length).split(';')[0] || 'application/octet-stream';
  return ok({ data: Buffer.from(payload, 'base64'), contentType: contentType.toLowerCase() });
}

interface PendingUpload {
  url: string;
  param: string;
}

export class AttachmentResolver {
  private readonly upstream: AttachmentUpstream;
  private readonly maxBytes: number;
  private readonly logger: Logger;
  private readonly idFactory: () => string;

  constructor(opts: AttachmentResolverOptions) {
    this.upstream = opts.upstream;
    this.maxBytes = opts.maxBytes;
    this.logger = opts.logger ?? silentLogger;
    this.idFactory = opts.idFactory ?? nanoid;
  }

  /**
   * Upstream references for every attachment in the request, in message
   * order. Uploads run concurrently; the first failure is returned and
   * the completion is not opened.
   */
  async resolve(request: CompletionRequest, signal: AbortSignal, logger: Logger = this.logger): Promise<Result<UpstreamFileRef[]>> {
    const tasks: Array<Promise<Result<UpstreamFileRef>>> = [];

    request.messages.forEach((message, mi) => {
      if (typeof message.content === 'string') return;
      message.content.forEach((part, pi) => {
        if (part.type === 'file') {
          tasks.push(Promise.resolve(ok(referenceFile(part.file.file_id, part.file.filename))));
        } else if (part.type === 'image_url') {
          const url = typeof part.image_url === 'string' ? part.image_url : part.image_url.url;
          tasks.push(this.upload({ url, param: `messages.${mi}.content.${pi}.image_url` }, signal));
        }
      });
    });
    if (tasks.length === 0) return ok([]);

    const results = await Promise.all(tasks);
    const refs: UpstreamFileRef[] = [];
    for (const result of results) {
      if (!result.ok) {
        logger.warn({ event: 'attachments.failed', kind: result.error.kind, err: result.error.message }, 'Attachment upload failed');
        return result;
      }
      refs.push(result.value);
    }
    logger.info({ event: 'attachments.uploaded', count: refs.length }, 'Attachments ready');
    return ok(refs);
  }

  private async upload(pending: PendingUpload, signal: AbortSignal): Promise<Result<UpstreamFileRef>> {
    const loaded = await this.load(pending, signal);
    if (!loaded.ok) return loaded;
    const { data, contentType, filename } = loaded.value;

    if (data.length > this.maxBytes) {
      return err(
        new PayloadTooLargeError(`Attachment of ${data.length} bytes exceeds ${this.maxBytes} bytes`, {
          param: pending.param,
          details: { max_bytes: this.maxBytes },
        }),
      );
    }

    const uploaded = await this.upstream.uploadAttachment({ data, filename, contentType }, signal);
    if (!uploaded.ok) return uploaded;

    const parsed = UploadedSchema.safeParse(uploaded.value.body);
    if (!parsed.success) {
      return err(new UpstreamBadResponseError('Upstream file response is missing an id', { upstreamStatus: uploaded.value.statusCode }));
    }
    // The upstream may answer with `<id>_<name>`; references use the bare id.
    const id = parsed.data.id.split('_')[0] || parsed.data.id;
    const name = parsed.data.filename ?? filename;
    return ok({ id, name, media: mediaOf(name), size: data.length, url: `${FILES_PATH}${id}` });
  }

  private async load(pending: PendingUpload, signal: AbortSignal): Promise<Result<Decoded & { filename: string }>> {
    const { url, param } = pending;

    if (url.startsWith('data:')) {
      const decoded = decodeDataUrl(url, param);
      if (!decoded.ok) return decoded;
      const ext = EXTENSION_BY_MIME[decoded.value.contentType] ?? 'png';
      return ok({ ...decoded.value, filename: `${this.idFactory()}.${ext}` });
    }

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return err(new ValidationError('Attachment URL is not valid', { param }));
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return err(new ValidationError(`Unsupported attachment URL scheme '${parsed.protocol}'`, { param }));
    }

    const fetched = await this.upstream.fetchAttachment(url, this.maxBytes, signal);
    if (!fetched.ok) return fetched;
    if (fetched.value.statusCode < 200 || fetched.value.statusCode >= 300) {
      return err(
        new ValidationError(`Attachment URL answered HTTP ${fetched.value.statusCode}`, {
          param,
          details: { url_status: fetched.value.statusCode },
        }),
      );
    }

    const lastSegment = lastPathSegment(parsed);
    const headerType = fetched.value.contentType?.split(';')[0]?.trim().toLowerCase();
    const contentType = headerType || MIME_BY_EXTENSION.get(extensionOf(lastSegment)) || 'application/octet-stream';
    const filename = extensionOf(lastSegment)
      ? lastSegment
      : `${lastSegment || this.idFactory()}.${EXTENSION_BY_MIME[contentType] ?? 'png'}`;
    return ok({ data: fetched.value.data, contentType, filename });
  }
}
