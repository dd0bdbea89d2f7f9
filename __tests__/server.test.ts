/**
 * End-to-end tests: a real gateway in front of an in-process upstream.
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as http from 'node:http';
import { GatewayServer } from '../src/server.js';
import {
  TEST_TOKEN,
  answerStream,
  closeServer,
  createMockServer,
  readBody,
  ssePayloads,
  testConfig,
  upstreamFrame,
  writeStream,
  type MockServer,
} from './helpers/mock-upstream.js';

interface Reply {
  status: number;
  headers: http.IncomingHttpHeaders;
  text: string;
}

interface CallOptions {
  method?: string;
  headers?: http.OutgoingHttpHeaders;
  body?: string | Buffer;
}

const AUTH = { authorization: `Bearer ${TEST_TOKEN}` };
const JSON_AUTH = { ...AUTH, 'content-type': 'application/json' };
const ignore = () => undefined;

function call(url: string, opts: CallOptions = {}): Promise<Reply> {
  return new Promise((resolve, reject) => {
    const req = http.request(url, { method: opts.method ?? 'GET', headers: opts.headers }, (res) => {
      let text = '';
      res.setEncoding('utf8');
      res.on('data', (c: string) => (text += c));
      res.on('end', () => resolve({ status: res.statusCode ?? 0, headers: res.headers, text }));
    });
    req.on('error', reject);
    req.end(opts.body);
  });
}

async function eventually<T>(read: () => T, done: (value: T) => boolean, timeoutMs = 2000): Promise<T> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const value = read();
    if (done(value) || Date.now() > deadline) return value;
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function completionBody(extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ model: 'glm-4.6', messages: [{ role: 'user', content: 'Say hello' }], ...extra });
}

describe('GatewayServer', () => {
  let mock: MockServer | undefined;
  let gateway: GatewayServer | undefined;
  let base = '';
  let handler: http.RequestListener = (_req, res) => writeStream(res, answerStream(['Hel', 'lo']));
  let upstreamCalls: string[] = [];

  async function boot(env: Record<string, string> = {}): Promise<void> {
    upstreamCalls = [];
    mock = await createMockServer((req, res) => {
      upstreamCalls.push(`${req.method ?? ''} ${req.url ?? ''}`);
      handler(req, res);
    });
    gateway = new GatewayServer({ config: testConfig(mock.url, env), random: () => 0 });
    const address = await gateway.start();
    base = `http://127.0.0.1:${address.port}`;
  }

  afterEach(async () => {
    await gateway?.stop();
    if (mock) await closeServer(mock.server);
    gateway = undefined;
    mock = undefined;
    handler = (_req, res) => writeStream(res, answerStream(['Hel', 'lo']));
  });

  it('returns an aggregated completion', async () => {
    let upstreamPayload: unknown;
    handler = async (req, res) => {
      upstreamPayload = JSON.parse(await readBody(req));
      writeStream(res, answerStream(['Hel', 'lo']));
    };
    await boot();

    const reply = await call(`${base}/v1/chat/completions`, { method: 'POST', headers: JSON_AUTH, body: completionBody() });

    expect(reply.status).toBe(200);
    expect(reply.headers['content-type']).toBe('application/json');
    expect(reply.headers['x-request-id']).toHaveLength(12);
    const completion: unknown = JSON.parse(reply.text);
    expect(completion).toMatchObject({
      object: 'chat.completion',
      model: 'glm-4.6',
      choices: [{ index: 0, message: { role: 'assistant', content: 'Hello' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
    });
    expect(JSON.parse(reply.text).id).toMatch(/^chatcmpl-/);

    expect(upstreamCalls).toEqual(['POST /api/chat/completions']);
    expect(upstreamPayload).toMatchObject({
      stream: true,
      model: 'GLM-4-6-API-V1',
      messages: [{ role: 'user', content: 'Say hello' }],
      params: { temperature: 0.7, top_p: 0.9, max_tokens: 8192 },
      features: { enable_thinking: true, web_search: false },
      signature_prompt: 'Say hello',
    });
  });

  it('streams chunks in order and ends with [DONE]', async () => {
    await boot();

    const reply = await call(`${base}/v1/chat/completions`, {
      method: 'POST',
      headers: JSON_AUTH,
      body: completionBody({ stream: true }),
    });

    expect(reply.status).toBe(200);
    expect(reply.headers['content-type']).toBe('text/event-stream');
    const payloads = ssePayloads(reply.text);
    expect(payloads).toHaveLength(4);
    expect(payloads[3]).toBe('[DONE]');

    const chunks = payloads.slice(0, 3).map((p) => JSON.parse(p));
    expect(chunks.map((c) => c.choices)).toEqual([
      [{ index: 0, delta: { role: 'assistant', content: 'Hel' }, finish_reason: null }],
      [{ index: 0, delta: { content: 'lo' }, finish_reason: null }],
      [{ index: 0, delta: {}, finish_reason: 'stop' }],
    ]);
    expect(chunks[2]).toMatchObject({ usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 } });

    const ids = new Set(chunks.map((c) => c.id));
    expect(ids.size).toBe(1);
  });

  it('gives the same text whether streamed or aggregated', async () => {
    const pieces = ['The ', 'quick ', 'fox ', '世界'];
    handler = (_req, res) => writeStream(res, answerStream(pieces));
    await boot();

    const streamed = await call(`${base}/v1/chat/completions`, {
      method: 'POST',
      headers: JSON_AUTH,
      body: completionBody({ stream: true }),
    });
    const aggregated = await call(`${base}/v1/chat/completions`, { method: 'POST', headers: JSON_AUTH, body: completionBody() });

    const text = ssePayloads(streamed.text)
      .filter((p) => p !== '[DONE]')
      .map((p) => JSON.parse(p).choices[0].delta.content ?? '')
      .join('');
    expect(text).toBe('The quick fox 世界');
    expect(JSON.parse(aggregated.text).choices[0].message.content).toBe(text);
  });

  it('rejects a missing token without calling upstream', async () => {
    await boot();

    const reply = await call(`${base}/v1/chat/completions`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: completionBody(),
    });

    expect(reply.status).toBe(401);
    expect(JSON.parse(reply.text)).toEqual({
      error: { message: 'Missing Authorization header', type: 'authentication_error', code: 401 },
    });
    expect(upstreamCalls).toEqual([]);
  });

  it('rejects a wrong token', async () => {
    await boot();
    const reply = await call(`${base}/v1/models`, { headers: { authorization: 'Bearer not-the-token' } });
    expect(reply.status).toBe(401);
    expect(JSON.parse(reply.text).error.message).toBe('Invalid token');
  });

  it('retries transient upstream failures with backoff', async () => {
    let attempt = 0;
    handler = (_req, res) => {
      attempt++;
      if (attempt <= 2) {
        res.writeHead(503, { 'content-type': 'text/plain' });
        res.end('busy');
        return;
      }
      writeStream(res, answerStream(['ok']));
    };
    await boot();

    const started = Date.now();
    const reply = await call(`${base}/v1/chat/completions`, { method: 'POST', headers: JSON_AUTH, body: completionBody() });
    const elapsed = Date.now() - started;

    expect(reply.status).toBe(200);
    expect(JSON.parse(reply.text).choices[0].message.content).toBe('ok');
    expect(upstreamCalls).toHaveLength(3);
    // 50ms then 100ms with jitter pinned to zero
    expect(elapsed).toBeGreaterThanOrEqual(150 - 5);
    expect(gateway?.stats.getStats().retriedRequests).toBe(1);
  });

  it('reports exhausted retries with the attempt count', async () => {
    handler = (_req, res) => {
      res.writeHead(503, { 'content-type': 'text/plain' });
      res.end('busy');
    };
    await boot();

    const reply = await call(`${base}/v1/chat/completions`, { method: 'POST', headers: JSON_AUTH, body: completionBody() });

    expect(reply.status).toBe(502);
    expect(JSON.parse(reply.text)).toEqual({
      error: {
        message: 'Upstream returned 503',
        type: 'upstream_server_error',
        code: 502,
        upstream_status: 503,
        attempts: 3,
        details: { upstream_body: 'busy' },
      },
    });
    expect(upstreamCalls).toHaveLength(3);
  });

  it('maps a silent upstream to 504 after retrying', async () => {
    handler = () => {
      // never answers
    };
    await boot({ FIRST_BYTE_TIMEOUT_MS: '150' });

    const reply = await call(`${base}/v1/chat/completions`, {
      method: 'POST',
      headers: JSON_AUTH,
      body: completionBody({ stream: true }),
    });

    expect(reply.status).toBe(504);
    expect(JSON.parse(reply.text).error).toMatchObject({ message: 'Upstream first-byte timeout', type: 'upstream_timeout', attempts: 3 });
    expect(upstreamCalls).toHaveLength(3);
  });

  it('does not retry a request the upstream rejected', async () => {
    handler = (_req, res) => {
      res.writeHead(422, { 'content-type': 'application/json' });
      res.end('{"detail":"bad"}');
    };
    await boot();

    const reply = await call(`${base}/v1/chat/completions`, { method: 'POST', headers: JSON_AUTH, body: completionBody() });
    expect(reply.status).toBe(502);
    expect(JSON.parse(reply.text).error).toMatchObject({ message: 'Upstream rejected the request (422)', attempts: 1 });
    expect(upstreamCalls).toHaveLength(1);
  });

  it('answers an unknown model with 404 and no upstream call', async () => {
    await boot();

    const reply = await call(`${base}/v1/chat/completions`, {
      method: 'POST',
      headers: JSON_AUTH,
      body: completionBody({ model: 'gpt-imaginary' }),
    });

    expect(reply.status).toBe(404);
    expect(JSON.parse(reply.text)).toEqual({
      error: {
        message: "The model 'gpt-imaginary' does not exist. Use GET /v1/models to list available models.",
        type: 'model_not_found',
        code: 404,
        param: 'model',
      },
    });
    expect(upstreamCalls).toEqual([]);
  });

  it('rejects invalid bodies with 400', async () => {
    await boot();

    const notJson = await call(`${base}/v1/chat/completions`, { method: 'POST', headers: JSON_AUTH, body: '{"model":' });
    expect(notJson.status).toBe(400);
    expect(JSON.parse(notJson.text).error.message).toBe('Request body must be valid JSON');

    const badTemp = await call(`${base}/v1/chat/completions`, {
      method: 'POST',
      headers: JSON_AUTH,
      body: completionBody({ temperature: 5 }),
    });
    expect(badTemp.status).toBe(400);
    expect(JSON.parse(badTemp.text).error).toMatchObject({ type: 'invalid_request_error', param: 'temperature' });
    expect(upstreamCalls).toEqual([]);
  });

  it('enforces model capabilities', async () => {
    const models = [
      { id: 'batch', upstreamId: 'up-batch', streaming: false },
      { id: 'text-only', upstreamId: 'up-text', files: false },
    ];
    await boot({ MODELS: JSON.stringify(models) });

    const stream = await call(`${base}/v1/chat/completions`, {
      method: 'POST',
      headers: JSON_AUTH,
      body: completionBody({ model: 'batch', stream: true }),
    });
    expect(stream.status).toBe(400);
    expect(JSON.parse(stream.text).error).toMatchObject({ message: "Model 'batch' does not support streaming", param: 'stream' });

    const image = await call(`${base}/v1/chat/completions`, {
      method: 'POST',
      headers: JSON_AUTH,
      body: JSON.stringify({
        model: 'text-only',
        messages: [{ role: 'user', content: [{ type: 'image_url', image_url: { url: 'https://example.test/a.png' } }] }],
      }),
    });
    expect(image.status).toBe(400);
    expect(JSON.parse(image.text).error.param).toBe('messages');
    expect(upstreamCalls).toEqual([]);
  });

  it('ends a broken stream with one error frame and no [DONE]', async () => {
    handler = (_req, res) => writeStream(res, [upstreamFrame({ phase: 'answer', delta_content: 'Hel' }), 'data: {broken\n\n']);
    await boot();

    const reply = await call(`${base}/v1/chat/completions`, {
      method: 'POST',
      headers: JSON_AUTH,
      body: completionBody({ stream: true }),
    });

    expect(reply.status).toBe(200);
    const payloads = ssePayloads(reply.text);
    expect(payloads).toHaveLength(2);
    expect(payloads).not.toContain('[DONE]');
    expect(JSON.parse(payloads[1] ?? '')).toMatchObject({
      choices: [{ index: 0, delta: {}, finish_reason: 'error' }],
      error: { message: 'Upstream sent malformed JSON', type: 'upstream_bad_response', code: 502 },
    });
  });

  it('reports a stalled stream as an idle timeout frame', async () => {
    handler = (_req, res) => {
      res.writeHead(200, { 'content-type': 'text/event-stream' });
      res.write(upstreamFrame({ phase: 'answer', delta_content: 'Hel' }));
    };
    await boot({ IDLE_TIMEOUT_MS: '150' });

    const reply = await call(`${base}/v1/chat/completions`, {
      method: 'POST',
      headers: JSON_AUTH,
      body: completionBody({ stream: true }),
    });

    const payloads = ssePayloads(reply.text);
    expect(payloads).toHaveLength(2);
    expect(JSON.parse(payloads[1] ?? '').error).toEqual({ message: 'Upstream idle timeout', type: 'upstream_timeout', code: 504 });
  });

  it('closes the upstream call when the client disconnects mid-stream', async () => {
    let markClosed: (at: number) => void = ignore;
    const upstreamClosed = new Promise<number>((resolve) => {
      markClosed = resolve;
    });
    handler = (_req, res) => {
      res.writeHead(200, { 'content-type': 'text/event-stream' });
      let n = 0;
      const timer = setInterval(() => {
        res.write(upstreamFrame({ phase: 'answer', delta_content: `p${n++}` }));
      }, 20);
      res.on('close', () => {
        clearInterval(timer);
        markClosed(Date.now());
      });
    };
    await boot();

    const disconnectedAt = await new Promise<number>((resolve, reject) => {
      let frames = 0;
      let done = false;
      const req = http.request(`${base}/v1/chat/completions`, { method: 'POST', headers: JSON_AUTH }, (res) => {
        res.on('error', ignore);
        res.on('data', (c: Buffer) => {
          frames += ssePayloads(c.toString('utf8')).length;
          if (frames >= 2 && !done) {
            done = true;
            req.destroy();
            resolve(Date.now());
          }
        });
      });
      req.on('error', (cause) => {
        if (!done) reject(cause);
      });
      req.end(completionBody({ stream: true }));
    });

    const closedAt = await upstreamClosed;
    expect(closedAt - disconnectedAt).toBeLessThan(1000);
  });

  it('counts a client that leaves before sending the whole body as cancelled', async () => {
    await boot();

    await new Promise<void>((resolve) => {
      const req = http.request(`${base}/v1/chat/completions`, {
        method: 'POST',
        headers: { ...JSON_AUTH, 'content-length': 100 },
      });
      req.on('error', ignore);
      req.write('{"model":', () => {
        setTimeout(() => {
          req.destroy();
          resolve();
        }, 50);
      });
    });

    const total = await eventually(() => gateway?.stats.getStats().totalRequests ?? 0, (n) => n === 1);
    expect(total).toBe(1);
    expect(gateway?.stats.getStats()).toMatchObject({
      statusCounts: { '499': 1 },
      cancelledRequests: 1,
      failedRequests: 0,
    });
    expect(upstreamCalls).toEqual([]);
  });

  it('stops reading the upstream while the client is not reading', async () => {
    const FRAMES = 1024;
    const frame = upstreamFrame({ phase: 'answer', delta_content: 'x'.repeat(64 * 1024) });
    let written = 0;
    handler = (_req, res) => {
      res.writeHead(200, { 'content-type': 'text/event-stream' });
      const pump = () => {
        while (written < FRAMES) {
          written++;
          if (!res.write(frame)) {
            res.once('drain', pump);
            return;
          }
        }
        res.end(answerStream([]).join(''));
      };
      pump();
    };
    await boot();

    const res = await new Promise<http.IncomingMessage>((resolve, reject) => {
      const req = http.request(`${base}/v1/chat/completions`, { method: 'POST', headers: JSON_AUTH }, (r) => {
        r.pause();
        resolve(r);
      });
      req.on('error', reject);
      req.end(completionBody({ stream: true }));
    });
    expect(res.statusCode).toBe(200);

    await sleep(300);
    const whilePaused = written;
    await sleep(200);
    expect(whilePaused).toBeGreaterThan(0);
    expect(whilePaused).toBeLessThan(FRAMES);
    expect(written).toBe(whilePaused);

    const tail = await new Promise<string>((resolve, reject) => {
      let last = '';
      res.setEncoding('utf8');
      res.on('data', (c: string) => {
        last = (last + c).slice(-64);
      });
      res.on('end', () => resolve(last));
      res.on('error', reject);
      res.resume();
    });
    expect(tail.endsWith('data: [DONE]\n\n')).toBe(true);
    expect(written).toBe(FRAMES);
  }, 20_000);

  it('uploads an inline image before asking a vision model', async () => {
    let uploaded = '';
    let completionPayload: unknown;
    handler = async (req, res) => {
      if (req.url === '/api/v1/files/') {
        uploaded = await readBody(req);
        res.writeHead(200, { 'content-type': 'application/json' });
        res.end(JSON.stringify({ id: 'img7_upload', filename: 'cat.png' }));
        return;
      }
      completionPayload = JSON.parse(await readBody(req));
      writeStream(res, answerStream(['A cat']));
    };
    await boot();

    const reply = await call(`${base}/v1/chat/completions`, {
      method: 'POST',
      headers: JSON_AUTH,
      body: JSON.stringify({
        model: 'glm-4.5v',
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: 'what is this' },
              { type: 'image_url', image_url: { url: 'data:image/png;base64,aGVsbG8=' } },
            ],
          },
        ],
      }),
    });

    expect(reply.status).toBe(200);
    expect(JSON.parse(reply.text).choices[0].message.content).toBe('A cat');
    expect(upstreamCalls).toEqual(['POST /api/v1/files/', 'POST /api/chat/completions']);
    expect(uploaded).toContain('image/png');
    expect(uploaded).toContain('hello');
    expect(completionPayload).toMatchObject({
      model: 'glm-4.5v',
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: 'what is this' },
            { type: 'image_url', image_url: { url: 'img7_cat.png' } },
          ],
        },
      ],
      files: [],
      signature_prompt: 'what is this',
    });
  });

  it('rejects an unreadable inline image without opening a completion', async () => {
    await boot();

    const reply = await call(`${base}/v1/chat/completions`, {
      method: 'POST',
      headers: JSON_AUTH,
      body: JSON.stringify({
        model: 'glm-4.5v',
        messages: [{ role: 'user', content: [{ type: 'image_url', image_url: 'data:image/png;base64,@@' }] }],
      }),
    });

    expect(reply.status).toBe(400);
    expect(JSON.parse(reply.text).error).toMatchObject({
      message: 'Data URL payload is not valid base64',
      param: 'messages.0.content.0.image_url',
    });
    expect(upstreamCalls).toEqual([]);
  });

  describe('tool calls', () => {
    const tools = [
      {
        type: 'function',
        function: { name: 'get_weather', parameters: { properties: { city: { type: 'string' } }, required: ['city'] } },
      },
    ];
    const block =
      '\n<tool_call>\n<function_calls><function_call><tool>get_weather</tool>' +
      '<args><city>"Paris"</city></args></function_call></function_calls>';

    it('returns tool_calls parsed from the answer', async () => {
      let upstreamPayload: { messages: Array<{ role: string; content: string }> } | undefined;
      handler = async (req, res) => {
        upstreamPayload = JSON.parse(await readBody(req));
        writeStream(res, answerStream(['Checking.', block]));
      };
      await boot();

      const reply = await call(`${base}/v1/chat/completions`, {
        method: 'POST',
        headers: JSON_AUTH,
        body: completionBody({ tools }),
      });

      expect(reply.status).toBe(200);
      const choice = JSON.parse(reply.text).choices[0];
      expect(choice.finish_reason).toBe('tool_calls');
      expect(choice.message.content).toBe('Checking.\n');
      expect(choice.message.tool_calls).toEqual([
        { id: expect.stringMatching(/^call_/), type: 'function', function: { name: 'get_weather', arguments: '{"city":"Paris"}' } },
      ]);
      expect(upstreamPayload?.messages[0]?.role).toBe('system');
      expect(upstreamPayload?.messages[0]?.content).toContain('  - city (string, required): ');
    });

    it('streams tool_calls on the final chunk', async () => {
      handler = (_req, res) => writeStream(res, answerStream(['Checking.', block]));
      await boot();

      const reply = await call(`${base}/v1/chat/completions`, {
        method: 'POST',
        headers: JSON_AUTH,
        body: completionBody({ tools, stream: true }),
      });

      const payloads = ssePayloads(reply.text);
      expect(payloads).toHaveLength(4);
      expect(payloads[3]).toBe('[DONE]');
      const choices = payloads.slice(0, 3).map((p) => JSON.parse(p).choices[0]);
      expect(choices[0]).toEqual({ index: 0, delta: { role: 'assistant', content: 'Checking.' }, finish_reason: null });
      expect(choices[1]).toEqual({ index: 0, delta: { content: '\n' }, finish_reason: null });
      expect(choices[2]).toEqual({
        index: 0,
        delta: {
          tool_calls: [
            {
              index: 0,
              id: expect.stringMatching(/^call_/),
              type: 'function',
              function: { name: 'get_weather', arguments: '{"city":"Paris"}' },
            },
          ],
        },
        finish_reason: 'tool_calls',
      });
    });
  });

  it('lists the configured models', async () => {
    await boot();

    const reply = await call(`${base}/v1/models`, { headers: AUTH });
    expect(reply.status).toBe(200);
    const list = JSON.parse(reply.text);
    expect(list.object).toBe('list');
    expect(list.data.map((m: { id: string }) => m.id)).toEqual([
      'glm-4.6',
      'glm-4.6-nothinking',
      'glm-4.6-search',
      'glm-4.6-advanced-search',
      'glm-4.5v',
      'glm-4.5',
    ]);
    expect(list.data.every((m: { object: string }) => m.object === 'model')).toBe(true);
    expect(upstreamCalls).toEqual([]);
  });

  it('relays a file upload', async () => {
    let received = '';
    handler = async (req, res) => {
      received = await readBody(req);
      res.writeHead(200, { 'content-type': 'application/json' });
      res.end(JSON.stringify({ id: 'file-1', meta: { name: 'a.txt', size: 5 } }));
    };
    await boot();

    const payload = '--xyz\r\nContent-Disposition: form-data; name="file"; filename="a.txt"\r\n\r\nhello\r\n--xyz--\r\n';
    const reply = await call(`${base}/v1/files`, {
      method: 'POST',
      headers: { ...AUTH, 'content-type': 'multipart/form-data; boundary=xyz' },
      body: payload,
    });

    expect(reply.status).toBe(200);
    expect(JSON.parse(reply.text)).toMatchObject({ id: 'file-1', object: 'file', bytes: 5, filename: 'a.txt', purpose: 'assistants' });
    expect(upstreamCalls).toEqual(['POST /api/v1/files/']);
    expect(received).toBe(payload);
  });

  it('refuses an oversized upload before contacting upstream', async () => {
    await boot({ MAX_UPLOAD_BYTES: '64' });

    const reply = await call(`${base}/v1/files`, {
      method: 'POST',
      headers: { ...AUTH, 'content-type': 'multipart/form-data; boundary=xyz', 'content-length': 200 },
      body: Buffer.alloc(200, 'a'),
    });

    expect(reply.status).toBe(413);
    expect(reply.headers.connection).toBe('close');
    expect(JSON.parse(reply.text).error).toMatchObject({ type: 'payload_too_large', details: { max_bytes: 64 } });
    expect(upstreamCalls).toEqual([]);
  });

  it('serves health without authentication', async () => {
    await boot();

    const reply = await call(`${base}/health`);
    expect(reply.status).toBe(200);
    expect(JSON.parse(reply.text)).toMatchObject({ ok: true, models: 6 });
  });

  it('answers CORS preflight and sets CORS headers', async () => {
    await boot();

    const preflight = await call(`${base}/v1/chat/completions`, { method: 'OPTIONS' });
    expect(preflight.status).toBe(204);
    expect(preflight.headers['access-control-allow-origin']).toBe('*');
    expect(preflight.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
    expect(preflight.headers['access-control-allow-headers']).toBe('Content-Type, Authorization');

    const denied = await call(`${base}/v1/models`);
    expect(denied.headers['access-control-allow-origin']).toBe('*');
  });

  it('returns 404 for unknown routes', async () => {
    await boot();

    const outside = await call(`${base}/dashboard`);
    expect(outside.status).toBe(404);
    expect(JSON.parse(outside.text)).toEqual({ error: { message: 'Unknown endpoint: /dashboard', type: 'not_found', code: 404 } });

    const inside = await call(`${base}/v1/embeddings`, { method: 'POST', headers: AUTH });
    expect(inside.status).toBe(404);
    expect(JSON.parse(inside.text).error.message).toBe('Unknown endpoint: /v1/embeddings');
  });
});
