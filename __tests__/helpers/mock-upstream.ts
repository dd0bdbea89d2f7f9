import * as http from 'node:http';
import { loadConfig, type GatewayConfig } from '../../src/config.js';

export interface MockServer {
  server: http.Server;
  port: number;
  url: string;
}

export function createMockServer(handler: http.RequestListener): Promise<MockServer> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(handler);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('mock server did not bind a TCP port'));
        return;
      }
      resolve({ server, port: address.port, url: `http://127.0.0.1:${address.port}` });
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
  });
}

export function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => (body += chunk));
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

/** One upstream SSE frame. */
export function upstreamFrame(data: Record<string, unknown>, type = 'chat:completion'): string {
  return `data: ${JSON.stringify({ type, data })}\n\n`;
}

/**
 * A complete upstream stream: one `answer` frame per piece, then the
 * terminal `other` frame with usage and the `done` frame.
 */
export function answerStream(pieces: string[], usage = { prompt_tokens: 3, completion_tokens: pieces.length, total_tokens: 3 + pieces.length }): string[] {
  return [
    ...pieces.map((p) => upstreamFrame({ phase: 'answer', delta_content: p })),
    upstreamFrame({ phase: 'other', delta_content: '', usage }),
    upstreamFrame({ phase: 'done' }),
  ];
}

export function writeStream(res: http.ServerResponse, frames: string[]): void {
  res.writeHead(200, { 'Content-Type': 'text/event-stream' });
  for (const frame of frames) res.write(frame);
  res.end();
}

export const TEST_TOKEN = 'test-secret';

export function testConfig(upstreamUrl: string, env: Record<string, string> = {}): GatewayConfig {
  return loadConfig({
    AUTH_TOKENS: TEST_TOKEN,
    UPSTREAM_BASE_URL: upstreamUrl,
    GATEWAY_PORT: '0',
    LOG_LEVEL: 'silent',
    RETRY_INITIAL_DELAY_MS: '50',
    RETRY_MAX_DELAY_MS: '400',
    CONNECT_TIMEOUT_MS: '1000',
    FIRST_BYTE_TIMEOUT_MS: '2000',
    IDLE_TIMEOUT_MS: '2000',
    ...env,
  });
}

/** Split an SSE response body into its `data:` payloads. */
export function ssePayloads(text: string): string[] {
  return text
    .split('\n\n')
    .filter((frame) => frame.startsWith('data: '))
    .map((frame) => frame.slice('data: '.length));
}
