#!/usr/bin/env node
/**
 * Completion Gateway CLI
 *
 * Usage:
 *   completion-gateway [command] [options]
 *
 * Commands:
 *   (default), start   Start the gateway
 *   status             Check a running gateway's /health endpoint
 *
 * Options:
 *   --port <number>    Port to listen on (default: GATEWAY_PORT or 8001)
 *   --host <string>    Host to bind to (default: GATEWAY_HOST or 127.0.0.1)
 *   -v, --verbose      Debug logging
 *   -h, --help         Show this help message
 *   --version          Show version
 *
 * Configuration is read from the environment; a `.env` file in the working
 * directory is loaded first.
 *
 * @packageDocumentation
 */

import dotenv from 'dotenv';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ConfigError, loadConfig, type GatewayConfig } from './config.js';
import { checkHealth } from './health.js';
import { createLogger } from './logger.js';
import { startGateway } from './server.js';

function readVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0'; // package.json not shipped alongside dist
  }
}

const VERSION = readVersion();

interface CliOptions {
  command: 'start' | 'status' | 'help' | 'version';
  port?: number;
  host?: string;
  verbose: boolean;
}

/**
 * Parse argv (without the node and script entries).
 *
 * @throws Error on an invalid port or unknown command
 */
function parseArgs(args: readonly string[]): CliOptions {
  const opts: CliOptions = { command: 'start', verbose: false };
  if (args.includes('-h') || args.includes('--help')) return { ...opts, command: 'help' };
  if (args.includes('--version')) return { ...opts, command: 'version' };

  let i = 0;
  const first = args[0];
  if (first !== undefined && !first.startsWith('-')) {
    if (first !== 'start' && first !== 'status') throw new Error(`Unknown command: ${first}`);
    opts.command = first;
    i = 1;
  }

  for (; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === '--port' && next !== undefined) {
      const port = Number.parseInt(next, 10);
      if (Number.isNaN(port) || port < 0 || port > 65535) {
        throw new Error('Invalid port number');
      }
      opts.port = port;
      i++;
    } else if (arg === '--host' && next !== undefined) {
      opts.host = next;
      i++;
    } else if (arg === '-v' || arg === '--verbose') {
      opts.verbose = true;
    }
  }
  return opts;
}

function printHelp(): void {
  console.log(`
Completion Gateway - OpenAI-compatible front for a chat completion upstream

Usage:
  completion-gateway [command] [options]

Commands:
  (default), start   Start the gateway
  status             Check a running gateway's /health endpoint

Options:
  --port <number>    Port to listen on (default: 8001)
  --host <string>    Host to bind to (default: 127.0.0.1)
  -v, --verbose      Enable debug logging
  -h, --help         Show this help message
  --version          Show version

Environment Variables:
  AUTH_TOKENS        Comma-separated bearer tokens accepted from clients (required)
  UPSTREAM_BASE_URL  Upstream origin, e.g. https://chat.example.com (required)
  UPSTREAM_API_KEY   Bearer token sent to the upstream
  LOG_LEVEL          fatal | error | warn | info | debug | trace | silent
  LOG_PRETTY         Human-readable logs (true/false)
`);
}

async function main(): Promise<void> {
  dotenv.config();

  let opts: CliOptions;
  try {
    opts = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  if (opts.command === 'help') {
    printHelp();
    return;
  }
  if (opts.command === 'version') {
    console.log(`completion-gateway v${VERSION}`);
    return;
  }

  const env: Record<string, string | undefined> = { ...process.env };
  if (opts.port !== undefined) env['GATEWAY_PORT'] = String(opts.port);
  if (opts.host !== undefined) env['GATEWAY_HOST'] = opts.host;
  if (opts.verbose) env['LOG_LEVEL'] = 'debug';

  if (opts.command === 'status') {
    const host = env['GATEWAY_HOST'] ?? '127.0.0.1';
    const port = env['GATEWAY_PORT'] ?? '8001';
    const healthy = await checkHealth(`http://${host}:${port}`);
    console.log(healthy ? `Gateway at ${host}:${port} is healthy` : `Gateway at ${host}:${port} is not responding`);
    process.exit(healthy ? 0 : 1);
  }

  let config: GatewayConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });
  const gateway = await startGateway({ config, logger });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    gateway.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error('Failed to start gateway:', err);
  process.exit(1);
});
