/**
 * Structured logger for the gateway.
 * @packageDocumentation
 */

import { pino } from 'pino';
import type { Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

/** Paths scrubbed from every log line. */
const REDACT_PATHS = [
  'authorization',
  'headers.authorization',
  'req.headers.authorization',
  'token',
];

export function createLogger(opts: LoggerOptions = {}): Logger {
  return pino({
    name: 'completion-gateway',
    level: opts.level ?? 'info',
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    transport: opts.pretty
      ? {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss Z', ignore: 'pid,hostname' },
        }
      : undefined,
  });
}

/** Logger that drops everything; used by tests and embedders that bring their own sink. */
export const silentLogger: Logger = pino({ level: 'silent' });
