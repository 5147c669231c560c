import pino, { stdTimeFunctions, type DestinationStream, type Logger } from 'pino';

import { ApiError, ChatClientError } from '../types';

export type ClientLogger = Logger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  code?: string | number;
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: unknown;
};

/** Credentials that must never reach a log line: auth frames, login bodies, request headers. */
export const REDACTED_PATHS = [
  'token',
  '*.token',
  'password',
  '*.password',
  'headers.Authorization',
  '*.headers.Authorization'
];

type CreateLoggerOptions = {
  level?: string;
  bindings?: Record<string, unknown>;
  /** Where lines are written; stdout when omitted. */
  destination?: DestinationStream;
};

function resolveLevel(): string {
  const envLevel = process.env.CHAT_LOG_LEVEL ?? process.env.LOG_LEVEL;
  if (typeof envLevel === 'string' && envLevel.trim().length > 0) {
    return envLevel.trim();
  }
  return 'info';
}

export function createLogger(options: CreateLoggerOptions = {}): ClientLogger {
  const logger = pino(
    {
      level: options.level ?? resolveLevel(),
      base: { service: 'chatline-client' },
      timestamp: stdTimeFunctions.isoTime,
      redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
      formatters: {
        level(label: string) {
          return { level: label };
        }
      }
    },
    options.destination
  );
  return options.bindings ? logger.child(options.bindings) : logger;
}

export const clientLogger: ClientLogger = createLogger({ bindings: { subsystem: 'realtime' } });

function systemErrorCode(error: Error): string | number | undefined {
  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    return error.code;
  }
  return undefined;
}

/**
 * Flattens a thrown value for the `err` field of a log line. Client errors
 * keep their code and details, HTTP failures their status, and socket or
 * file system errors their `code` (ECONNREFUSED, ENOENT).
 */
export function normalizeError(error: unknown): NormalizedError {
  if (!(error instanceof Error)) {
    return { message: typeof error === 'string' ? error : safeStringify(error) ?? String(error) };
  }

  const normalized: NormalizedError = { message: error.message, name: error.name };
  if (error.stack) {
    normalized.stack = error.stack;
  }
  if (error instanceof ChatClientError) {
    normalized.code = error.code;
    if (error.details) {
      normalized.details = error.details;
    }
    if (error instanceof ApiError) {
      normalized.statusCode = error.statusCode;
    }
  } else {
    const code = systemErrorCode(error);
    if (code !== undefined) {
      normalized.code = code;
    }
  }
  if (error.cause !== undefined) {
    normalized.cause = error.cause instanceof Error ? normalizeError(error.cause) : error.cause;
  }
  return normalized;
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}
