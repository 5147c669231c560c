import type { ZodIssue } from 'zod';

import { ConfigError } from '../types';
import { resolveEnv, type EnvSource } from '../utils/env';
import { ClientConfigSchema, type ClientConfig, type ClientConfigInput } from './schema';

function parseInteger(name: string, raw: string | undefined, issues: string[]): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || String(parsed) !== raw) {
    issues.push(`${name}: expected an integer, received "${raw}"`);
    return undefined;
  }
  return parsed;
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
  return `${path}: ${issue.message}`;
}

/**
 * Validates a partial configuration, filling defaults.
 */
export function parseClientConfig(input: ClientConfigInput = {}): ClientConfig {
  const result = ClientConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new ConfigError(`Invalid client configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

/**
 * Builds the client configuration from `CHAT_*` environment variables.
 * Explicit overrides win over the environment.
 */
export function loadClientConfig(env: EnvSource = process.env, overrides: ClientConfigInput = {}): ClientConfig {
  const issues: string[] = [];
  const integer = (name: string) => parseInteger(name, resolveEnv(name, env), issues);

  const input: ClientConfigInput = {
    serverUrl: resolveEnv('CHAT_SERVER_URL', env),
    apiBaseUrl: resolveEnv('CHAT_API_URL', env),
    authTimeoutMs: integer('CHAT_AUTH_TIMEOUT_MS'),
    heartbeatIntervalMs: integer('CHAT_HEARTBEAT_INTERVAL_MS'),
    typingQuietPeriodMs: integer('CHAT_TYPING_QUIET_MS'),
    requestTimeoutMs: integer('CHAT_REQUEST_TIMEOUT_MS'),
    reconnect: {
      baseDelayMs: integer('CHAT_RECONNECT_BASE_DELAY_MS'),
      maxDelayMs: integer('CHAT_RECONNECT_MAX_DELAY_MS'),
      maxAttempts: integer('CHAT_RECONNECT_MAX_ATTEMPTS')
    },
    tokenStorePath: resolveEnv('CHAT_TOKEN_STORE_PATH', env)
  };

  if (issues.length > 0) {
    throw new ConfigError(`Invalid client configuration: ${issues.join('; ')}`, { issues });
  }

  return parseClientConfig({
    ...input,
    ...overrides,
    reconnect: { ...input.reconnect, ...overrides.reconnect }
  });
}
