/**
 * Configuration schema for the realtime client.
 *
 * Every field has a default so an empty object yields a usable local
 * development configuration.
 */

import { z } from 'zod';

const WebSocketUrlSchema = z
  .string()
  .url()
  .refine((value) => value.startsWith('ws://') || value.startsWith('wss://'), {
    message: 'serverUrl must use ws or wss'
  });

const HttpUrlSchema = z
  .string()
  .url()
  .refine((value) => value.startsWith('http://') || value.startsWith('https://'), {
    message: 'apiBaseUrl must use http or https'
  });

export const ReconnectConfigSchema = z
  .object({
    baseDelayMs: z.number().int().min(1).max(600_000).default(2_000),
    maxDelayMs: z.number().int().min(1).max(3_600_000).default(30_000),
    maxAttempts: z.number().int().min(0).max(100).default(5)
  })
  .refine((data) => data.maxDelayMs >= data.baseDelayMs, {
    message: 'maxDelayMs must be greater than or equal to baseDelayMs'
  });
export type ReconnectConfig = z.infer<typeof ReconnectConfigSchema>;

export const ClientConfigSchema = z.object({
  serverUrl: WebSocketUrlSchema.default('ws://127.0.0.1:8080/ws'),
  apiBaseUrl: HttpUrlSchema.default('http://127.0.0.1:8080/api'),
  authTimeoutMs: z.number().int().min(100).max(120_000).default(5_000),
  heartbeatIntervalMs: z.number().int().min(1_000).max(600_000).default(30_000),
  typingQuietPeriodMs: z.number().int().min(100).max(60_000).default(2_000),
  requestTimeoutMs: z.number().int().min(1_000).max(300_000).default(30_000),
  reconnect: ReconnectConfigSchema.default({}),
  tokenStorePath: z.string().min(1).optional()
});
export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

export const DEFAULT_CLIENT_CONFIG: ClientConfig = ClientConfigSchema.parse({});
