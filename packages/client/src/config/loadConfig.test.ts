import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, it, expect } from 'vitest';
import { loadClientConfig, parseClientConfig } from './loadConfig';
import { DEFAULT_CLIENT_CONFIG } from './schema';
import { ConfigError } from '../types';

describe('parseClientConfig', () => {
  it('should fill every default from an empty object', () => {
    expect(parseClientConfig({})).toEqual({
      serverUrl: 'ws://127.0.0.1:8080/ws',
      apiBaseUrl: 'http://127.0.0.1:8080/api',
      authTimeoutMs: 5000,
      heartbeatIntervalMs: 30000,
      typingQuietPeriodMs: 2000,
      requestTimeoutMs: 30000,
      reconnect: { baseDelayMs: 2000, maxDelayMs: 30000, maxAttempts: 5 }
    });
    expect(DEFAULT_CLIENT_CONFIG.reconnect.maxAttempts).toBe(5);
  });

  it('should reject a non-websocket server url', () => {
    expect(() => parseClientConfig({ serverUrl: 'http://chat.test' })).toThrow(
      'Invalid client configuration: serverUrl: serverUrl must use ws or wss'
    );
  });

  it('should reject a cap below the base delay', () => {
    expect(() => parseClientConfig({ reconnect: { baseDelayMs: 5000, maxDelayMs: 1000 } })).toThrow(
      'reconnect: maxDelayMs must be greater than or equal to baseDelayMs'
    );
  });

  it('should list every invalid field', () => {
    const error = (() => {
      try {
        parseClientConfig({ authTimeoutMs: 1, typingQuietPeriodMs: 0 });
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ details: { issues: expect.arrayContaining([expect.stringMatching(/^authTimeoutMs: /), expect.stringMatching(/^typingQuietPeriodMs: /)]) } });
  });
});

describe('loadClientConfig', () => {
  it('should read CHAT_ variables', () => {
    const config = loadClientConfig({
      CHAT_SERVER_URL: 'wss://chat.example.com/ws',
      CHAT_API_URL: 'https://chat.example.com/api',
      CHAT_AUTH_TIMEOUT_MS: '8000',
      CHAT_RECONNECT_MAX_ATTEMPTS: '10',
      CHAT_TOKEN_STORE_PATH: '/var/lib/chatline/token.json'
    });

    expect(config.serverUrl).toBe('wss://chat.example.com/ws');
    expect(config.apiBaseUrl).toBe('https://chat.example.com/api');
    expect(config.authTimeoutMs).toBe(8000);
    expect(config.reconnect).toEqual({ baseDelayMs: 2000, maxDelayMs: 30000, maxAttempts: 10 });
    expect(config.tokenStorePath).toBe('/var/lib/chatline/token.json');
  });

  it('should let explicit overrides win', () => {
    const config = loadClientConfig(
      { CHAT_HEARTBEAT_INTERVAL_MS: '10000', CHAT_RECONNECT_BASE_DELAY_MS: '1000' },
      { heartbeatIntervalMs: 15000, reconnect: { maxAttempts: 2 } }
    );

    expect(config.heartbeatIntervalMs).toBe(15000);
    expect(config.reconnect).toEqual({ baseDelayMs: 1000, maxDelayMs: 30000, maxAttempts: 2 });
  });

  it('should reject integers it cannot parse', () => {
    expect(() => loadClientConfig({ CHAT_AUTH_TIMEOUT_MS: '5s' })).toThrow(
      'Invalid client configuration: CHAT_AUTH_TIMEOUT_MS: expected an integer, received "5s"'
    );
  });

  it('should read values through _FILE indirection', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'chatline-config-'));
    try {
      const file = path.join(dir, 'server-url');
      await fs.writeFile(file, 'wss://secret.example.com/ws\n');

      const config = loadClientConfig({ CHAT_SERVER_URL_FILE: file, CHAT_SERVER_URL: 'ws://ignored.test/ws' });

      expect(config.serverUrl).toBe('wss://secret.example.com/ws');
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
