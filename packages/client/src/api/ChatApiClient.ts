/**
 * ChatApiClient - REST collaborator for accounts, users, rooms and history
 */

import { request } from 'undici';
import { z } from 'zod';

import { clientLogger, type ClientLogger } from '../observability/logger';
import {
  ApiError,
  AuthenticationError,
  DecodingError,
  EmailAlreadyRegisteredError,
  InvalidCredentialsError,
  type WireMessage
} from '../types';
import { camelizeKeys } from './camelize';
import {
  ApiErrorBodySchema,
  AuthResponseSchema,
  ChatRoomSummarySchema,
  HistoryMessageSchema,
  UserSchema,
  type AuthResponse,
  type ChatRoomSummary,
  type User
} from './schemas';

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequestOptions {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  headersTimeout: number;
  bodyTimeout: number;
}

export interface HttpResponse {
  statusCode: number;
  body: { text(): Promise<string> };
}

/** The slice of undici's `request` the client depends on. */
export type HttpRequester = (url: string, options: HttpRequestOptions) => Promise<HttpResponse>;

const undiciRequester: HttpRequester = (url, options) => request(url, options);

export interface ChatApiClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  /** Extra attempts for GET requests that fail with a 5xx or a network error. */
  retries?: number;
  headers?: Record<string, string>;
  requester?: HttpRequester;
  logger?: ClientLogger;
}

interface RequestOptions {
  token?: string;
  body?: Record<string, unknown>;
}

const RETRY_BASE_DELAY_MS = 500;
const RETRY_MAX_DELAY_MS = 5_000;

export class ChatApiClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly retries: number;
  private readonly headers: Record<string, string>;
  private readonly requester: HttpRequester;
  private readonly logger: ClientLogger;

  constructor(options: ChatApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeout = options.timeoutMs ?? 30_000;
    this.retries = options.retries ?? 2;
    this.headers = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'User-Agent': 'chatline-client',
      ...options.headers
    };
    this.requester = options.requester ?? undiciRequester;
    this.logger = (options.logger ?? clientLogger).child({ component: 'api' });
  }

  async register(name: string, email: string, password: string): Promise<AuthResponse> {
    try {
      return await this.call('POST', '/auth/register', AuthResponseSchema, { body: { name, email, password } });
    } catch (error) {
      if (error instanceof ApiError && error.statusCode === 409) {
        throw new EmailAlreadyRegisteredError();
      }
      throw error;
    }
  }

  async login(email: string, password: string): Promise<AuthResponse> {
    try {
      return await this.call('POST', '/auth/login', AuthResponseSchema, { body: { email, password } });
    } catch (error) {
      if (error instanceof ApiError) {
        throw new InvalidCredentialsError(error.statusCode);
      }
      throw error;
    }
  }

  currentUser(token: string): Promise<User> {
    return this.call('GET', '/auth/me', UserSchema, { token });
  }

  listUsers(token: string): Promise<User[]> {
    return this.call('GET', '/users', z.array(UserSchema), { token });
  }

  listRooms(token: string): Promise<ChatRoomSummary[]> {
    return this.call('GET', '/chat-rooms', z.array(ChatRoomSummarySchema), { token });
  }

  createRoom(token: string, participantId: string): Promise<ChatRoomSummary> {
    return this.call('POST', '/chat-rooms', ChatRoomSummarySchema, { token, body: { participantId } });
  }

  async fetchMessages(token: string, roomId: string): Promise<WireMessage[]> {
    const history = await this.call(
      'GET',
      `/chat-rooms/${encodeURIComponent(roomId)}/messages`,
      z.array(HistoryMessageSchema),
      { token }
    );
    return history.map(({ chatRoomId, ...rest }) => ({ ...rest, roomId: chatRoomId }));
  }

  private async call<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    options: RequestOptions = {}
  ): Promise<z.output<S>> {
    const payload = await this.send(method, path, options);
    const parsed = schema.safeParse(camelizeKeys(payload));
    if (!parsed.success) {
      throw new DecodingError(`Unexpected response from ${method} ${path}`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      });
    }
    return parsed.data;
  }

  private async send(method: HttpMethod, path: string, options: RequestOptions): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const headers = { ...this.headers };
    if (options.token) {
      headers['Authorization'] = `Bearer ${options.token}`;
    }
    const body = options.body ? JSON.stringify(options.body) : undefined;
    const attempts = method === 'GET' ? this.retries + 1 : 1;

    let lastError: Error | undefined;
    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        const response = await this.requester(url, {
          method,
          headers,
          body,
          headersTimeout: this.timeout,
          bodyTimeout: this.timeout
        });
        const text = await response.body.text();
        if (response.statusCode >= 400) {
          throw this.toApiError(response.statusCode, text);
        }
        return parseBody(text);
      } catch (error) {
        if (error instanceof ApiError && error.statusCode < 500) {
          throw error;
        }
        if (error instanceof DecodingError) {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));
        if (attempt + 1 < attempts) {
          const delay = Math.min(RETRY_BASE_DELAY_MS * Math.pow(2, attempt), RETRY_MAX_DELAY_MS);
          this.logger.debug({ method, path, attempt: attempt + 1, delayMs: delay }, 'retrying request');
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }

    throw lastError ?? new ApiError(`Request failed: ${method} ${path}`, 0);
  }

  private toApiError(statusCode: number, text: string): ApiError {
    let message = `HTTP ${statusCode}`;
    let code: string | undefined;
    const parsed = ApiErrorBodySchema.safeParse(parseBodySafely(text));
    if (parsed.success) {
      message = parsed.data.reason ?? parsed.data.message ?? message;
      code = parsed.data.code;
    } else if (text.trim().length > 0) {
      message = text.trim();
    }

    if (statusCode === 401 || statusCode === 403) {
      return new AuthenticationError(message, statusCode);
    }
    return new ApiError(message, statusCode, code ? { code } : undefined);
  }
}

function parseBody(text: string): unknown {
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodingError('Response body is not valid JSON', {
      body: text.slice(0, 120),
      reason: error instanceof Error ? error.message : String(error)
    });
  }
}

function parseBodySafely(text: string): unknown {
  try {
    return text.length > 0 ? JSON.parse(text) : undefined;
  } catch {
    return undefined;
  }
}
