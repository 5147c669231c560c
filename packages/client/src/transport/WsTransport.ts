import { WebSocket, type RawData } from 'ws';

import { clientLogger, type ClientLogger } from '../observability/logger';
import type { RawPayload } from '../protocol/codec';
import { TransportError } from '../types';
import type { Transport, TransportFactory } from './Transport';

const NORMAL_CLOSURE = 1000;
const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;

export interface WsTransportOptions {
  handshakeTimeoutMs?: number;
  headers?: Record<string, string>;
  logger?: ClientLogger;
}

type PendingRead = {
  resolve: (payload: RawPayload) => void;
  reject: (error: TransportError) => void;
};

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return data;
}

function toText(data: RawData): string {
  return Buffer.from(toBytes(data)).toString('utf8');
}

/**
 * Transport over a `ws` client socket. Inbound frames are buffered until
 * read, so no frame is lost between two `receive` calls.
 */
export class WsTransport implements Transport {
  private readonly handshakeTimeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly logger: ClientLogger;
  private socket: WebSocket | null = null;
  private readonly inbox: RawPayload[] = [];
  private pendingRead: PendingRead | null = null;
  private failure: TransportError | null = null;

  constructor(private readonly url: string, options: WsTransportOptions = {}) {
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.headers = options.headers ?? {};
    this.logger = (options.logger ?? clientLogger).child({ component: 'ws-transport' });
  }

  open(): Promise<void> {
    if (this.socket) {
      return Promise.reject(new TransportError('Transport already opened'));
    }

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const settleWithFailure = (error: TransportError) => {
        this.fail(error);
        if (!settled) {
          settled = true;
          reject(this.failure ?? error);
        }
      };

      const socket = new WebSocket(this.url, {
        handshakeTimeout: this.handshakeTimeoutMs,
        headers: this.headers
      });
      this.socket = socket;

      socket.on('open', () => {
        settled = true;
        this.logger.debug({ url: this.url }, 'socket open');
        resolve();
      });

      socket.on('message', (data, isBinary) => {
        this.deliver(isBinary ? toBytes(data) : toText(data));
      });

      socket.on('error', (error) => {
        this.logger.debug({ url: this.url, message: error.message }, 'socket error');
        settleWithFailure(new TransportError(error.message, { cause: error }));
      });

      socket.on('close', (code, reason) => {
        const text = reason.toString('utf8');
        const message = text.length > 0 ? `Socket closed (${code}: ${text})` : `Socket closed (${code})`;
        settleWithFailure(new TransportError(message, { details: { code } }));
      });
    });
  }

  send(text: string): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError('Socket is not open'));
    }
    return new Promise<void>((resolve, reject) => {
      socket.send(text, (error) => {
        if (error) {
          reject(new TransportError(error.message, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  receive(): Promise<RawPayload> {
    const next = this.inbox.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.pendingRead) {
      return Promise.reject(new TransportError('A receive is already in progress'));
    }
    return new Promise<RawPayload>((resolve, reject) => {
      this.pendingRead = { resolve, reject };
    });
  }

  close(code: number = NORMAL_CLOSURE, reason: string = 'client closing'): void {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.fail(new TransportError('Transport closed by client'));
    if (socket.readyState === WebSocket.CONNECTING) {
      socket.terminate();
    } else if (socket.readyState === WebSocket.OPEN) {
      socket.close(code, reason);
    }
  }

  private deliver(payload: RawPayload): void {
    if (this.failure) {
      return;
    }
    const reader = this.pendingRead;
    if (reader) {
      this.pendingRead = null;
      reader.resolve(payload);
      return;
    }
    this.inbox.push(payload);
  }

  private fail(error: TransportError): void {
    if (!this.failure) {
      this.failure = error;
    }
    const reader = this.pendingRead;
    if (reader) {
      this.pendingRead = null;
      reader.reject(this.failure);
    }
  }
}

export function createWsTransportFactory(options: WsTransportOptions = {}): TransportFactory {
  return (url: string) => new WsTransport(url, options);
}
