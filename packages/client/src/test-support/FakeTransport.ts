import type { RawPayload } from '../protocol/codec';
import type { Transport, TransportFactory } from '../transport/Transport';
import { TransportError } from '../types';

export const AUTH_ACK_FRAME = JSON.stringify({ type: 'success', authenticated: true });

export interface FakeTransportOptions {
  /** Rejects `open` with this error. */
  openError?: Error;
  /** Leaves `open` pending until `completeOpen` or `close` is called. */
  deferOpen?: boolean;
  /** Answers an auth frame with an acknowledgment. Defaults to true. */
  autoAck?: boolean;
  /** Rejects every `send` with this error. */
  sendError?: Error;
}

type Pending<T> = { resolve: (value: T) => void; reject: (error: Error) => void };

/** In-process transport driven directly by tests. */
export class FakeTransport implements Transport {
  readonly sent: string[] = [];
  closeCalls = 0;
  opened = false;
  private readonly inbox: RawPayload[] = [];
  private pendingRead: Pending<RawPayload> | null = null;
  private pendingOpen: Pending<void> | null = null;
  private failure: TransportError | null = null;

  constructor(
    readonly url: string,
    readonly options: FakeTransportOptions = {}
  ) {}

  get closed(): boolean {
    return this.closeCalls > 0;
  }

  get authFrames(): string[] {
    return this.sent.filter((frame) => frame.includes('"type":"auth"'));
  }

  open(): Promise<void> {
    if (this.options.openError) {
      return Promise.reject(this.options.openError);
    }
    if (this.options.deferOpen) {
      return new Promise<void>((resolve, reject) => {
        this.pendingOpen = { resolve, reject };
      });
    }
    this.opened = true;
    return Promise.resolve();
  }

  completeOpen(): void {
    const pending = this.pendingOpen;
    this.pendingOpen = null;
    this.opened = true;
    pending?.resolve();
  }

  async send(text: string): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    if (this.options.sendError) {
      throw this.options.sendError;
    }
    this.sent.push(text);
    if (this.options.autoAck !== false && text.includes('"type":"auth"')) {
      this.push(AUTH_ACK_FRAME);
    }
  }

  receive(): Promise<RawPayload> {
    const next = this.inbox.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise<RawPayload>((resolve, reject) => {
      this.pendingRead = { resolve, reject };
    });
  }

  close(): void {
    this.closeCalls += 1;
    this.fail(new TransportError('Transport closed'));
  }

  /** Delivers one inbound frame. */
  push(payload: RawPayload): void {
    const pending = this.pendingRead;
    if (pending) {
      this.pendingRead = null;
      pending.resolve(payload);
      return;
    }
    this.inbox.push(payload);
  }

  /** Simulates the peer dropping the connection. */
  drop(error: TransportError = new TransportError('Connection reset by peer')): void {
    this.fail(error);
  }

  private fail(error: TransportError): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    const read = this.pendingRead;
    this.pendingRead = null;
    read?.reject(error);
    const open = this.pendingOpen;
    this.pendingOpen = null;
    open?.reject(error);
  }
}

/**
 * Factory that records every transport it creates. `plan` supplies options
 * for the n-th transport (0-based); later transports use `defaults`.
 */
export class FakeTransportFactory {
  readonly transports: FakeTransport[] = [];
  private readonly plan: FakeTransportOptions[];

  constructor(
    plan: FakeTransportOptions[] = [],
    private readonly defaults: FakeTransportOptions = {}
  ) {
    this.plan = [...plan];
  }

  readonly create: TransportFactory = (url) => {
    const options = this.plan[this.transports.length] ?? this.defaults;
    const transport = new FakeTransport(url, { ...options });
    this.transports.push(transport);
    return transport;
  };

  get latest(): FakeTransport | undefined {
    return this.transports[this.transports.length - 1];
  }

  at(index: number): FakeTransport {
    const transport = this.transports[index];
    if (!transport) {
      throw new Error(`No transport created at index ${index}`);
    }
    return transport;
  }
}
