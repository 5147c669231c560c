/**
 * ConnectionSessionManager - owns the realtime socket and its lifecycle.
 *
 * State only changes inside synchronous sections. Every continuation that
 * resumes after an await carries the epoch it started under and gives up
 * when a newer connect or a disconnect has moved the epoch on.
 */

import { clientLogger, normalizeError, type ClientLogger } from '../observability/logger';
import {
  recordConnectionTransition,
  recordFrameDropped,
  recordReconnectAttempt
} from '../observability/metrics';
import { decodeFrame, encodeIntent, type DecodeResult, type RawPayload } from '../protocol/codec';
import { PING_FRAME, PONG_FRAME } from '../protocol/frames';
import type { Transport, TransportFactory } from '../transport/Transport';
import { createWsTransportFactory } from '../transport/WsTransport';
import {
  AuthenticationFailedError,
  ConnectionCancelledError,
  MaxReconnectAttemptsError,
  NotConnectedError,
  TransportError,
  type ChatIntent,
  type ConnectionState,
  type InboundEvent,
  type Unsubscribe
} from '../types';
import { toError } from '../utils/errorUtils';
import { HeartbeatDriver } from './HeartbeatDriver';
import { DEFAULT_RECONNECT_POLICY, reconnectDelay, type ReconnectPolicyOptions } from './ReconnectPolicy';
import { SerialExecutor } from './SerialExecutor';
import { BroadcastStream, ValueStream, type Listener } from './streams';

export const DEFAULT_AUTH_TIMEOUT_MS = 5_000;
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;

export interface SessionManagerOptions {
  url: string;
  transportFactory?: TransportFactory;
  authTimeoutMs?: number;
  heartbeatIntervalMs?: number;
  reconnect?: ReconnectPolicyOptions;
  logger?: ClientLogger;
}

type Handshake = {
  epoch: number;
  timer: NodeJS.Timeout;
  resolve: () => void;
  reject: (error: Error) => void;
};

function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  const normalized = toError(error);
  return new TransportError(normalized.message, { cause: normalized });
}

export class ConnectionSessionManager {
  private readonly url: string;
  private readonly transportFactory: TransportFactory;
  private readonly authTimeoutMs: number;
  private readonly reconnectPolicy: ReconnectPolicyOptions;
  private readonly logger: ClientLogger;

  private readonly events: BroadcastStream<InboundEvent>;
  private readonly states: ValueStream<ConnectionState>;
  private readonly writer = new SerialExecutor();
  private readonly heartbeat: HeartbeatDriver;

  private transport: Transport | null = null;
  private authenticated = false;
  private credential: string | null = null;
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private handshake: Handshake | null = null;
  // Set when the socket dies after the ack but before `establish` resumes.
  private lostDuringHandshake: { transport: Transport; error: TransportError } | null = null;
  private epoch = 0;

  constructor(options: SessionManagerOptions) {
    this.url = options.url;
    this.logger = (options.logger ?? clientLogger).child({ component: 'session' });
    this.transportFactory = options.transportFactory ?? createWsTransportFactory({ logger: this.logger });
    this.authTimeoutMs = options.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS;
    this.reconnectPolicy = options.reconnect ?? DEFAULT_RECONNECT_POLICY;
    this.events = new BroadcastStream<InboundEvent>('events', this.logger);
    this.states = new ValueStream<ConnectionState>({ status: 'disconnected' }, 'state', this.logger);
    this.heartbeat = new HeartbeatDriver({
      intervalMs: options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS,
      ping: () => this.sendText(PING_FRAME),
      onFailure: (error) => this.handleConnectionLost(toTransportError(error)),
      logger: this.logger
    });
  }

  get state(): ConnectionState {
    return this.states.value;
  }

  get isAuthenticated(): boolean {
    return this.authenticated;
  }

  /** Current state immediately, then every transition. */
  onStateChange(listener: Listener<ConnectionState>): Unsubscribe {
    return this.states.subscribe(listener);
  }

  /** Inbound events from now on; nothing emitted earlier is replayed. */
  subscribe(listener: Listener<InboundEvent>): Unsubscribe {
    return this.events.subscribe(listener);
  }

  /**
   * Opens the socket and authenticates with `token`. Resolves once the server
   * acknowledged the credential; a no-op while a session is already active.
   *
   * @throws TransportError when the socket cannot be opened
   * @throws AuthenticationFailedError when the ack is refused or times out
   * @throws ConnectionCancelledError when `disconnect` interrupts the attempt
   */
  async connect(token: string): Promise<void> {
    const status = this.state.status;
    if (status === 'connecting' || status === 'connected' || status === 'reconnecting') {
      this.logger.debug({ status }, 'connect ignored; session already active');
      return;
    }
    if (token.trim().length === 0) {
      throw new AuthenticationFailedError('A credential is required to connect');
    }

    this.teardown(new ConnectionCancelledError());
    const epoch = this.advanceEpoch();
    this.credential = token;
    this.reconnectAttempts = 0;
    this.setState({ status: 'connecting' });

    try {
      await this.establish(token, epoch);
    } catch (error) {
      if (epoch === this.epoch && !(error instanceof ConnectionCancelledError)) {
        this.credential = null;
        this.fail(toError(error).message);
      }
      throw error;
    }
  }

  /**
   * Cancels timers, the handshake and the receive loop, then closes the
   * socket. Idempotent; emits `disconnected` only when the state changes.
   */
  disconnect(): void {
    const changed = this.state.status !== 'disconnected';
    this.advanceEpoch();
    this.teardown(new ConnectionCancelledError('Disconnected while connecting'));
    this.credential = null;
    this.reconnectAttempts = 0;
    if (changed) {
      this.setState({ status: 'disconnected' });
      this.events.emit({ type: 'disconnected' });
    }
  }

  /**
   * @throws NotConnectedError unless the session is authenticated
   * @throws EncodingError when the intent fails validation
   * @throws TransportError when the socket write fails
   */
  async send(intent: ChatIntent): Promise<void> {
    if (!this.authenticated || !this.transport) {
      throw new NotConnectedError();
    }
    await this.sendText(encodeIntent(intent));
  }

  async sendText(text: string): Promise<void> {
    const transport = this.transport;
    if (!this.authenticated || !transport) {
      throw new NotConnectedError();
    }
    await this.write(transport, text);
  }

  private async establish(token: string, epoch: number): Promise<void> {
    const transport = this.transportFactory(this.url);
    this.transport = transport;
    this.authenticated = false;

    try {
      await transport.open();
    } catch (error) {
      transport.close();
      if (epoch !== this.epoch) {
        throw new ConnectionCancelledError();
      }
      this.transport = null;
      throw toTransportError(error);
    }
    if (epoch !== this.epoch) {
      transport.close();
      throw new ConnectionCancelledError();
    }

    const acknowledged = this.awaitAuthAck(epoch);
    void this.receiveLoop(transport, epoch);

    try {
      await Promise.all([this.write(transport, encodeIntent({ type: 'auth', token })), acknowledged]);
    } catch (error) {
      this.abortHandshake(error instanceof Error ? error : new AuthenticationFailedError());
      if (epoch === this.epoch) {
        this.closeTransport();
      }
      throw error;
    }

    if (epoch !== this.epoch) {
      throw new ConnectionCancelledError();
    }
    const lost = this.lostDuringHandshake;
    this.lostDuringHandshake = null;
    if (lost && lost.transport === transport) {
      this.closeTransport();
      throw lost.error;
    }

    this.authenticated = true;
    this.reconnectAttempts = 0;
    this.setState({ status: 'connected' });
    this.events.emit({ type: 'connected' });
    this.heartbeat.start();
  }

  private awaitAuthAck(epoch: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.settleHandshake(
          epoch,
          new AuthenticationFailedError(`Authentication not acknowledged within ${this.authTimeoutMs}ms`)
        );
      }, this.authTimeoutMs);
      this.handshake = { epoch, timer, resolve, reject };
    });
  }

  private settleHandshake(epoch: number, error?: Error): void {
    const handshake = this.handshake;
    if (!handshake || handshake.epoch !== epoch) {
      return;
    }
    this.handshake = null;
    clearTimeout(handshake.timer);
    if (error) {
      handshake.reject(error);
    } else {
      handshake.resolve();
    }
  }

  private abortHandshake(error: Error): void {
    if (this.handshake) {
      this.settleHandshake(this.handshake.epoch, error);
    }
  }

  private async receiveLoop(transport: Transport, epoch: number): Promise<void> {
    for (;;) {
      let payload: RawPayload;
      try {
        payload = await transport.receive();
      } catch (error) {
        this.handleReceiveFailure(transport, epoch, error);
        return;
      }
      if (epoch !== this.epoch || this.transport !== transport) {
        return;
      }
      this.dispatch(decodeFrame(payload), transport, epoch);
    }
  }

  private dispatch(result: DecodeResult, transport: Transport, epoch: number): void {
    switch (result.kind) {
      case 'event':
        this.events.emit(result.event);
        return;
      case 'authAck':
        if (!this.handshake) {
          this.logger.debug('auth acknowledgment outside of a handshake');
        }
        this.settleHandshake(epoch);
        return;
      case 'authRejected':
        this.settleHandshake(epoch, new AuthenticationFailedError(result.reason));
        return;
      case 'ping':
        this.write(transport, PONG_FRAME).catch((error: unknown) => {
          this.logger.debug({ err: normalizeError(error) }, 'failed to answer ping');
        });
        return;
      case 'pong':
        this.logger.trace('pong received');
        return;
      case 'ignored':
        recordFrameDropped(result.reason);
        this.logger.debug({ reason: result.reason, detail: result.detail }, 'inbound frame ignored');
        return;
    }
  }

  private handleReceiveFailure(transport: Transport, epoch: number, error: unknown): void {
    if (epoch !== this.epoch || this.transport !== transport) {
      return;
    }
    const failure = toTransportError(error);
    if (this.handshake) {
      this.settleHandshake(epoch, failure);
      return;
    }
    if (this.state.status !== 'connected') {
      this.lostDuringHandshake = { transport, error: failure };
      return;
    }
    this.handleConnectionLost(failure);
  }

  private handleConnectionLost(error: TransportError): void {
    if (this.state.status !== 'connected') {
      return;
    }
    this.logger.warn({ err: normalizeError(error) }, 'connection lost');
    const epoch = this.advanceEpoch();
    this.teardown(error);
    this.scheduleReconnect(epoch);
  }

  private scheduleReconnect(epoch: number): void {
    if (!this.credential) {
      this.fail('No credential available for reconnection');
      return;
    }
    this.reconnectAttempts += 1;
    const delayMs = reconnectDelay(this.reconnectAttempts, this.reconnectPolicy);
    if (delayMs === null) {
      const exhausted = new MaxReconnectAttemptsError(this.reconnectAttempts - 1);
      this.logger.error({ attempts: this.reconnectAttempts - 1 }, exhausted.message);
      this.fail(exhausted.message);
      return;
    }

    recordReconnectAttempt();
    this.logger.info(
      { attempt: this.reconnectAttempts, maxAttempts: this.reconnectPolicy.maxAttempts, delayMs },
      'reconnect scheduled'
    );
    this.setState({ status: 'reconnecting', attempt: this.reconnectAttempts, delayMs });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.reconnect(epoch);
    }, delayMs);
  }

  private async reconnect(epoch: number): Promise<void> {
    const token = this.credential;
    if (epoch !== this.epoch) {
      return;
    }
    if (!token) {
      this.fail('No credential available for reconnection');
      return;
    }

    try {
      await this.establish(token, epoch);
      this.logger.info('reconnected');
    } catch (error) {
      if (epoch !== this.epoch || error instanceof ConnectionCancelledError) {
        return;
      }
      if (error instanceof AuthenticationFailedError) {
        this.logger.error({ err: normalizeError(error) }, 're-authentication failed');
        this.credential = null;
        this.fail(error.message);
        return;
      }
      this.logger.warn({ err: normalizeError(error), attempt: this.reconnectAttempts }, 'reconnect attempt failed');
      this.scheduleReconnect(epoch);
    }
  }

  private write(transport: Transport, text: string): Promise<void> {
    return this.writer.run(async () => {
      if (this.transport !== transport) {
        throw new TransportError('Socket replaced before write');
      }
      await transport.send(text);
    });
  }

  private fail(reason: string): void {
    this.teardown(new ConnectionCancelledError(reason));
    this.setState({ status: 'failed', reason });
  }

  private teardown(handshakeError: Error): void {
    this.authenticated = false;
    this.heartbeat.stop();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.abortHandshake(handshakeError);
    this.lostDuringHandshake = null;
    this.closeTransport();
  }

  private closeTransport(): void {
    const transport = this.transport;
    this.transport = null;
    if (transport) {
      transport.close();
    }
  }

  private advanceEpoch(): number {
    this.epoch += 1;
    return this.epoch;
  }

  private setState(state: ConnectionState): void {
    recordConnectionTransition(state.status);
    this.logger.info({ state }, 'connection state changed');
    this.states.emit(state);
  }
}
