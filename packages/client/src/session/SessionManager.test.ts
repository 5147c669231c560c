import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConnectionSessionManager, type SessionManagerOptions } from './SessionManager';
import { createLogger } from '../observability/logger';
import { AUTH_ACK_FRAME, FakeTransportFactory, type FakeTransportOptions } from '../test-support/FakeTransport';
import {
  AuthenticationFailedError,
  ConnectionCancelledError,
  NotConnectedError,
  TransportError,
  type ConnectionState,
  type InboundEvent
} from '../types';

const logger = createLogger({ level: 'silent' });
const TOKEN = 'test-token';

const flush = () => vi.advanceTimersByTimeAsync(0);

function setup(
  plan: FakeTransportOptions[] = [],
  defaults: FakeTransportOptions = {},
  options: Partial<SessionManagerOptions> = {}
) {
  const factory = new FakeTransportFactory(plan, defaults);
  const manager = new ConnectionSessionManager({
    url: 'ws://chat.test/ws',
    transportFactory: factory.create,
    logger,
    ...options
  });
  const states: ConnectionState[] = [];
  const events: InboundEvent[] = [];
  manager.onStateChange((state) => states.push(state));
  manager.subscribe((event) => events.push(event));
  return { factory, manager, states, events };
}

describe('ConnectionSessionManager', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('connect', () => {
    it('should authenticate and report connected', async () => {
      const { factory, manager, states, events } = setup();

      await manager.connect(TOKEN);

      expect(states.map((state) => state.status)).toEqual(['disconnected', 'connecting', 'connected']);
      expect(events).toEqual([{ type: 'connected' }]);
      expect(manager.isAuthenticated).toBe(true);
      expect(factory.at(0).url).toBe('ws://chat.test/ws');
      expect(factory.at(0).sent).toEqual(['{"type":"auth","token":"test-token"}']);

      manager.disconnect();
    });

    it('should be a no-op while a session is active', async () => {
      const { factory, manager } = setup();

      await manager.connect(TOKEN);
      await manager.connect('another-token');

      expect(factory.transports).toHaveLength(1);
      expect(factory.at(0).authFrames).toHaveLength(1);

      manager.disconnect();
    });

    it('should refuse a blank credential without opening a socket', async () => {
      const { factory, manager } = setup();

      await expect(manager.connect('   ')).rejects.toBeInstanceOf(AuthenticationFailedError);
      expect(factory.transports).toHaveLength(0);
      expect(manager.state).toEqual({ status: 'disconnected' });
    });

    it('should fail and close the socket when the ack never arrives', async () => {
      const { factory, manager } = setup([{ autoAck: false }]);

      const outcome = manager.connect(TOKEN).catch((error: unknown) => error);
      await vi.advanceTimersByTimeAsync(4_999);
      expect(manager.state.status).toBe('connecting');

      await vi.advanceTimersByTimeAsync(1);
      const error = await outcome;

      expect(error).toBeInstanceOf(AuthenticationFailedError);
      expect(manager.state).toEqual({ status: 'failed', reason: 'Authentication not acknowledged within 5000ms' });
      expect(factory.at(0).closed).toBe(true);
      expect(manager.isAuthenticated).toBe(false);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should fail with the server reason when authentication is rejected', async () => {
      const { factory, manager } = setup([{ autoAck: false }]);

      const outcome = manager.connect(TOKEN).catch((error: unknown) => error);
      factory.at(0).push('{"type":"success","authenticated":false,"message":"token revoked"}');
      const error = await outcome;

      expect(error).toBeInstanceOf(AuthenticationFailedError);
      expect(manager.state).toEqual({ status: 'failed', reason: 'token revoked' });
      expect(factory.at(0).closed).toBe(true);
    });

    it('should fail when the socket cannot be opened', async () => {
      const { manager } = setup([{ openError: new Error('ECONNREFUSED') }]);

      const error = await manager.connect(TOKEN).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(TransportError);
      expect(manager.state).toEqual({ status: 'failed', reason: 'ECONNREFUSED' });
    });

    it('should allow a new connect after a failure', async () => {
      const { factory, manager } = setup([{ autoAck: false }]);

      const outcome = manager.connect(TOKEN).catch((error: unknown) => error);
      await vi.advanceTimersByTimeAsync(5_000);
      await outcome;

      await manager.connect(TOKEN);

      expect(manager.state).toEqual({ status: 'connected' });
      expect(factory.transports).toHaveLength(2);

      manager.disconnect();
    });

    it('should ignore a greeting that carries no authentication flag', async () => {
      const { factory, manager } = setup([{ autoAck: false }]);

      const outcome = manager.connect(TOKEN).catch((error: unknown) => error);
      factory.at(0).push('{"type":"connected","message":"welcome"}');
      await flush();
      expect(manager.state.status).toBe('connecting');

      factory.at(0).push('{"type":"connected","authenticated":true}');
      expect(await outcome).toBeUndefined();
      expect(manager.state.status).toBe('connected');

      manager.disconnect();
    });

    it('should fail when the socket drops right after the acknowledgment', async () => {
      const { factory, manager } = setup([{ autoAck: false }]);

      const outcome = manager.connect(TOKEN).catch((error: unknown) => error);
      await flush();
      factory.at(0).push(AUTH_ACK_FRAME);
      factory.at(0).drop();
      const error = await outcome;

      expect(error).toBeInstanceOf(TransportError);
      expect(manager.state).toEqual({ status: 'failed', reason: 'Connection reset by peer' });
      expect(manager.isAuthenticated).toBe(false);
      expect(factory.at(0).closed).toBe(true);
      await expect(manager.send({ type: 'typing', chatRoomId: 'room-1', isTyping: true })).rejects.toBeInstanceOf(
        NotConnectedError
      );
      expect(vi.getTimerCount()).toBe(0);
    });
  });

  describe('disconnect', () => {
    it('should cancel an in-flight handshake', async () => {
      const { factory, manager } = setup([{ autoAck: false }]);

      const outcome = manager.connect(TOKEN).catch((error: unknown) => error);
      await flush();
      manager.disconnect();
      const error = await outcome;

      expect(error).toBeInstanceOf(ConnectionCancelledError);
      expect(manager.state).toEqual({ status: 'disconnected' });
      expect(factory.at(0).closed).toBe(true);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should cancel a connect that is still opening the socket', async () => {
      const { factory, manager } = setup([{ deferOpen: true }]);

      const outcome = manager.connect(TOKEN).catch((error: unknown) => error);
      manager.disconnect();
      const error = await outcome;

      expect(error).toBeInstanceOf(ConnectionCancelledError);
      expect(factory.at(0).sent).toEqual([]);
      expect(manager.state).toEqual({ status: 'disconnected' });
    });

    it('should be idempotent', async () => {
      const { manager, events, states } = setup();
      await manager.connect(TOKEN);

      manager.disconnect();
      manager.disconnect();

      expect(events.filter((event) => event.type === 'disconnected')).toHaveLength(1);
      expect(states.filter((state) => state.status === 'disconnected')).toHaveLength(2);
      expect(manager.state).toEqual({ status: 'disconnected' });
      expect(manager.isAuthenticated).toBe(false);
    });

    it('should emit nothing when never connected', () => {
      const { manager, events, states } = setup();

      manager.disconnect();

      expect(events).toEqual([]);
      expect(states).toEqual([{ status: 'disconnected' }]);
    });

    it('should leave no timers behind', async () => {
      const { manager } = setup();
      await manager.connect(TOKEN);

      manager.disconnect();

      expect(vi.getTimerCount()).toBe(0);
    });
  });

  describe('send', () => {
    it('should reject while not connected', async () => {
      const { manager } = setup();

      await expect(
        manager.send({ type: 'typing', chatRoomId: 'room-1', isTyping: true })
      ).rejects.toBeInstanceOf(NotConnectedError);
    });

    it('should write the encoded intent', async () => {
      const { factory, manager } = setup();
      await manager.connect(TOKEN);

      await manager.send({ type: 'message', content: 'hi', chatRoomId: 'room-1', clientMessageId: 'c-1' });

      expect(factory.at(0).sent[1]).toBe(
        '{"type":"message","content":"hi","chatRoomId":"room-1","clientMessageId":"c-1"}'
      );
      manager.disconnect();
    });

    it('should keep concurrent writes in submission order', async () => {
      const { factory, manager } = setup();
      await manager.connect(TOKEN);

      await Promise.all([
        manager.sendText('first'),
        manager.sendText('second'),
        manager.sendText('third')
      ]);

      expect(factory.at(0).sent.slice(1)).toEqual(['first', 'second', 'third']);
      manager.disconnect();
    });

    it('should reject a write racing a dropped socket', async () => {
      const { factory, manager } = setup();
      await manager.connect(TOKEN);
      factory.at(0).drop();

      await expect(manager.sendText('late')).rejects.toBeInstanceOf(TransportError);
      await expect(manager.sendText('later')).rejects.toBeInstanceOf(NotConnectedError);
      manager.disconnect();
    });
  });

  describe('inbound frames', () => {
    it('should fan events out to every subscriber', async () => {
      const { factory, manager, events } = setup();
      const second: InboundEvent[] = [];
      const unsubscribe = manager.subscribe((event) => second.push(event));
      await manager.connect(TOKEN);

      factory.at(0).push('{"type":"status","userId":"u-2","isOnline":true}');
      await flush();
      unsubscribe();
      factory.at(0).push('{"type":"status","userId":"u-2","isOnline":false}');
      await flush();

      expect(events.slice(1)).toEqual([
        { type: 'presenceChanged', userId: 'u-2', isOnline: true },
        { type: 'presenceChanged', userId: 'u-2', isOnline: false }
      ]);
      expect(second).toEqual([
        { type: 'connected' },
        { type: 'presenceChanged', userId: 'u-2', isOnline: true }
      ]);
      manager.disconnect();
    });

    it('should answer ping with pong', async () => {
      const { factory, manager } = setup();
      await manager.connect(TOKEN);

      factory.at(0).push('ping');
      await flush();

      expect(factory.at(0).sent).toEqual(['{"type":"auth","token":"test-token"}', 'pong']);
      manager.disconnect();
    });

    it('should drop unknown and malformed frames without changing state', async () => {
      const { factory, manager, events } = setup();
      await manager.connect(TOKEN);

      factory.at(0).push('{"type":"reaction","emoji":"+1"}');
      factory.at(0).push('{"type":"message"}');
      factory.at(0).push('not json at all');
      factory.at(0).push(new Uint8Array([0xff]));
      await flush();

      expect(events).toEqual([{ type: 'connected' }]);
      expect(manager.state).toEqual({ status: 'connected' });
      manager.disconnect();
    });
  });

  describe('heartbeat', () => {
    it('should send a keepalive each interval while connected', async () => {
      const { factory, manager } = setup();
      await manager.connect(TOKEN);

      await vi.advanceTimersByTimeAsync(30_000);
      expect(factory.at(0).sent).toEqual(['{"type":"auth","token":"test-token"}', 'ping']);

      await vi.advanceTimersByTimeAsync(30_000);
      expect(factory.at(0).sent.filter((frame) => frame === 'ping')).toHaveLength(2);
      manager.disconnect();
    });

    it('should use the configured interval', async () => {
      const { factory, manager } = setup([], {}, { heartbeatIntervalMs: 5_000 });
      await manager.connect(TOKEN);

      await vi.advanceTimersByTimeAsync(5_000);

      expect(factory.at(0).sent).toContain('ping');
      manager.disconnect();
    });
  });

  describe('reconnect', () => {
    it('should schedule the first retry two seconds after a drop', async () => {
      const { factory, manager, events } = setup();
      await manager.connect(TOKEN);

      factory.at(0).drop();
      await flush();

      expect(manager.state).toEqual({ status: 'reconnecting', attempt: 1, delayMs: 2_000 });
      expect(factory.at(0).closed).toBe(true);
      expect(events).toEqual([{ type: 'connected' }]);

      await vi.advanceTimersByTimeAsync(1_999);
      expect(factory.transports).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(factory.transports).toHaveLength(2);
      expect(factory.at(1).sent).toEqual(['{"type":"auth","token":"test-token"}']);
      expect(manager.state).toEqual({ status: 'connected' });
      expect(events).toEqual([{ type: 'connected' }, { type: 'connected' }]);
      manager.disconnect();
    });

    it('should keep backing off when the socket drops right after a reconnect is acknowledged', async () => {
      const { factory, manager } = setup([{}, { autoAck: false }]);
      await manager.connect(TOKEN);

      factory.at(0).drop();
      await vi.advanceTimersByTimeAsync(2_000);
      expect(factory.at(1).authFrames).toHaveLength(1);

      factory.at(1).push(AUTH_ACK_FRAME);
      factory.at(1).drop();
      await flush();

      expect(manager.state).toEqual({ status: 'reconnecting', attempt: 2, delayMs: 4_000 });
      expect(factory.at(1).closed).toBe(true);

      await vi.advanceTimersByTimeAsync(4_000);
      expect(factory.transports).toHaveLength(3);
      expect(manager.state).toEqual({ status: 'connected' });
      manager.disconnect();
    });

    it('should reset the attempt counter after a successful reconnect', async () => {
      const { factory, manager } = setup();
      await manager.connect(TOKEN);

      factory.at(0).drop();
      await vi.advanceTimersByTimeAsync(2_000);
      factory.at(1).drop();
      await flush();

      expect(manager.state).toEqual({ status: 'reconnecting', attempt: 1, delayMs: 2_000 });
      manager.disconnect();
    });

    it('should give up after the maximum number of attempts', async () => {
      const { factory, manager, states } = setup([{}], { openError: new Error('ECONNREFUSED') });
      await manager.connect(TOKEN);

      factory.at(0).drop();
      await vi.advanceTimersByTimeAsync(2_000 + 4_000 + 8_000 + 16_000 + 30_000);

      const retries = states.filter((state) => state.status === 'reconnecting');
      expect(retries).toEqual([
        { status: 'reconnecting', attempt: 1, delayMs: 2_000 },
        { status: 'reconnecting', attempt: 2, delayMs: 4_000 },
        { status: 'reconnecting', attempt: 3, delayMs: 8_000 },
        { status: 'reconnecting', attempt: 4, delayMs: 16_000 },
        { status: 'reconnecting', attempt: 5, delayMs: 30_000 }
      ]);
      expect(manager.state).toEqual({ status: 'failed', reason: 'Max reconnect attempts reached' });
      expect(factory.transports).toHaveLength(6);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should fail without retrying when re-authentication is refused', async () => {
      const { factory, manager } = setup([{}, { autoAck: false }]);
      await manager.connect(TOKEN);

      factory.at(0).drop();
      await vi.advanceTimersByTimeAsync(2_000 + 5_000);

      expect(manager.state).toEqual({ status: 'failed', reason: 'Authentication not acknowledged within 5000ms' });
      expect(factory.at(1).closed).toBe(true);

      await vi.advanceTimersByTimeAsync(60_000);
      expect(factory.transports).toHaveLength(2);
    });

    it('should reconnect when the heartbeat write fails', async () => {
      const { factory, manager } = setup([], {}, { heartbeatIntervalMs: 1_000 });
      await manager.connect(TOKEN);

      factory.at(0).options.sendError = new TransportError('half-open socket');
      await vi.advanceTimersByTimeAsync(1_000);

      expect(manager.state).toEqual({ status: 'reconnecting', attempt: 1, delayMs: 2_000 });
      expect(factory.at(0).closed).toBe(true);
      manager.disconnect();
    });

    it('should cancel a scheduled retry on disconnect', async () => {
      const { factory, manager } = setup();
      await manager.connect(TOKEN);

      factory.at(0).drop();
      await flush();
      manager.disconnect();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(factory.transports).toHaveLength(1);
      expect(manager.state).toEqual({ status: 'disconnected' });
    });

    it('should honour a custom reconnect policy', async () => {
      const { factory, manager } = setup([{}], { openError: new Error('ECONNREFUSED') }, {
        reconnect: { baseDelayMs: 100, maxDelayMs: 100, maxAttempts: 1 }
      });
      await manager.connect(TOKEN);

      factory.at(0).drop();
      await flush();
      expect(manager.state).toEqual({ status: 'reconnecting', attempt: 1, delayMs: 100 });

      await vi.advanceTimersByTimeAsync(100);
      expect(manager.state).toEqual({ status: 'failed', reason: 'Max reconnect attempts reached' });
    });
  });
});
