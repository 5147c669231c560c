import { Counter, register } from 'prom-client';

export const FRAMES_DROPPED_NAME = 'chat_client_frames_dropped_total';
export const RECONNECT_ATTEMPTS_NAME = 'chat_client_reconnect_attempts_total';
export const CONNECTION_TRANSITIONS_NAME = 'chat_client_connection_transitions_total';
export const MESSAGE_SENDS_NAME = 'chat_client_message_sends_total';

function getOrCreateCounter<L extends string>(name: string, help: string, labelNames: readonly L[]): Counter<L> {
  const existing = register.getSingleMetric(name);
  if (existing instanceof Counter) {
    return existing;
  }
  return new Counter({ name, help, labelNames });
}

function framesDroppedCounter(): Counter<'reason'> {
  return getOrCreateCounter(FRAMES_DROPPED_NAME, 'Inbound frames dropped by the frame codec', ['reason']);
}

function reconnectAttemptsCounter(): Counter<never> {
  return getOrCreateCounter(RECONNECT_ATTEMPTS_NAME, 'Reconnect attempts scheduled after transport failures', []);
}

function connectionTransitionsCounter(): Counter<'status'> {
  return getOrCreateCounter(
    CONNECTION_TRANSITIONS_NAME,
    'Connection state transitions by target status',
    ['status']
  );
}

function messageSendsCounter(): Counter<'outcome'> {
  return getOrCreateCounter(MESSAGE_SENDS_NAME, 'Outbound chat message sends by outcome', ['outcome']);
}

export function recordFrameDropped(reason: string): void {
  framesDroppedCounter().inc({ reason });
}

export function recordReconnectAttempt(): void {
  reconnectAttemptsCounter().inc();
}

export function recordConnectionTransition(status: string): void {
  connectionTransitionsCounter().inc({ status });
}

export function recordMessageSend(outcome: 'sent' | 'failed'): void {
  messageSendsCounter().inc({ outcome });
}
