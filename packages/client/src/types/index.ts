/**
 * Core types for the Chatline realtime client
 */

// ============================================================================
// Connection Types
// ============================================================================

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'failed';

export type ConnectionState =
  | { status: 'disconnected' }
  | { status: 'connecting' }
  | { status: 'connected' }
  | { status: 'reconnecting'; attempt: number; delayMs: number }
  | { status: 'failed'; reason: string };

export function describeConnectionState(state: ConnectionState): string {
  switch (state.status) {
    case 'disconnected':
      return 'Disconnected';
    case 'connecting':
      return 'Connecting...';
    case 'connected':
      return 'Connected';
    case 'reconnecting':
      return `Reconnecting (attempt ${state.attempt})...`;
    case 'failed':
      return `Failed: ${state.reason}`;
  }
}

// ============================================================================
// Message Types
// ============================================================================

export type DeliveryState =
  | { status: 'sending' }
  | { status: 'sent' }
  | { status: 'delivered' }
  | { status: 'failed'; cause: Error };

export type DeliveryStatus = DeliveryState['status'];

/**
 * A chat message as seen by the client. `delivery` is local bookkeeping and
 * never leaves the process.
 */
export interface Message {
  id: string;
  senderId: string;
  senderName: string;
  content: string;
  timestamp: Date;
  roomId: string;
  clientMessageId?: string;
  delivery: DeliveryState;
}

/** Message fields as decoded from the wire, before delivery bookkeeping. */
export type WireMessage = Omit<Message, 'delivery'>;

export interface LocalUser {
  id: string;
  name: string;
}

// ============================================================================
// Event Types
// ============================================================================

export type InboundEvent =
  | { type: 'messageReceived'; message: WireMessage }
  | { type: 'messageAck'; messageId: string }
  | { type: 'userTyping'; userId: string; roomId: string; isTyping: boolean }
  | { type: 'presenceChanged'; userId: string; isOnline: boolean }
  | { type: 'userRegistered' }
  | { type: 'serverError'; message: string }
  | { type: 'connected' }
  | { type: 'disconnected' };

export type InboundEventType = InboundEvent['type'];

export type OutboundIntent =
  | { type: 'auth'; token: string }
  | { type: 'message'; content: string; chatRoomId: string; clientMessageId: string }
  | { type: 'typing'; chatRoomId: string; isTyping: boolean };

/** Intents a consumer may send; `auth` is reserved for the session handshake. */
export type ChatIntent = Exclude<OutboundIntent, { type: 'auth' }>;

export type Unsubscribe = () => void;

// ============================================================================
// Error Types
// ============================================================================

export class ChatClientError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ChatClientError';
  }
}

export class TransportError extends ChatClientError {
  constructor(message: string = 'Connection closed unexpectedly', options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, 'TRANSPORT_ERROR', options?.details, options);
    this.name = 'TransportError';
  }
}

export class AuthenticationFailedError extends ChatClientError {
  constructor(message: string = 'Authentication failed') {
    super(message, 'AUTHENTICATION_FAILED');
    this.name = 'AuthenticationFailedError';
  }
}

export class NotConnectedError extends ChatClientError {
  constructor(message: string = 'Socket is not connected') {
    super(message, 'NOT_CONNECTED');
    this.name = 'NotConnectedError';
  }
}

export class ConnectionCancelledError extends ChatClientError {
  constructor(message: string = 'Connection attempt cancelled') {
    super(message, 'CONNECTION_CANCELLED');
    this.name = 'ConnectionCancelledError';
  }
}

export class MaxReconnectAttemptsError extends ChatClientError {
  constructor(attempts: number) {
    super('Max reconnect attempts reached', 'MAX_RECONNECT_ATTEMPTS', { attempts });
    this.name = 'MaxReconnectAttemptsError';
  }
}

export class EncodingError extends ChatClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ENCODING_FAILED', details);
    this.name = 'EncodingError';
  }
}

export class DecodingError extends ChatClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DECODING_FAILED', details);
    this.name = 'DecodingError';
  }
}

export class ApiError extends ChatClientError {
  constructor(
    message: string,
    public statusCode: number,
    details?: Record<string, unknown>,
    code: string = 'API_ERROR'
  ) {
    super(message, code, details);
    this.name = 'ApiError';
  }
}

export class AuthenticationError extends ApiError {
  constructor(message: string = 'Not authenticated', statusCode: number = 401) {
    super(message, statusCode, undefined, 'AUTHENTICATION_ERROR');
    this.name = 'AuthenticationError';
  }
}

export class InvalidCredentialsError extends ApiError {
  constructor(statusCode: number) {
    super('Invalid email or password', statusCode, undefined, 'INVALID_CREDENTIALS');
    this.name = 'InvalidCredentialsError';
  }
}

export class EmailAlreadyRegisteredError extends ApiError {
  constructor() {
    super('Email already registered', 409, undefined, 'EMAIL_ALREADY_REGISTERED');
    this.name = 'EmailAlreadyRegisteredError';
  }
}

export class ConfigError extends ChatClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}
