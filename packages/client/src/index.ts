/**
 * Chatline realtime chat client
 *
 * @example
 * ```typescript
 * import { createChatClient, loadClientConfig, describeConnectionState } from '@chatline/client';
 *
 * const client = createChatClient({ config: loadClientConfig() });
 *
 * client.onConnectionStateChange((state) => {
 *   console.log(describeConnectionState(state));
 * });
 *
 * await client.login('ada@example.com', 'test-secret');
 *
 * const [first] = await client.listRooms();
 * const room = client.openRoom(first);
 * await room.loadHistory();
 *
 * room.onChange(({ messages, typingUserIds }) => {
 *   console.log(messages.length, 'messages;', typingUserIds.length, 'typing');
 * });
 *
 * room.setDraft('hello');
 * room.send();
 * ```
 */

import { ChatClient, type ChatClientOptions } from './client/ChatClient';

// Client
export { ChatClient } from './client/ChatClient';
export type { ChatClientOptions } from './client/ChatClient';

export function createChatClient(options: ChatClientOptions = {}): ChatClient {
  return new ChatClient(options);
}

// Session
export { ConnectionSessionManager, DEFAULT_AUTH_TIMEOUT_MS, DEFAULT_HEARTBEAT_INTERVAL_MS } from './session/SessionManager';
export type { SessionManagerOptions } from './session/SessionManager';
export { HeartbeatDriver } from './session/HeartbeatDriver';
export type { HeartbeatDriverOptions } from './session/HeartbeatDriver';
export { reconnectDelay, DEFAULT_RECONNECT_POLICY } from './session/ReconnectPolicy';
export type { ReconnectPolicyOptions } from './session/ReconnectPolicy';
export { BroadcastStream, ValueStream } from './session/streams';
export type { Listener } from './session/streams';

// Chat
export { ChatRoom } from './chat/ChatRoom';
export type { ChatRoomOptions, ChatRoomSnapshot, HistorySource, RealtimeSession } from './chat/ChatRoom';
export { DeliveryTracker } from './chat/DeliveryTracker';
export type { DeliveryTrackerOptions, MessageSender } from './chat/DeliveryTracker';
export { TypingDebouncer, DEFAULT_TYPING_QUIET_PERIOD_MS } from './chat/TypingDebouncer';
export type { TypingDebouncerOptions } from './chat/TypingDebouncer';

// Protocol and transport
export { decodeFrame, encodeIntent } from './protocol/codec';
export type { DecodeResult, IgnoredReason, RawPayload } from './protocol/codec';
export { WsTransport, createWsTransportFactory } from './transport/WsTransport';
export type { WsTransportOptions } from './transport/WsTransport';
export type { Transport, TransportFactory } from './transport/Transport';

// REST and auth
export { ChatApiClient } from './api/ChatApiClient';
export type { ChatApiClientOptions, HttpRequester } from './api/ChatApiClient';
export type { AuthResponse, ChatRoomSummary, HistoryMessage, User } from './api/schemas';
export { AuthSession } from './auth/AuthSession';
export type { AccountApi, AuthState } from './auth/AuthSession';
export { FileKeyValueStore, MemoryKeyValueStore } from './auth/KeyValueStore';
export type { KeyValueStore } from './auth/KeyValueStore';
export { TokenStore, AUTH_TOKEN_KEY } from './auth/TokenStore';

// Configuration and observability
export { loadClientConfig, parseClientConfig } from './config/loadConfig';
export { ClientConfigSchema, DEFAULT_CLIENT_CONFIG } from './config/schema';
export type { ClientConfig, ClientConfigInput } from './config/schema';
export { createLogger, normalizeError } from './observability/logger';
export type { ClientLogger } from './observability/logger';

// Types
export type {
  ConnectionState,
  ConnectionStatus,
  DeliveryState,
  DeliveryStatus,
  Message,
  WireMessage,
  LocalUser,
  InboundEvent,
  InboundEventType,
  OutboundIntent,
  ChatIntent,
  Unsubscribe
} from './types';

export {
  describeConnectionState,
  ChatClientError,
  TransportError,
  AuthenticationFailedError,
  NotConnectedError,
  ConnectionCancelledError,
  MaxReconnectAttemptsError,
  EncodingError,
  DecodingError,
  ApiError,
  AuthenticationError,
  InvalidCredentialsError,
  EmailAlreadyRegisteredError,
  ConfigError
} from './types';
