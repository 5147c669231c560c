/**
 * ChatClient - application-wide entry point wiring auth, the realtime
 * session and per-room state together. A process holds one instance.
 */

import { ChatApiClient } from '../api/ChatApiClient';
import type { ChatRoomSummary, User } from '../api/schemas';
import { AuthSession, type AuthState } from '../auth/AuthSession';
import { FileKeyValueStore, MemoryKeyValueStore, type KeyValueStore } from '../auth/KeyValueStore';
import { TokenStore } from '../auth/TokenStore';
import { ChatRoom } from '../chat/ChatRoom';
import { parseClientConfig } from '../config/loadConfig';
import type { ClientConfig, ClientConfigInput } from '../config/schema';
import { clientLogger, normalizeError, type ClientLogger } from '../observability/logger';
import { ConnectionSessionManager } from '../session/SessionManager';
import type { Listener } from '../session/streams';
import type { TransportFactory } from '../transport/Transport';
import { AuthenticationError, type ConnectionState, type Unsubscribe } from '../types';

export interface ChatClientOptions {
  config?: ClientConfigInput;
  api?: ChatApiClient;
  store?: KeyValueStore;
  transportFactory?: TransportFactory;
  logger?: ClientLogger;
}

export class ChatClient {
  readonly config: ClientConfig;
  readonly api: ChatApiClient;
  readonly auth: AuthSession;
  readonly session: ConnectionSessionManager;
  private readonly logger: ClientLogger;
  private readonly rooms = new Map<string, ChatRoom>();

  constructor(options: ChatClientOptions = {}) {
    this.config = parseClientConfig(options.config);
    this.logger = (options.logger ?? clientLogger).child({ component: 'chat-client' });
    this.api =
      options.api ??
      new ChatApiClient({
        baseUrl: this.config.apiBaseUrl,
        timeoutMs: this.config.requestTimeoutMs,
        logger: this.logger
      });

    const store =
      options.store ??
      (this.config.tokenStorePath
        ? new FileKeyValueStore(this.config.tokenStorePath, { logger: this.logger })
        : new MemoryKeyValueStore());
    this.auth = new AuthSession({ api: this.api, tokens: new TokenStore(store), logger: this.logger });

    this.session = new ConnectionSessionManager({
      url: this.config.serverUrl,
      transportFactory: options.transportFactory,
      authTimeoutMs: this.config.authTimeoutMs,
      heartbeatIntervalMs: this.config.heartbeatIntervalMs,
      reconnect: this.config.reconnect,
      logger: this.logger
    });
  }

  get connectionState(): ConnectionState {
    return this.session.state;
  }

  get currentUser(): User | undefined {
    const state = this.auth.state;
    return state.status === 'signedIn' ? state.user : undefined;
  }

  onConnectionStateChange(listener: Listener<ConnectionState>): Unsubscribe {
    return this.session.onStateChange(listener);
  }

  onAuthStateChange(listener: Listener<AuthState>): Unsubscribe {
    return this.auth.onChange(listener);
  }

  /** Resumes a stored session, if any, and opens the realtime connection. */
  async start(): Promise<User | undefined> {
    const user = await this.auth.resume();
    if (user) {
      await this.connectQuietly();
    }
    return user;
  }

  async login(email: string, password: string): Promise<User> {
    const previous = this.signedInAs();
    const user = await this.auth.login(email, password);
    await this.connectAfterSignIn(previous);
    return user;
  }

  async register(name: string, email: string, password: string): Promise<User> {
    const previous = this.signedInAs();
    const user = await this.auth.register(name, email, password);
    await this.connectAfterSignIn(previous);
    return user;
  }

  async logout(): Promise<void> {
    this.closeRooms();
    this.session.disconnect();
    await this.auth.logout();
  }

  async listUsers(): Promise<User[]> {
    return this.api.listUsers(this.requireToken());
  }

  async listRooms(): Promise<ChatRoomSummary[]> {
    return this.api.listRooms(this.requireToken());
  }

  async createRoom(participantId: string): Promise<ChatRoomSummary> {
    return this.api.createRoom(this.requireToken(), participantId);
  }

  /**
   * Returns the room bound to the shared session, creating it on first use.
   * History is not loaded until `loadHistory` is called on the room.
   */
  openRoom(room: Pick<ChatRoomSummary, 'id'>): ChatRoom {
    const existing = this.rooms.get(room.id);
    if (existing) {
      return existing;
    }
    const user = this.currentUser;
    if (!user) {
      throw new AuthenticationError('Sign in before opening a room');
    }

    const chatRoom = new ChatRoom({
      roomId: room.id,
      localUser: { id: user.id, name: user.name },
      session: this.session,
      history: { fetchMessages: (roomId) => this.api.fetchMessages(this.requireToken(), roomId) },
      typingQuietPeriodMs: this.config.typingQuietPeriodMs,
      logger: this.logger
    });
    this.rooms.set(room.id, chatRoom);
    return chatRoom;
  }

  closeRoom(roomId: string): void {
    const room = this.rooms.get(roomId);
    if (room) {
      room.close();
      this.rooms.delete(roomId);
    }
  }

  /** Closes every room and the socket; the stored token is kept. */
  shutdown(): void {
    this.closeRooms();
    this.session.disconnect();
  }

  private signedInAs(): { userId: string; token: string } | undefined {
    const state = this.auth.state;
    return state.status === 'signedIn' ? { userId: state.user.id, token: state.token } : undefined;
  }

  /** Rooms belong to one user and the socket to one token; either changing drops the old one. */
  private async connectAfterSignIn(previous: { userId: string; token: string } | undefined): Promise<void> {
    if (previous) {
      if (previous.userId !== this.currentUser?.id) {
        this.closeRooms();
      }
      if (previous.token !== this.auth.token) {
        this.session.disconnect();
      }
    }
    await this.connectQuietly();
  }

  private async connectQuietly(): Promise<void> {
    const token = this.auth.token;
    if (!token) {
      return;
    }
    try {
      await this.session.connect(token);
    } catch (error) {
      this.logger.warn({ err: normalizeError(error) }, 'realtime connection failed');
    }
  }

  private closeRooms(): void {
    for (const room of this.rooms.values()) {
      room.close();
    }
    this.rooms.clear();
  }

  private requireToken(): string {
    const token = this.auth.token;
    if (!token) {
      throw new AuthenticationError('Not signed in');
    }
    return token;
  }
}
