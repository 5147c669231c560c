import { clientLogger, normalizeError, type ClientLogger } from '../observability/logger';
import { BroadcastStream, type Listener } from '../session/streams';
import type { ChatIntent, InboundEvent, LocalUser, Message, Unsubscribe, WireMessage } from '../types';
import { DeliveryTracker } from './DeliveryTracker';
import { TypingDebouncer } from './TypingDebouncer';

/** The part of the session manager a room needs. */
export interface RealtimeSession {
  subscribe(listener: Listener<InboundEvent>): Unsubscribe;
  send(intent: ChatIntent): Promise<void>;
}

export interface HistorySource {
  fetchMessages(roomId: string): Promise<WireMessage[]>;
}

export interface ChatRoomOptions {
  roomId: string;
  localUser: LocalUser;
  session: RealtimeSession;
  history?: HistorySource;
  typingQuietPeriodMs?: number;
  generateId?: () => string;
  now?: () => Date;
  logger?: ClientLogger;
}

export interface ChatRoomSnapshot {
  roomId: string;
  draft: string;
  messages: readonly Message[];
  typingUserIds: string[];
  onlineUserIds: string[];
}

/**
 * One open conversation: its message list, draft, remote typing indicators
 * and presence, fed by the shared session's event stream.
 */
export class ChatRoom {
  readonly roomId: string;
  private readonly localUser: LocalUser;
  private readonly history?: HistorySource;
  private readonly logger: ClientLogger;
  private readonly tracker: DeliveryTracker;
  private readonly typing: TypingDebouncer;
  private readonly changes: BroadcastStream<ChatRoomSnapshot>;
  private readonly typingUsers = new Set<string>();
  private readonly onlineUsers = new Set<string>();
  private readonly unsubscribers: Unsubscribe[] = [];
  private currentDraft = '';
  private closed = false;

  constructor(options: ChatRoomOptions) {
    this.roomId = options.roomId;
    this.localUser = options.localUser;
    this.history = options.history;
    this.logger = (options.logger ?? clientLogger).child({ component: 'room', roomId: options.roomId });
    this.changes = new BroadcastStream<ChatRoomSnapshot>('room', this.logger);

    this.tracker = new DeliveryTracker({
      roomId: options.roomId,
      localUser: options.localUser,
      sender: options.session,
      generateId: options.generateId,
      now: options.now,
      logger: this.logger
    });
    this.typing = new TypingDebouncer({
      quietPeriodMs: options.typingQuietPeriodMs,
      emit: (isTyping) => options.session.send({ type: 'typing', chatRoomId: options.roomId, isTyping }),
      logger: this.logger
    });

    this.unsubscribers.push(
      this.tracker.onChange(() => this.notify()),
      options.session.subscribe((event) => this.handleEvent(event))
    );
  }

  get draft(): string {
    return this.currentDraft;
  }

  get messages(): readonly Message[] {
    return this.tracker.messages;
  }

  get typingUserIds(): string[] {
    return [...this.typingUsers];
  }

  get onlineUserIds(): string[] {
    return [...this.onlineUsers];
  }

  snapshot(): ChatRoomSnapshot {
    return {
      roomId: this.roomId,
      draft: this.currentDraft,
      messages: this.tracker.messages,
      typingUserIds: this.typingUserIds,
      onlineUserIds: this.onlineUserIds
    };
  }

  onChange(listener: Listener<ChatRoomSnapshot>): Unsubscribe {
    return this.changes.subscribe(listener);
  }

  setDraft(text: string): void {
    if (this.closed) {
      return;
    }
    this.currentDraft = text;
    this.typing.handleInput(text);
    this.notify();
  }

  /** Submits the draft and clears it. Blank drafts send nothing. */
  send(): Message | undefined {
    if (this.closed) {
      return undefined;
    }
    const message = this.tracker.submit(this.currentDraft);
    if (!message) {
      return undefined;
    }
    this.currentDraft = '';
    this.typing.handleInput('');
    this.notify();
    return message;
  }

  retry(messageId: string): boolean {
    return this.tracker.retry(messageId);
  }

  /**
   * Loads earlier messages from the history collaborator.
   *
   * @returns the number of messages now in the room
   */
  async loadHistory(): Promise<number> {
    if (!this.history) {
      return this.tracker.messages.length;
    }
    try {
      const history = await this.history.fetchMessages(this.roomId);
      this.tracker.seed(history);
    } catch (error) {
      this.logger.warn({ err: normalizeError(error) }, 'failed to load message history');
      throw error;
    }
    return this.tracker.messages.length;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.typing.dispose();
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }

  private handleEvent(event: InboundEvent): void {
    switch (event.type) {
      case 'messageReceived':
        if (event.message.roomId === this.roomId && event.message.senderId !== this.localUser.id) {
          this.typingUsers.delete(event.message.senderId);
        }
        this.tracker.handleEvent(event);
        return;
      case 'messageAck':
        this.tracker.handleEvent(event);
        return;
      case 'userTyping':
        if (event.roomId !== this.roomId || event.userId === this.localUser.id) {
          return;
        }
        if (event.isTyping) {
          this.typingUsers.add(event.userId);
        } else {
          this.typingUsers.delete(event.userId);
        }
        this.notify();
        return;
      case 'presenceChanged':
        if (event.isOnline) {
          this.onlineUsers.add(event.userId);
        } else {
          this.onlineUsers.delete(event.userId);
          this.typingUsers.delete(event.userId);
        }
        this.notify();
        return;
      case 'serverError':
        this.logger.warn({ message: event.message }, 'server reported an error');
        return;
      default:
        return;
    }
  }

  private notify(): void {
    this.changes.emit(this.snapshot());
  }
}
