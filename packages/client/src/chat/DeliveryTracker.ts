/**
 * DeliveryTracker - optimistic send bookkeeping for one chat room.
 */

import { randomUUID } from 'node:crypto';

import { clientLogger, normalizeError, type ClientLogger } from '../observability/logger';
import { recordMessageSend } from '../observability/metrics';
import { BroadcastStream, type Listener } from '../session/streams';
import type {
  ChatIntent,
  DeliveryState,
  DeliveryStatus,
  InboundEvent,
  LocalUser,
  Message,
  Unsubscribe,
  WireMessage
} from '../types';
import { toError } from '../utils/errorUtils';

export interface MessageSender {
  send(intent: ChatIntent): Promise<void>;
}

export interface DeliveryTrackerOptions {
  roomId: string;
  localUser: LocalUser;
  sender: MessageSender;
  generateId?: () => string;
  now?: () => Date;
  logger?: ClientLogger;
}

const ALLOWED_TRANSITIONS: Record<DeliveryStatus, readonly DeliveryStatus[]> = {
  sending: ['sent', 'delivered', 'failed'],
  sent: ['delivered'],
  // Server confirmation outranks a local write error.
  failed: ['sending', 'delivered'],
  delivered: []
};

function snapshot(message: Message): Message {
  return { ...message };
}

export class DeliveryTracker {
  readonly roomId: string;
  private readonly localUser: LocalUser;
  private readonly sender: MessageSender;
  private readonly generateId: () => string;
  private readonly now: () => Date;
  private readonly logger: ClientLogger;

  private entries: Message[] = [];
  private readonly byId = new Map<string, Message>();
  private readonly pending = new Map<string, Message>();
  private readonly changes: BroadcastStream<readonly Message[]>;

  constructor(options: DeliveryTrackerOptions) {
    this.roomId = options.roomId;
    this.localUser = options.localUser;
    this.sender = options.sender;
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? clientLogger).child({ component: 'delivery', roomId: options.roomId });
    this.changes = new BroadcastStream<readonly Message[]>('messages', this.logger);
  }

  /** Ordered snapshot of every message in the room. */
  get messages(): readonly Message[] {
    return this.entries.map(snapshot);
  }

  get pendingIds(): string[] {
    return [...this.pending.keys()];
  }

  find(messageId: string): Message | undefined {
    const entry = this.byId.get(messageId);
    return entry ? snapshot(entry) : undefined;
  }

  onChange(listener: Listener<readonly Message[]>): Unsubscribe {
    return this.changes.subscribe(listener);
  }

  /**
   * Appends a locally authored message in `sending` state and starts the
   * send. Blank content is ignored.
   */
  submit(content: string): Message | undefined {
    if (content.trim().length === 0) {
      return undefined;
    }

    const message: Message = {
      id: this.generateId(),
      senderId: this.localUser.id,
      senderName: this.localUser.name,
      content,
      timestamp: this.now(),
      roomId: this.roomId,
      delivery: { status: 'sending' }
    };
    this.entries.push(message);
    this.byId.set(message.id, message);
    this.pending.set(message.id, message);
    this.notify();

    this.dispatch(message);
    return snapshot(message);
  }

  /**
   * Re-sends a failed message under its original id. Returns false, and does
   * nothing, unless the message is currently failed.
   */
  retry(messageId: string): boolean {
    const entry = this.byId.get(messageId);
    if (!entry || entry.delivery.status !== 'failed') {
      return false;
    }
    this.transition(entry, { status: 'sending' });
    this.dispatch(entry);
    return true;
  }

  handleEvent(event: InboundEvent): void {
    switch (event.type) {
      case 'messageAck': {
        const entry = this.byId.get(event.messageId);
        if (!entry) {
          this.logger.debug({ messageId: event.messageId }, 'ack for unknown message');
          return;
        }
        this.transition(entry, { status: 'delivered' });
        return;
      }
      case 'messageReceived':
        this.reconcile(event.message);
        return;
      default:
        return;
    }
  }

  /**
   * Merges history as delivered messages, skipping ids already listed. A
   * confirmed local message is also known by the id its echo carried, so the
   * server copy of it is skipped too.
   */
  seed(history: readonly WireMessage[]): void {
    let added = 0;
    for (const item of history) {
      if (item.roomId !== this.roomId || this.byId.has(item.id)) {
        continue;
      }
      const message: Message = { ...item, delivery: { status: 'delivered' } };
      this.entries.push(message);
      this.byId.set(message.id, message);
      added += 1;
    }
    if (added === 0) {
      return;
    }
    this.entries = [...this.entries].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    this.notify();
  }

  private reconcile(message: WireMessage): void {
    if (message.roomId !== this.roomId) {
      return;
    }

    if (message.senderId === this.localUser.id) {
      const local = this.findEcho(message);
      if (local) {
        if (message.id !== local.id) {
          this.byId.set(message.id, local);
        }
        this.transition(local, { status: 'delivered' });
        return;
      }
    }

    if (this.byId.has(message.id)) {
      return;
    }
    const received: Message = { ...message, delivery: { status: 'delivered' } };
    this.entries.push(received);
    this.byId.set(received.id, received);
    this.notify();
  }

  private findEcho(message: WireMessage): Message | undefined {
    if (message.clientMessageId) {
      const byClientId = this.byId.get(message.clientMessageId);
      if (byClientId) {
        return byClientId;
      }
    }
    const byServerId = this.byId.get(message.id);
    if (byServerId) {
      return byServerId;
    }
    for (const candidate of this.pending.values()) {
      if (candidate.content === message.content) {
        return candidate;
      }
    }
    return undefined;
  }

  private dispatch(message: Message): void {
    const intent: ChatIntent = {
      type: 'message',
      content: message.content,
      chatRoomId: message.roomId,
      clientMessageId: message.id
    };
    void this.sender.send(intent).then(
      () => {
        recordMessageSend('sent');
        this.transition(message, { status: 'sent' });
      },
      (error: unknown) => {
        recordMessageSend('failed');
        this.logger.warn({ err: normalizeError(error), messageId: message.id }, 'message send failed');
        this.transition(message, { status: 'failed', cause: toError(error) });
      }
    );
  }

  private transition(entry: Message, next: DeliveryState): boolean {
    const current = entry.delivery.status;
    if (!ALLOWED_TRANSITIONS[current].includes(next.status)) {
      this.logger.trace({ messageId: entry.id, from: current, to: next.status }, 'delivery transition skipped');
      return false;
    }
    entry.delivery = next;
    if (next.status === 'sending' || next.status === 'sent') {
      this.pending.set(entry.id, entry);
    } else {
      this.pending.delete(entry.id);
    }
    this.notify();
    return true;
  }

  private notify(): void {
    this.changes.emit(this.messages);
  }
}
