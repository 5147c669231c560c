/**
 * Frame codec: turns raw socket payloads into decode outcomes and outbound
 * intents into text frames. Stateless.
 */

import { EncodingError, type InboundEvent, type OutboundIntent } from '../types';
import {
  FrameEnvelopeSchema,
  InboundFrameSchema,
  KNOWN_INBOUND_TYPES,
  OutboundIntentSchema,
  PING_FRAME,
  PONG_FRAME,
  type InboundFrame
} from './frames';

export type RawPayload = string | Uint8Array;

export type IgnoredReason =
  | 'invalid_utf8'
  | 'plain_text'
  | 'invalid_json'
  | 'not_an_object'
  | 'missing_type'
  | 'unknown_type'
  | 'malformed'
  | 'server_greeting';

export type DecodeResult =
  | { kind: 'event'; event: InboundEvent }
  | { kind: 'authAck' }
  | { kind: 'authRejected'; reason: string }
  | { kind: 'ping' }
  | { kind: 'pong' }
  | { kind: 'ignored'; reason: IgnoredReason; detail?: string };

const utf8 = new TextDecoder('utf-8', { fatal: true });

function ignored(reason: IgnoredReason, detail?: string): DecodeResult {
  return detail === undefined ? { kind: 'ignored', reason } : { kind: 'ignored', reason, detail };
}

function toText(payload: RawPayload): string | undefined {
  if (typeof payload === 'string') {
    return payload;
  }
  try {
    return utf8.decode(payload);
  } catch {
    return undefined;
  }
}

function toResult(frame: InboundFrame): DecodeResult {
  switch (frame.type) {
    case 'message':
      return {
        kind: 'event',
        event: {
          type: 'messageReceived',
          message: {
            id: frame.id,
            senderId: frame.senderId,
            senderName: frame.senderName,
            content: frame.content,
            timestamp: frame.timestamp,
            roomId: frame.chatRoomId,
            ...(frame.clientMessageId ? { clientMessageId: frame.clientMessageId } : {})
          }
        }
      };
    case 'ack':
      return { kind: 'event', event: { type: 'messageAck', messageId: frame.messageId } };
    case 'typing':
      return {
        kind: 'event',
        event: { type: 'userTyping', userId: frame.userId, roomId: frame.chatRoomId, isTyping: frame.isTyping }
      };
    case 'status':
    case 'userStatus':
      return { kind: 'event', event: { type: 'presenceChanged', userId: frame.userId, isOnline: frame.isOnline } };
    case 'userRegistered':
      return { kind: 'event', event: { type: 'userRegistered' } };
    case 'error':
      return { kind: 'event', event: { type: 'serverError', message: frame.message } };
    case 'success':
    case 'connected':
      if (frame.authenticated === true) {
        return { kind: 'authAck' };
      }
      if (frame.authenticated === false) {
        return { kind: 'authRejected', reason: frame.message ?? 'Authentication rejected by server' };
      }
      return ignored('server_greeting', frame.type);
  }
}

/**
 * Decodes one inbound frame. Never throws: anything that cannot be mapped to
 * an outcome comes back as `ignored` with a reason.
 */
export function decodeFrame(payload: RawPayload): DecodeResult {
  const text = toText(payload);
  if (text === undefined) {
    return ignored('invalid_utf8');
  }

  if (text === PING_FRAME) {
    return { kind: 'ping' };
  }
  if (text === PONG_FRAME) {
    return { kind: 'pong' };
  }

  const trimmed = text.trimStart();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
    return ignored('plain_text', text.slice(0, 120));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return ignored('invalid_json');
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return ignored('not_an_object');
  }

  const envelope = FrameEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return ignored('missing_type');
  }
  if (!KNOWN_INBOUND_TYPES.has(envelope.data.type)) {
    return ignored('unknown_type', envelope.data.type);
  }

  const frame = InboundFrameSchema.safeParse(parsed);
  if (!frame.success) {
    return ignored('malformed', envelope.data.type);
  }
  return toResult(frame.data);
}

/**
 * Encodes an outbound intent as a JSON text frame.
 *
 * @throws EncodingError when the intent fails validation
 */
export function encodeIntent(intent: OutboundIntent): string {
  const result = OutboundIntentSchema.safeParse(intent);
  if (!result.success) {
    throw new EncodingError(`Failed to encode ${intent.type} frame`, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    });
  }
  return JSON.stringify(result.data);
}
