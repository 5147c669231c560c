import { z } from 'zod';

export const PING_FRAME = 'ping';
export const PONG_FRAME = 'pong';

const Identifier = z.string().min(1);

export const InboundMessageFrameSchema = z.object({
  type: z.literal('message'),
  id: Identifier,
  content: z.string(),
  senderId: Identifier,
  senderName: z.string(),
  chatRoomId: Identifier,
  timestamp: z.string().datetime({ offset: true }).transform((value) => new Date(value)),
  clientMessageId: Identifier.optional()
});

export const InboundFrameSchema = z.discriminatedUnion('type', [
  InboundMessageFrameSchema,
  z.object({ type: z.literal('ack'), messageId: Identifier }),
  z.object({
    type: z.literal('typing'),
    userId: Identifier,
    chatRoomId: Identifier,
    isTyping: z.boolean()
  }),
  z.object({
    type: z.enum(['status', 'userStatus']),
    userId: Identifier,
    isOnline: z.boolean()
  }),
  z.object({ type: z.literal('userRegistered') }),
  z.object({ type: z.literal('error'), message: z.string() }),
  z.object({
    type: z.enum(['success', 'connected']),
    authenticated: z.boolean().optional(),
    message: z.string().optional()
  })
]);

export type InboundFrame = z.infer<typeof InboundFrameSchema>;

export const KNOWN_INBOUND_TYPES: ReadonlySet<string> = new Set([
  'message',
  'ack',
  'typing',
  'status',
  'userStatus',
  'userRegistered',
  'error',
  'success',
  'connected'
]);

export const FrameEnvelopeSchema = z.object({ type: z.string() }).passthrough();

export const OutboundIntentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('auth'), token: z.string().min(1) }),
  z.object({
    type: z.literal('message'),
    content: z.string().min(1),
    chatRoomId: Identifier,
    clientMessageId: Identifier
  }),
  z.object({ type: z.literal('typing'), chatRoomId: Identifier, isTyping: z.boolean() })
]);
