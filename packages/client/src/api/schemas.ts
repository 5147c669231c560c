import { z } from 'zod';

const Identifier = z.string().min(1);

const IsoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const optional = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value) => value ?? undefined);

export const UserSchema = z.object({
  id: Identifier,
  name: z.string(),
  email: optional(z.string()),
  avatarUrl: optional(z.string()),
  isOnline: z.boolean().default(false),
  lastSeen: optional(IsoDate)
});

export type User = z.infer<typeof UserSchema>;

export const AuthResponseSchema = z.object({
  user: UserSchema,
  token: z.string().min(1)
});

export type AuthResponse = z.infer<typeof AuthResponseSchema>;

export const HistoryMessageSchema = z.object({
  id: Identifier,
  content: z.string(),
  senderId: Identifier,
  senderName: z.string(),
  chatRoomId: Identifier,
  timestamp: IsoDate
});

export type HistoryMessage = z.infer<typeof HistoryMessageSchema>;

export const ChatRoomSummarySchema = z.object({
  id: Identifier,
  name: optional(z.string()),
  isGroup: z.boolean().default(false),
  participants: z.array(UserSchema).default([]),
  lastMessage: optional(HistoryMessageSchema),
  unreadCount: optional(z.number().int().nonnegative())
});

export type ChatRoomSummary = z.infer<typeof ChatRoomSummarySchema>;

export const ApiErrorBodySchema = z
  .object({
    reason: z.string().optional(),
    message: z.string().optional(),
    code: z.string().optional()
  })
  .passthrough();
