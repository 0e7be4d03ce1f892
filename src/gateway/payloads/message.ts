import { z } from 'zod';

import { EmojiSchema } from '../../models/emoji.js';
import { GuildMemberSchema } from '../../models/member.js';
import { MessageSchema, MessageUpdateSchema } from '../../models/message.js';

export const MessageCreateSchema = MessageSchema;
export { MessageUpdateSchema };

export const MessageDeleteSchema = z.object({
  id: z.string(),
  channel_id: z.string(),
  guild_id: z.string().optional(),
});

export type MessageDelete = z.infer<typeof MessageDeleteSchema>;

export const MessageDeleteBulkSchema = z.object({
  ids: z.array(z.string()),
  channel_id: z.string(),
  guild_id: z.string().optional(),
});

export type MessageDeleteBulk = z.infer<typeof MessageDeleteBulkSchema>;

export const MessageReactionAddSchema = z.object({
  user_id: z.string(),
  channel_id: z.string(),
  message_id: z.string(),
  guild_id: z.string().optional(),
  member: GuildMemberSchema.optional(),
  emoji: EmojiSchema,
});

export type MessageReactionAdd = z.infer<typeof MessageReactionAddSchema>;

export const MessageReactionRemoveSchema = z.object({
  user_id: z.string(),
  channel_id: z.string(),
  message_id: z.string(),
  guild_id: z.string().optional(),
  emoji: EmojiSchema,
});

export type MessageReactionRemove = z.infer<typeof MessageReactionRemoveSchema>;

export const MessageReactionRemoveAllSchema = z.object({
  channel_id: z.string(),
  message_id: z.string(),
  guild_id: z.string().optional(),
});

export type MessageReactionRemoveAll = z.infer<typeof MessageReactionRemoveAllSchema>;

export const MessageReactionRemoveEmojiSchema = z.object({
  channel_id: z.string(),
  guild_id: z.string().optional(),
  message_id: z.string(),
  emoji: EmojiSchema,
});

export type MessageReactionRemoveEmoji = z.infer<typeof MessageReactionRemoveEmojiSchema>;
