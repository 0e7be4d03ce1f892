import { z } from 'zod';

import { GuildMemberSchema } from '../../models/member.js';
import { PresenceSchema } from '../../models/presence.js';
import { UserSchema } from '../../models/user.js';

export const PresenceUpdateSchema = PresenceSchema;

export const TypingStartSchema = z.object({
  channel_id: z.string(),
  guild_id: z.string().optional(),
  user_id: z.string(),
  /** Unix time in seconds. */
  timestamp: z.number().int(),
  member: GuildMemberSchema.optional(),
});

export type TypingStart = z.infer<typeof TypingStartSchema>;

export const UserUpdateSchema = UserSchema;
