import { z } from 'zod';

import { UserSchema } from './user.js';

/**
 * `user` is left out when the member rides along with a message,
 * since the message already carries the author.
 */
export const GuildMemberSchema = z.object({
  user: UserSchema.optional(),
  nick: z.string().nullish(),
  avatar: z.string().nullish(),
  roles: z.array(z.string()),
  joined_at: z.string(),
  premium_since: z.string().nullish(),
  deaf: z.boolean(),
  mute: z.boolean(),
  pending: z.boolean().optional(),
  permissions: z.string().optional(),
});

export type GuildMember = z.infer<typeof GuildMemberSchema>;
