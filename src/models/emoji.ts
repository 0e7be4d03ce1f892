import { z } from 'zod';

import { UserSchema } from './user.js';

export const EmojiSchema = z.object({
  /** Null for unicode emoji. */
  id: z.string().nullable(),
  /** Null only for deleted custom emoji in reaction payloads. */
  name: z.string().nullable(),
  roles: z.array(z.string()).optional(),
  user: UserSchema.optional(),
  require_colons: z.boolean().optional(),
  managed: z.boolean().optional(),
  animated: z.boolean().optional(),
  available: z.boolean().optional(),
});

export type Emoji = z.infer<typeof EmojiSchema>;

export const ReactionSchema = z.object({
  count: z.number().int(),
  me: z.boolean(),
  emoji: EmojiSchema,
});

export type Reaction = z.infer<typeof ReactionSchema>;
