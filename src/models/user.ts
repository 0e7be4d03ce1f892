import { z } from 'zod';

// https://discord.com/developers/docs/resources/user#user-object
export const UserSchema = z.object({
  id: z.string(),
  username: z.string(),
  discriminator: z.string(),
  global_name: z.string().nullish(),
  avatar: z.string().nullish(),
  bot: z.boolean().optional(),
  system: z.boolean().optional(),
  mfa_enabled: z.boolean().optional(),
  locale: z.string().optional(),
  verified: z.boolean().optional(),
  email: z.string().nullish(),
  flags: z.number().int().optional(),
  premium_type: z.number().int().optional(),
  public_flags: z.number().int().optional(),
});

export type User = z.infer<typeof UserSchema>;

/** Presence updates only guarantee the id; every other user field may be left out. */
export const PartialUserSchema = UserSchema.partial().required({ id: true });

export type PartialUser = z.infer<typeof PartialUserSchema>;
