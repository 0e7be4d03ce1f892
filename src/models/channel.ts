import { z } from 'zod';

import { UserSchema } from './user.js';

export const PermissionOverwriteSchema = z.object({
  id: z.string(),
  /** 0 = role, 1 = member */
  type: z.number().int(),
  allow: z.string(),
  deny: z.string(),
});

export type PermissionOverwrite = z.infer<typeof PermissionOverwriteSchema>;

// https://discord.com/developers/docs/resources/channel#channel-object
export const ChannelSchema = z.object({
  id: z.string(),
  type: z.number().int(),
  guild_id: z.string().optional(),
  position: z.number().int().optional(),
  permission_overwrites: z.array(PermissionOverwriteSchema).optional(),
  name: z.string().nullish(),
  topic: z.string().nullish(),
  nsfw: z.boolean().optional(),
  last_message_id: z.string().nullish(),
  bitrate: z.number().int().optional(),
  user_limit: z.number().int().optional(),
  rate_limit_per_user: z.number().int().optional(),
  recipients: z.array(UserSchema).optional(),
  icon: z.string().nullish(),
  owner_id: z.string().optional(),
  application_id: z.string().optional(),
  parent_id: z.string().nullish(),
  last_pin_timestamp: z.string().nullish(),
});

export type Channel = z.infer<typeof ChannelSchema>;

/** A channel mentioned in a crossposted message. */
export const MentionChannelSchema = z.object({
  id: z.string(),
  guild_id: z.string(),
  type: z.number().int(),
  name: z.string(),
});

export type MentionChannel = z.infer<typeof MentionChannelSchema>;
