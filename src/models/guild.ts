import { z } from 'zod';

import { ChannelSchema } from './channel.js';
import { EmojiSchema } from './emoji.js';
import { GuildMemberSchema } from './member.js';
import { PresenceSchema } from './presence.js';
import { VoiceStateSchema } from './voice.js';

export const RoleSchema = z.object({
  id: z.string(),
  name: z.string(),
  color: z.number().int(),
  hoist: z.boolean(),
  position: z.number().int(),
  /** Bit set, serialized as a string. */
  permissions: z.string(),
  managed: z.boolean(),
  mentionable: z.boolean(),
  icon: z.string().nullish(),
  unicode_emoji: z.string().nullish(),
});

export type Role = z.infer<typeof RoleSchema>;

export const UnavailableGuildSchema = z.object({
  id: z.string(),
  /** Absent when the user was removed from the guild rather than it going offline. */
  unavailable: z.boolean().optional(),
});

export type UnavailableGuild = z.infer<typeof UnavailableGuildSchema>;

// https://discord.com/developers/docs/resources/guild#guild-object
export const GuildSchema = z.object({
  id: z.string(),
  name: z.string(),
  icon: z.string().nullish(),
  splash: z.string().nullish(),
  discovery_splash: z.string().nullish(),
  owner_id: z.string(),
  region: z.string().nullish(),
  afk_channel_id: z.string().nullish(),
  afk_timeout: z.number().int(),
  verification_level: z.number().int(),
  default_message_notifications: z.number().int(),
  explicit_content_filter: z.number().int(),
  roles: z.array(RoleSchema),
  emojis: z.array(EmojiSchema),
  features: z.array(z.string()),
  mfa_level: z.number().int(),
  application_id: z.string().nullish(),
  system_channel_id: z.string().nullish(),
  rules_channel_id: z.string().nullish(),
  max_members: z.number().int().optional(),
  vanity_url_code: z.string().nullish(),
  description: z.string().nullish(),
  banner: z.string().nullish(),
  premium_tier: z.number().int().optional(),
  premium_subscription_count: z.number().int().optional(),
  preferred_locale: z.string().optional(),

  // Only sent with GUILD_CREATE
  joined_at: z.string().optional(),
  large: z.boolean().optional(),
  unavailable: z.boolean().optional(),
  member_count: z.number().int().optional(),
  voice_states: z.array(VoiceStateSchema).optional(),
  members: z.array(GuildMemberSchema).optional(),
  channels: z.array(ChannelSchema).optional(),
  presences: z.array(PresenceSchema).optional(),
});

export type Guild = z.infer<typeof GuildSchema>;
