import { z } from 'zod';

import { EmojiSchema } from '../../models/emoji.js';
import { GuildSchema, RoleSchema, UnavailableGuildSchema } from '../../models/guild.js';
import { GuildMemberSchema } from '../../models/member.js';
import { PresenceSchema } from '../../models/presence.js';
import { UserSchema } from '../../models/user.js';

export const GuildCreateSchema = GuildSchema;
export const GuildUpdateSchema = GuildSchema;
export const GuildDeleteSchema = UnavailableGuildSchema;

const GuildBanSchema = z.object({
  guild_id: z.string(),
  user: UserSchema,
});

export const GuildBanAddSchema = GuildBanSchema;
export const GuildBanRemoveSchema = GuildBanSchema;

export type GuildBan = z.infer<typeof GuildBanSchema>;

export const GuildEmojisUpdateSchema = z.object({
  guild_id: z.string(),
  emojis: z.array(EmojiSchema),
});

export type GuildEmojisUpdate = z.infer<typeof GuildEmojisUpdateSchema>;

export const GuildIntegrationsUpdateSchema = z.object({
  guild_id: z.string(),
});

export type GuildIntegrationsUpdate = z.infer<typeof GuildIntegrationsUpdateSchema>;

export const GuildMemberAddSchema = GuildMemberSchema.extend({
  guild_id: z.string(),
  user: UserSchema,
});

export type GuildMemberAdd = z.infer<typeof GuildMemberAddSchema>;

export const GuildMemberRemoveSchema = z.object({
  guild_id: z.string(),
  user: UserSchema,
});

export type GuildMemberRemove = z.infer<typeof GuildMemberRemoveSchema>;

export const GuildMemberUpdateSchema = z.object({
  guild_id: z.string(),
  roles: z.array(z.string()),
  user: UserSchema,
  nick: z.string().nullish(),
  avatar: z.string().nullish(),
  joined_at: z.string().nullish(),
  premium_since: z.string().nullish(),
  deaf: z.boolean().optional(),
  mute: z.boolean().optional(),
  pending: z.boolean().optional(),
});

export type GuildMemberUpdate = z.infer<typeof GuildMemberUpdateSchema>;

export const GuildMembersChunkSchema = z.object({
  guild_id: z.string(),
  members: z.array(GuildMemberSchema),
  chunk_index: z.number().int(),
  chunk_count: z.number().int(),
  not_found: z.array(z.string()).optional(),
  presences: z.array(PresenceSchema).optional(),
  nonce: z.string().optional(),
});

export type GuildMembersChunk = z.infer<typeof GuildMembersChunkSchema>;

const GuildRoleSchema = z.object({
  guild_id: z.string(),
  role: RoleSchema,
});

export const GuildRoleCreateSchema = GuildRoleSchema;
export const GuildRoleUpdateSchema = GuildRoleSchema;

export type GuildRoleEvent = z.infer<typeof GuildRoleSchema>;

export const GuildRoleDeleteSchema = z.object({
  guild_id: z.string(),
  role_id: z.string(),
});

export type GuildRoleDelete = z.infer<typeof GuildRoleDeleteSchema>;
