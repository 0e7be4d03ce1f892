import { z } from 'zod';

import { deepFreeze } from '../utils/freeze.js';

import { MentionChannelSchema } from './channel.js';
import { EmbedSchema } from './embed.js';
import { ReactionSchema } from './emoji.js';
import { GuildMemberSchema } from './member.js';
import { UserSchema } from './user.js';

export const MessageKind = {
  Regular: 0,
  RecipientAdd: 1,
  RecipientRemove: 2,
  Call: 3,
  ChannelNameChange: 4,
  ChannelIconChange: 5,
  ChannelPinnedMessage: 6,
  GuildMemberJoin: 7,
  UserPremiumGuildSub: 8,
  UserPremiumGuildSubTier1: 9,
  UserPremiumGuildSubTier2: 10,
  UserPremiumGuildSubTier3: 11,
  ChannelFollowAdd: 12,
  GuildDiscoveryDisqualified: 14,
  GuildDiscoveryRequalified: 15,
} as const;

export type MessageKind = (typeof MessageKind)[keyof typeof MessageKind];

export const AttachmentSchema = z.object({
  id: z.string(),
  filename: z.string(),
  content_type: z.string().optional(),
  size: z.number().int(),
  url: z.string(),
  proxy_url: z.string(),
  height: z.number().int().nullish(),
  width: z.number().int().nullish(),
});

export type Attachment = z.infer<typeof AttachmentSchema>;

/** Sent with Rich Presence-related chat embeds. */
export const MessageApplicationSchema = z.object({
  id: z.string(),
  cover_image: z.string().optional(),
  description: z.string(),
  icon: z.string().nullable(),
  name: z.string(),
});

export type MessageApplication = z.infer<typeof MessageApplicationSchema>;

/** Cross-post linkage. */
export const MessageReferenceSchema = z.object({
  message_id: z.string().optional(),
  channel_id: z.string().optional(),
  guild_id: z.string().optional(),
});

export type MessageReference = z.infer<typeof MessageReferenceSchema>;

// Wire shape. Both spellings of the embed and mentioned-channel lists are
// accepted; `type` is surfaced as `kind`.
const MessageObjectSchema = z.object({
  id: z.string(),
  channel_id: z.string(),
  guild_id: z.string().optional(),
  author: UserSchema,
  member: GuildMemberSchema.optional(),
  content: z.string(),
  timestamp: z.string(),
  edited_timestamp: z.string().nullish(),
  tts: z.boolean(),
  mention_everyone: z.boolean(),
  mentions: z.array(UserSchema),
  mention_roles: z.array(z.string()),
  mention_channels: z.array(MentionChannelSchema).optional(),
  mentions_channels: z.array(MentionChannelSchema).optional(),
  attachments: z.array(AttachmentSchema),
  embeds: z.array(EmbedSchema).optional(),
  embed: z.array(EmbedSchema).optional(),
  reactions: z.array(ReactionSchema).optional(),
  nonce: z.union([z.string(), z.number().int()]).nullish(),
  pinned: z.boolean(),
  webhook_id: z.string().optional(),
  type: z.nativeEnum(MessageKind).optional(),
  application: MessageApplicationSchema.optional(),
  message_reference: MessageReferenceSchema.optional(),
  flags: z.number().int().optional(),
});

type MessageObject = z.infer<typeof MessageObjectSchema>;

function normalizeMessage({
  type,
  embeds,
  embed,
  mention_channels,
  mentions_channels,
  reactions,
  ...rest
}: MessageObject) {
  return {
    ...rest,
    ...(type !== undefined ? { kind: type } : {}),
    embed: embeds ?? embed ?? [],
    reactions: reactions ?? [],
    mentions_channels: mention_channels ?? mentions_channels ?? [],
  };
}

/**
 * A message sent in a channel. Always present: `author`, `timestamp`,
 * `tts`, `mention_everyone`, `pinned`. `embed`, `reactions` and
 * `mentions_channels` are empty when the platform leaves them out.
 */
export const MessageSchema = MessageObjectSchema.transform(normalizeMessage);

/** Decoded messages are frozen, so the type is read-only too. */
export type Message = Readonly<z.output<typeof MessageSchema>>;

type PartialMessageObject = Partial<MessageObject> & Pick<MessageObject, 'id' | 'channel_id'>;

function normalizeMessageUpdate({
  type,
  embeds,
  embed,
  mention_channels,
  mentions_channels,
  ...rest
}: PartialMessageObject) {
  const embedList = embeds ?? embed;
  const channelList = mention_channels ?? mentions_channels;
  return {
    ...rest,
    ...(type !== undefined ? { kind: type } : {}),
    ...(embedList !== undefined ? { embed: embedList } : {}),
    ...(channelList !== undefined ? { mentions_channels: channelList } : {}),
  };
}

/**
 * MESSAGE_UPDATE body. Only `id` and `channel_id` are guaranteed; a missing
 * field means "unchanged", so nothing is defaulted here.
 */
export const MessageUpdateSchema = MessageObjectSchema
  .partial()
  .required({ id: true, channel_id: true })
  .transform(normalizeMessageUpdate);

export type MessageUpdate = Readonly<z.output<typeof MessageUpdateSchema>>;

/** Decode a message body coming back from the REST collaborator. */
export function parseMessage(raw: unknown): Message {
  return deepFreeze(MessageSchema.parse(raw));
}
