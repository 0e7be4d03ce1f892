import { ZodError } from 'zod';

import { deepFreeze } from '../utils/freeze.js';

import { GatewayDecodeError } from './errors.js';
import type { DispatchEvent, DispatchEventOf, DispatchPayloadMap, DispatchType } from './events.js';
import {
  ChannelCreateSchema,
  ChannelDeleteSchema,
  ChannelPinsUpdateSchema,
  ChannelUpdateSchema,
} from './payloads/channel.js';
import {
  GuildBanAddSchema,
  GuildBanRemoveSchema,
  GuildCreateSchema,
  GuildDeleteSchema,
  GuildEmojisUpdateSchema,
  GuildIntegrationsUpdateSchema,
  GuildMemberAddSchema,
  GuildMemberRemoveSchema,
  GuildMemberUpdateSchema,
  GuildMembersChunkSchema,
  GuildRoleCreateSchema,
  GuildRoleDeleteSchema,
  GuildRoleUpdateSchema,
  GuildUpdateSchema,
} from './payloads/guild.js';
import {
  MessageCreateSchema,
  MessageDeleteBulkSchema,
  MessageDeleteSchema,
  MessageReactionAddSchema,
  MessageReactionRemoveAllSchema,
  MessageReactionRemoveEmojiSchema,
  MessageReactionRemoveSchema,
  MessageUpdateSchema,
} from './payloads/message.js';
import { PresenceUpdateSchema, TypingStartSchema, UserUpdateSchema } from './payloads/presence.js';
import { ReadySchema } from './payloads/ready.js';
import { VoiceServerUpdateSchema, VoiceStateUpdateSchema } from './payloads/voice.js';

type DispatchDecoder<K extends DispatchType> = (d: unknown) => DispatchEventOf<K>;

type DispatchDecoderTable = { readonly [K in DispatchType]: DispatchDecoder<K> };

interface PayloadSchema<T> {
  parse(d: unknown): T;
}

function decodeWith<K extends DispatchType>(
  type: K,
  schema: PayloadSchema<DispatchPayloadMap[K]>,
): DispatchDecoder<K> {
  return (d) => ({ type, payload: schema.parse(d) });
}

// One entry per tag; the mapped type rejects an entry built for another tag.
// Decoders throw ZodError and decodeDispatch reports it under the looked-up tag.
const DISPATCH_DECODERS: DispatchDecoderTable = {
  READY: decodeWith('READY', ReadySchema),
  RESUMED: () => ({ type: 'RESUMED', payload: null }),
  RECONNECT: () => ({ type: 'RECONNECT', payload: null }),

  CHANNEL_CREATE: decodeWith('CHANNEL_CREATE', ChannelCreateSchema),
  CHANNEL_UPDATE: decodeWith('CHANNEL_UPDATE', ChannelUpdateSchema),
  CHANNEL_DELETE: decodeWith('CHANNEL_DELETE', ChannelDeleteSchema),
  CHANNEL_PINS_UPDATE: decodeWith('CHANNEL_PINS_UPDATE', ChannelPinsUpdateSchema),

  GUILD_CREATE: decodeWith('GUILD_CREATE', GuildCreateSchema),
  GUILD_UPDATE: decodeWith('GUILD_UPDATE', GuildUpdateSchema),
  GUILD_DELETE: decodeWith('GUILD_DELETE', GuildDeleteSchema),
  GUILD_BAN_ADD: decodeWith('GUILD_BAN_ADD', GuildBanAddSchema),
  GUILD_BAN_REMOVE: decodeWith('GUILD_BAN_REMOVE', GuildBanRemoveSchema),
  GUILD_EMOJIS_UPDATE: decodeWith('GUILD_EMOJIS_UPDATE', GuildEmojisUpdateSchema),
  GUILD_INTEGRATIONS_UPDATE: decodeWith('GUILD_INTEGRATIONS_UPDATE', GuildIntegrationsUpdateSchema),
  GUILD_MEMBER_ADD: decodeWith('GUILD_MEMBER_ADD', GuildMemberAddSchema),
  GUILD_MEMBER_REMOVE: decodeWith('GUILD_MEMBER_REMOVE', GuildMemberRemoveSchema),
  GUILD_MEMBER_UPDATE: decodeWith('GUILD_MEMBER_UPDATE', GuildMemberUpdateSchema),
  GUILD_MEMBERS_CHUNK: decodeWith('GUILD_MEMBERS_CHUNK', GuildMembersChunkSchema),
  GUILD_ROLE_CREATE: decodeWith('GUILD_ROLE_CREATE', GuildRoleCreateSchema),
  GUILD_ROLE_UPDATE: decodeWith('GUILD_ROLE_UPDATE', GuildRoleUpdateSchema),
  GUILD_ROLE_DELETE: decodeWith('GUILD_ROLE_DELETE', GuildRoleDeleteSchema),

  MESSAGE_CREATE: decodeWith('MESSAGE_CREATE', MessageCreateSchema),
  MESSAGE_UPDATE: decodeWith('MESSAGE_UPDATE', MessageUpdateSchema),
  MESSAGE_DELETE: decodeWith('MESSAGE_DELETE', MessageDeleteSchema),
  MESSAGE_DELETE_BULK: decodeWith('MESSAGE_DELETE_BULK', MessageDeleteBulkSchema),
  MESSAGE_REACTION_ADD: decodeWith('MESSAGE_REACTION_ADD', MessageReactionAddSchema),
  MESSAGE_REACTION_REMOVE: decodeWith('MESSAGE_REACTION_REMOVE', MessageReactionRemoveSchema),
  MESSAGE_REACTION_REMOVE_ALL: decodeWith('MESSAGE_REACTION_REMOVE_ALL', MessageReactionRemoveAllSchema),
  MESSAGE_REACTION_REMOVE_EMOJI: decodeWith('MESSAGE_REACTION_REMOVE_EMOJI', MessageReactionRemoveEmojiSchema),

  PRESENCE_UPDATE: decodeWith('PRESENCE_UPDATE', PresenceUpdateSchema),
  TYPING_START: decodeWith('TYPING_START', TypingStartSchema),
  USER_UPDATE: decodeWith('USER_UPDATE', UserUpdateSchema),

  VOICE_STATE_UPDATE: decodeWith('VOICE_STATE_UPDATE', VoiceStateUpdateSchema),
  VOICE_SERVER_UPDATE: decodeWith('VOICE_SERVER_UPDATE', VoiceServerUpdateSchema),
};

/** Every recognized dispatch tag, in table order. */
export const DISPATCH_TYPES: readonly string[] = Object.freeze(Object.keys(DISPATCH_DECODERS));

/** Exact, case-sensitive membership test against the table's own keys. */
export function isDispatchType(t: string): t is DispatchType {
  return Object.prototype.hasOwnProperty.call(DISPATCH_DECODERS, t);
}

/**
 * Resolve a dispatch tag to its decoder and decode `d` with it.
 *
 * Throws `GatewayDecodeError` of kind `unrecognized-dispatch-type` for an
 * unknown tag, or of kind `format` (subject = the tag) when the body does
 * not match the tag's payload shape.
 */
export function decodeDispatch(t: string, d: unknown): DispatchEvent {
  if (!isDispatchType(t)) {
    throw GatewayDecodeError.unrecognizedDispatchType(t);
  }

  try {
    const event: DispatchEvent = DISPATCH_DECODERS[t](d);
    return deepFreeze(event);
  } catch (err) {
    if (err instanceof ZodError) {
      throw GatewayDecodeError.format(t, err.issues);
    }
    throw err;
  }
}
