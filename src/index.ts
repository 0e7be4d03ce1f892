export { GatewayDecodeError, isGatewayDecodeError, type GatewayDecodeErrorKind } from './gateway/errors.js';
export { GatewayOpcode, parseFrameEnvelope, parseFrameText, type FrameEnvelope } from './gateway/frame.js';
export { decodeGatewayFrame, safeDecodeGatewayFrame, type DecodeResult } from './gateway/opcode-resolver.js';
export { DISPATCH_TYPES, decodeDispatch, isDispatchType } from './gateway/dispatch-registry.js';
export type {
  DispatchEvent,
  DispatchEventOf,
  DispatchPayloadMap,
  DispatchType,
  GatewayEvent,
  GatewayEventType,
} from './gateway/events.js';
export {
  handleGatewayFrame,
  routeGatewayEvent,
  type DispatchHandlers,
  type GatewayEventHandlers,
} from './gateway/event-router.js';

export type { ChannelPinsUpdate } from './gateway/payloads/channel.js';
export type {
  GuildBan,
  GuildEmojisUpdate,
  GuildIntegrationsUpdate,
  GuildMemberAdd,
  GuildMemberRemove,
  GuildMemberUpdate,
  GuildMembersChunk,
  GuildRoleDelete,
  GuildRoleEvent,
} from './gateway/payloads/guild.js';
export type {
  MessageDelete,
  MessageDeleteBulk,
  MessageReactionAdd,
  MessageReactionRemove,
  MessageReactionRemoveAll,
  MessageReactionRemoveEmoji,
} from './gateway/payloads/message.js';
export type { TypingStart } from './gateway/payloads/presence.js';
export type { Ready } from './gateway/payloads/ready.js';

export { ChannelSchema, MentionChannelSchema, type Channel, type MentionChannel } from './models/channel.js';
export { EmbedSchema, type Embed } from './models/embed.js';
export { EmojiSchema, ReactionSchema, type Emoji, type Reaction } from './models/emoji.js';
export { GuildSchema, RoleSchema, UnavailableGuildSchema, type Guild, type Role, type UnavailableGuild } from './models/guild.js';
export { GuildMemberSchema, type GuildMember } from './models/member.js';
export {
  MessageKind,
  MessageSchema,
  MessageUpdateSchema,
  parseMessage,
  type Attachment,
  type Message,
  type MessageApplication,
  type MessageReference,
  type MessageUpdate,
} from './models/message.js';
export { PresenceSchema, type Activity, type Presence, type PresenceStatus } from './models/presence.js';
export { UserSchema, type PartialUser, type User } from './models/user.js';
export { VoiceServerSchema, VoiceStateSchema, type VoiceServer, type VoiceState } from './models/voice.js';

export * as MessageActions from './core/message-actions.js';
export { createRestClient, RestRequestError, type RestClient, type RestClientOptions } from './rest/rest-client.js';
export { createOutboxRestClient, type OutboxEntry, type OutboxClientOptions } from './rest/outbox-client.js';
