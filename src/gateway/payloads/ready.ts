import { z } from 'zod';

import { ChannelSchema } from '../../models/channel.js';
import { UnavailableGuildSchema } from '../../models/guild.js';
import { UserSchema } from '../../models/user.js';

export const ReadySchema = z.object({
  /** Gateway protocol version. */
  v: z.number().int(),
  user: UserSchema,
  private_channels: z.array(ChannelSchema),
  guilds: z.array(UnavailableGuildSchema),
  session_id: z.string(),
  resume_gateway_url: z.string().optional(),
  /** [shard_id, num_shards] */
  shard: z.tuple([z.number().int(), z.number().int()]).optional(),
});

export type Ready = z.infer<typeof ReadySchema>;
