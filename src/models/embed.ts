import { z } from 'zod';

const EmbedMediaSchema = z.object({
  url: z.string().optional(),
  proxy_url: z.string().optional(),
  height: z.number().int().optional(),
  width: z.number().int().optional(),
});

// https://discord.com/developers/docs/resources/channel#embed-object
export const EmbedSchema = z.object({
  title: z.string().optional(),
  /** Always "rich" for embeds sent by bots. */
  type: z.string().optional(),
  description: z.string().optional(),
  url: z.string().optional(),
  timestamp: z.string().optional(),
  color: z.number().int().optional(),
  footer: z.object({
    text: z.string(),
    icon_url: z.string().optional(),
    proxy_icon_url: z.string().optional(),
  }).optional(),
  image: EmbedMediaSchema.optional(),
  thumbnail: EmbedMediaSchema.optional(),
  video: EmbedMediaSchema.optional(),
  provider: z.object({
    name: z.string().optional(),
    url: z.string().optional(),
  }).optional(),
  author: z.object({
    name: z.string().optional(),
    url: z.string().optional(),
    icon_url: z.string().optional(),
    proxy_icon_url: z.string().optional(),
  }).optional(),
  fields: z.array(z.object({
    name: z.string(),
    value: z.string(),
    inline: z.boolean().optional(),
  })).optional(),
});

export type Embed = z.infer<typeof EmbedSchema>;
