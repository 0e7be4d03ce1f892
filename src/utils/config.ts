import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');

loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });

const envSchema = z.object({
  // REST collaborator used by message actions
  CHAT_API_BASE_URL: z.string().url().default('https://discord.com/api/v10'),
  CHAT_BOT_TOKEN: z.string().optional(),
  CHAT_USER_AGENT: z.string().default('DiscordBot (chat-gateway-core, 0.1.0)'),

  // Infrastructure
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof envSchema>;

/**
 * Validate an environment map. Throws with one line per invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined>): Config {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const lines = parsed.error.issues.map((issue) => `   ${issue.path.join('.')}: ${issue.message}`);
    throw new Error(['Invalid environment variables:', ...lines].join('\n'));
  }

  return {
    ...parsed.data,
    CHAT_API_BASE_URL: parsed.data.CHAT_API_BASE_URL.replace(/\/+$/, ''),
  };
}

export const config: Config = loadConfig(process.env);
