import { describe, it, expect } from 'vitest';

import * as configModule from '../src/utils/config.js';
import { loadConfig } from '../src/utils/config.js';

describe('Config', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      CHAT_API_BASE_URL: 'https://discord.com/api/v10',
      CHAT_USER_AGENT: 'DiscordBot (chat-gateway-core, 0.1.0)',
      LOG_LEVEL: 'info',
    });
  });

  it('trims a trailing slash from the API base URL', () => {
    expect(loadConfig({ CHAT_API_BASE_URL: 'https://api.test/v10/' }).CHAT_API_BASE_URL).toBe('https://api.test/v10');
  });

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose', CHAT_API_BASE_URL: 'not a url' })).toThrow(
      /CHAT_API_BASE_URL: .*\n.*LOG_LEVEL: /,
    );
  });

  it('exposes only the validated config and its loader', () => {
    expect(Object.keys(configModule).sort()).toEqual(['config', 'loadConfig']);
  });
});
