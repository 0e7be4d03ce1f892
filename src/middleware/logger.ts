import pino from 'pino';

import { config } from '../utils/config.js';

export const logger = pino({
  name: 'chat-gateway-core',
  level: config.LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
});
