import pino from 'pino';

import { LOG_LEVEL } from './config.js';

// stdout is reserved for the resolved path, so everything goes to fd 2
export const logger = pino({
  level: LOG_LEVEL,
  transport: {
    target: 'pino-pretty',
    options: { colorize: true, destination: 2 },
  },
});
