import { pino, type Logger } from 'pino';
import { config } from '../config.js';

export const logger: Logger = pino({
  name: 'vod-resolver',
  level: config.NODE_ENV === 'test' ? 'silent' : config.LOG_LEVEL,
});
