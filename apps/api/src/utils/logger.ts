import { pino } from 'pino';
import { env } from '../config/env.js';

export const logger = pino({
  level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
  base: { service: 'punchcard-api' },
  redact: ['password', '*.password', 'photo', '*.photo'],
});
