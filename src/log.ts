import pino from 'pino';
import { env } from './env';

export const log = pino({
  name: 'realtime-voice-bridge',
  level: env.LOG_LEVEL,
  base: { service: 'realtime-voice-bridge' },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['headers.Authorization', 'headers.authorization', 'apiKey', 'token'],
    censor: '[redacted]',
  },
});
