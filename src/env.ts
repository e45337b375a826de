import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
      return true;
    }
    if (normalized === 'false' || normalized === '0' || normalized === 'no') {
      return false;
    }
  }
  return value;
};

const EnvSchema = z
  .object({
    PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(3000)),
    LOG_LEVEL: z.preprocess(
      emptyToUndefined,
      z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    ),
    MEDIA_PATH: z.preprocess(emptyToUndefined, z.string().startsWith('/').default('/audio')),
    MEDIA_STREAM_TOKEN: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    OPENAI_API_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    OPENAI_REALTIME_URL: z.preprocess(
      emptyToUndefined,
      z.string().url().default('wss://api.openai.com/v1/realtime'),
    ),
    OPENAI_MODEL: z.preprocess(
      emptyToUndefined,
      z.string().min(1).default('gpt-4o-realtime-preview-2024-12-17'),
    ),
    OPENAI_VOICE: z.preprocess(emptyToUndefined, z.string().min(1).default('verse')),
    OPENAI_TURN_DETECTION: z.preprocess(
      emptyToUndefined,
      z.enum(['semantic_vad', 'server_vad']).default('semantic_vad'),
    ),
    OPENAI_SYSTEM_PROMPT: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    OPENAI_TRANSLATE_TO: z.preprocess(emptyToUndefined, z.string().min(1).default('English')),
    OPENAI_TRANSLATE_STYLE: z.preprocess(
      emptyToUndefined,
      z.string().min(1).default('natural and concise'),
    ),
    OPENAI_TRANSLATE_EXTRAS: z.preprocess(emptyToUndefined, z.string().optional()),
    MODEL_SAMPLE_RATE_HZ: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(24000),
    ),
    REALTIME_CONNECT_TIMEOUT_MS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(5000),
    ),
    REALTIME_PING_INTERVAL_MS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(30000),
    ),
    REALTIME_PING_TIMEOUT_MS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(10000),
    ),
    REALTIME_DEBUG: z.preprocess(stringToBoolean, z.boolean().default(false)),
    REALTIME_TRACE: z.preprocess(stringToBoolean, z.boolean().default(false)),
    OUTBOUND_QUEUE_MAX_CHUNKS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(50),
    ),
    STOP_DRAIN_TIMEOUT_MS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(2000),
    ),
    BARGE_IN_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(true)),
    BARGE_IN_CLEAR_PLAYBACK: z.preprocess(stringToBoolean, z.boolean().default(true)),
    AUDIO_MONITOR_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(false)),
    AUDIO_MONITOR_DIR: z.preprocess(
      emptyToUndefined,
      z.string().min(1).default('/tmp/realtime-voice-bridge-monitor'),
    ),
    AUDIO_MONITOR_SECONDS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(30),
    ),
  })
  .refine((value) => value.REALTIME_PING_INTERVAL_MS > value.REALTIME_PING_TIMEOUT_MS, {
    message: 'must be greater than REALTIME_PING_TIMEOUT_MS',
    path: ['REALTIME_PING_INTERVAL_MS'],
  });

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;
