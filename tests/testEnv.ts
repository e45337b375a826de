const defaults: Record<string, string> = {
  PORT: '3000',
  LOG_LEVEL: 'silent',
  MEDIA_PATH: '/audio',
  OPENAI_API_KEY: 'test-key',
  OPENAI_MODEL: 'test-model',
  OPENAI_REALTIME_URL: 'wss://realtime.test/v1/realtime',
  MODEL_SAMPLE_RATE_HZ: '24000',
  REALTIME_CONNECT_TIMEOUT_MS: '500',
  AUDIO_MONITOR_ENABLED: 'false',
};

export function setTestEnv(): void {
  for (const [key, value] of Object.entries(defaults)) {
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
