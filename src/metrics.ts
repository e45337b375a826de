import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Bridge Prometheus metrics.
 *
 * Durations are recorded in TRUE milliseconds to match the *_ms names;
 * prom-client's startTimer() would record seconds.
 */

export const register = new client.Registry();
const METRICS_PREFIX = 'realtime_voice_bridge_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000],
  registers: [register],
});

const sessionsActive = new client.Gauge({
  name: `${METRICS_PREFIX}sessions_active`,
  help: 'Bridge sessions currently registered',
  registers: [register],
});

const sessionsStartedTotal = new client.Counter({
  name: `${METRICS_PREFIX}sessions_started_total`,
  help: 'Telephony stream starts that created a bridge session',
  registers: [register],
});

const sessionTeardownsTotal = new client.Counter({
  name: `${METRICS_PREFIX}session_teardowns_total`,
  help: 'Bridge session teardowns by reason',
  labelNames: ['reason'] as const,
  registers: [register],
});

const sessionDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}session_duration_seconds`,
  help: 'Bridge session duration in seconds',
  buckets: [5, 10, 30, 60, 120, 300, 600, 1800],
  registers: [register],
});

const realtimeConnectDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}realtime_connect_duration_ms`,
  help: 'Time from realtime socket connect to open in milliseconds',
  labelNames: ['outcome'] as const,
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [register],
});

const inboundMediaFramesTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_media_frames_total`,
  help: 'Telephony media frames received',
  registers: [register],
});

const modelAudioChunksForwardedTotal = new client.Counter({
  name: `${METRICS_PREFIX}model_audio_chunks_forwarded_total`,
  help: 'input_audio_buffer.append messages handed to the realtime socket',
  registers: [register],
});

const audioChunksDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}audio_chunks_dropped_total`,
  help: 'Audio chunks dropped in either direction',
  labelNames: ['direction', 'reason'] as const,
  registers: [register],
});

const modelAudioDeltasTotal = new client.Counter({
  name: `${METRICS_PREFIX}model_audio_deltas_total`,
  help: 'Audio chunks received from the realtime model',
  registers: [register],
});

const outboundTelephonyFramesTotal = new client.Counter({
  name: `${METRICS_PREFIX}outbound_telephony_frames_total`,
  help: 'Fixed-size media frames sent to telephony',
  registers: [register],
});

const interruptionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}interruptions_total`,
  help: 'Barge-in interruptions handled',
  labelNames: ['cancel'] as const,
  registers: [register],
});

const modelErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}model_errors_total`,
  help: 'Error events from the realtime model or its transport',
  labelNames: ['source'] as const,
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;
  }
  return 'unmatched';
}

// ---------- exports used by server ----------

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

/** Starts a timer; the returned function records elapsed milliseconds for the outcome. */
export function startConnectTimer(): (outcome: 'open' | 'failed' | 'timeout') => void {
  const start = nowNs();
  return (outcome) => {
    realtimeConnectDurationMs.observe({ outcome }, nsToMs(nowNs() - start));
  };
}

export function setSessionsActive(count: number): void {
  sessionsActive.set(count);
}

export function incSessionsStarted(): void {
  sessionsStartedTotal.inc();
}

export function recordSessionTeardown(reason: string, durationMs: number): void {
  const label = reason && reason.trim() !== '' ? reason : 'unknown';
  sessionTeardownsTotal.inc({ reason: label });
  sessionDurationSeconds.observe(durationMs / 1000);
}

export function incInboundMediaFrames(count = 1): void {
  inboundMediaFramesTotal.inc(count);
}

export function incModelAudioChunksForwarded(count = 1): void {
  modelAudioChunksForwardedTotal.inc(count);
}

export function incAudioChunksDropped(direction: 'to_model' | 'to_telephony', reason: string, count = 1): void {
  audioChunksDroppedTotal.inc({ direction, reason }, count);
}

export function incModelAudioDeltas(count = 1): void {
  modelAudioDeltasTotal.inc(count);
}

export function incOutboundTelephonyFrames(count = 1): void {
  outboundTelephonyFramesTotal.inc(count);
}

export function incInterruptions(cancel: 'sent' | 'failed' | 'disabled'): void {
  interruptionsTotal.inc({ cancel });
}

export function incModelErrors(source: 'model' | 'transport'): void {
  modelErrorsTotal.inc({ source });
}
