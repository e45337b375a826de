import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import type { Duplex } from 'stream';
import WebSocket, { WebSocketServer } from 'ws';
import { disabledAudioMonitor, WavAudioMonitor, type AudioMonitor } from './audio/audioMonitor';
import type { ModelClientFactory } from './calls/bridgeSession';
import { SessionRegistry } from './calls/sessionRegistry';
import { env } from './env';
import { log } from './log';
import { MediaStreamHandler, type BridgeSettings } from './media/mediaStream';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createHealthRouter } from './routes/health';
import { createSessionsRouter } from './routes/sessions';

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  log.error({ err, request_id: res.locals.requestId }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export type MediaUpgradeCheck = { ok: true } | { ok: false; reason: 'bad_path' | 'bad_token' };

export function checkMediaRequest(
  request: Pick<http.IncomingMessage, 'url' | 'headers'>,
  mediaPath: string,
  expectedToken: string | undefined,
): MediaUpgradeCheck {
  if (!request.url) {
    return { ok: false, reason: 'bad_path' };
  }

  const host = request.headers.host ?? 'localhost';
  const url = new URL(request.url, `http://${host}`);
  if (url.pathname !== mediaPath) {
    return { ok: false, reason: 'bad_path' };
  }

  if (expectedToken && url.searchParams.get('token') !== expectedToken) {
    return { ok: false, reason: 'bad_token' };
  }

  return { ok: true };
}

function rejectUpgrade(socket: Duplex, status: number, message: string): void {
  socket.write(`HTTP/1.1 ${status} ${message}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

export type ServerOptions = {
  registry?: SessionRegistry;
  monitor?: AudioMonitor;
  settings?: BridgeSettings;
  createClient?: ModelClientFactory;
};

function attachMediaWebSocketServer(
  server: http.Server,
  registry: SessionRegistry,
  options: ServerOptions & { monitor: AudioMonitor },
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    const check = checkMediaRequest(request, env.MEDIA_PATH, env.MEDIA_STREAM_TOKEN);
    if (!check.ok) {
      log.warn({ event: 'media_upgrade_rejected', reason: check.reason, url: request.url }, 'media upgrade rejected');
      rejectUpgrade(socket, check.reason === 'bad_token' ? 401 : 404, check.reason === 'bad_token' ? 'Unauthorized' : 'Not Found');
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
    });
  });

  wss.on('connection', (ws: WebSocket) => {
    const connectionId = randomUUID();
    log.info({ event: 'media_ws_connected', connection_id: connectionId }, 'media websocket connected');

    const handler = new MediaStreamHandler({
      socket: ws,
      registry,
      settings: options.settings,
      createClient: options.createClient,
      monitor: options.monitor,
      connectionId,
    });

    ws.on('message', (data, isBinary) => {
      void handler.handleMessage(data, isBinary);
    });

    ws.on('close', (code) => {
      log.info({ event: 'media_ws_closed', connection_id: connectionId, code }, 'media websocket closed');
      handler.handleClose('telephony_disconnected').catch((error: unknown) => {
        log.error({ err: error, connection_id: connectionId }, 'media teardown failed');
      });
    });

    ws.on('error', (error) => {
      log.error({ err: error, connection_id: connectionId }, 'media websocket error');
      handler.handleClose('telephony_error').catch((teardownError: unknown) => {
        log.error({ err: teardownError, connection_id: connectionId }, 'media teardown failed');
      });
    });
  });

  return wss;
}

export function createAudioMonitor(): AudioMonitor {
  if (!env.AUDIO_MONITOR_ENABLED) {
    return disabledAudioMonitor;
  }
  return new WavAudioMonitor({
    baseDir: env.AUDIO_MONITOR_DIR,
    sampleRate: env.MODEL_SAMPLE_RATE_HZ,
    secondsToKeep: env.AUDIO_MONITOR_SECONDS,
  });
}

export function buildServer(options: ServerOptions = {}): {
  app: express.Express;
  server: http.Server;
  wss: WebSocketServer;
  registry: SessionRegistry;
  monitor: AudioMonitor;
} {
  const app = express();
  const registry = options.registry ?? new SessionRegistry();
  const monitor = options.monitor ?? createAudioMonitor();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.use('/health', createHealthRouter(registry));
  app.use('/v1/sessions', createSessionsRouter(registry));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachMediaWebSocketServer(server, registry, { ...options, monitor });

  return { app, server, wss, registry, monitor };
}
