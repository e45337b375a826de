import WebSocket, { type RawData } from 'ws';
import { getErrorMessage } from '../errors';
import { log } from '../log';
import { incModelErrors, startConnectTimer } from '../metrics';
import { AsyncQueue } from '../queue/asyncQueue';
import { decodeModelEvent, type ModelEvent, type OutboundMessage } from './protocol';

const WS_CONNECTING = 0;
const WS_OPEN = 1;

const DEFAULT_REALTIME_URL = 'wss://api.openai.com/v1/realtime';
const DEFAULT_PING_INTERVAL_MS = 30_000;
const DEFAULT_PING_TIMEOUT_MS = 10_000;
const TRACE_PREVIEW_CHARS = 300;

/** The subset of a `ws` client socket the realtime client drives. */
export interface RealtimeSocket {
  readonly readyState: number;
  send(data: string, cb: (err?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'pong', listener: () => void): unknown;
}

export type RealtimeSocketFactory = (url: string, headers: Record<string, string>) => RealtimeSocket;

export type RealtimeClientState = 'idle' | 'connecting' | 'open' | 'closed' | 'failed';

export type RealtimeClientOptions = {
  apiKey: string;
  model: string;
  url?: string;
  pingIntervalMs?: number;
  pingTimeoutMs?: number;
  debug?: boolean;
  trace?: boolean;
  logContext?: Record<string, unknown>;
  createSocket?: RealtimeSocketFactory;
};

/** What a bridge session needs from its model connection. */
export interface ModelSessionClient {
  readonly state: RealtimeClientState;
  start(): void;
  waitOpen(timeoutMs: number): Promise<boolean>;
  send(message: OutboundMessage): Promise<boolean>;
  events(): AsyncIterable<ModelEvent>;
  close(): void;
}

const defaultSocketFactory: RealtimeSocketFactory = (url, headers) => new WebSocket(url, { headers });

function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export function buildRealtimeUrl(baseUrl: string, model: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('model', model);
  return url.toString();
}

/**
 * One realtime socket session. Outbound messages are delivered in submission
 * order; inbound frames, socket errors and closes all arrive through events().
 */
export class RealtimeClient implements ModelSessionClient {
  public readonly url: string;

  private readonly apiKey: string;
  private readonly pingIntervalMs: number;
  private readonly pingTimeoutMs: number;
  private readonly debug: boolean;
  private readonly trace: boolean;
  private readonly logContext: Record<string, unknown>;
  private readonly createSocket: RealtimeSocketFactory;
  private readonly inbound = new AsyncQueue<ModelEvent>();
  private readonly opened: Promise<boolean>;
  private resolveOpened: (value: boolean) => void = () => undefined;

  private socket?: RealtimeSocket;
  private stateValue: RealtimeClientState = 'idle';
  private closing = false;
  private sendTail: Promise<unknown> = Promise.resolve();
  private pingTimer?: NodeJS.Timeout;
  private pongTimer?: NodeJS.Timeout;
  private endConnectTimer?: (outcome: 'open' | 'failed' | 'timeout') => void;
  private sentCount = 0;
  private receivedCount = 0;

  constructor(options: RealtimeClientOptions) {
    this.apiKey = options.apiKey;
    this.url = buildRealtimeUrl(options.url ?? DEFAULT_REALTIME_URL, options.model);
    this.pingIntervalMs = options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS;
    this.pingTimeoutMs = options.pingTimeoutMs ?? DEFAULT_PING_TIMEOUT_MS;
    if (this.pingIntervalMs <= this.pingTimeoutMs) {
      throw new RangeError(
        `ping interval (${this.pingIntervalMs}ms) must exceed ping timeout (${this.pingTimeoutMs}ms)`,
      );
    }
    this.debug = options.debug ?? false;
    this.trace = options.trace ?? false;
    this.logContext = options.logContext ?? {};
    this.createSocket = options.createSocket ?? defaultSocketFactory;
    this.opened = new Promise<boolean>((resolve) => {
      this.resolveOpened = resolve;
    });
  }

  get state(): RealtimeClientState {
    return this.stateValue;
  }

  getStats(): { sent: number; received: number } {
    return { sent: this.sentCount, received: this.receivedCount };
  }

  /** Begins connecting and returns immediately. Calling it again is a no-op. */
  start(): void {
    if (this.stateValue !== 'idle' || this.closing) {
      return;
    }

    this.stateValue = 'connecting';
    this.endConnectTimer = startConnectTimer();
    log.info({ event: 'realtime_connecting', url: this.url, ...this.logContext }, 'realtime connecting');

    let socket: RealtimeSocket;
    try {
      socket = this.createSocket(this.url, {
        Authorization: `Bearer ${this.apiKey}`,
        'OpenAI-Beta': 'realtime=v1',
      });
    } catch (error) {
      this.finishConnect('failed');
      this.fail(error);
      this.handleClose(1006, 'socket_create_failed');
      return;
    }
    this.socket = socket;

    socket.on('open', () => {
      if (this.closing) {
        return;
      }
      this.finishConnect('open');
      this.stateValue = 'open';
      this.resolveOpened(true);
      this.startKeepAlive();
      log.info({ event: 'realtime_open', ...this.logContext }, 'realtime socket open');
    });

    socket.on('message', (data, isBinary) => {
      this.receivedCount += 1;
      const buffer = rawDataToBuffer(data);
      const event = decodeModelEvent(buffer, isBinary);
      if (this.trace) {
        log.info(
          {
            event: 'realtime_trace_in',
            bytes: buffer.length,
            preview: isBinary ? undefined : buffer.toString('utf8', 0, TRACE_PREVIEW_CHARS),
            ...this.logContext,
          },
          'realtime <<',
        );
      } else if (this.debug) {
        log.info({ event: 'realtime_in', type: event.type, ...this.logContext }, 'realtime <<');
      }
      this.inbound.push(event);
    });

    socket.on('error', (error) => {
      if (this.stateValue === 'connecting') {
        this.finishConnect('failed');
      }
      this.fail(error);
    });

    socket.on('close', (code, reason) => {
      this.handleClose(code, reason.toString('utf8'));
    });

    socket.on('pong', () => {
      if (this.debug) {
        log.info({ event: 'realtime_pong', ...this.logContext }, 'realtime <pong>');
      }
      this.clearPongTimer();
    });
  }

  /** Resolves true once open, false on timeout or if the socket fails first. */
  async waitOpen(timeoutMs: number): Promise<boolean> {
    if (this.stateValue === 'open') {
      return true;
    }
    if (this.stateValue === 'closed' || this.stateValue === 'failed') {
      return false;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
    });

    try {
      return await Promise.race([this.opened, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Queues a message behind every earlier send. Resolves true once the frame
   * was handed to the socket, false if it was dropped because the session is
   * closed or never opened.
   */
  send(message: OutboundMessage): Promise<boolean> {
    const payload = JSON.stringify(message);
    const result = this.sendTail.then(() => this.transmit(message.type, payload));
    this.sendTail = result;
    return result;
  }

  events(): AsyncIterable<ModelEvent> {
    return this.inbound;
  }

  /** Idempotent; safe before start() and from any teardown path. */
  close(): void {
    if (this.closing) {
      return;
    }
    this.closing = true;
    this.stopKeepAlive();
    this.resolveOpened(false);
    if (this.stateValue === 'connecting') {
      this.finishConnect('timeout');
    }

    const socket = this.socket;
    if (socket) {
      try {
        if (socket.readyState === WS_CONNECTING) {
          socket.terminate();
        } else if (socket.readyState === WS_OPEN) {
          socket.close(1000, 'session_closed');
        }
      } catch (error) {
        log.warn({ err: error, event: 'realtime_close_failed', ...this.logContext }, 'realtime socket close failed');
      }
    }

    if (this.stateValue !== 'failed') {
      this.stateValue = 'closed';
    }
    this.inbound.close({ discard: true });
    log.info(
      { event: 'realtime_closed_by_client', sent: this.sentCount, received: this.receivedCount, ...this.logContext },
      'realtime client closed',
    );
  }

  private async transmit(type: OutboundMessage['type'], payload: string): Promise<boolean> {
    if (this.closing) {
      return false;
    }

    if (this.stateValue === 'idle' || this.stateValue === 'connecting') {
      const opened = await this.opened;
      if (!opened) {
        return false;
      }
    }

    const socket = this.socket;
    if (this.closing || !socket || socket.readyState !== WS_OPEN) {
      return false;
    }

    if (this.debug && type !== 'input_audio_buffer.append') {
      log.info({ event: 'realtime_out', type, ...this.logContext }, 'realtime >>');
    }

    return new Promise<boolean>((resolve) => {
      try {
        socket.send(payload, (error) => {
          if (error) {
            log.warn({ err: error, event: 'realtime_send_failed', type, ...this.logContext }, 'realtime send failed');
            resolve(false);
            return;
          }
          this.sentCount += 1;
          resolve(true);
        });
      } catch (error) {
        log.warn({ err: error, event: 'realtime_send_failed', type, ...this.logContext }, 'realtime send failed');
        resolve(false);
      }
    });
  }

  private finishConnect(outcome: 'open' | 'failed' | 'timeout'): void {
    const end = this.endConnectTimer;
    this.endConnectTimer = undefined;
    end?.(outcome);
  }

  private fail(error: unknown): void {
    const message = getErrorMessage(error);
    if (this.stateValue === 'connecting') {
      this.stateValue = 'failed';
      this.resolveOpened(false);
    }
    incModelErrors('transport');
    log.error({ err: error, event: 'realtime_socket_error', ...this.logContext }, 'realtime socket error');
    this.inbound.push({ type: 'error', source: 'transport', message });
  }

  private handleClose(code: number, reason: string): void {
    this.stopKeepAlive();
    if (this.stateValue !== 'failed') {
      this.stateValue = 'closed';
    }
    this.resolveOpened(false);
    if (!this.closing) {
      log.warn({ event: 'realtime_socket_closed', code, reason, ...this.logContext }, 'realtime socket closed');
    }
    this.inbound.push({ type: 'closed', code, reason });
    this.inbound.close();
  }

  private startKeepAlive(): void {
    this.stopKeepAlive();
    this.pingTimer = setInterval(() => this.sendPing(), this.pingIntervalMs);
    this.pingTimer.unref?.();
  }

  private sendPing(): void {
    const socket = this.socket;
    if (!socket || socket.readyState !== WS_OPEN || this.pongTimer) {
      return;
    }

    try {
      socket.ping();
    } catch (error) {
      log.warn({ err: error, event: 'realtime_ping_failed', ...this.logContext }, 'realtime ping failed');
      return;
    }

    this.pongTimer = setTimeout(() => {
      this.pongTimer = undefined;
      log.warn(
        { event: 'realtime_pong_timeout', timeout_ms: this.pingTimeoutMs, ...this.logContext },
        'realtime pong timeout - terminating socket',
      );
      this.inbound.push({ type: 'error', source: 'transport', message: 'pong_timeout' });
      incModelErrors('transport');
      socket.terminate();
    }, this.pingTimeoutMs);
    this.pongTimer.unref?.();
  }

  private clearPongTimer(): void {
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = undefined;
    }
  }

  private stopKeepAlive(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = undefined;
    }
    this.clearPongTimer();
  }
}
