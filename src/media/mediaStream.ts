import type { RawData } from 'ws';
import type { AudioMonitor } from '../audio/audioMonitor';
import { TELEPHONY_SAMPLE_RATE_HZ } from '../audio/framePacker';
import { BridgeSession, type ModelClientFactory } from '../calls/bridgeSession';
import { buildInstructions } from '../calls/instructions';
import type { SessionRegistry } from '../calls/sessionRegistry';
import type { BridgeSessionConfig } from '../calls/types';
import { env, type Env } from '../env';
import { BridgeError, TelephonySendError } from '../errors';
import { log } from '../log';
import { incSessionsStarted } from '../metrics';
import {
  TelephonyInboundEventSchema,
  type MediaFormat,
  type TelephonyOutbound,
  type TelephonyOutboundMessage,
  type TelephonyStartEvent,
} from './types';

const WS_OPEN = 1;
const TELEPHONY_ENCODING = 'audio/x-mulaw';
const KNOWN_EVENTS = new Set(['connected', 'start', 'media', 'mark', 'stop']);

/** The subset of a `ws` server-side socket the handler writes to. */
export interface TelephonySocket {
  readonly readyState: number;
  send(data: string, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

export type BridgeSettings = Omit<BridgeSessionConfig, 'streamSid' | 'callSid'>;

export function bridgeSettingsFromEnv(source: Env = env): BridgeSettings {
  return {
    apiKey: source.OPENAI_API_KEY,
    model: source.OPENAI_MODEL,
    realtimeUrl: source.OPENAI_REALTIME_URL,
    voice: source.OPENAI_VOICE,
    instructions: buildInstructions({
      systemPrompt: source.OPENAI_SYSTEM_PROMPT,
      translateTo: source.OPENAI_TRANSLATE_TO,
      translateStyle: source.OPENAI_TRANSLATE_STYLE,
      translateExtras: source.OPENAI_TRANSLATE_EXTRAS,
    }),
    turnDetection: source.OPENAI_TURN_DETECTION,
    modelSampleRateHz: source.MODEL_SAMPLE_RATE_HZ,
    connectTimeoutMs: source.REALTIME_CONNECT_TIMEOUT_MS,
    pingIntervalMs: source.REALTIME_PING_INTERVAL_MS,
    pingTimeoutMs: source.REALTIME_PING_TIMEOUT_MS,
    queueMaxChunks: source.OUTBOUND_QUEUE_MAX_CHUNKS,
    stopDrainTimeoutMs: source.STOP_DRAIN_TIMEOUT_MS,
    bargeInEnabled: source.BARGE_IN_ENABLED,
    bargeInClearPlayback: source.BARGE_IN_CLEAR_PLAYBACK,
    debug: source.REALTIME_DEBUG,
    trace: source.REALTIME_TRACE,
  };
}

export function createTelephonyOutbound(socket: TelephonySocket): TelephonyOutbound {
  return {
    send: (message: TelephonyOutboundMessage) =>
      new Promise<void>((resolve, reject) => {
        if (socket.readyState !== WS_OPEN) {
          reject(new TelephonySendError('telephony socket is not open'));
          return;
        }
        try {
          socket.send(JSON.stringify(message), (error) => {
            if (error) {
              reject(new TelephonySendError('telephony socket write failed', error));
              return;
            }
            resolve();
          });
        } catch (error) {
          reject(new TelephonySendError('telephony socket write failed', error));
        }
      }),
  };
}

/**
 * The bridge speaks 8 kHz mono μ-law only. Returns a reason when the stream
 * declares anything else; fields the stream leaves out are assumed to match.
 */
export function checkMediaFormat(format: MediaFormat | undefined): string | undefined {
  if (!format) {
    return undefined;
  }
  if (format.encoding !== undefined && format.encoding.toLowerCase() !== TELEPHONY_ENCODING) {
    return `unsupported encoding ${format.encoding}`;
  }
  if (format.sampleRate !== undefined && format.sampleRate !== TELEPHONY_SAMPLE_RATE_HZ) {
    return `unsupported sample rate ${format.sampleRate}`;
  }
  if (format.channels !== undefined && format.channels !== 1) {
    return `unsupported channel count ${format.channels}`;
  }
  return undefined;
}

function rawToText(data: RawData | string): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function readEventName(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('event' in value)) {
    return undefined;
  }
  return typeof value.event === 'string' ? value.event : undefined;
}

export type MediaStreamHandlerOptions = {
  socket: TelephonySocket;
  registry: SessionRegistry;
  settings?: BridgeSettings;
  createClient?: ModelClientFactory;
  monitor?: AudioMonitor;
  connectionId?: string;
};

/**
 * Telephony receive loop for one media WebSocket. Every inbound message is
 * handled here; model-side work happens in the session's own pumps.
 */
export class MediaStreamHandler {
  private readonly socket: TelephonySocket;
  private readonly registry: SessionRegistry;
  private readonly settings: BridgeSettings;
  private readonly createClient?: ModelClientFactory;
  private readonly monitor?: AudioMonitor;
  private readonly outbound: TelephonyOutbound;
  private readonly logContext: Record<string, unknown>;
  private session?: BridgeSession;
  private mediaFrames = 0;
  private closed = false;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: MediaStreamHandlerOptions) {
    this.socket = options.socket;
    this.registry = options.registry;
    this.settings = options.settings ?? bridgeSettingsFromEnv();
    this.createClient = options.createClient;
    this.monitor = options.monitor;
    this.outbound = createTelephonyOutbound(options.socket);
    this.logContext = { connection_id: options.connectionId };
  }

  getSession(): BridgeSession | undefined {
    return this.session;
  }

  /**
   * Messages are handled one at a time in arrival order, so a `stop` waits for
   * an in-flight `start`. Never rejects: protocol problems are logged and the
   * frame is dropped.
   */
  handleMessage(data: RawData | string, isBinary = false): Promise<void> {
    const next = this.tail.then(() => this.dispatch(data, isBinary));
    this.tail = next;
    return next;
  }

  private async dispatch(data: RawData | string, isBinary: boolean): Promise<void> {
    if (isBinary) {
      log.warn({ event: 'telephony_binary_ignored', ...this.logContext }, 'ignoring binary telephony frame');
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(rawToText(data));
    } catch {
      log.warn({ event: 'telephony_json_invalid', ...this.logContext }, 'dropping undecodable telephony message');
      return;
    }

    const eventName = readEventName(json);
    if (!eventName || !KNOWN_EVENTS.has(eventName)) {
      log.debug({ event: 'telephony_event_ignored', type: eventName, ...this.logContext }, 'telephony event ignored');
      return;
    }

    const parsed = TelephonyInboundEventSchema.safeParse(json);
    if (!parsed.success) {
      log.warn(
        {
          event: 'telephony_event_invalid',
          type: eventName,
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
          ...this.logContext,
        },
        'dropping malformed telephony event',
      );
      return;
    }

    const message = parsed.data;
    try {
      switch (message.event) {
        case 'connected':
          log.info({ event: 'telephony_connected', protocol: message.protocol, ...this.logContext }, 'telephony connected');
          return;
        case 'start':
          await this.onStart(message);
          return;
        case 'media':
          this.onMedia(message.media.payload);
          return;
        case 'mark':
          return;
        case 'stop':
          await this.onStop();
          return;
      }
    } catch (error) {
      log.error({ err: error, event: 'telephony_event_failed', type: message.event, ...this.logContext }, 'telephony event failed');
    }
  }

  /** Telephony socket closed or errored. */
  async handleClose(reason = 'telephony_disconnected'): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const session = this.session;
    if (session) {
      await session.teardown(reason);
    }
  }

  private async onStart(message: TelephonyStartEvent): Promise<void> {
    if (this.closed) {
      return;
    }
    if (this.session) {
      log.warn(
        { event: 'telephony_duplicate_start', stream_sid: message.start.streamSid, ...this.logContext },
        'stream already started on this connection',
      );
      return;
    }

    const { streamSid, callSid, mediaFormat } = message.start;
    log.info(
      { event: 'telephony_stream_start', stream_sid: streamSid, call_sid: callSid, media_format: mediaFormat, ...this.logContext },
      'telephony stream started',
    );

    const formatProblem = checkMediaFormat(mediaFormat);
    if (formatProblem) {
      log.warn(
        { event: 'telephony_media_format_rejected', stream_sid: streamSid, reason: formatProblem, ...this.logContext },
        'telephony media format rejected',
      );
      this.socket.close(1003, 'unsupported_media_format');
      return;
    }

    const session = new BridgeSession(
      { ...this.settings, streamSid, callSid },
      {
        telephony: this.outbound,
        createClient: this.createClient,
        monitor: this.monitor,
        onClosed: (closed) => {
          this.registry.remove(closed);
        },
      },
    );

    if (!this.registry.add(session)) {
      this.socket.close(1008, 'duplicate_stream');
      return;
    }
    this.session = session;
    incSessionsStarted();

    try {
      await session.start();
    } catch (error) {
      const code = error instanceof BridgeError ? error.code : 'internal';
      log.error({ err: error, event: 'bridge_session_start_failed', code, stream_sid: streamSid, ...this.logContext }, 'bridge session start failed');
      this.socket.close(1011, code);
    }
  }

  private onMedia(payload: string): void {
    const session = this.session;
    if (!session) {
      log.warn({ event: 'telephony_media_before_start', ...this.logContext }, 'media before start dropped');
      return;
    }

    session.acceptMedia(payload);
    this.mediaFrames += 1;
    if (this.mediaFrames % 50 === 0) {
      log.debug({ event: 'telephony_media_frames', frames: this.mediaFrames, stream_sid: session.streamSid }, 'media frames received');
    }
  }

  private async onStop(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    await session.stop();
  }
}
