import { disabledAudioMonitor, type AudioMonitor } from '../audio/audioMonitor';
import { TELEPHONY_SAMPLE_RATE_HZ, TelephonyFramePacker } from '../audio/framePacker';
import { expand } from '../audio/mulaw';
import { StreamResampler } from '../audio/resampler';
import { AudioFormatError, ConfigurationError, RealtimeConnectError, getErrorMessage } from '../errors';
import { log } from '../log';
import {
  incAudioChunksDropped,
  incInboundMediaFrames,
  incInterruptions,
  incModelAudioChunksForwarded,
  incModelAudioDeltas,
  incModelErrors,
  incOutboundTelephonyFrames,
  recordSessionTeardown,
} from '../metrics';
import type { TelephonyOutbound } from '../media/types';
import { AsyncQueue } from '../queue/asyncQueue';
import {
  buildAudioAppend,
  buildInstructionItem,
  buildResponseCancel,
  buildSessionUpdate,
  type ModelEvent,
} from '../realtime/protocol';
import { RealtimeClient, type ModelSessionClient, type RealtimeClientOptions } from '../realtime/realtimeClient';
import { previewInstructions } from './instructions';
import { TurnStateMachine, type TurnEffect, type TurnSnapshot } from './turnState';
import type {
  BridgeSessionConfig,
  BridgeSessionCounters,
  BridgeSessionStatus,
  BridgeSessionSummary,
  StreamSid,
} from './types';

export type ModelClientFactory = (options: RealtimeClientOptions) => ModelSessionClient;

export interface BridgeSessionDeps {
  telephony: TelephonyOutbound;
  createClient?: ModelClientFactory;
  monitor?: AudioMonitor;
  onClosed?: (session: BridgeSession, reason: string) => void;
}

const defaultClientFactory: ModelClientFactory = (options) => new RealtimeClient(options);

/**
 * One telephony stream bridged to one realtime model socket.
 *
 * Three cooperative tasks run per session: the telephony receive loop calls
 * acceptMedia(), the sender pump drains the bounded outbound queue into the
 * model socket, and the consumer pump feeds model events through the turn
 * machine back out to telephony. teardown() stops all of them once.
 */
export class BridgeSession {
  public readonly streamSid: StreamSid;
  public readonly callSid?: string;
  public readonly startedAt = new Date();

  private readonly config: BridgeSessionConfig;
  private readonly telephony: TelephonyOutbound;
  private readonly createClient: ModelClientFactory;
  private readonly monitor: AudioMonitor;
  private readonly onClosed?: (session: BridgeSession, reason: string) => void;
  private readonly logContext: Record<string, unknown>;
  private readonly turn = new TurnStateMachine();
  private readonly upsampler: StreamResampler;
  private readonly downsampler: StreamResampler;
  private readonly packer: TelephonyFramePacker;
  private readonly outbound: AsyncQueue<Buffer>;
  private readonly counters: BridgeSessionCounters = {
    inboundFrames: 0,
    forwardedChunks: 0,
    droppedChunks: 0,
    modelAudioChunks: 0,
    outboundFrames: 0,
    interruptions: 0,
    modelErrors: 0,
  };

  private status: BridgeSessionStatus = 'created';
  private client?: ModelSessionClient;
  private senderPump?: Promise<void>;
  private consumerPump?: Promise<void>;
  private stopPromise?: Promise<void>;
  private teardownPromise?: Promise<void>;
  private teardownReason?: string;
  private lastModelError?: string;

  constructor(config: BridgeSessionConfig, deps: BridgeSessionDeps) {
    this.config = config;
    this.streamSid = config.streamSid;
    this.callSid = config.callSid;
    this.telephony = deps.telephony;
    this.createClient = deps.createClient ?? defaultClientFactory;
    this.monitor = deps.monitor ?? disabledAudioMonitor;
    this.onClosed = deps.onClosed;
    this.logContext = { stream_sid: config.streamSid, call_sid: config.callSid };

    this.upsampler = new StreamResampler(TELEPHONY_SAMPLE_RATE_HZ, config.modelSampleRateHz);
    this.downsampler = new StreamResampler(config.modelSampleRateHz, TELEPHONY_SAMPLE_RATE_HZ);
    this.outbound = new AsyncQueue<Buffer>({ maxSize: config.queueMaxChunks, overflow: 'drop_oldest' });
    this.packer = new TelephonyFramePacker({
      logContext: this.logContext,
      sink: async (mulawFrame) => {
        await this.telephony.send({
          event: 'media',
          streamSid: this.streamSid,
          media: { payload: mulawFrame.toString('base64') },
        });
        this.counters.outboundFrames += 1;
        incOutboundTelephonyFrames();
      },
    });
  }

  getStatus(): BridgeSessionStatus {
    return this.status;
  }

  getTurn(): TurnSnapshot {
    return this.turn.snapshot();
  }

  getCounters(): BridgeSessionCounters {
    return { ...this.counters };
  }

  getTeardownReason(): string | undefined {
    return this.teardownReason;
  }

  getLastModelError(): string | undefined {
    return this.lastModelError;
  }

  describe(): BridgeSessionSummary {
    const turn = this.turn.snapshot();
    return {
      streamSid: this.streamSid,
      callSid: this.callSid,
      status: this.status,
      turnState: turn.state,
      assistantSpeaking: turn.assistantSpeaking,
      startedAt: this.startedAt.toISOString(),
      counters: this.getCounters(),
    };
  }

  /**
   * Connects the model socket, configures it and starts both pumps.
   * Rejects with ConfigurationError or RealtimeConnectError after tearing the
   * session down; the caller reports the failure to telephony.
   */
  async start(): Promise<void> {
    if (this.status !== 'created') {
      return;
    }
    this.status = 'starting';

    if (!this.config.apiKey) {
      const error = new ConfigurationError('OPENAI_API_KEY is not set');
      log.error({ err: error, event: 'bridge_session_config_error', ...this.logContext }, 'bridge session not started');
      await this.teardown('configuration_error');
      throw error;
    }

    const client = this.createClient({
      apiKey: this.config.apiKey,
      model: this.config.model,
      url: this.config.realtimeUrl,
      pingIntervalMs: this.config.pingIntervalMs,
      pingTimeoutMs: this.config.pingTimeoutMs,
      debug: this.config.debug,
      trace: this.config.trace,
      logContext: this.logContext,
    });
    this.client = client;
    client.start();

    const opened = await client.waitOpen(this.config.connectTimeoutMs);
    if (this.isStopping()) {
      return;
    }
    if (!opened) {
      const error = new RealtimeConnectError(
        `realtime socket did not open within ${this.config.connectTimeoutMs}ms`,
        { timeoutMs: this.config.connectTimeoutMs },
      );
      log.error({ err: error, event: 'realtime_open_timeout', ...this.logContext }, 'realtime socket failed to open');
      await this.teardown('realtime_connect_failed');
      throw error;
    }

    log.info(
      {
        event: 'realtime_session_configure',
        voice: this.config.voice,
        turn_detection: this.config.turnDetection,
        instructions: previewInstructions(this.config.instructions),
        ...this.logContext,
      },
      'applying realtime session settings',
    );

    // events that arrive during setup are applied in order by the consumer
    this.consumerPump = this.runConsumer(client);

    const [updated, seeded] = await Promise.all([
      client.send(
        buildSessionUpdate({
          voice: this.config.voice,
          instructions: this.config.instructions,
          inputRateHz: this.config.modelSampleRateHz,
          turnDetection: this.config.turnDetection,
        }),
      ),
      client.send(buildInstructionItem(this.config.instructions)),
    ]);
    if (!updated || !seeded) {
      log.warn(
        { event: 'realtime_session_configure_failed', session_update: updated, instructions: seeded, ...this.logContext },
        'realtime session settings not delivered',
      );
    }

    if (this.isStopping()) {
      return;
    }
    this.status = 'active';
    this.senderPump = this.runSender(client);
    log.info({ event: 'bridge_session_active', ...this.logContext }, 'bridge session active');
  }

  /**
   * Converts one telephony media payload and queues it for the model.
   * Returns false when the session no longer takes audio.
   */
  acceptMedia(payloadBase64: string): boolean {
    if (this.status === 'stopping' || this.status === 'closed') {
      return false;
    }

    this.counters.inboundFrames += 1;
    incInboundMediaFrames();

    const mulaw = Buffer.from(payloadBase64, 'base64');
    if (mulaw.length === 0) {
      this.dropInbound('empty_payload');
      return true;
    }

    let pcm: Buffer;
    try {
      pcm = this.upsampler.process(expand(mulaw));
    } catch (error) {
      if (!(error instanceof AudioFormatError)) {
        throw error;
      }
      log.warn({ err: error, event: 'telephony_audio_malformed', ...this.logContext }, 'dropping telephony audio');
      this.dropInbound('malformed');
      return true;
    }

    const result = this.outbound.push(pcm);
    if (result.dropped === 'oldest' || result.dropped === 'newest') {
      this.dropInbound('queue_overflow');
    }
    return true;
  }

  /**
   * Telephony stop: play out buffered model audio, give the sender a bounded
   * window to forward queued caller audio, then tear down. Concurrent callers
   * share one stop.
   */
  stop(): Promise<void> {
    if (this.stopPromise) {
      return this.stopPromise;
    }
    if (this.teardownPromise) {
      return this.teardownPromise;
    }
    this.stopPromise = this.runStop();
    return this.stopPromise;
  }

  /** Idempotent; concurrent callers share one teardown. */
  teardown(reason: string): Promise<void> {
    if (!this.teardownPromise) {
      this.teardownReason = reason;
      this.teardownPromise = this.runTeardown(reason);
    }
    return this.teardownPromise;
  }

  private async runStop(): Promise<void> {
    this.status = 'stopping';
    log.info(
      { event: 'telephony_stream_stop', queued_chunks: this.outbound.size, ...this.logContext },
      'telephony stream stopped',
    );
    await this.packer.flush(true);
    await this.drainOutbound();
    await this.teardown('telephony_stop');
  }

  /** Lets the sender pump forward what is queued, up to the drain timeout. */
  private async drainOutbound(): Promise<void> {
    this.outbound.close();
    const sender = this.senderPump;
    if (!sender || this.teardownPromise) {
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), this.config.stopDrainTimeoutMs);
    });

    try {
      const expired = await Promise.race([sender.then(() => false), timedOut]);
      if (expired) {
        log.warn(
          {
            event: 'outbound_drain_timeout',
            timeout_ms: this.config.stopDrainTimeoutMs,
            queued_chunks: this.outbound.size,
            ...this.logContext,
          },
          'queued caller audio not drained before stop',
        );
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private async runTeardown(reason: string): Promise<void> {
    this.status = 'stopping';
    const discarded = this.outbound.close({ discard: true });
    if (discarded > 0) {
      this.counters.droppedChunks += discarded;
      incAudioChunksDropped('to_model', 'teardown', discarded);
    }
    this.client?.close();

    await Promise.all([this.senderPump, this.consumerPump]);

    await this.packer.flush(false);
    this.packer.markClosed();
    this.monitor.release(this.streamSid);
    this.status = 'closed';

    const durationMs = Date.now() - this.startedAt.getTime();
    recordSessionTeardown(reason, durationMs);
    log.info(
      {
        event: 'bridge_session_teardown',
        reason,
        session_duration_ms: durationMs,
        turn_state: this.turn.state,
        ...this.counters,
        ...this.logContext,
      },
      'bridge session teardown',
    );

    try {
      this.onClosed?.(this, reason);
    } catch (error) {
      log.warn({ err: error, event: 'bridge_session_on_closed_failed', ...this.logContext }, 'session close callback failed');
    }
  }

  private isStopping(): boolean {
    return this.teardownPromise !== undefined || this.status === 'stopping' || this.status === 'closed';
  }

  private dropInbound(reason: string): void {
    this.counters.droppedChunks += 1;
    incAudioChunksDropped('to_model', reason);
  }

  private async runSender(client: ModelSessionClient): Promise<void> {
    try {
      for await (const pcm of this.outbound) {
        const sent = await client.send(buildAudioAppend(pcm));
        if (sent) {
          this.counters.forwardedChunks += 1;
          incModelAudioChunksForwarded();
        } else {
          this.dropInbound('send_failed');
        }
      }
    } catch (error) {
      log.error({ err: error, event: 'model_sender_failed', ...this.logContext }, 'model sender pump failed');
    }
  }

  private async runConsumer(client: ModelSessionClient): Promise<void> {
    let terminateReason: string | undefined;

    try {
      for await (const event of client.events()) {
        if (this.status === 'closed') {
          break;
        }
        if (event.type === 'session.updated') {
          log.info({ event: 'realtime_session_updated', ...this.logContext }, 'realtime session updated');
        }
        for (const effect of this.turn.apply(event)) {
          const reason = await this.applyEffect(client, effect, event);
          if (reason) {
            terminateReason = reason;
          }
        }
        if (terminateReason) {
          break;
        }
      }
    } catch (error) {
      log.error({ err: error, event: 'model_consumer_failed', ...this.logContext }, 'model event consumer failed');
      terminateReason = 'consumer_failed';
    }

    if (terminateReason && !this.teardownPromise) {
      // teardown waits for this pump, so it must not be awaited from inside it
      this.teardown(terminateReason).catch((error: unknown) => {
        log.error({ err: error, event: 'bridge_session_teardown_failed', ...this.logContext }, 'teardown failed');
      });
    }
  }

  private async applyEffect(
    client: ModelSessionClient,
    effect: TurnEffect,
    event: ModelEvent,
  ): Promise<string | undefined> {
    switch (effect.kind) {
      case 'audio':
        await this.forwardModelAudio(effect.pcm);
        return undefined;

      case 'flush':
        await this.packer.flush(true);
        this.monitor.flush(this.streamSid, 'response');
        return undefined;

      case 'interrupt':
        this.handleInterruption(client, effect.responseId);
        return undefined;

      case 'error':
        this.counters.modelErrors += 1;
        this.lastModelError = effect.message;
        if (effect.source === 'model') {
          incModelErrors('model');
        }
        log.warn(
          { event: 'realtime_error_event', source: effect.source, code: effect.code, message: effect.message, ...this.logContext },
          'realtime error event',
        );
        return undefined;

      case 'terminate':
        return effect.reason;

      case 'ignored':
        if (effect.reason === 'invalid' && event.type === 'invalid') {
          log.warn(
            { event: 'realtime_event_invalid', reason: event.reason, preview: event.preview, ...this.logContext },
            'dropping undecodable realtime event',
          );
        } else if (this.config.debug) {
          log.info(
            { event: 'realtime_event_ignored', type: effect.eventType, reason: effect.reason, ...this.logContext },
            'realtime event ignored',
          );
        }
        return undefined;
    }
  }

  private async forwardModelAudio(pcm: Buffer): Promise<void> {
    this.counters.modelAudioChunks += 1;
    incModelAudioDeltas();
    if (this.monitor.enabled) {
      this.monitor.write(this.streamSid, pcm);
    }

    let pcm8k: Buffer;
    try {
      pcm8k = this.downsampler.process(pcm);
    } catch (error) {
      if (!(error instanceof AudioFormatError)) {
        throw error;
      }
      log.warn({ err: error, event: 'model_audio_malformed', ...this.logContext }, 'dropping model audio chunk');
      incAudioChunksDropped('to_telephony', 'malformed');
      return;
    }

    await this.packer.accept(pcm8k);
  }

  /**
   * Barge-in: cancel the in-flight response and, unless disabled, drop audio
   * that telephony has not played yet. Neither step is awaited by audio flow.
   */
  private handleInterruption(client: ModelSessionClient, responseId?: string): void {
    this.counters.interruptions += 1;
    if (!this.config.bargeInEnabled) {
      incInterruptions('disabled');
      return;
    }

    log.info({ event: 'barge_in', response_id: responseId, ...this.logContext }, 'user barge-in');

    if (this.config.bargeInClearPlayback) {
      const droppedBytes = this.packer.discard();
      if (droppedBytes > 0) {
        incAudioChunksDropped('to_telephony', 'barge_in');
      }
      void this.sendClear();
    }
    void this.requestCancel(client);
  }

  private async requestCancel(client: ModelSessionClient): Promise<void> {
    try {
      const sent = await client.send(buildResponseCancel());
      incInterruptions(sent ? 'sent' : 'failed');
    } catch (error) {
      incInterruptions('failed');
      log.warn(
        { event: 'response_cancel_failed', error: getErrorMessage(error), ...this.logContext },
        'response.cancel failed',
      );
    }
  }

  private async sendClear(): Promise<void> {
    try {
      await this.telephony.send({ event: 'clear', streamSid: this.streamSid });
    } catch (error) {
      log.warn({ err: error, event: 'telephony_clear_failed', ...this.logContext }, 'telephony clear failed');
    }
  }
}
