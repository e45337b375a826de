import { log } from '../log';
import { compress, PCM16_SAMPLE_BYTES } from './mulaw';

export const TELEPHONY_SAMPLE_RATE_HZ = 8000;
export const TELEPHONY_FRAME_MS = 20;
export const TELEPHONY_FRAME_SAMPLES = (TELEPHONY_SAMPLE_RATE_HZ * TELEPHONY_FRAME_MS) / 1000;

/** Receives one μ-law frame; a rejection closes the packer. */
export type FrameSink = (mulawFrame: Buffer) => Promise<void> | void;

export type FramePackerOptions = {
  sink: FrameSink;
  frameSamples?: number;
  logContext?: Record<string, unknown>;
};

/**
 * Re-packetizes PCM16 8 kHz audio into fixed 20 ms telephony frames.
 * Every emitted frame is exactly frameSamples μ-law bytes.
 */
export class TelephonyFramePacker {
  public readonly frameBytes: number;

  private readonly sink: FrameSink;
  private readonly logContext: Record<string, unknown>;
  private buffer: Buffer = Buffer.alloc(0);
  private closed = false;
  private sent = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: FramePackerOptions) {
    this.sink = options.sink;
    this.frameBytes = (options.frameSamples ?? TELEPHONY_FRAME_SAMPLES) * PCM16_SAMPLE_BYTES;
    this.logContext = options.logContext ?? {};
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }

  get framesSent(): number {
    return this.sent;
  }

  isClosed(): boolean {
    return this.closed;
  }

  accept(pcm8k: Buffer): Promise<void> {
    return this.serialize(async () => {
      if (this.closed || pcm8k.length === 0) {
        return;
      }
      this.buffer = this.buffer.length === 0 ? Buffer.from(pcm8k) : Buffer.concat([this.buffer, pcm8k]);
      await this.emitFullFrames();
    });
  }

  flush(pad: boolean): Promise<void> {
    return this.serialize(async () => {
      if (this.closed) {
        this.buffer = Buffer.alloc(0);
        return;
      }

      const remainder = this.buffer.length % this.frameBytes;
      if (pad && remainder !== 0) {
        this.buffer = Buffer.concat([this.buffer, Buffer.alloc(this.frameBytes - remainder)]);
      }

      await this.emitFullFrames();
      this.buffer = Buffer.alloc(0);
    });
  }

  /** Drops audio that has not been framed yet. */
  discard(): number {
    const dropped = this.buffer.length;
    this.buffer = Buffer.alloc(0);
    return dropped;
  }

  markClosed(): void {
    this.closed = true;
    this.buffer = Buffer.alloc(0);
  }

  // accept and flush share the buffer, so they run one at a time in call order
  private serialize(operation: () => Promise<void>): Promise<void> {
    const next = this.tail.then(operation);
    this.tail = next.catch(() => undefined);
    return next;
  }

  private async emitFullFrames(): Promise<void> {
    while (this.buffer.length >= this.frameBytes && !this.closed) {
      const frame = this.buffer.subarray(0, this.frameBytes);
      this.buffer = this.buffer.subarray(this.frameBytes);

      try {
        await this.sink(compress(frame));
        this.sent += 1;
      } catch (error) {
        this.markClosed();
        log.warn(
          { err: error, event: 'telephony_frame_send_failed', frames_sent: this.sent, ...this.logContext },
          'telephony frame send failed - outbound audio stopped',
        );
      }
    }
  }
}
