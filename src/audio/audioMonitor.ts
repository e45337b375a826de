import fs from 'node:fs';
import path from 'node:path';
import { log } from '../log';

/**
 * Process-wide tap on model output audio. Only event consumers write to it,
 * one stream at a time per key, so it keeps no locks.
 */
export interface AudioMonitor {
  readonly enabled: boolean;
  write(streamSid: string, pcm16: Buffer): void;
  flush(streamSid: string, label: string): string | undefined;
  release(streamSid: string): void;
}

type WavMonitorOptions = {
  baseDir: string;
  sampleRate: number;
  secondsToKeep: number;
};

export const disabledAudioMonitor: AudioMonitor = {
  enabled: false,
  write: () => undefined,
  flush: () => undefined,
  release: () => undefined,
};

/** Keeps a rolling window of PCM16 per stream and writes it out as WAV. */
export class WavAudioMonitor implements AudioMonitor {
  public readonly enabled = true;

  private readonly baseDir: string;
  private readonly sampleRate: number;
  private readonly maxBytes: number;
  private readonly buffers = new Map<string, Buffer[]>();
  private readonly sizes = new Map<string, number>();
  private dirReady = false;

  constructor(opts: WavMonitorOptions) {
    this.baseDir = opts.baseDir;
    this.sampleRate = opts.sampleRate;
    // mono PCM16: 2 bytes per sample
    this.maxBytes = Math.max(1, Math.floor(opts.sampleRate * 2 * opts.secondsToKeep));
  }

  write(streamSid: string, pcm16: Buffer): void {
    if (pcm16.length === 0) return;

    const chunks = this.buffers.get(streamSid) ?? [];
    chunks.push(pcm16);
    this.buffers.set(streamSid, chunks);
    this.sizes.set(streamSid, (this.sizes.get(streamSid) ?? 0) + pcm16.length);
    this.trim(streamSid);
  }

  flush(streamSid: string, label: string): string | undefined {
    const chunks = this.buffers.get(streamSid);
    const size = this.sizes.get(streamSid) ?? 0;
    if (!chunks || size === 0) return undefined;

    const wav = pcm16ToWav(Buffer.concat(chunks, size), this.sampleRate);
    const filename = `${sanitize(streamSid)}__${Date.now()}__${sanitize(label)}.wav`;
    const outPath = path.join(this.baseDir, filename);

    try {
      if (!this.dirReady) {
        fs.mkdirSync(this.baseDir, { recursive: true });
        this.dirReady = true;
      }
      fs.writeFileSync(outPath, wav);
    } catch (error) {
      log.warn({ err: error, event: 'audio_monitor_write_failed', stream_sid: streamSid }, 'audio monitor write failed');
      return undefined;
    } finally {
      this.release(streamSid);
    }

    return outPath;
  }

  release(streamSid: string): void {
    this.buffers.delete(streamSid);
    this.sizes.delete(streamSid);
  }

  private trim(streamSid: string): void {
    const chunks = this.buffers.get(streamSid);
    if (!chunks) return;

    let size = this.sizes.get(streamSid) ?? 0;
    while (size > this.maxBytes && chunks.length > 1) {
      const head = chunks.shift();
      if (!head) break;
      size -= head.length;
    }
    this.sizes.set(streamSid, size);
  }
}

export function pcm16ToWav(pcm16: Buffer, sampleRate: number, channels = 1): Buffer {
  const bytesPerSample = 2;
  const blockAlign = channels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(44);
  header.write('RIFF', 0);
  header.writeUInt32LE(36 + pcm16.length, 4);
  header.write('WAVE', 8);

  header.write('fmt ', 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34);

  header.write('data', 36);
  header.writeUInt32LE(pcm16.length, 40);

  return Buffer.concat([header, pcm16]);
}

function sanitize(value: string): string {
  return (value || 'dump').replace(/[^a-zA-Z0-9._-]+/g, '_').slice(0, 64);
}
