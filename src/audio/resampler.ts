import { AudioFormatError } from '../errors';
import { assertPcm16, clampInt16, PCM16_SAMPLE_BYTES } from './mulaw';

/**
 * Streaming linear-interpolation resampler state for one direction of one call.
 *
 * Output sample positions are tracked in units of 1/outStep input samples so
 * that splitting a stream into chunks yields the same samples as converting
 * it in one piece.
 */
export type ResamplerState = {
  readonly rateIn: number;
  readonly rateOut: number;
  /** input samples advanced per output sample, numerator over outStep */
  readonly inStep: number;
  readonly outStep: number;
  /** position of the next output sample relative to the next chunk's first sample */
  position: number;
  /** last sample of the previous chunk, null before the first chunk */
  previous: number | null;
};

export type ConvertResult = {
  audio: Buffer;
  state: ResamplerState;
};

function gcd(a: number, b: number): number {
  let x = a;
  let y = b;
  while (y !== 0) {
    const t = y;
    y = x % y;
    x = t;
  }
  return x;
}

export function createResamplerState(rateIn: number, rateOut: number): ResamplerState {
  if (!Number.isInteger(rateIn) || !Number.isInteger(rateOut) || rateIn <= 0 || rateOut <= 0) {
    throw new AudioFormatError(`invalid resample rates ${rateIn} -> ${rateOut}`, 0);
  }
  const divisor = gcd(rateIn, rateOut);
  return {
    rateIn,
    rateOut,
    inStep: rateIn / divisor,
    outStep: rateOut / divisor,
    position: 0,
    previous: null,
  };
}

/**
 * Resamples PCM16LE mono audio. Passing the returned state into the next call
 * continues the stream without discontinuities at the chunk boundary.
 */
export function convert(
  pcm: Buffer,
  rateIn: number,
  rateOut: number,
  state: ResamplerState | null = null,
): ConvertResult {
  assertPcm16(pcm, 'convert');

  const current = state ?? createResamplerState(rateIn, rateOut);
  if (current.rateIn !== rateIn || current.rateOut !== rateOut) {
    throw new AudioFormatError(
      `resampler state is ${current.rateIn} -> ${current.rateOut}, got ${rateIn} -> ${rateOut}`,
      pcm.length,
    );
  }

  if (rateIn === rateOut) {
    return { audio: Buffer.from(pcm), state: current };
  }

  const count = pcm.length / PCM16_SAMPLE_BYTES;
  if (count === 0) {
    return { audio: Buffer.alloc(0), state: current };
  }

  const sampleAt = (index: number): number => {
    if (index < 0) {
      return current.previous ?? pcm.readInt16LE(0);
    }
    return pcm.readInt16LE(index * PCM16_SAMPLE_BYTES);
  };

  const { inStep, outStep } = current;
  const out: number[] = [];
  let position = current.position;

  // interpolation needs the sample after floor(position), so stop one short of the chunk end
  while (Math.floor(position / outStep) <= count - 2) {
    const index = Math.floor(position / outStep);
    const frac = (position - index * outStep) / outStep;
    const sample0 = sampleAt(index);
    const sample1 = sampleAt(index + 1);
    out.push(clampInt16(Math.round(sample0 + (sample1 - sample0) * frac)));
    position += inStep;
  }

  const audio = Buffer.alloc(out.length * PCM16_SAMPLE_BYTES);
  for (let i = 0; i < out.length; i += 1) {
    audio.writeInt16LE(out[i] ?? 0, i * PCM16_SAMPLE_BYTES);
  }

  return {
    audio,
    state: {
      ...current,
      position: position - count * outStep,
      previous: sampleAt(count - 1),
    },
  };
}

/** Holds the state for one direction so callers do not thread it by hand. */
export class StreamResampler {
  private state: ResamplerState;

  constructor(
    public readonly rateIn: number,
    public readonly rateOut: number,
  ) {
    this.state = createResamplerState(rateIn, rateOut);
  }

  process(pcm: Buffer): Buffer {
    const result = convert(pcm, this.rateIn, this.rateOut, this.state);
    this.state = result.state;
    return result.audio;
  }

  reset(): void {
    this.state = createResamplerState(this.rateIn, this.rateOut);
  }
}
