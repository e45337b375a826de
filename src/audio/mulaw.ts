import { AudioFormatError } from '../errors';

const MU_LAW_BIAS = 0x84;
const MU_LAW_CLIP = 32635;

export const PCM16_SAMPLE_BYTES = 2;

export function clampInt16(value: number): number {
  if (value > 32767) return 32767;
  if (value < -32768) return -32768;
  return value | 0;
}

export function muLawToPcmSample(uLawByte: number): number {
  const u = (~uLawByte) & 0xff;
  const sign = u & 0x80;
  const exponent = (u >> 4) & 0x07;
  const mantissa = u & 0x0f;
  let sample = ((mantissa << 3) + MU_LAW_BIAS) << exponent;
  sample -= MU_LAW_BIAS;
  if (sign) sample = -sample;
  return clampInt16(sample);
}

export function pcmSampleToMuLaw(sample: number): number {
  let pcm = clampInt16(sample);
  let sign = 0;

  if (pcm < 0) {
    sign = 0x80;
    pcm = -pcm;
  }

  if (pcm > MU_LAW_CLIP) {
    pcm = MU_LAW_CLIP;
  }

  pcm += MU_LAW_BIAS;

  let exponent = 7;
  for (let mask = 0x4000; exponent > 0 && (pcm & mask) === 0; mask >>= 1) {
    exponent -= 1;
  }

  const mantissa = (pcm >> (exponent + 3)) & 0x0f;
  return ~(sign | (exponent << 4) | mantissa) & 0xff;
}

export function assertPcm16(pcm: Buffer, context: string): void {
  if (pcm.length % PCM16_SAMPLE_BYTES !== 0) {
    throw new AudioFormatError(`${context}: pcm16 length ${pcm.length} is not a multiple of 2`, pcm.length);
  }
}

/** μ-law bytes to PCM16LE, one sample per input byte. */
export function expand(mulaw: Buffer): Buffer {
  const out = Buffer.alloc(mulaw.length * PCM16_SAMPLE_BYTES);
  for (let i = 0; i < mulaw.length; i += 1) {
    out.writeInt16LE(muLawToPcmSample(mulaw[i] ?? 0xff), i * PCM16_SAMPLE_BYTES);
  }
  return out;
}

export function compress(pcm: Buffer): Buffer {
  assertPcm16(pcm, 'compress');
  const out = Buffer.alloc(pcm.length / PCM16_SAMPLE_BYTES);
  for (let i = 0; i < out.length; i += 1) {
    out[i] = pcmSampleToMuLaw(pcm.readInt16LE(i * PCM16_SAMPLE_BYTES));
  }
  return out;
}
