import assert from 'node:assert/strict';
import { test } from 'node:test';
import { compress, expand, muLawToPcmSample, pcmSampleToMuLaw } from '../src/audio/mulaw';
import { AudioFormatError } from '../src/errors';

test('muLawToPcmSample decodes the G.711 extremes', () => {
  assert.equal(muLawToPcmSample(0x00), -32124);
  assert.equal(muLawToPcmSample(0x80), 32124);
  assert.equal(muLawToPcmSample(0xff), 0);
  assert.equal(muLawToPcmSample(0x7f), 0);
});

test('pcmSampleToMuLaw encodes silence as 0xff and clips out-of-range input', () => {
  assert.equal(pcmSampleToMuLaw(0), 0xff);
  assert.equal(pcmSampleToMuLaw(40000), pcmSampleToMuLaw(32767));
  assert.equal(pcmSampleToMuLaw(-40000), pcmSampleToMuLaw(-32768));
});

test('every code except negative zero survives decode then encode', () => {
  for (let code = 0; code < 256; code += 1) {
    const roundTrip = pcmSampleToMuLaw(muLawToPcmSample(code));
    assert.equal(roundTrip, code === 0x7f ? 0xff : code, `code 0x${code.toString(16)}`);
  }
});

test('expand yields two bytes of PCM16LE per μ-law byte', () => {
  const pcm = expand(Buffer.from([0x00, 0xff, 0x80]));
  assert.equal(pcm.length, 6);
  assert.equal(pcm.readInt16LE(0), -32124);
  assert.equal(pcm.readInt16LE(2), 0);
  assert.equal(pcm.readInt16LE(4), 32124);
});

test('compress halves the byte count', () => {
  const pcm = Buffer.alloc(320);
  const mulaw = compress(pcm);
  assert.equal(mulaw.length, 160);
  assert.ok(mulaw.every((byte) => byte === 0xff));
});

test('compress rejects odd-length PCM', () => {
  assert.throws(() => compress(Buffer.alloc(3)), AudioFormatError);
});

test('expand of empty input is empty', () => {
  assert.equal(expand(Buffer.alloc(0)).length, 0);
});

test('compress then expand stays within half a quantization step across the int16 range', () => {
  const count = 65536;
  const pcm = Buffer.alloc(count * 2);
  for (let i = 0; i < count; i += 1) {
    pcm.writeInt16LE(i - 32768, i * 2);
  }

  const decoded = expand(compress(pcm));
  assert.equal(decoded.length, pcm.length);

  const failures: string[] = [];
  for (let i = 0; i < count; i += 1) {
    const sample = i - 32768;
    const value = decoded.readInt16LE(i * 2);
    // step size doubles per segment, so the bound grows with magnitude; the clip at 32635 stays inside it
    const tolerance = (Math.abs(sample) + 132) / 32;
    const signFlipped = (sample > 0 && value < 0) || (sample < 0 && value > 0);
    if (Math.abs(value - sample) > tolerance || signFlipped) {
      failures.push(`${sample} -> ${value}`);
    }
  }
  assert.deepEqual(failures, []);
  assert.equal(decoded.readInt16LE(0), -32124);
  assert.equal(decoded.readInt16LE((count - 1) * 2), 32124);
});
