import assert from 'node:assert/strict';
import { test } from 'node:test';
import { convert, createResamplerState, StreamResampler } from '../src/audio/resampler';
import { AudioFormatError } from '../src/errors';

function ramp(samples: number, start = 0, step = 7): Buffer {
  const out = Buffer.alloc(samples * 2);
  for (let i = 0; i < samples; i += 1) {
    out.writeInt16LE(((start + i * step) % 20000) - 10000, i * 2);
  }
  return out;
}

test('8k to 24k yields 477 samples for the first 20 ms chunk and 480 after', () => {
  const resampler = new StreamResampler(8000, 24000);
  const first = resampler.process(ramp(160));
  const second = resampler.process(ramp(160, 160 * 7));
  const third = resampler.process(ramp(160, 320 * 7));
  assert.equal(first.length / 2, 477);
  assert.equal(second.length / 2, 480);
  assert.equal(third.length / 2, 480);
});

test('24k to 8k yields 160 samples per 480-sample chunk', () => {
  const resampler = new StreamResampler(24000, 8000);
  for (let i = 0; i < 3; i += 1) {
    assert.equal(resampler.process(ramp(480, i * 480 * 7)).length / 2, 160);
  }
});

test('chunked conversion matches converting the whole stream at once', () => {
  const whole = ramp(800);
  const expected = convert(whole, 8000, 24000).audio;

  let state = createResamplerState(8000, 24000);
  const parts: Buffer[] = [];
  let cursor = 0;
  for (const size of [160, 2, 98, 300, 240]) {
    const chunk = whole.subarray(cursor * 2, (cursor + size) * 2);
    cursor += size;
    const result = convert(chunk, 8000, 24000, state);
    parts.push(result.audio);
    state = result.state;
  }

  assert.equal(cursor, 800);
  assert.deepEqual(Buffer.concat(parts), expected);
});

test('downsampling interpolates on whole input positions', () => {
  const pcm = Buffer.alloc(12);
  [0, 30, 60, 90, 120, 150].forEach((sample, i) => pcm.writeInt16LE(sample, i * 2));
  const { audio } = convert(pcm, 24000, 8000);
  assert.equal(audio.length, 4);
  assert.equal(audio.readInt16LE(0), 0);
  assert.equal(audio.readInt16LE(2), 90);
});

test('equal rates pass audio through unchanged', () => {
  const pcm = ramp(10);
  const { audio } = convert(pcm, 16000, 16000);
  assert.deepEqual(audio, pcm);
  assert.notEqual(audio, pcm);
});

test('empty input produces empty output and keeps the state', () => {
  const state = createResamplerState(8000, 24000);
  const result = convert(Buffer.alloc(0), 8000, 24000, state);
  assert.equal(result.audio.length, 0);
  assert.equal(result.state, state);
});

test('rejects odd-length input, bad rates and mismatched state', () => {
  assert.throws(() => convert(Buffer.alloc(3), 8000, 24000), AudioFormatError);
  assert.throws(() => createResamplerState(0, 24000), AudioFormatError);
  const state = createResamplerState(8000, 24000);
  assert.throws(() => convert(Buffer.alloc(4), 24000, 8000, state), AudioFormatError);
});
