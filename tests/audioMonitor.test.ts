import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('pcm16ToWav writes a 44-byte PCM header', async () => {
  const { pcm16ToWav } = await import('../src/audio/audioMonitor');
  const wav = pcm16ToWav(Buffer.alloc(8), 24000);

  assert.equal(wav.length, 52);
  assert.equal(wav.toString('ascii', 0, 4), 'RIFF');
  assert.equal(wav.readUInt32LE(4), 44);
  assert.equal(wav.toString('ascii', 8, 12), 'WAVE');
  assert.equal(wav.readUInt32LE(24), 24000);
  assert.equal(wav.readUInt32LE(28), 48000);
  assert.equal(wav.readUInt32LE(40), 8);
});

test('monitor keeps a rolling window per stream and writes it on flush', async () => {
  const { WavAudioMonitor } = await import('../src/audio/audioMonitor');
  const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-monitor-'));
  const monitor = new WavAudioMonitor({ baseDir, sampleRate: 100, secondsToKeep: 1 });

  try {
    monitor.write('MZ/1', Buffer.alloc(120, 1));
    monitor.write('MZ/1', Buffer.alloc(120, 2));
    monitor.write('MZ2', Buffer.alloc(10, 3));

    const written = monitor.flush('MZ/1', 'response');
    assert.ok(written);
    assert.equal(path.dirname(written), baseDir);
    assert.match(path.basename(written), /^MZ_1__\d+__response\.wav$/);

    const wav = fs.readFileSync(written);
    assert.equal(wav.readUInt32LE(40), 120);
    assert.equal(wav[44], 2);

    assert.equal(monitor.flush('MZ/1', 'response'), undefined);
    monitor.release('MZ2');
    assert.equal(monitor.flush('MZ2', 'response'), undefined);
  } finally {
    fs.rmSync(baseDir, { recursive: true, force: true });
  }
});
