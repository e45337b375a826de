import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('media upgrades must target the media path and carry the token when one is set', async () => {
  const { checkMediaRequest } = await import('../src/server');
  const headers = { host: 'bridge.test' };

  assert.deepEqual(checkMediaRequest({ url: '/audio', headers }, '/audio', undefined), { ok: true });
  assert.deepEqual(checkMediaRequest({ url: '/other', headers }, '/audio', undefined), { ok: false, reason: 'bad_path' });
  assert.deepEqual(checkMediaRequest({ url: '/audio', headers }, '/audio', 'test-token'), { ok: false, reason: 'bad_token' });
  assert.deepEqual(checkMediaRequest({ url: '/audio?token=wrong', headers }, '/audio', 'test-token'), {
    ok: false,
    reason: 'bad_token',
  });
  assert.deepEqual(checkMediaRequest({ url: '/audio?token=test-token', headers }, '/audio', 'test-token'), { ok: true });
  assert.deepEqual(checkMediaRequest({ url: undefined, headers }, '/audio', undefined), { ok: false, reason: 'bad_path' });
});

test('health, sessions and metrics routes answer over HTTP', async () => {
  const { buildServer } = await import('../src/server');
  const { disabledAudioMonitor } = await import('../src/audio/audioMonitor');
  const { server, wss, registry } = buildServer({ monitor: disabledAudioMonitor });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  assert.ok(address && typeof address === 'object');
  const base = `http://127.0.0.1:${address.port}`;

  try {
    const health = await fetch(`${base}/health`);
    assert.equal(health.status, 200);
    assert.ok(health.headers.get('x-request-id'));
    assert.deepEqual(await health.json(), { ok: true, sessions: registry.size });

    const sessions = await fetch(`${base}/v1/sessions`);
    assert.deepEqual(await sessions.json(), { sessions: [] });

    const missing = await fetch(`${base}/v1/sessions/MZ-unknown`);
    assert.equal(missing.status, 404);
    assert.deepEqual(await missing.json(), { error: 'session_not_found' });

    const metrics = await fetch(`${base}/metrics`);
    assert.equal(metrics.status, 200);
    assert.match(await metrics.text(), /realtime_voice_bridge_sessions_active/);
  } finally {
    wss.close();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  }
});
