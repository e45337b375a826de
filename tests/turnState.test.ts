import assert from 'node:assert/strict';
import { test } from 'node:test';
import { deriveTurnState, TurnStateMachine } from '../src/calls/turnState';

const delta = (bytes: number[]) => ({
  type: 'response.audio.delta' as const,
  delta: Buffer.from(bytes).toString('base64'),
});

test('a full response cycle returns to idle with one audio effect per delta', () => {
  const machine = new TurnStateMachine();

  assert.deepEqual(machine.apply({ type: 'session.created', sessionId: 's' }), []);
  assert.equal(machine.sessionReady, true);

  machine.apply({ type: 'input_audio_buffer.speech_started' });
  assert.equal(machine.state, 'user_speaking');
  machine.apply({ type: 'input_audio_buffer.speech_stopped' });
  machine.apply({ type: 'response.created', responseId: 'resp_1' });
  assert.equal(machine.state, 'response_in_progress');

  const audioEffects = [];
  for (let i = 0; i < 4; i += 1) {
    const effects = machine.apply(delta([i, i]));
    assert.equal(effects.length, 1);
    audioEffects.push(effects[0]);
  }
  assert.equal(machine.state, 'assistant_speaking');
  assert.deepEqual(audioEffects[2], { kind: 'audio', pcm: Buffer.from([2, 2]), responseId: 'resp_1' });

  assert.deepEqual(machine.apply({ type: 'response.audio.done' }), [{ kind: 'flush' }]);
  assert.equal(machine.state, 'response_in_progress');
  assert.deepEqual(machine.apply({ type: 'response.done', responseId: 'resp_1' }), []);
  assert.equal(machine.state, 'idle');

  const snapshot = machine.snapshot();
  assert.equal(snapshot.audioChunks, 4);
  assert.equal(snapshot.responseId, undefined);
});

test('speech while the assistant is speaking produces an interrupt', () => {
  const machine = new TurnStateMachine();
  machine.apply({ type: 'response.created', responseId: 'resp_2' });
  machine.apply(delta([1, 0]));

  assert.deepEqual(machine.apply({ type: 'input_audio_buffer.speech_started' }), [
    { kind: 'interrupt', responseId: 'resp_2' },
  ]);
});

test('speech with no assistant audio does not interrupt', () => {
  const machine = new TurnStateMachine();
  machine.apply({ type: 'response.created', responseId: 'resp_3' });
  assert.deepEqual(machine.apply({ type: 'input_audio_buffer.speech_started' }), []);
});

test('empty audio is ignored and does not start assistant speech', () => {
  const machine = new TurnStateMachine();
  assert.deepEqual(machine.apply(delta([])), [
    { kind: 'ignored', eventType: 'response.audio.delta', reason: 'empty_audio' },
  ]);
  assert.equal(machine.assistantSpeaking, false);
});

test('binary frames count as assistant audio', () => {
  const machine = new TurnStateMachine();
  const effects = machine.apply({ type: 'binary', audio: Buffer.from([0, 1]) });
  assert.equal(effects[0]?.kind, 'audio');
  assert.equal(machine.state, 'assistant_speaking');
});

test('model errors are reported but transport errors also terminate', () => {
  const machine = new TurnStateMachine();
  assert.deepEqual(machine.apply({ type: 'error', source: 'model', message: 'bad' }), [
    { kind: 'error', source: 'model', message: 'bad', code: undefined },
  ]);
  assert.deepEqual(machine.apply({ type: 'error', source: 'transport', message: 'reset' }), [
    { kind: 'error', source: 'transport', message: 'reset', code: undefined },
    { kind: 'terminate', reason: 'realtime_transport_error' },
  ]);
});

test('socket close terminates and clears speaking flags', () => {
  const machine = new TurnStateMachine();
  machine.apply({ type: 'session.created' });
  machine.apply(delta([1, 1]));
  assert.deepEqual(machine.apply({ type: 'closed', code: 1006, reason: '' }), [
    { kind: 'terminate', reason: 'realtime_closed' },
  ]);
  assert.equal(machine.sessionReady, false);
  assert.equal(machine.assistantSpeaking, false);
});

test('unknown and invalid events are ignored without state change', () => {
  const machine = new TurnStateMachine();
  assert.deepEqual(machine.apply({ type: 'unhandled', eventType: 'rate_limits.updated', payload: {} }), [
    { kind: 'ignored', eventType: 'rate_limits.updated', reason: 'unhandled' },
  ]);
  assert.deepEqual(machine.apply({ type: 'invalid', reason: 'json_parse_failed', preview: '{' }), [
    { kind: 'ignored', eventType: 'invalid', reason: 'invalid' },
  ]);
  assert.equal(machine.state, 'idle');
});

test('derived state prefers assistant speech over everything else', () => {
  assert.equal(
    deriveTurnState({ sessionReady: true, userSpeaking: true, responseInProgress: true, assistantSpeaking: true }),
    'assistant_speaking',
  );
  assert.equal(
    deriveTurnState({ sessionReady: true, userSpeaking: true, responseInProgress: false, assistantSpeaking: false }),
    'user_speaking',
  );
});
