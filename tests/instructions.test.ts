import assert from 'node:assert/strict';
import { test } from 'node:test';
import { buildInstructions, previewInstructions } from '../src/calls/instructions';

test('an explicit system prompt is used as given, trimmed', () => {
  assert.equal(
    buildInstructions({ systemPrompt: '  Be a helpful concierge.  ', translateTo: 'English', translateStyle: 'natural' }),
    'Be a helpful concierge.',
  );
});

test('without a prompt the model is told to translate into the target language', () => {
  assert.equal(
    buildInstructions({ translateTo: 'Spanish', translateStyle: 'warm and brief' }),
    'You are a translator. Translate all user speech into Spanish. ' +
      'Return only the translation with no preface or commentary. ' +
      'Keep the original meaning, tone, and intent. Speak warm and brief. ' +
      'If the user already speaks Spanish, rephrase to improve clarity and flow.',
  );
});

test('extras are appended and a blank prompt falls back to translation', () => {
  const text = buildInstructions({
    systemPrompt: '   ',
    translateTo: 'German',
    translateStyle: 'formal',
    translateExtras: ' Keep product names in English. ',
  });
  assert.ok(text.startsWith('You are a translator. Translate all user speech into German.'));
  assert.ok(text.endsWith('rephrase to improve clarity and flow. Keep product names in English.'));
});

test('previewInstructions shortens long text', () => {
  assert.equal(previewInstructions('abcdef', 3), 'abc...');
  assert.equal(previewInstructions('abc', 3), 'abc');
});
