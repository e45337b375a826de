export type InstructionSettings = {
  systemPrompt?: string;
  translateTo: string;
  translateStyle: string;
  translateExtras?: string;
};

/**
 * System instructions for the realtime model. An explicit prompt wins;
 * otherwise the model is told to act as a translator into the target language.
 */
export function buildInstructions(settings: InstructionSettings): string {
  const explicit = settings.systemPrompt?.trim();
  if (explicit) {
    return explicit;
  }

  const target = settings.translateTo;
  let instructions =
    `You are a translator. Translate all user speech into ${target}. ` +
    'Return only the translation with no preface or commentary. ' +
    `Keep the original meaning, tone, and intent. Speak ${settings.translateStyle}. ` +
    `If the user already speaks ${target}, rephrase to improve clarity and flow.`;

  const extras = settings.translateExtras?.trim();
  if (extras) {
    instructions += ` ${extras}`;
  }
  return instructions;
}

export function previewInstructions(instructions: string, maxChars = 160): string {
  return instructions.length > maxChars ? `${instructions.slice(0, maxChars)}...` : instructions;
}
