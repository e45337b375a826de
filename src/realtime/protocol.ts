import { z } from 'zod';

export type TurnDetectionMode = 'semantic_vad' | 'server_vad';

export type SessionUpdateMessage = {
  type: 'session.update';
  session: {
    type: 'realtime';
    output_modalities: ['audio'];
    audio: {
      input: {
        format: { type: 'audio/pcm'; rate: number };
        turn_detection: { type: TurnDetectionMode };
      };
      output: {
        format: { type: 'audio/pcm' };
        voice: string;
      };
    };
    instructions: string;
  };
};

export type ConversationItemCreateMessage = {
  type: 'conversation.item.create';
  item: {
    type: 'message';
    role: 'system';
    content: Array<{ type: 'input_text'; text: string }>;
  };
};

export type AudioAppendMessage = {
  type: 'input_audio_buffer.append';
  audio: string;
};

export type ResponseCancelMessage = {
  type: 'response.cancel';
};

export type OutboundMessage =
  | SessionUpdateMessage
  | ConversationItemCreateMessage
  | AudioAppendMessage
  | ResponseCancelMessage;

export function buildSessionUpdate(options: {
  voice: string;
  instructions: string;
  inputRateHz: number;
  turnDetection: TurnDetectionMode;
}): SessionUpdateMessage {
  return {
    type: 'session.update',
    session: {
      type: 'realtime',
      output_modalities: ['audio'],
      audio: {
        input: {
          format: { type: 'audio/pcm', rate: options.inputRateHz },
          turn_detection: { type: options.turnDetection },
        },
        output: {
          format: { type: 'audio/pcm' },
          voice: options.voice,
        },
      },
      instructions: options.instructions,
    },
  };
}

export function buildInstructionItem(text: string): ConversationItemCreateMessage {
  return {
    type: 'conversation.item.create',
    item: {
      type: 'message',
      role: 'system',
      content: [{ type: 'input_text', text }],
    },
  };
}

export function buildAudioAppend(pcm: Buffer): AudioAppendMessage {
  return { type: 'input_audio_buffer.append', audio: pcm.toString('base64') };
}

export function buildResponseCancel(): ResponseCancelMessage {
  return { type: 'response.cancel' };
}

// ---------- inbound ----------

export type ModelEvent =
  | { type: 'session.created'; sessionId?: string }
  | { type: 'session.updated' }
  | { type: 'input_audio_buffer.speech_started'; itemId?: string; audioStartMs?: number }
  | { type: 'input_audio_buffer.speech_stopped'; itemId?: string; audioEndMs?: number }
  | { type: 'input_audio_buffer.committed'; itemId?: string }
  | { type: 'response.created'; responseId?: string }
  | { type: 'response.output_item.added'; responseId?: string; itemId?: string }
  | { type: 'response.audio.delta'; responseId?: string; itemId?: string; delta: string }
  | { type: 'response.audio.done'; responseId?: string; itemId?: string }
  | { type: 'response.done'; responseId?: string; status?: string }
  | { type: 'error'; source: 'model' | 'transport'; message: string; code?: string }
  | { type: 'closed'; code: number; reason: string }
  | { type: 'binary'; audio: Buffer }
  | { type: 'unhandled'; eventType: string; payload: Record<string, unknown> }
  | { type: 'invalid'; reason: string; preview: string };

export type ModelEventType = ModelEvent['type'];

const idField = z.string().optional();

const SessionCreatedSchema = z.object({
  session: z.object({ id: idField }).passthrough().optional(),
});

const SpeechStartedSchema = z.object({
  item_id: idField,
  audio_start_ms: z.number().optional(),
});

const SpeechStoppedSchema = z.object({
  item_id: idField,
  audio_end_ms: z.number().optional(),
});

const CommittedSchema = z.object({ item_id: idField });

const ResponseCreatedSchema = z.object({
  response: z.object({ id: idField }).passthrough().optional(),
});

const OutputItemAddedSchema = z.object({
  response_id: idField,
  item: z.object({ id: idField }).passthrough().optional(),
});

const AudioDeltaSchema = z.object({
  response_id: idField,
  item_id: idField,
  delta: z.string(),
});

const AudioDoneSchema = z.object({
  response_id: idField,
  item_id: idField,
});

const ResponseDoneSchema = z.object({
  response: z
    .object({ id: idField, status: z.string().optional() })
    .passthrough()
    .optional(),
});

const ErrorSchema = z.object({
  error: z
    .union([
      z.string(),
      z.object({ message: z.string().optional(), code: z.string().nullish(), type: z.string().optional() }).passthrough(),
    ])
    .optional(),
});

const EnvelopeSchema = z.object({ type: z.string().min(1) }).passthrough();

const PREVIEW_CHARS = 180;

function preview(raw: string): string {
  return raw.length > PREVIEW_CHARS ? `${raw.slice(0, PREVIEW_CHARS)}...` : raw;
}

function invalid(reason: string, raw: string): ModelEvent {
  return { type: 'invalid', reason, preview: preview(raw) };
}

function decodeKnown(type: string, payload: Record<string, unknown>, raw: string): ModelEvent {
  switch (type) {
    case 'session.created': {
      const parsed = SessionCreatedSchema.safeParse(payload);
      if (!parsed.success) return invalid(`bad ${type}`, raw);
      return { type, sessionId: parsed.data.session?.id };
    }
    case 'session.updated':
      return { type };
    case 'input_audio_buffer.speech_started': {
      const parsed = SpeechStartedSchema.safeParse(payload);
      if (!parsed.success) return invalid(`bad ${type}`, raw);
      return { type, itemId: parsed.data.item_id, audioStartMs: parsed.data.audio_start_ms };
    }
    case 'input_audio_buffer.speech_stopped': {
      const parsed = SpeechStoppedSchema.safeParse(payload);
      if (!parsed.success) return invalid(`bad ${type}`, raw);
      return { type, itemId: parsed.data.item_id, audioEndMs: parsed.data.audio_end_ms };
    }
    case 'input_audio_buffer.committed': {
      const parsed = CommittedSchema.safeParse(payload);
      if (!parsed.success) return invalid(`bad ${type}`, raw);
      return { type, itemId: parsed.data.item_id };
    }
    case 'response.created': {
      const parsed = ResponseCreatedSchema.safeParse(payload);
      if (!parsed.success) return invalid(`bad ${type}`, raw);
      return { type, responseId: parsed.data.response?.id };
    }
    case 'response.output_item.added': {
      const parsed = OutputItemAddedSchema.safeParse(payload);
      if (!parsed.success) return invalid(`bad ${type}`, raw);
      return { type, responseId: parsed.data.response_id, itemId: parsed.data.item?.id };
    }
    case 'response.audio.delta':
    case 'response.output_audio.delta': {
      const parsed = AudioDeltaSchema.safeParse(payload);
      if (!parsed.success) return invalid(`bad ${type}`, raw);
      return {
        type: 'response.audio.delta',
        responseId: parsed.data.response_id,
        itemId: parsed.data.item_id,
        delta: parsed.data.delta,
      };
    }
    case 'response.audio.done':
    case 'response.output_audio.done': {
      const parsed = AudioDoneSchema.safeParse(payload);
      if (!parsed.success) return invalid(`bad ${type}`, raw);
      return { type: 'response.audio.done', responseId: parsed.data.response_id, itemId: parsed.data.item_id };
    }
    case 'response.done': {
      const parsed = ResponseDoneSchema.safeParse(payload);
      if (!parsed.success) return invalid(`bad ${type}`, raw);
      return { type, responseId: parsed.data.response?.id, status: parsed.data.response?.status };
    }
    case 'error': {
      const parsed = ErrorSchema.safeParse(payload);
      if (!parsed.success) return invalid(`bad ${type}`, raw);
      const error = parsed.data.error;
      if (typeof error === 'string') {
        return { type, source: 'model', message: error };
      }
      return {
        type,
        source: 'model',
        message: error?.message ?? 'unknown model error',
        code: error?.code ?? undefined,
      };
    }
    default:
      return { type: 'unhandled', eventType: type, payload };
  }
}

/**
 * Decodes one socket frame. Never throws: undecodable text becomes an
 * `invalid` event and unknown types become `unhandled`.
 */
export function decodeModelEvent(data: Buffer | string, isBinary = false): ModelEvent {
  if (isBinary && Buffer.isBuffer(data)) {
    return { type: 'binary', audio: data };
  }

  const raw = typeof data === 'string' ? data : data.toString('utf8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return invalid('json_parse_failed', raw);
  }

  const envelope = EnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    return invalid('missing_type', raw);
  }

  return decodeKnown(envelope.data.type, envelope.data, raw);
}
