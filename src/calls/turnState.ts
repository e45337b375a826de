import type { ModelEvent } from '../realtime/protocol';

export type TurnState = 'idle' | 'user_speaking' | 'response_in_progress' | 'assistant_speaking';

export type TurnFlags = {
  sessionReady: boolean;
  userSpeaking: boolean;
  responseInProgress: boolean;
  assistantSpeaking: boolean;
};

export type TurnSnapshot = TurnFlags & {
  state: TurnState;
  responseId?: string;
  audioChunks: number;
};

/** Work the owner of the machine performs, in order, after each event. */
export type TurnEffect =
  | { kind: 'audio'; pcm: Buffer; responseId?: string }
  | { kind: 'flush' }
  | { kind: 'interrupt'; responseId?: string }
  | { kind: 'error'; source: 'model' | 'transport'; message: string; code?: string }
  | { kind: 'terminate'; reason: string }
  | { kind: 'ignored'; eventType: string; reason: 'unhandled' | 'invalid' | 'empty_audio' };

export function deriveTurnState(flags: TurnFlags): TurnState {
  if (flags.assistantSpeaking) return 'assistant_speaking';
  if (flags.responseInProgress) return 'response_in_progress';
  if (flags.userSpeaking) return 'user_speaking';
  return 'idle';
}

function decodeBase64Audio(encoded: string): Buffer {
  return Buffer.from(encoded, 'base64');
}

/**
 * Derives the conversation turn from model events. Events must be applied
 * one at a time in receipt order; nothing is reordered or coalesced.
 */
export class TurnStateMachine {
  private readonly flags: TurnFlags = {
    sessionReady: false,
    userSpeaking: false,
    responseInProgress: false,
    assistantSpeaking: false,
  };
  private responseId?: string;
  private audioChunks = 0;

  get state(): TurnState {
    return deriveTurnState(this.flags);
  }

  get assistantSpeaking(): boolean {
    return this.flags.assistantSpeaking;
  }

  get sessionReady(): boolean {
    return this.flags.sessionReady;
  }

  snapshot(): TurnSnapshot {
    return {
      ...this.flags,
      state: this.state,
      responseId: this.responseId,
      audioChunks: this.audioChunks,
    };
  }

  apply(event: ModelEvent): TurnEffect[] {
    switch (event.type) {
      case 'session.created':
        this.flags.sessionReady = true;
        return [];

      case 'session.updated':
      case 'input_audio_buffer.committed':
      case 'response.output_item.added':
        return [];

      case 'input_audio_buffer.speech_started': {
        this.flags.userSpeaking = true;
        if (this.flags.assistantSpeaking) {
          return [{ kind: 'interrupt', responseId: this.responseId }];
        }
        return [];
      }

      case 'input_audio_buffer.speech_stopped':
        this.flags.userSpeaking = false;
        return [];

      case 'response.created':
        this.flags.responseInProgress = true;
        this.responseId = event.responseId;
        return [];

      case 'response.audio.delta':
        return this.acceptAudio(decodeBase64Audio(event.delta), event.type, event.responseId ?? this.responseId);

      case 'binary':
        return this.acceptAudio(event.audio, event.type, this.responseId);

      case 'response.audio.done':
        this.flags.assistantSpeaking = false;
        return [{ kind: 'flush' }];

      case 'response.done':
        this.flags.responseInProgress = false;
        this.flags.assistantSpeaking = false;
        this.responseId = undefined;
        return [];

      case 'error': {
        const effect: TurnEffect = {
          kind: 'error',
          source: event.source,
          message: event.message,
          code: event.code,
        };
        if (event.source === 'transport') {
          return [effect, { kind: 'terminate', reason: 'realtime_transport_error' }];
        }
        return [effect];
      }

      case 'closed':
        this.flags.sessionReady = false;
        this.flags.assistantSpeaking = false;
        this.flags.responseInProgress = false;
        return [{ kind: 'terminate', reason: 'realtime_closed' }];

      case 'unhandled':
        return [{ kind: 'ignored', eventType: event.eventType, reason: 'unhandled' }];

      case 'invalid':
        return [{ kind: 'ignored', eventType: 'invalid', reason: 'invalid' }];
    }
  }

  private acceptAudio(pcm: Buffer, eventType: string, responseId?: string): TurnEffect[] {
    if (pcm.length === 0) {
      return [{ kind: 'ignored', eventType, reason: 'empty_audio' }];
    }
    this.flags.assistantSpeaking = true;
    this.audioChunks += 1;
    return [{ kind: 'audio', pcm, responseId }];
  }
}
