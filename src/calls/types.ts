import type { TurnDetectionMode } from '../realtime/protocol';
import type { TurnState } from './turnState';

export type StreamSid = string;

export type BridgeSessionStatus = 'created' | 'starting' | 'active' | 'stopping' | 'closed';

export interface BridgeSessionConfig {
  streamSid: StreamSid;
  callSid?: string;
  apiKey?: string;
  model: string;
  realtimeUrl: string;
  voice: string;
  instructions: string;
  turnDetection: TurnDetectionMode;
  modelSampleRateHz: number;
  connectTimeoutMs: number;
  pingIntervalMs: number;
  pingTimeoutMs: number;
  queueMaxChunks: number;
  stopDrainTimeoutMs: number;
  bargeInEnabled: boolean;
  bargeInClearPlayback: boolean;
  debug: boolean;
  trace: boolean;
}

export interface BridgeSessionCounters {
  inboundFrames: number;
  forwardedChunks: number;
  droppedChunks: number;
  modelAudioChunks: number;
  outboundFrames: number;
  interruptions: number;
  modelErrors: number;
}

export interface BridgeSessionSummary {
  streamSid: StreamSid;
  callSid?: string;
  status: BridgeSessionStatus;
  turnState: TurnState;
  assistantSpeaking: boolean;
  startedAt: string;
  counters: BridgeSessionCounters;
}
