export type BridgeErrorCode =
  | 'configuration'
  | 'realtime_connect'
  | 'audio_format'
  | 'telephony_send';

export class BridgeError extends Error {
  public readonly code: BridgeErrorCode;

  constructor(code: BridgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or invalid settings detected when a session starts. */
export class ConfigurationError extends BridgeError {
  constructor(message: string) {
    super('configuration', message);
  }
}

export class RealtimeConnectError extends BridgeError {
  public readonly timeoutMs?: number;

  constructor(message: string, options: { timeoutMs?: number; cause?: unknown } = {}) {
    super('realtime_connect', message, { cause: options.cause });
    this.timeoutMs = options.timeoutMs;
  }
}

/** Audio bytes that cannot be interpreted at the declared sample width. */
export class AudioFormatError extends BridgeError {
  public readonly byteLength: number;

  constructor(message: string, byteLength: number) {
    super('audio_format', message);
    this.byteLength = byteLength;
  }
}

export class TelephonySendError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super('telephony_send', message, { cause });
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'unknown_error';
}
