import { EventEmitter } from 'node:events';
import type {
  TelephonyMediaMessage,
  TelephonyOutbound,
  TelephonyOutboundMessage,
} from '../../src/media/types';
import { AsyncQueue } from '../../src/queue/asyncQueue';
import type { ModelEvent, OutboundMessage } from '../../src/realtime/protocol';
import type {
  ModelSessionClient,
  RealtimeClientOptions,
  RealtimeClientState,
  RealtimeSocket,
} from '../../src/realtime/realtimeClient';

/** In-process stand-in for a `ws` client socket. */
export class FakeRealtimeSocket extends EventEmitter implements RealtimeSocket {
  readyState = 0;
  readonly sent: string[] = [];
  pings = 0;
  terminated = 0;
  closeCalls: Array<{ code?: number; reason?: string }> = [];

  send(data: string, cb: (err?: Error) => void): void {
    this.sent.push(data);
    cb();
  }

  ping(): void {
    this.pings += 1;
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
    this.readyState = 2;
  }

  terminate(): void {
    this.terminated += 1;
    this.readyState = 3;
  }

  open(): void {
    this.readyState = 1;
    this.emit('open');
  }

  receive(payload: unknown): void {
    this.emit('message', Buffer.from(JSON.stringify(payload)), false);
  }

  remoteClose(code: number, reason = ''): void {
    this.readyState = 3;
    this.emit('close', code, Buffer.from(reason));
  }
}

type FakeClientOptions = {
  opens?: boolean;
  failOn?: (message: OutboundMessage) => boolean;
  /** Matching sends hang until close(), then resolve false. */
  stallOn?: (message: OutboundMessage) => boolean;
  /** Pushed as soon as start() is called. */
  initialEvents?: ModelEvent[];
};

/** Model client whose inbound events are scripted by the test. */
export class FakeModelClient implements ModelSessionClient {
  readonly sent: OutboundMessage[] = [];
  readonly inbound = new AsyncQueue<ModelEvent>();
  startCalls = 0;
  closeCalls = 0;
  options?: RealtimeClientOptions;

  private stateValue: RealtimeClientState = 'idle';
  private readonly opens: boolean;
  private readonly failOn?: (message: OutboundMessage) => boolean;
  private readonly stallOn?: (message: OutboundMessage) => boolean;
  private readonly initialEvents: ModelEvent[];
  private readonly stalled: Array<(sent: boolean) => void> = [];

  constructor(options: FakeClientOptions = {}) {
    this.opens = options.opens ?? true;
    this.failOn = options.failOn;
    this.stallOn = options.stallOn;
    this.initialEvents = options.initialEvents ?? [];
  }

  get stalledSends(): number {
    return this.stalled.length;
  }

  get state(): RealtimeClientState {
    return this.stateValue;
  }

  start(): void {
    this.startCalls += 1;
    this.stateValue = this.opens ? 'open' : 'failed';
    for (const event of this.initialEvents) {
      this.inbound.push(event);
    }
  }

  async waitOpen(): Promise<boolean> {
    return this.stateValue === 'open';
  }

  async send(message: OutboundMessage): Promise<boolean> {
    if (this.failOn?.(message)) {
      throw new Error(`send failed: ${message.type}`);
    }
    if (this.stateValue !== 'open') {
      return false;
    }
    if (this.stallOn?.(message)) {
      return new Promise<boolean>((resolve) => {
        this.stalled.push(resolve);
      });
    }
    this.sent.push(message);
    return true;
  }

  events(): AsyncIterable<ModelEvent> {
    return this.inbound;
  }

  close(): void {
    this.closeCalls += 1;
    this.stateValue = 'closed';
    this.inbound.close({ discard: true });
    for (const resolve of this.stalled.splice(0)) {
      resolve(false);
    }
  }

  emit(event: ModelEvent): void {
    this.inbound.push(event);
  }

  sentOfType<T extends OutboundMessage['type']>(type: T): Array<Extract<OutboundMessage, { type: T }>> {
    return this.sent.filter((message): message is Extract<OutboundMessage, { type: T }> => message.type === type);
  }
}

/** Resolves once `predicate` holds, polling on the macrotask queue. */
export async function waitFor(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/** Collects what a session writes to its telephony socket. */
export class FakeTelephony implements TelephonyOutbound {
  readonly messages: TelephonyOutboundMessage[] = [];
  failing = false;

  async send(message: TelephonyOutboundMessage): Promise<void> {
    if (this.failing) {
      throw new Error('telephony socket closed');
    }
    this.messages.push(message);
  }

  media(): TelephonyMediaMessage[] {
    return this.messages.filter((message): message is TelephonyMediaMessage => message.event === 'media');
  }
}
