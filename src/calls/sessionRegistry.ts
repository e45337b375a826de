import { log } from '../log';
import { setSessionsActive } from '../metrics';
import type { BridgeSession } from './bridgeSession';
import type { BridgeSessionSummary, StreamSid } from './types';

/**
 * Live bridge sessions keyed by telephony stream id. Insert happens on stream
 * start and removal on teardown; nothing else holds session references.
 */
export class SessionRegistry {
  private readonly sessions = new Map<StreamSid, BridgeSession>();

  /** Returns false when the stream id is already bridged. */
  add(session: BridgeSession): boolean {
    const existing = this.sessions.get(session.streamSid);
    if (existing) {
      log.warn(
        { event: 'bridge_session_exists', stream_sid: session.streamSid, call_sid: existing.callSid },
        'bridge session exists',
      );
      return false;
    }

    this.sessions.set(session.streamSid, session);
    setSessionsActive(this.sessions.size);
    return true;
  }

  get(streamSid: StreamSid): BridgeSession | undefined {
    return this.sessions.get(streamSid);
  }

  /** Removes the entry only if it still belongs to this session instance. */
  remove(session: BridgeSession): boolean {
    if (this.sessions.get(session.streamSid) !== session) {
      return false;
    }
    this.sessions.delete(session.streamSid);
    setSessionsActive(this.sessions.size);
    return true;
  }

  get size(): number {
    return this.sessions.size;
  }

  list(): BridgeSessionSummary[] {
    return Array.from(this.sessions.values(), (session) => session.describe());
  }

  async closeAll(reason: string): Promise<void> {
    const sessions = Array.from(this.sessions.values());
    await Promise.all(sessions.map((session) => session.teardown(reason)));
  }
}
