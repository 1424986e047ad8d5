import type { VoiceSession } from '@cadence/schemas';

export interface PartialVoiceSession {
  sessionId?: string;
  token?: string;
  endpoint?: string;
}

/**
 * Collects the halves of a voice handshake. `VOICE_STATE_UPDATE` supplies the session id and `VOICE_SERVER_UPDATE`
 * the token and endpoint; they arrive in either order and may repeat.
 */
export class VoiceStateAccumulator {
  private readonly voice: PartialVoiceSession = {};
  private lastPushed: VoiceSession | null = null;

  get snapshot(): Readonly<PartialVoiceSession> {
    return { ...this.voice };
  }

  get descriptor(): VoiceSession | null {
    const { sessionId, token, endpoint } = this.voice;
    if (!sessionId || !token || !endpoint) {
      return null;
    }
    return { sessionId, token, endpoint };
  }

  applyMembership(sessionId: string): void {
    this.voice.sessionId = sessionId;
  }

  applyCredentials(token: string, endpoint: string | null): void {
    this.voice.token = token;
    // Discord sends a null endpoint while the voice server is being reallocated.
    if (endpoint) {
      this.voice.endpoint = endpoint;
    } else {
      delete this.voice.endpoint;
    }
  }

  /** The complete descriptor, unless it is exactly the one most recently pushed. */
  takePending(): VoiceSession | null {
    const descriptor = this.descriptor;
    if (!descriptor) {
      return null;
    }
    if (
      this.lastPushed &&
      this.lastPushed.sessionId === descriptor.sessionId &&
      this.lastPushed.token === descriptor.token &&
      this.lastPushed.endpoint === descriptor.endpoint
    ) {
      return null;
    }
    return descriptor;
  }

  markPushed(descriptor: VoiceSession): void {
    this.lastPushed = { ...descriptor };
  }

  reset(): void {
    this.lastPushed = null;
  }
}
