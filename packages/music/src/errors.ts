import type { LavalinkErrorBody } from '@cadence/schemas';

export type MusicErrorCode =
  | 'INVALID_CHANNEL_STATE'
  | 'CHANNEL_TIMEOUT'
  | 'LAVALINK'
  | 'INVALID_NODE'
  | 'NOT_IMPLEMENTED';

export class MusicError extends Error {
  constructor(
    public readonly code: MusicErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'MusicError';
  }
}

/** An operation needed a bound voice channel or guild and the player had none. */
export class InvalidChannelStateError extends MusicError {
  constructor(message: string) {
    super('INVALID_CHANNEL_STATE', message);
    this.name = 'InvalidChannelStateError';
  }
}

export class ChannelTimeoutError extends MusicError {
  constructor(
    public readonly channel: string,
    public readonly timeout: number,
  ) {
    super('CHANNEL_TIMEOUT', `Unable to connect to ${channel} as it exceeded the timeout of ${timeout} seconds.`);
    this.name = 'ChannelTimeoutError';
  }
}

/**
 * Failure reported by a Lavalink node. `status` is the HTTP status of the response, or 0 when the request never
 * produced one.
 */
export class LavalinkError extends MusicError {
  public readonly status: number;
  public readonly error: string;
  public readonly path: string | null;

  constructor(body: Pick<LavalinkErrorBody, 'status' | 'error' | 'message'> & { path?: string }, options?: ErrorOptions) {
    super('LAVALINK', body.message ?? `Lavalink request failed with status ${body.status} (${body.error})`, options);
    this.name = 'LavalinkError';
    this.status = body.status;
    this.error = body.error;
    this.path = body.path ?? null;
  }
}

export class InvalidNodeError extends MusicError {
  constructor(message: string) {
    super('INVALID_NODE', message);
    this.name = 'InvalidNodeError';
  }
}

export class NotImplementedError extends MusicError {
  constructor(feature: string) {
    super('NOT_IMPLEMENTED', `${feature} is not implemented`);
    this.name = 'NotImplementedError';
  }
}

export function isMusicError(error: unknown): error is MusicError {
  return error instanceof MusicError;
}
