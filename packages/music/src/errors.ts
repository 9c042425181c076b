export type PlaybackErrorCode =
  | 'COMMAND_REJECTED'
  | 'QUEUE_FULL'
  | 'AT_BOUNDARY'
  | 'OUT_OF_RANGE'
  | 'TRACK_LOAD_FAILED'
  | 'NODE_UNAVAILABLE'
  | 'INVALID_STATE'
  | 'PLAYER_DESTROYED';

export class PlaybackError extends Error {
  constructor(
    public readonly code: PlaybackErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'PlaybackError';
  }
}

export type RestErrorKind = 'network' | 'rejected';

/**
 * `network` covers transport failures, timeouts and 5xx responses and may be
 * retried. `rejected` means the node understood the request and refused it.
 */
export class RestError extends Error {
  constructor(
    public readonly kind: RestErrorKind,
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'RestError';
  }
}

export class CodecError extends Error {
  public readonly kind = 'malformed' as const;

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'CodecError';
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export function isPlaybackError(error: unknown, code?: PlaybackErrorCode): error is PlaybackError {
  return error instanceof PlaybackError && (code === undefined || error.code === code);
}
