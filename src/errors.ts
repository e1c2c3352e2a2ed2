export type WatcherErrorKind = 'transport' | 'upstream_status' | 'validation' | 'notification' | 'config';

export abstract class WatcherError extends Error {
  abstract readonly kind: WatcherErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Connection, DNS or timeout failure on an outbound request.
 */
export class TransportError extends WatcherError {
  readonly kind = 'transport';

  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class UpstreamStatusError extends WatcherError {
  readonly kind = 'upstream_status';

  constructor(
    readonly url: string,
    readonly status: number,
    readonly bodyExcerpt: string,
  ) {
    super(`Upstream responded with status ${status}`);
  }
}

export class ValidationError extends WatcherError {
  readonly kind = 'validation';
}

export class NotificationError extends WatcherError {
  readonly kind = 'notification';

  constructor(
    message: string,
    readonly recipient: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * Raised before the loop starts; the process cannot continue without settings.
 */
export class ConfigError extends WatcherError {
  readonly kind = 'config';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
