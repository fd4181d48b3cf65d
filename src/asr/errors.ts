export type AsrErrorKind =
  | 'ConfigurationError'
  | 'ConnectFailure'
  | 'ConfigurationRejected'
  | 'FramingError'
  | 'TransportError'
  | 'DecodeError'
  | 'ServiceError'
  | 'InputError';

export interface AsrErrorOptions {
  cause?: unknown;
  /** Service error payload, for kinds triggered by a service event. */
  payload?: Record<string, unknown>;
}

/**
 * Every failure the session engine reports carries one of the kinds above.
 * `ServiceError` is relayed as a normal record and only becomes fatal while
 * the session is still configuring (then reported as `ConfigurationRejected`).
 */
export class AsrError extends Error {
  readonly kind: AsrErrorKind;
  readonly payload: Record<string, unknown> | null;

  constructor(kind: AsrErrorKind, message: string, options: AsrErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = kind;
    this.kind = kind;
    this.payload = options.payload ?? null;
  }
}

export function isAsrError(err: unknown, kind?: AsrErrorKind): err is AsrError {
  return err instanceof AsrError && (kind === undefined || err.kind === kind);
}

export function extractErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

/** Wrap an arbitrary thrown value as the given kind, keeping existing AsrErrors as-is. */
export function toAsrError(err: unknown, kind: AsrErrorKind, context?: string): AsrError {
  if (err instanceof AsrError) return err;
  const message = extractErrorMessage(err);
  return new AsrError(kind, context ? `${context}: ${message}` : message, { cause: err });
}
