/**
 * OSC error model
 *
 * Every failure raised by the codec, matcher and transports is an OscError
 * carrying one of the codes below plus a small context record (host, port,
 * type tag, offset...) so callers can branch on `code` instead of parsing
 * message text.
 */

export type OscErrorCode =
  | 'MalformedPacket'
  | 'DeserializationError'
  | 'SerializationError'
  | 'TypeMismatch'
  | 'InvalidArgument'
  | 'PatternError'
  | 'AddressError'
  | 'NetworkError'
  | 'SocketError'
  | 'NetworkingError'
  | 'MessageTooLarge'
  | 'ServerError'
  | 'NotImplemented';

export type ErrorContext = Record<string, string | number | boolean | undefined>;

export class OscError extends Error {
  readonly code: OscErrorCode;
  readonly context: ErrorContext;

  constructor(code: OscErrorCode, message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OscError';
    this.code = code;
    this.context = context;
  }

  /** Same code and context, message prefixed with where it happened */
  withPrefix(prefix: string, extra: ErrorContext = {}): OscError {
    return new OscError(this.code, `${prefix}: ${this.message}`, { ...this.context, ...extra }, { cause: this });
  }
}

export function isOscError(err: unknown): err is OscError {
  return err instanceof OscError;
}

/** Human-readable text for anything thrown */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Normalize an unknown throwable into an OscError.
 * OscErrors pass through untouched; anything else is wrapped with `fallback`.
 */
export function toOscError(err: unknown, fallback: OscErrorCode, context: ErrorContext = {}): OscError {
  if (err instanceof OscError) return err;
  return new OscError(fallback, errorMessage(err), context, { cause: err });
}
