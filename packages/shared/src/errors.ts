/**
 * Conversion error taxonomy.
 *
 * Every failure that crosses a component boundary is one of these kinds.
 * The kind string is what travels on the wire in a failure response, so a
 * client can rebuild the same error the server raised.
 */

export const ERROR_KINDS = [
  'FramingError',
  'UnsupportedOperationError',
  'InvalidParameterError',
  'DecodeError',
  'TimeoutError',
  'IOError',
  'ConnectionError',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export abstract class ConversionError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }

  /** Shape sent inside a failure response. */
  toJSON(): { kind: ErrorKind; message: string } {
    return { kind: this.kind, message: this.message };
  }
}

/** Malformed, truncated or oversized wire data. Fatal to the connection. */
export class FramingError extends ConversionError {
  readonly kind = 'FramingError';
  override readonly name = 'FramingError';
}

export class UnsupportedOperationError extends ConversionError {
  readonly kind = 'UnsupportedOperationError';
  override readonly name = 'UnsupportedOperationError';
}

export class InvalidParameterError extends ConversionError {
  readonly kind = 'InvalidParameterError';
  override readonly name = 'InvalidParameterError';
}

/** Input bytes the capability provider rejected as not matching the declared format. */
export class DecodeError extends ConversionError {
  readonly kind = 'DecodeError';
  override readonly name = 'DecodeError';
}

export class TimeoutError extends ConversionError {
  readonly kind = 'TimeoutError';
  override readonly name = 'TimeoutError';
}

export class IOError extends ConversionError {
  readonly kind = 'IOError';
  override readonly name = 'IOError';
}

/** Server unreachable: refused, reset or closed before any exchange. */
export class ConnectionError extends ConversionError {
  readonly kind = 'ConnectionError';
  override readonly name = 'ConnectionError';
}

const ERROR_CONSTRUCTORS: Record<ErrorKind, new (message: string, options?: { cause?: unknown }) => ConversionError> = {
  FramingError,
  UnsupportedOperationError,
  InvalidParameterError,
  DecodeError,
  TimeoutError,
  IOError,
  ConnectionError,
};

export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === 'string' && (ERROR_KINDS as readonly string[]).includes(value);
}

export function isConversionError(value: unknown): value is ConversionError {
  return value instanceof ConversionError;
}

/**
 * Rebuild a typed error from its wire form.
 */
export function createConversionError(kind: ErrorKind, message: string, cause?: unknown): ConversionError {
  const ErrorClass = ERROR_CONSTRUCTORS[kind];
  return new ErrorClass(message, cause === undefined ? undefined : { cause });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Pass conversion errors through; wrap anything else as `fallback`.
 */
export function toConversionError(err: unknown, fallback: ErrorKind): ConversionError {
  if (isConversionError(err)) return err;
  return createConversionError(fallback, errorMessage(err), err);
}
