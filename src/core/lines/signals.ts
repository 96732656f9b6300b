/**
 * Control signals and error types for line pipelines.
 *
 * A filter either returns the (possibly rewritten) record bytes or one of
 * three signals:
 * - Omit: drop this record, keep streaming
 * - EndOfStream: stop cleanly, as if the input had ended
 * - Failure: hard error, surfaced verbatim to the reader's caller
 *
 * @module signals
 */

export enum SignalKind {
  Omit = "OMIT",
  EndOfStream = "END_OF_STREAM",
  Failure = "FAILURE",
}

export type FilterSignal =
  | { readonly kind: SignalKind.Omit }
  | { readonly kind: SignalKind.EndOfStream }
  | { readonly kind: SignalKind.Failure; readonly error: unknown };

/** Drop the current record and continue with the next one. */
export const OMIT_LINE: FilterSignal = Object.freeze({ kind: SignalKind.Omit });

/** Stop reading; the reader reports end of stream from now on. */
export const END_OF_STREAM: FilterSignal = Object.freeze({ kind: SignalKind.EndOfStream });

/**
 * Build a hard-error signal.
 *
 * @example
 * ```typescript
 * reader.mapStringFallible((line) => (line.startsWith("#") ? fail(new Error("comment")) : line));
 * ```
 */
export function fail(error: unknown): FilterSignal {
  return { kind: SignalKind.Failure, error };
}

export function isSignal(value: unknown): value is FilterSignal {
  if (typeof value !== "object" || value === null || value instanceof Uint8Array) {
    return false;
  }
  if (!("kind" in value)) {
    return false;
  }
  return value.kind === SignalKind.Omit || value.kind === SignalKind.EndOfStream || value.kind === SignalKind.Failure;
}

/**
 * Base class for errors raised by the library itself.
 * Errors coming from sources or callbacks are never wrapped.
 */
export class LinewiseError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A record is longer than the scanner limit. */
export class RecordTooLongError extends LinewiseError {
  readonly limit: number;

  constructor(limit: number) {
    super("RECORD_TOO_LONG", `record exceeds ${limit} bytes`);
    this.limit = limit;
  }
}

/** A produced record does not fit the buffer passed to `read`. */
export class RecordTooLargeError extends LinewiseError {
  readonly recordLength: number;
  readonly bufferLength: number;

  constructor(recordLength: number, bufferLength: number) {
    super("RECORD_TOO_LARGE", `record of ${recordLength} bytes does not fit a ${bufferLength}-byte read buffer`);
    this.recordLength = recordLength;
    this.bufferLength = bufferLength;
  }
}

export class LineReaderOptionError extends LinewiseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_OPTION", message, options);
  }
}

export class ConfigError extends LinewiseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_CONFIG", message, options);
  }
}
