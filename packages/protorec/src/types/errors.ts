/**
 * Error codes for protorec.
 */

export enum ErrorCode {
  /** Underlying storage failure */
  ERR_IO = 1,

  /** File does not start with the protorec magic */
  ERR_BAD_MAGIC = 2,

  /** File was written with an incompatible major format version */
  ERR_UNSUPPORTED_VERSION = 3,

  /** Fewer bytes remain than a frame declares */
  ERR_TRUNCATED_FRAME = 4,

  /** Frame boundary cannot be determined */
  ERR_STREAM_CORRUPT = 5,

  /** Schema tag or kind is not registered */
  ERR_UNKNOWN_SCHEMA = 6,

  /** Payload does not match its schema */
  ERR_SCHEMA_MISMATCH = 7,

  /** Payload is larger than the maximum frame length */
  ERR_FRAME_TOO_LARGE = 8,

  /** Tag or (kind, version) registered twice */
  ERR_DUPLICATE_SCHEMA = 9,

  /** Schema definition cannot be used */
  ERR_INVALID_SCHEMA = 10,

  /** Writer was closed or failed */
  ERR_WRITER_CLOSED = 11,

  /** Reader sequence was already started */
  ERR_READER_CONSUMED = 12,
}

/**
 * Get human-readable description for error code
 */
export function getErrorMessage(code: ErrorCode): string {
  const messages: Record<ErrorCode, string> = {
    [ErrorCode.ERR_IO]: 'I/O error',
    [ErrorCode.ERR_BAD_MAGIC]: 'Bad magic number',
    [ErrorCode.ERR_UNSUPPORTED_VERSION]: 'Unsupported format version',
    [ErrorCode.ERR_TRUNCATED_FRAME]: 'Truncated frame',
    [ErrorCode.ERR_STREAM_CORRUPT]: 'Stream corrupt',
    [ErrorCode.ERR_UNKNOWN_SCHEMA]: 'Unknown schema',
    [ErrorCode.ERR_SCHEMA_MISMATCH]: 'Payload does not match schema',
    [ErrorCode.ERR_FRAME_TOO_LARGE]: 'Frame too large',
    [ErrorCode.ERR_DUPLICATE_SCHEMA]: 'Duplicate schema',
    [ErrorCode.ERR_INVALID_SCHEMA]: 'Invalid schema definition',
    [ErrorCode.ERR_WRITER_CLOSED]: 'Writer is closed',
    [ErrorCode.ERR_READER_CONSUMED]: 'Reader sequence already started',
  };
  return messages[code] ?? 'Unknown error';
}

export interface ErrorDetails {
  /** Byte offset of the frame (or header field) involved */
  position?: number;
  /** Zero-based record index */
  index?: number;
  /** Schema tag involved */
  tag?: number;
  cause?: unknown;
}

/**
 * Custom error class for protorec errors
 */
export class ProtorecError extends Error {
  readonly position?: number;
  readonly index?: number;
  readonly tag?: number;

  constructor(
    public readonly code: ErrorCode,
    message?: string,
    details: ErrorDetails = {}
  ) {
    super(message ?? getErrorMessage(code), details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'ProtorecError';
    this.position = details.position;
    this.index = details.index;
    this.tag = details.tag;
  }
}

/**
 * Per-record content errors. The reader reports these and moves on to the next
 * frame; every other code stops the sequence.
 */
export function isRecoverable(error: unknown): error is ProtorecError {
  return (
    error instanceof ProtorecError &&
    (error.code === ErrorCode.ERR_UNKNOWN_SCHEMA || error.code === ErrorCode.ERR_SCHEMA_MISMATCH)
  );
}

/**
 * Frame-boundary errors: nothing after them can be located
 */
export function isTerminal(error: unknown): error is ProtorecError {
  return (
    error instanceof ProtorecError &&
    (error.code === ErrorCode.ERR_TRUNCATED_FRAME || error.code === ErrorCode.ERR_STREAM_CORRUPT)
  );
}

/**
 * Wrap a storage failure from node:fs
 */
export function ioError(action: string, cause: unknown): ProtorecError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new ProtorecError(ErrorCode.ERR_IO, `${action}: ${detail}`, { cause });
}
