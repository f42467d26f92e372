/**
 * Error raised when input cannot be interpreted as EDI or XML at all.
 *
 * Malformed content inside a readable document never raises: short or
 * missing fields become absent slots and undecodable typed values keep
 * their literal text.
 */

export type FormatErrorCode =
  | 'ELEMENT_SEPARATOR_UNDETERMINED'
  | 'SEGMENT_TERMINATOR_UNDETERMINED'
  | 'INVALID_XML';

export class FormatError extends Error {
  constructor(
    message: string,
    public readonly code: FormatErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FormatError';
  }
}

export function isFormatError(error: unknown): error is FormatError {
  return error instanceof FormatError;
}
