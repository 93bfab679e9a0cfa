/**
 * Raised when GPX input is not well-formed XML or yields no usable track.
 */
export class FormatError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FormatError';
  }
}

/**
 * Raised when input is well-formed but cannot be processed, e.g. no points to split.
 */
export class ValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

export function isClientError(error: unknown): error is FormatError | ValidationError {
  return error instanceof FormatError || error instanceof ValidationError;
}
