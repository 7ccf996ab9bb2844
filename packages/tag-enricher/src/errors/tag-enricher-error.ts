/**
 * TagEnricherError
 *
 * Base error class for argument and input failures raised before any
 * element is enriched.
 */
export class TagEnricherError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TagEnricherError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create TagEnricherError from unknown error with context
   */
  static fromError(context: string, error: unknown): TagEnricherError {
    return new TagEnricherError(
      `${context}: ${TagEnricherError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * TagPatternError
 *
 * Error thrown when the tag pattern is not a valid regular expression.
 */
export class TagPatternError extends TagEnricherError {
  constructor(
    readonly pattern: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid tag pattern "${pattern}"`, options);
    this.name = 'TagPatternError';
  }
}

/**
 * UnknownOperationError
 *
 * Error thrown for an operation name outside the supported set.
 */
export class UnknownOperationError extends TagEnricherError {
  constructor(readonly operation: string) {
    super(`Unknown operation "${operation}"`);
    this.name = 'UnknownOperationError';
  }
}

/**
 * UnsupportedInputError
 *
 * Error thrown when the input and output file types cannot be combined
 * for the requested operation.
 */
export class UnsupportedInputError extends TagEnricherError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedInputError';
  }
}

/**
 * ImageReadError
 *
 * Error thrown when an image input cannot be read or decoded.
 */
export class ImageReadError extends TagEnricherError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ImageReadError';
  }

  static fromError(context: string, error: unknown): ImageReadError {
    return new ImageReadError(
      `${context}: ${TagEnricherError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
