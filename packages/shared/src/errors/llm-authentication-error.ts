/**
 * LLMAuthenticationError
 *
 * Thrown when the model provider rejects the configured credentials.
 * Callers treat it as fatal for the whole run.
 */
export class LLMAuthenticationError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'LLMAuthenticationError';
  }

  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  static fromError(
    context: string,
    error: unknown,
    statusCode?: number,
  ): LLMAuthenticationError {
    return new LLMAuthenticationError(
      `${context}: ${LLMAuthenticationError.getErrorMessage(error)}`,
      statusCode,
      { cause: error },
    );
  }
}
