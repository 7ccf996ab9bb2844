/**
 * CliError
 *
 * Base error class for invalid command line input.
 */
export class CliError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CliError';
  }
}

/**
 * OptionsError
 *
 * Error thrown when option values fail validation.
 */
export class OptionsError extends CliError {
  constructor(
    message: string,
    readonly issues: string[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'OptionsError';
  }
}

/**
 * MissingApiKeyError
 *
 * Error thrown when no OpenAI API key is given on the command line or in
 * the environment.
 */
export class MissingApiKeyError extends CliError {
  constructor() {
    super('Invalid or missing OpenAI API key: pass --openai-key or set OPENAI_API_KEY');
    this.name = 'MissingApiKeyError';
  }
}
