/**
 * Error taxonomy.
 *
 * Only ParseError and FileProcessingError reach the batch driver as file
 * failures. Capability failures are recovered where they happen.
 */

/**
 * Source text is not valid Python. Fatal for that file only.
 */
export class ParseError extends Error {
  constructor(
    public readonly diagnostic: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(`${diagnostic} (line ${line}, column ${column})`);
    this.name = 'ParseError';
  }
}

/**
 * The generation capability failed or produced unusable text.
 */
export class GenerationFailure extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'GenerationFailure';
  }
}

/**
 * The evaluation capability failed or produced an unusable review.
 */
export class EvaluationFailure extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'EvaluationFailure';
  }
}

/**
 * A capability answered, but not in the expected envelope.
 */
export class AIValidationError extends Error {
  constructor(
    message: string,
    public readonly rawResponse: string
  ) {
    super(message);
    this.name = 'AIValidationError';
  }
}

/**
 * A configuration value could not be accepted.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key: string,
    public readonly source: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Reading, cancelling or writing a file failed.
 */
export class FileProcessingError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'FileProcessingError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
