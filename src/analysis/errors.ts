/**
 * Base class for every failure the analyzer reports to the user.
 */
export class BookStatsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The source path does not exist or cannot be accessed.
 */
export class SourceNotFoundError extends BookStatsError {
  constructor(public readonly sourcePath: string, cause?: unknown) {
    super(`Source not found: ${sourcePath}`, { cause });
  }
}

/**
 * The source exists but no chapter text could be derived from it.
 */
export class ExtractionError extends BookStatsError {
  constructor(public readonly sourcePath: string, cause?: unknown) {
    super(`Could not extract chapters from ${sourcePath}: ${describeCause(cause)}`, { cause });
  }
}

/**
 * A token encoder could not be loaded or failed on its input.
 */
export class EncodingError extends BookStatsError {
  constructor(public readonly encoding: string, cause?: unknown) {
    super(`Encoding "${encoding}" failed: ${describeCause(cause)}`, { cause });
  }
}

/**
 * The report destination could not be written.
 */
export class WriteError extends BookStatsError {
  constructor(public readonly destination: string, cause?: unknown) {
    super(`Could not write report to ${destination}: ${describeCause(cause)}`, { cause });
  }
}

export class ConfigurationError extends BookStatsError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

/**
 * Formats an unknown thrown value for an error message
 * @param cause - The thrown value
 * @returns A one-line description
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (cause === undefined) {
    return 'Unknown error';
  }
  return String(cause);
}
