/**
 * InfrastructureError
 *
 * Thrown when the persistence layer fails, including:
 * - Data file that cannot be read or written
 * - Data file that is not valid JSON
 * - Data file that does not match the expected schema
 *
 * A missing data file is not an error: the repository treats it as an empty book.
 */
export class InfrastructureError extends Error {
  public constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'InfrastructureError';

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InfrastructureError);
    }
  }
}
