/**
 * Base class for all domain errors
 * Extends Error so the CLI boundary can tell domain failures apart from unexpected ones
 */
export class DomainError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
