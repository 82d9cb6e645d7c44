import { DomainError } from './DomainError';

/**
 * Thrown when a command receives fewer arguments than it needs
 */
export class MissingArgumentError extends DomainError {
  public constructor(
    command: string,
    expected: number,
    received: number
  ) {
    super(`Command "${command}" expects ${expected} argument(s), got ${received}`);
  }
}
