import { ValidationError } from './ValidationError';

/**
 * Thrown when a birthday is not a real calendar date in DD.MM.YYYY format
 */
export class InvalidBirthdayError extends ValidationError {
  public constructor(value: string) {
    super(`Invalid date format: ${value}. Use DD.MM.YYYY`);
  }
}
