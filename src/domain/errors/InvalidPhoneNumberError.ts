import { ValidationError } from './ValidationError';

/**
 * Thrown when a phone number is not exactly 10 digits
 */
export class InvalidPhoneNumberError extends ValidationError {
  public constructor(value: string) {
    super(`Invalid phone number: ${value}. Must contain exactly 10 digits.`);
  }
}
