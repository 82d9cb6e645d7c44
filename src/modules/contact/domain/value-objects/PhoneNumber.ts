import { InvalidPhoneNumberError } from '../../../../domain/errors/InvalidPhoneNumberError';

const PHONE_PATTERN = /^\d{10}$/;

/**
 * PhoneNumber value object
 * Exactly 10 ASCII digits, no separators or country prefix
 */
export class PhoneNumber {
  private readonly value: string;

  public constructor(value: string) {
    if (!PhoneNumber.isValid(value)) {
      throw new InvalidPhoneNumberError(value);
    }
    this.value = value;
  }

  public static isValid(value: string): boolean {
    return PHONE_PATTERN.test(value);
  }

  public toString(): string {
    return this.value;
  }

  public equals(other: PhoneNumber): boolean {
    return this.value === other.value;
  }
}
